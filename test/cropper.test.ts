/**
 * Copyright (c) 2024 Discover Financial Services
*/
import { Box, Context, Image, OCV, PerspectiveCropper, PixelImage, cv } from "../src";

function gradient(width: number, height: number): PixelImage {
    const data = new Uint8Array(width * height * 3);
    for (let y = 0; y < height; y++) {
        for (let x = 0; x < width; x++) {
            const i = (y * width + x) * 3;
            data[i] = (x * 7) % 256;
            data[i + 1] = (y * 11) % 256;
            data[i + 2] = (x * y) % 256;
        }
    }
    return { width, height, format: "rgb", data };
}

/**
 * Gray levels that are constant along lines of slope 2, so a band of equal
 * value runs diagonally down and to the right: value = 8x - 4(y - 5).
 */
function diagonalBands(width: number, height: number): PixelImage {
    const data = new Uint8Array(width * height * 3);
    for (let y = 0; y < height; y++) {
        for (let x = 0; x < width; x++) {
            const v = Math.min(255, Math.max(0, 8 * x - 4 * (y - 5)));
            data.fill(v, (y * width + x) * 3, (y * width + x) * 3 + 3);
        }
    }
    return { width, height, format: "rgb", data };
}

describe('PerspectiveCropper', () => {

    let ctx: Context;
    const cropper = new PerspectiveCropper();

    beforeAll(async () => {
        await OCV.init();
    });

    beforeEach(() => {
        ctx = Context.obtain("cropper-test");
    });

    afterEach(() => {
        ctx.release();
    });

    test('an axis-aligned box at the origin crops the same pixels as a plain crop', () => {
        const image = Image.fromPixels(gradient(40, 30), ctx);
        const box = Box.fromArray([[0, 0], [10, 0], [10, 5], [0, 5]]);
        const warped = cropper.cropAndStraighten(image, box);
        const plain = image.roi("plain", new cv.Rect(0, 0, 10, 5));
        expect([warped.width, warped.height]).toEqual([10, 5]);
        expect([...warped.mat.data]).toEqual([...plain.mat.data]);
    });

    test('an offset box given in any point order crops the same pixels as a plain crop', () => {
        const image = Image.fromPixels(gradient(40, 30), ctx);
        const box = Box.fromArray([[13, 12], [3, 2], [13, 2], [3, 12]]);
        const warped = cropper.cropAndStraighten(image, box);
        const plain = image.roi("plain", new cv.Rect(3, 2, 10, 10));
        expect([...warped.mat.data]).toEqual([...plain.mat.data]);
    });

    test('a rotated quad is straightened to its longest edges', () => {
        const quad = Box.orderPoints(Box.fromArray([[10, 0], [20, 10], [10, 20], [0, 10]]).points);
        expect(PerspectiveCropper.outputSize(quad)).toEqual({ width: 14, height: 14 });
        const image = Image.fromPixels(gradient(40, 30), ctx);
        const warped = cropper.cropAndStraighten(image, Box.fromArray([[10, 0], [20, 10], [10, 20], [0, 10]]));
        expect([warped.width, warped.height, warped.channels()]).toEqual([14, 14, 3]);
    });

    test('a sheared quad along the bands comes out with upright bands', () => {
        const image = Image.fromPixels(diagonalBands(40, 30), ctx);
        const warped = cropper.cropAndStraighten(image, Box.fromArray([[20, 25], [10, 5], [30, 25], [20, 5]]));
        expect([warped.width, warped.height]).toEqual([10, 22]);
        const data = warped.mat.data;
        const off: number[][] = [];
        for (let y = 0; y < warped.height; y++) {
            for (let x = 0; x < warped.width; x++) {
                const v = data[(y * warped.width + x) * 3] ?? -1;
                if (Math.abs(v - (80 + 8 * x)) > 1) off.push([x, y, v]);
            }
        }
        expect(off).toEqual([]);
    });

    test('degenerate boxes are clamped to one pixel', () => {
        const image = Image.fromPixels(gradient(40, 30), ctx);
        const warped = cropper.cropAndStraighten(image, Box.fromRect(5, 5, 0, 0));
        expect([warped.width, warped.height]).toEqual([1, 1]);
    });

});
