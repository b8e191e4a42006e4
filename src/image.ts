/**
 * Copyright (c) 2024 Discover Financial Services
*/
import { cv } from './ocv.js';
import type { HsvTriple } from './config.js';
import type { Context } from './context.js';
import { Contour, FilterContourOpts } from './contour.js';
import type { Box, Quad } from './box.js';
import { Util } from './util.js';

export type PixelFormat = "rgb" | "rgba" | "gray";

/**
 * A decoded image supplied by the host application.  Pixels are stored row
 * by row, interleaved, one byte per channel.
 */
export interface PixelImage {
    width: number;
    height: number;
    format: PixelFormat;
    data: Uint8Array | Uint8ClampedArray;
}

export interface GetContoursOpts extends FilterContourOpts {
    mode?: number;
    method?: number;
};

export enum ImageFormat {
    PNG = "image/png",
}

export interface NamedImageInfo {
    name: string;
    format: ImageFormat;
    width: number;
    height: number;
    buffer: Buffer;
}

const channelsPerFormat: { [format in PixelFormat]: number } = {
    rgb: 3,
    rgba: 4,
    gray: 1,
};

/**
 * An immutable raster.  Every operation returns a new Image whose mat is
 * owned by the same Context.
 */
export class Image {

    /**
     * Normalize a host pixel buffer into a 3-channel RGB image.
     * @throws if the buffer length does not match width, height and format
     */
    public static fromPixels(raw: PixelImage, ctx: Context, opts?: { name?: string }): Image {
        opts = opts || {};
        const name = opts.name || "original";
        const channels = channelsPerFormat[raw.format];
        if (channels === undefined) throw new Error(`Invalid pixel format: '${raw.format}'; expecting one of ${JSON.stringify(Object.keys(channelsPerFormat))}`);
        if (!Number.isInteger(raw.width) || !Number.isInteger(raw.height) || raw.width < 0 || raw.height < 0) {
            throw new Error(`Invalid image dimensions: ${raw.width}x${raw.height}`);
        }
        const expected = raw.width * raw.height * channels;
        if (raw.data.length !== expected) {
            throw new Error(`Pixel buffer of a ${raw.width}x${raw.height} ${raw.format} image must have ${expected} bytes but found ${raw.data.length}`);
        }
        if (expected === 0) return new Image(name, ctx.newCustomMat(0, 0, cv.CV_8UC3), ctx);
        const type = channels === 1 ? cv.CV_8UC1 : channels === 3 ? cv.CV_8UC3 : cv.CV_8UC4;
        const src = ctx.newCustomMat(raw.height, raw.width, type);
        src.data.set(raw.data);
        if (raw.format === "rgb") return new Image(name, src, ctx);
        const dst = ctx.newMat();
        cv.cvtColor(src, dst, raw.format === "gray" ? cv.COLOR_GRAY2RGB : cv.COLOR_RGBA2RGB);
        return new Image(name, dst, ctx);
    }

    /**
     * Decode an encoded image file (PNG, JPEG, BMP, TIFF or GIF).
     */
    public static async fromBuffer(buf: Buffer | ArrayBuffer | Uint8Array, ctx: Context, opts?: { name?: string }): Promise<Image> {
        const decoded = await Util.decodeImage(buf);
        return Image.fromPixels({ ...decoded, format: "rgba" }, ctx, opts);
    }

    public readonly name: string;
    public readonly mat: cv.Mat;
    public readonly width: number;
    public readonly height: number;
    public readonly ctx: Context;

    public constructor(name: string, mat: cv.Mat, ctx: Context) {
        this.name = name;
        this.mat = mat;
        this.width = mat.cols;
        this.height = mat.rows;
        this.ctx = ctx;
    }

    public isEmpty(): boolean {
        return this.width <= 0 || this.height <= 0;
    }

    public channels(): number {
        return this.mat.channels();
    }

    public hsv(opts?: { name?: string }): Image {
        const self = this;
        opts = opts || {};
        const name = opts.name || "hsv";
        return this.newImage(name, (newMat: cv.Mat) => {
            cv.cvtColor(self.mat, newMat, cv.COLOR_RGB2HSV);
        });
    }

    /**
     * A binary mask of the pixels inside the inclusive range on every channel.
     */
    public inRange(lower: HsvTriple, upper: HsvTriple, opts?: { name?: string }): Image {
        const self = this;
        opts = opts || {};
        const name = opts.name || "in-range";
        const type = this.mat.type();
        const lowerMat = this.ctx.addDeletable(new cv.Mat(this.height, this.width, type, new cv.Scalar(lower[0], lower[1], lower[2], 0)));
        const upperMat = this.ctx.addDeletable(new cv.Mat(this.height, this.width, type, new cv.Scalar(upper[0], upper[1], upper[2], 255)));
        return this.newImage(name, (newMat: cv.Mat) => {
            cv.inRange(self.mat, lowerMat, upperMat, newMat);
        });
    }

    public bitwiseOr(other: Image, opts?: { name?: string }): Image {
        const self = this;
        opts = opts || {};
        const name = opts.name || "or";
        return this.newImage(name, (newMat: cv.Mat) => {
            cv.bitwise_or(self.mat, other.mat, newMat);
        });
    }

    public dilate(opts?: { name?: string, width?: number, height?: number, iterations?: number }): Image {
        const self = this;
        opts = opts || {};
        const name = opts.name || "dilation";
        const width = opts.width || 2;
        const height = opts.height || 2;
        const iterations = opts.iterations || 1;
        const kernel = this.newKernel(width, height);
        return this.newImage(name, (newMat: cv.Mat) => {
            cv.dilate(self.mat, newMat, kernel, new cv.Point(-1, -1), iterations);
        });
    }

    public close(opts?: { name?: string, width?: number, height?: number, iterations?: number }): Image {
        opts = opts || {};
        opts.name = opts.name || "closed";
        return this.morph(cv.MORPH_CLOSE, opts);
    }

    /**
     * Perform a morphology operation with a rectangular kernel.
     * @param op The openCV operation associated with this operation (cv.MORPH_*)
     */
    public morph(op: number, opts?: { name?: string, width?: number, height?: number, iterations?: number }): Image {
        const self = this;
        opts = opts || {};
        const name = opts.name || "morph";
        const width = opts.width || 5;
        const height = opts.height || 3;
        const kernel = this.newKernel(width, height);
        const iterations = opts.iterations || 1;
        return this.newImage(name, (newMat: cv.Mat) => {
            cv.morphologyEx(self.mat, newMat, op, kernel, new cv.Point(-1, -1), iterations);
        });
    }

    public resize(width: number, height: number, opts?: { name?: string, interpolation?: number }): Image {
        const self = this;
        opts = opts || {};
        const name = opts.name || `${this.name}-resized`;
        const interpolation = opts.interpolation ?? cv.INTER_LINEAR;
        return this.newImage(name, (newMat: cv.Mat) => {
            cv.resize(self.mat, newMat, new cv.Size(width, height), 0, 0, interpolation);
        });
    }

    public roi(name: string, rect: cv.Rect): Image {
        const x2 = rect.x + rect.width;
        const y2 = rect.y + rect.height;
        if (rect.x < 0 || rect.y < 0 || x2 > this.width || y2 > this.height) {
            throw new Error(`Rectangle expands beyond image boundary: width=${this.width}, height=${this.height}, rectangle=${JSON.stringify(rect)}`);
        }
        const roiMat = this.mat.roi(rect);
        const newMat = this.newCustomMat(rect.height, rect.width, this.mat.type());
        roiMat.copyTo(newMat);
        roiMat.delete();
        return new Image(name, newMat, this.ctx);
    }

    /**
     * Map an ordered quadrilateral (TL, TR, BR, BL) onto an upright
     * width x height image with bilinear sampling.  Pixels sampled outside
     * the source replicate the nearest border pixel.
     */
    public warpQuad(quad: Quad, width: number, height: number, opts?: { name?: string }): Image {
        const self = this;
        opts = opts || {};
        const name = opts.name || "warped";
        const [tl, tr, br, bl] = quad;
        const src = this.ctx.addDeletable(cv.matFromArray(4, 1, cv.CV_32FC2, [tl.x, tl.y, tr.x, tr.y, br.x, br.y, bl.x, bl.y]));
        const dst = this.ctx.addDeletable(cv.matFromArray(4, 1, cv.CV_32FC2, [0, 0, width, 0, width, height, 0, height]));
        const m = this.ctx.addDeletable(cv.getPerspectiveTransform(src, dst));
        return this.newImage(name, (newMat: cv.Mat) => {
            cv.warpPerspective(self.mat, newMat, m, new cv.Size(width, height), cv.INTER_LINEAR, cv.BORDER_REPLICATE, new cv.Scalar());
        });
    }

    /**
     * Normalize to (v/255 - 0.5)/0.5 in planar channel-height-width order.
     */
    public toPlanarFloat(): Float32Array {
        const channels = this.channels();
        const plane = this.width * this.height;
        const data = this.mat.data;
        const rtn = new Float32Array(channels * plane);
        for (let i = 0; i < plane; i++) {
            for (let c = 0; c < channels; c++) {
                const v = data[i * channels + c] ?? 0;
                rtn[c * plane + i] = (v / 255 - 0.5) / 0.5;
            }
        }
        return rtn;
    }

    public getContours(opts?: GetContoursOpts): Contour[] {
        opts = opts || {};
        const mode = opts.mode ?? cv.RETR_EXTERNAL;
        const method = opts.method ?? cv.CHAIN_APPROX_SIMPLE;
        const vector = this.newMatVector();
        const hierarchy = this.newMat();
        cv.findContours(this.mat, vector, hierarchy, mode, method);
        if (this.ctx.isDebugEnabled()) this.ctx.debug(`total number of contours returned by opencv: ${vector.size()}`);
        let contours: Contour[] = [];
        const count = vector.size();
        for (let i = 0; i < count; i++) {
            const c = this.ctx.addDeletable(vector.get(i));
            const contour = new Contour(c, this);
            contour.idx = i;
            contours.push(contour);
        }
        contours = Contour.filterContours(contours, opts);
        if (this.ctx.isDebugEnabled()) this.ctx.debug(`${contours.length} contours kept in image ${this.name}`);
        return contours;
    }

    public rgb(opts?: { name?: string }): Image {
        const self = this;
        opts = opts || {};
        const name = opts.name || "rgb";
        if (this.channels() === 3) return this.clone(name);
        return this.newImage(name, (newMat: cv.Mat) => {
            cv.cvtColor(self.mat, newMat, self.channels() === 1 ? cv.COLOR_GRAY2RGB : cv.COLOR_RGBA2RGB);
        });
    }

    public display(name?: string) {
        this.ctx.addImage(this, name);
    }

    public drawBoxes(name: string, boxes: Box[], opts?: { color?: cv.Scalar, thickness?: number, display?: boolean }): Image {
        opts = opts || {};
        const color = opts.color || new cv.Scalar(255, 0, 0, 255);
        const thickness = opts.thickness || 1;
        const display = opts.display ?? true;
        const image = this.rgb({ name });
        for (const box of boxes) {
            const pts = box.points;
            for (let i = 0; i < pts.length; i++) {
                const p1 = pts[i];
                const p2 = pts[(i + 1) % pts.length];
                if (!p1 || !p2) continue;
                cv.line(image.mat, new cv.Point(Math.round(p1.x), Math.round(p1.y)), new cv.Point(Math.round(p2.x), Math.round(p2.y)), color, thickness);
            }
        }
        if (display) image.display();
        return image;
    }

    private newImage(name: string, fcn: (mat: cv.Mat) => void): Image {
        if (this.ctx.isVerboseEnabled()) this.ctx.verbose(`begin newImage ${name}`);
        const newImg = this.newMat();
        fcn(newImg);
        const rtn = new Image(name, newImg, this.ctx);
        if (this.ctx.isVerboseEnabled()) this.ctx.verbose(`end newImage ${name}`);
        return rtn;
    }

    public newMat(): cv.Mat {
        return this.ctx.newMat();
    }

    public newCustomMat(height: number, width: number, type: number): cv.Mat {
        return this.ctx.newCustomMat(height, width, type);
    }

    private newMatVector(): cv.MatVector {
        return this.ctx.newMatVector();
    }

    private newKernel(width: number, height: number): cv.Mat {
        const kernel = cv.getStructuringElement(cv.MORPH_RECT, new cv.Size(width, height));
        this.ctx.addDeletable(kernel);
        return kernel;
    }

    public async toBuffer(): Promise<Buffer> {
        return await Util.matToPng(this.mat);
    }

    public clone(name?: string): Image {
        name = name || this.name;
        return new Image(name, this.ctx.addDeletable(this.mat.clone()), this.ctx);
    }

    public toJSON() {
        return { name: this.name, width: this.width, height: this.height };
    }

    public async serialize(): Promise<NamedImageInfo> {
        const buffer = await this.toBuffer();
        return { name: this.name, format: ImageFormat.PNG, buffer, width: this.width, height: this.height };
    }

}

export class Images {

    private images: Image[] = [];

    constructor() {
    }

    public add(image: Image) {
        this.images.push(image);
    }

    public get length(): number {
        return this.images.length;
    }

    public names(): string[] {
        return this.images.map((i) => i.name);
    }

    public isEmpty(): boolean {
        return this.images.length == 0;
    }

    public async serialize(): Promise<NamedImageInfo[] | undefined> {
        if (this.isEmpty()) return undefined;
        const rtn: NamedImageInfo[] = [];
        for (const image of this.images) {
            rtn.push(await image.serialize());
        }
        return rtn;
    }
}
