/**
 * Copyright (c) 2024 Discover Financial Services
*/
import { Context, Image, OCV, Outcomes, Util } from "../src";

describe('Util', () => {

    test('median takes the upper middle element', () => {
        expect(Util.median([3, 1, 2, 4])).toBe(3);
        expect(Util.median([5, 1, 9])).toBe(5);
        expect(Util.median([])).toBe(0);
    });

    test('average', () => {
        expect(Util.average([1, 2, 6])).toBe(3);
        expect(Util.average([])).toBe(0);
    });

    test('distance', () => {
        expect(Util.distance({ x: 0, y: 0 }, { x: 3, y: 4 })).toBe(5);
    });

    test('debug categories', () => {
        expect(Util.debug({ debug: ["images"] }, "images")).toBe(true);
        expect(Util.debug({ debug: ["*"] }, "images")).toBe(true);
        expect(Util.debug({ debug: ["timing"] }, "images")).toBe(false);
        expect(Util.debug({}, "images")).toBe(false);
    });

});

describe('Outcomes', () => {

    test('attempt turns a thrown error into a failed outcome', () => {
        const outcome = Outcomes.attempt<number>(() => { throw new Error("no model"); });
        expect(outcome.kind).toBe("failed");
        if (outcome.kind === "failed") expect(outcome.error.message).toBe("no model");
    });

    test('fromArray, map and getOrElse', () => {
        expect(Outcomes.fromArray([])).toEqual({ kind: "empty" });
        expect(Outcomes.map(Outcomes.fromArray([1, 2]), (v) => v.length)).toEqual({ kind: "ok", value: 2 });
        expect(Outcomes.getOrElse(Outcomes.empty<number[]>(), [7])).toEqual([7]);
    });

});

describe('image encoding', () => {

    let ctx: Context;

    beforeAll(async () => {
        await OCV.init();
    });

    beforeEach(() => {
        ctx = Context.obtain("util-test");
    });

    afterEach(() => {
        ctx.release();
    });

    test('a PNG written from a mat decodes to the same pixels', async () => {
        const data = new Uint8Array([255, 0, 0, 0, 255, 0, 0, 0, 255, 10, 20, 30, 40, 50, 60, 70, 80, 90]);
        const image = Image.fromPixels({ width: 3, height: 2, format: "rgb", data }, ctx);
        const png = await Util.matToPng(image.mat);
        expect([...png.subarray(0, 4)]).toEqual([0x89, 0x50, 0x4e, 0x47]);
        const decoded = await Util.decodeImage(png);
        expect([decoded.width, decoded.height]).toEqual([3, 2]);
        expect([...decoded.data.subarray(0, 8)]).toEqual([255, 0, 0, 255, 0, 255, 0, 255]);
        expect([...decoded.data.subarray(20, 24)]).toEqual([70, 80, 90, 255]);
    });

    test('undecodable bytes are rejected', async () => {
        await expect(Util.decodeImage(Buffer.from("not an image"))).rejects.toThrow(/^Failed to decode image/);
    });

});
