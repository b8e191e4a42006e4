/**
 * Copyright (c) 2024 Discover Financial Services
*/
import { Config, ConfigOpts, Context, Image, OCV, RegionDetector } from "../src";
import { blankPixels, fillRect, twoWordPage } from "./fakes.js";

describe('RegionDetector', () => {

    let ctx: Context;

    beforeAll(async () => {
        await OCV.init();
    });

    beforeEach(() => {
        ctx = Context.obtain("detector-test");
    });

    afterEach(() => {
        ctx.release();
    });

    function detector(opts?: ConfigOpts): RegionDetector {
        const cfg = new Config();
        if (opts) cfg.merge(opts);
        return new RegionDetector(cfg);
    }

    test('a dark rectangle becomes one box grown by the dilation kernel', () => {
        const image = Image.fromPixels(fillRect(blankPixels(100, 100), 20, 30, 20, 20), ctx);
        const boxes = detector().detect(image);
        expect(boxes.map((b) => b.toArray())).toEqual([[[18, 29], [42, 29], [42, 51], [18, 51]]]);
    });

    test('a blank page has no boxes', () => {
        const image = Image.fromPixels(blankPixels(100, 60), ctx);
        expect(detector().detect(image)).toEqual([]);
        expect(detector().detectOutcome(image).kind).toBe("empty");
    });

    test('an empty image has no boxes', () => {
        const image = Image.fromPixels({ width: 0, height: 0, format: "rgb", data: new Uint8Array(0) }, ctx);
        expect(detector().detectOutcome(image)).toEqual({ kind: "empty" });
    });

    test('specks below the minimum size are dropped', () => {
        const image = Image.fromPixels(fillRect(blankPixels(100, 100), 50, 50, 3, 3), ctx);
        expect(detector().detect(image)).toEqual([]);
        expect(detector({ minGlyphWidth: 5, minGlyphHeight: 5, minAspectRatio: 0.1 }).detect(image).length).toBe(1);
    });

    test('long thin strokes fail the aspect ratio bounds', () => {
        const image = Image.fromPixels(fillRect(blankPixels(300, 60), 10, 20, 250, 8), ctx);
        expect(detector().detect(image)).toEqual([]);
        expect(detector({ maxAspectRatio: 60 }).detect(image).length).toBe(1);
    });

    test('colored ink is found through the second range', () => {
        const image = Image.fromPixels(fillRect(blankPixels(100, 100), 20, 30, 20, 20, [120, 40, 40]), ctx);
        expect(detector().detect(image).length).toBe(1);
        expect(detector({ inkRanges: [{ lower: [0, 0, 0], upper: [180, 255, 100] }] }).detect(image)).toEqual([]);
    });

    test('boxes come out in reading order', () => {
        const img = blankPixels(120, 120);
        fillRect(img, 80, 70, 20, 20);
        fillRect(img, 10, 72, 20, 20);
        fillRect(img, 60, 10, 20, 20);
        const boxes = detector().detect(Image.fromPixels(img, ctx));
        expect(boxes.map((b) => [b.minX, b.minY])).toEqual([[58, 9], [78, 69], [8, 71]]);
    });

    test('pre-recognition grouping merges neighboring glyphs', () => {
        const image = Image.fromPixels(twoWordPage(), ctx);
        expect(detector().detect(image).length).toBe(4);
        const words = [[[8, 29], [62, 29], [62, 51], [8, 51]], [[118, 29], [172, 29], [172, 51], [118, 51]]];
        expect(detector({ detectorGrouping: "line_word" }).detect(image).map((b) => b.toArray())).toEqual(words);
        expect(detector({ detectorGrouping: "dilation" }).detect(image).map((b) => b.toArray())).toEqual(words);
        expect(detector({ detectorGrouping: "line_word" }).detect(image, { grouping: "none" }).length).toBe(4);
    });

    test('debug images are collected on request', () => {
        ctx.debugImages = true;
        const image = Image.fromPixels(twoWordPage(), ctx);
        detector().detect(image);
        expect(ctx.images.names()).toEqual(["ink-mask", "morphed-mask", "detected-boxes"]);
    });

});
