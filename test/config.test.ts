/**
 * Copyright (c) 2024 Discover Financial Services
*/
import { Config } from "../src";

describe('Config', () => {

    test('defaults', () => {
        const cfg = new Config();
        expect([cfg.minGlyphWidth, cfg.minGlyphHeight, cfg.maxGlyphWidth, cfg.maxGlyphHeight]).toEqual([15, 8, 1000, 200]);
        expect([cfg.minAspectRatio, cfg.maxAspectRatio, cfg.minConfidence]).toEqual([0.5, 20, 0.3]);
        expect(cfg.groupingStrategy).toBe("line_word");
        expect(cfg.detectorGrouping).toBe("none");
        expect([cfg.wordSpacingRatio, cfg.dilationX, cfg.dilationY]).toEqual([1.5, 0.5, 0.3]);
        expect([cfg.preLineThresholdRatio, cfg.postLineThresholdRatio]).toEqual([0.3, 0.5]);
        expect(cfg.inkRanges).toEqual([
            { lower: [0, 0, 0], upper: [180, 255, 100] },
            { lower: [0, 50, 50], upper: [180, 255, 150] },
        ]);
        expect(cfg.validate()).toBe(cfg);
    });

    test('presets', () => {
        const hw = Config.preset("handwriting");
        expect([hw.minGlyphWidth, hw.minGlyphHeight, hw.maxGlyphWidth, hw.maxGlyphHeight]).toEqual([10, 6, 1500, 300]);
        expect([hw.minAspectRatio, hw.maxAspectRatio, hw.minConfidence]).toEqual([0.3, 25, 0.3]);
        const printed = Config.preset("printed", { wordSpacingRatio: 2 });
        expect([printed.minGlyphWidth, printed.minConfidence, printed.wordSpacingRatio]).toEqual([15, 0.4, 2]);
    });

    test('merge only overlays fields that are set', () => {
        const cfg = new Config();
        cfg.merge({ minConfidence: 0.6, groupingStrategy: "dilation" });
        expect(cfg.minConfidence).toBe(0.6);
        expect(cfg.groupingStrategy).toBe("dilation");
        expect(cfg.minGlyphWidth).toBe(15);
    });

    test('clone copies ink ranges', () => {
        const cfg = new Config();
        const copy = cfg.clone({ maxGlyphWidth: 500 });
        const first = copy.inkRanges[0];
        if (first) first.upper[2] = 90;
        expect(cfg.inkRanges[0]?.upper).toEqual([180, 255, 100]);
        expect(copy.maxGlyphWidth).toBe(500);
        expect(cfg.maxGlyphWidth).toBe(1000);
    });

    test('fromEnv maps OCR_ variables to fields', () => {
        const cfg = Config.fromEnv({
            HOME: "/home/test",
            OCR_MIN_GLYPH_WIDTH: "12",
            OCR_GROUPING_STRATEGY: "DILATION",
            OCR_CONFIDENCE_MERGING: "true",
            OCR_INK_RANGES: "0,0,0-180,255,80",
            OCR_LOG_LEVEL: "warn",
        });
        expect(cfg.minGlyphWidth).toBe(12);
        expect(cfg.groupingStrategy).toBe("dilation");
        expect(cfg.confidenceMerging).toBe(true);
        expect(cfg.inkRanges).toEqual([{ lower: [0, 0, 0], upper: [180, 255, 80] }]);
        expect(cfg.logLevel).toBe("warn");
    });

    test('fromEnv rejects unknown names and bad values', () => {
        expect(() => Config.fromEnv({ OCR_FOO: "1" })).toThrow("'OCR_FOO' is an invalid environment variable name");
        expect(() => Config.fromEnv({ OCR_DILATION_X: "wide" })).toThrow("'OCR_DILATION_X' must be numeric but found 'wide'");
        expect(() => Config.fromEnv({ OCR_CONFIDENCE_MERGING: "yes" })).toThrow("'OCR_CONFIDENCE_MERGING' must have value 'true' or 'false' but found 'yes'");
        expect(() => Config.fromEnv({ OCR_GROUPING_STRATEGY: "columns" })).toThrow(/'columns' is an invalid grouping strategy/);
        expect(() => Config.fromEnv({ OCR_INK_RANGES: "0,0,0" })).toThrow("'0,0,0' is an invalid ink range; expecting 'h,s,v-h,s,v'");
    });

    test('validate fails fast on impossible settings', () => {
        expect(() => new Config().clone({ minConfidence: -1 }).validate()).toThrow("'minConfidence' must be a non-negative number but found -1");
        expect(() => new Config().clone({ minConfidence: 1.5 }).validate()).toThrow("'minConfidence' must be in [0,1] but found 1.5");
        expect(() => new Config().clone({ minGlyphWidth: 50, maxGlyphWidth: 40 }).validate()).toThrow("minGlyphWidth (50) exceeds maxGlyphWidth (40)");
        expect(() => new Config().clone({ inkRanges: [] }).validate()).toThrow("at least one ink range is required");
        expect(() => new Config().clone({ logLevel: "loud" }).validate()).toThrow("'loud' is an invalid logLevel");
    });

});
