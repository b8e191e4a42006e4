/**
 * Copyright (c) 2024 Discover Financial Services
*/
import { Config, Context, Image, OCV } from "../src";
import { blankPixels } from "./fakes.js";

describe('Context', () => {

    beforeAll(async () => {
        await OCV.init();
    });

    test('release frees every mat created through the context', () => {
        const ctx = Context.obtain("ctx-1");
        const image = Image.fromPixels(blankPixels(8, 4), ctx);
        image.hsv().resize(4, 2);
        expect(ctx.numDeletables()).toBe(3);
        ctx.release();
        expect(ctx.numDeletables()).toBe(0);
        expect(ctx.isReleased()).toBe(true);
        ctx.release();
        expect(ctx.isReleased()).toBe(true);
    });

    test('displayed images are kept as named copies', () => {
        const ctx = Context.obtain("ctx-2");
        const image = Image.fromPixels(blankPixels(8, 4), ctx);
        image.display("page");
        image.hsv().display();
        expect(ctx.images.names()).toEqual(["page", "hsv"]);
        ctx.release();
    });

    test('takes its log level from the config', () => {
        const cfg = new Config();
        cfg.merge({ logLevel: "trace" });
        const ctx = Context.obtain("ctx-3", cfg);
        expect(ctx.isTraceEnabled()).toBe(true);
        expect(ctx.id).toBe("ctx-3");
        ctx.release();
        expect(Context.obtain().id).toMatch(/^[a-z0-9]+$/);
    });

});
