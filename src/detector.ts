/**
 * Copyright (c) 2024 Discover Financial Services
*/
import type { Box } from "./box.js";
import type { Config, GroupingStrategy } from "./config.js";
import { GlyphGrouper } from "./grouping.js";
import type { Image } from "./image.js";
import { Outcome, Outcomes } from "./outcome.js";
import { sortReadingOrder } from "./readingOrder.js";

export interface DetectOpts {
    /** Overrides the configured detectorGrouping. */
    grouping?: GroupingStrategy;
}

/**
 * Find candidate glyph regions by color: pixels inside any configured HSV
 * ink range form a mask, which is closed and dilated so that the strokes of
 * one glyph join into one external contour.
 */
export class RegionDetector {

    public readonly cfg: Config;

    constructor(cfg: Config) {
        this.cfg = cfg;
    }

    /**
     * Detect glyph boxes in reading order.  Never throws; a failure is logged
     * and reported as no boxes.
     */
    public detect(image: Image, opts?: DetectOpts): Box[] {
        const outcome = this.detectOutcome(image, opts);
        if (outcome.kind === "failed") {
            image.ctx.error(`Region detection failed: ${outcome.error.message}`);
        }
        return Outcomes.getOrElse(outcome, []);
    }

    public detectOutcome(image: Image, opts?: DetectOpts): Outcome<Box[]> {
        opts = opts || {};
        const ctx = image.ctx;
        if (image.isEmpty()) {
            if (ctx.isDebugEnabled()) ctx.debug(`skipping detection of empty image ${image.name}`);
            return Outcomes.empty();
        }
        const grouping = opts.grouping ?? this.cfg.detectorGrouping;
        return Outcomes.attempt(() => {
            const mask = this.inkMask(image);
            if (!mask) return Outcomes.empty();
            const morphed = mask
                .close({ name: "closed-mask", width: this.cfg.morphKernelWidth, height: this.cfg.morphKernelHeight })
                .dilate({ name: "morphed-mask", width: this.cfg.morphKernelWidth, height: this.cfg.morphKernelHeight, iterations: 1 });
            const contours = morphed.getContours({
                minWidth: this.cfg.minGlyphWidth,
                minHeight: this.cfg.minGlyphHeight,
                maxWidth: this.cfg.maxGlyphWidth,
                maxHeight: this.cfg.maxGlyphHeight,
                minAspectRatio: this.cfg.minAspectRatio,
                maxAspectRatio: this.cfg.maxAspectRatio,
            });
            let boxes = contours.map((c) => c.toBox());
            boxes = new GlyphGrouper(this.cfg, ctx).groupBoxes(boxes, grouping);
            boxes = sortReadingOrder(boxes.map((b) => b.ordered()));
            if (ctx.debugImages) {
                mask.display("ink-mask");
                morphed.display("morphed-mask");
                image.drawBoxes("detected-boxes", boxes);
            }
            if (ctx.isDebugEnabled()) ctx.debug(`detected ${boxes.length} glyph regions in image ${image.name}`);
            return Outcomes.fromArray(boxes);
        });
    }

    /**
     * The union of the per-range masks, or undefined if no range is configured.
     */
    private inkMask(image: Image): Image | undefined {
        const hsv = image.hsv();
        let mask: Image | undefined;
        for (let i = 0; i < this.cfg.inkRanges.length; i++) {
            const range = this.cfg.inkRanges[i];
            if (!range) continue;
            const m = hsv.inRange(range.lower, range.upper, { name: `ink-range-${i}` });
            mask = mask ? mask.bitwiseOr(m, { name: "ink-mask" }) : m;
        }
        return mask;
    }

}
