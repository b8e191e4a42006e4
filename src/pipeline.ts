/**
 * Copyright (c) 2024 Discover Financial Services
*/
import type { Box, QuadArray } from "./box.js";
import type { Config } from "./config.js";
import { PerspectiveCropper } from "./cropper.js";
import { RegionDetector } from "./detector.js";
import { GlyphGrouper, RecognizedGlyph, RecognizedWord } from "./grouping.js";
import type { Image } from "./image.js";
import { Outcome, Outcomes } from "./outcome.js";
import type { SequenceRecognizer } from "./recognizer.js";
import { Util } from "./util.js";

export interface OcrSpan {
    text: string;
    confidence: number;
    box: QuadArray;
}

export interface OcrResult {
    text: string;
    confidence: number;
    spans: OcrSpan[];
}

export function emptyResult(): OcrResult {
    return { text: "", confidence: 0, spans: [] };
}

/**
 * Detect, crop, recognize and group the text of one image.  Stage failures
 * are logged and yield the empty result; nothing is thrown.
 */
export function runOcr(image: Image, recognizer: SequenceRecognizer, cfg: Config): OcrResult {
    const ctx = image.ctx;
    const detected = new RegionDetector(cfg).detectOutcome(image, { grouping: "none" });
    if (detected.kind === "failed") {
        ctx.error(`Detection failed: ${detected.error.message}`);
        return emptyResult();
    }
    if (detected.kind === "empty") {
        if (ctx.isDebugEnabled()) ctx.debug(`no glyph regions found`);
        return emptyResult();
    }
    const glyphs = recognizeGlyphs(image, detected.value, recognizer, cfg);
    if (glyphs.length === 0) {
        if (ctx.isDebugEnabled()) ctx.debug(`no glyphs passed the confidence filter`);
        return emptyResult();
    }
    const grouped = groupGlyphs(glyphs, cfg, image);
    if (grouped.kind === "failed") {
        ctx.error(`Grouping failed: ${grouped.error.message}`);
        return emptyResult();
    }
    if (grouped.kind === "empty") return emptyResult();
    return toResult(grouped.value);
}

/**
 * Crop and recognize every box, keeping glyphs with visible text and a
 * confidence of at least minConfidence.
 */
export function recognizeGlyphs(image: Image, boxes: Box[], recognizer: SequenceRecognizer, cfg: Config): RecognizedGlyph[] {
    const ctx = image.ctx;
    const cropper = new PerspectiveCropper();
    const rtn: RecognizedGlyph[] = [];
    boxes.forEach((box, i) => {
        const crop = Outcomes.attempt(() => Outcomes.ok(cropper.cropAndStraighten(image, box, { name: `glyph-${i}` })));
        if (crop.kind !== "ok") {
            if (crop.kind === "failed") ctx.warn(`Skipping glyph ${i}, crop failed: ${crop.error.message}`);
            return;
        }
        const rec = recognizer.recognizeOutcome(crop.value);
        if (rec.kind !== "ok") {
            if (rec.kind === "failed") ctx.warn(`Skipping glyph ${i}, recognition failed: ${rec.error.message}`);
            return;
        }
        const text = rec.value.text.trim();
        const confidence = rec.value.confidence;
        if (text === "" || confidence < cfg.minConfidence) {
            if (ctx.isDebugEnabled()) ctx.debug(`skip glyph ${i}, text='${text}', confidence ${confidence} < ${cfg.minConfidence} or blank`);
            return;
        }
        rtn.push({ text, confidence, box });
    });
    return rtn;
}

function groupGlyphs(glyphs: RecognizedGlyph[], cfg: Config, image: Image): Outcome<RecognizedWord[]> {
    return Outcomes.attempt(() => {
        const words = new GlyphGrouper(cfg, image.ctx).groupGlyphs(glyphs, cfg.groupingStrategy);
        return Outcomes.fromArray(words);
    });
}

export function toResult(words: RecognizedWord[]): OcrResult {
    if (words.length === 0) return emptyResult();
    return {
        text: words.map((w) => w.text).join(" "),
        confidence: Util.average(words.map((w) => w.confidence)),
        spans: words.map((w) => ({ text: w.text, confidence: w.confidence, box: w.box.toArray() })),
    };
}
