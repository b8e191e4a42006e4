/**
 * Copyright (c) 2024 Discover Financial Services
*/
import { Box, Boxed } from "./box.js";
import type { Config, GroupingStrategy } from "./config.js";
import type { Log } from "./log.js";
import { sortReadingOrder } from "./readingOrder.js";
import { Util } from "./util.js";

export interface RecognizedGlyph extends Boxed {
    text: string;
    confidence: number;
    box: Box;
}

export interface RecognizedWord extends Boxed {
    text: string;
    confidence: number;
    box: Box;
    /** Number of glyphs merged into this word. */
    count: number;
}

interface LineOpts {
    thresholdRatio: number;
    acceptOverlap: boolean;
}

/** Vertical overlap ratio above which a box joins a line regardless of its center. */
const LINE_OVERLAP_RATIO = 0.5;

/**
 * Reassemble boxes (before recognition) or recognized glyphs (after it)
 * into words.
 *
 * Strategy "line_word" clusters items into lines by vertical center and then
 * splits each line into words by horizontal gap.  Strategy "dilation" grows
 * each box and takes the connected components of the overlap graph.
 */
export class GlyphGrouper {

    /** Word merge with a count-weighted confidence; text is joined left-to-right. */
    public static mergeWords(a: RecognizedWord, b: RecognizedWord): RecognizedWord {
        const [left, right]: [RecognizedWord, RecognizedWord] = a.box.minX <= b.box.minX ? [a, b] : [b, a];
        const count = a.count + b.count;
        return {
            text: left.text + right.text,
            confidence: (a.confidence * a.count + b.confidence * b.count) / count,
            box: Box.union([a.box, b.box]),
            count,
        };
    }

    public static glyphToWord(glyph: RecognizedGlyph): RecognizedWord {
        return { text: glyph.text, confidence: glyph.confidence, box: glyph.box, count: 1 };
    }

    /**
     * Merge glyphs into one word.  Members are ordered by their left edge.
     * @throws if glyphs is empty
     */
    public static toWord(glyphs: RecognizedGlyph[]): RecognizedWord {
        const sorted = [...glyphs].sort((a, b) => a.box.minX - b.box.minX);
        const first = sorted[0];
        if (!first) throw new Error(`cannot merge zero glyphs into a word`);
        let word = GlyphGrouper.glyphToWord(first);
        for (let i = 1; i < sorted.length; i++) {
            const glyph = sorted[i];
            if (glyph) word = GlyphGrouper.mergeWords(word, GlyphGrouper.glyphToWord(glyph));
        }
        return word;
    }

    private readonly cfg: Config;
    private readonly log: Log;

    constructor(cfg: Config, log: Log) {
        this.cfg = cfg;
        this.log = log;
    }

    /**
     * Group glyph candidates before recognition.  Each group becomes the
     * union of its members' boxes.
     */
    public groupBoxes(boxes: Box[], strategy: GroupingStrategy): Box[] {
        if (boxes.length === 0) return [];
        let groups: Box[][];
        if (strategy === "line_word") {
            groups = this.lineWordGroups(boxes, { thresholdRatio: this.cfg.preLineThresholdRatio, acceptOverlap: true });
        } else if (strategy === "dilation") {
            groups = this.dilationGroups(boxes);
        } else {
            return [...boxes];
        }
        const rtn = groups.map((group) => Box.union(group));
        if (this.log.isDebugEnabled()) this.log.debug(`grouped ${boxes.length} boxes into ${rtn.length} with strategy ${strategy}`);
        return rtn;
    }

    /**
     * Group recognized glyphs into words, in line-then-word order.
     */
    public groupGlyphs(glyphs: RecognizedGlyph[], strategy: GroupingStrategy): RecognizedWord[] {
        if (glyphs.length === 0) return [];
        let words: RecognizedWord[];
        if (strategy === "line_word") {
            const lines = this.clusterLines(glyphs, { thresholdRatio: this.cfg.postLineThresholdRatio, acceptOverlap: false });
            words = [];
            for (const line of lines) {
                let lineWords = this.splitWords(line).map((word) => GlyphGrouper.toWord(word));
                if (this.cfg.confidenceMerging) lineWords = this.mergeByConfidence(lineWords);
                words.push(...lineWords);
            }
        } else if (strategy === "dilation") {
            words = sortReadingOrder(this.dilationGroups(glyphs).map((group) => GlyphGrouper.toWord(group)));
        } else {
            words = glyphs.map((glyph) => GlyphGrouper.glyphToWord(glyph));
        }
        if (this.log.isDebugEnabled()) this.log.debug(`grouped ${glyphs.length} glyphs into ${words.length} words with strategy ${strategy}`);
        return words;
    }

    private lineWordGroups<T extends Boxed>(items: T[], opts: LineOpts): T[][] {
        const rtn: T[][] = [];
        for (const line of this.clusterLines(items, opts)) {
            rtn.push(...this.splitWords(line));
        }
        return rtn;
    }

    /**
     * Cluster items into lines.  An item joins the current line if its
     * vertical center is within median(heights) * thresholdRatio of the
     * line's running mean center.
     */
    public clusterLines<T extends Boxed>(items: T[], opts: LineOpts): T[][] {
        if (items.length === 0) return [];
        const threshold = Util.median(items.map((i) => i.box.height)) * opts.thresholdRatio;
        const sorted = [...items].sort((a, b) => (a.box.centerY - b.box.centerY) || (a.box.centerX - b.box.centerX));
        const lines: T[][] = [];
        let line: T[] = [];
        let sumCenterY = 0;
        let lineMinY = 0;
        let lineMaxY = 0;
        for (const item of sorted) {
            const box = item.box;
            if (line.length > 0) {
                const meanCenterY = sumCenterY / line.length;
                let joins = Math.abs(box.centerY - meanCenterY) <= threshold;
                if (!joins && opts.acceptOverlap) {
                    const lineBox = Box.fromBounds(box.minX, lineMinY, box.maxX, lineMaxY);
                    joins = box.verticalOverlapRatio(lineBox) > LINE_OVERLAP_RATIO;
                }
                if (joins) {
                    line.push(item);
                    sumCenterY += box.centerY;
                    lineMinY = Math.min(lineMinY, box.minY);
                    lineMaxY = Math.max(lineMaxY, box.maxY);
                    continue;
                }
                lines.push(line);
            }
            line = [item];
            sumCenterY = box.centerY;
            lineMinY = box.minY;
            lineMaxY = box.maxY;
        }
        lines.push(line);
        if (this.log.isTraceEnabled()) this.log.trace(`line threshold ${threshold}: ${lines.map((l) => l.length).join(",")} items per line`);
        return lines;
    }

    /**
     * Split one line into words.  An item joins the current word if the gap
     * from the previous item's right edge is at most
     * median(widths) * wordSpacingRatio.
     */
    public splitWords<T extends Boxed>(line: T[]): T[][] {
        if (line.length === 0) return [];
        const threshold = Util.median(line.map((i) => i.box.width)) * this.cfg.wordSpacingRatio;
        const sorted = [...line].sort((a, b) => a.box.minX - b.box.minX);
        const words: T[][] = [];
        let word: T[] = [];
        let prev: T | undefined;
        for (const item of sorted) {
            if (prev && item.box.minX - prev.box.maxX > threshold) {
                words.push(word);
                word = [];
            }
            word.push(item);
            prev = item;
        }
        words.push(word);
        return words;
    }

    /**
     * Connected components of the overlap graph of the expanded boxes, in
     * input order of each component's first member.
     */
    public dilationGroups<T extends Boxed>(items: T[]): T[][] {
        const expanded = items.map((i) => i.box.expand(this.cfg.dilationX, this.cfg.dilationY));
        const visited: boolean[] = items.map(() => false);
        const rtn: T[][] = [];
        for (let start = 0; start < items.length; start++) {
            if (visited[start]) continue;
            visited[start] = true;
            const component: T[] = [];
            const queue: number[] = [start];
            for (let next = queue.shift(); next !== undefined; next = queue.shift()) {
                const item = items[next];
                const box = expanded[next];
                if (!item || !box) continue;
                component.push(item);
                for (let j = 0; j < items.length; j++) {
                    const other = expanded[j];
                    if (visited[j] || !other) continue;
                    if (box.overlaps(other)) {
                        visited[j] = true;
                        queue.push(j);
                    }
                }
            }
            rtn.push(component);
        }
        return rtn;
    }

    /**
     * Fold a single low-confidence glyph into a neighboring word when the
     * gap between them is below averageWidth * mergeDistanceRatio.  The
     * previous word wins over the next when both qualify.
     */
    public mergeByConfidence(words: RecognizedWord[]): RecognizedWord[] {
        const rtn: RecognizedWord[] = [];
        const ratio = this.cfg.mergeDistanceRatio;
        for (let i = 0; i < words.length; i++) {
            const word = words[i];
            if (!word) continue;
            if (word.count === 1 && word.confidence < this.cfg.lowConfidenceThreshold) {
                const prev = rtn[rtn.length - 1];
                if (prev && this.isClose(prev, word, ratio)) {
                    if (this.log.isDebugEnabled()) this.log.debug(`merging low confidence '${word.text}' into previous word '${prev.text}'`);
                    rtn[rtn.length - 1] = GlyphGrouper.mergeWords(prev, word);
                    continue;
                }
                const next = words[i + 1];
                if (next && this.isClose(word, next, ratio)) {
                    if (this.log.isDebugEnabled()) this.log.debug(`merging low confidence '${word.text}' into next word '${next.text}'`);
                    rtn.push(GlyphGrouper.mergeWords(word, next));
                    i++;
                    continue;
                }
            }
            rtn.push(word);
        }
        return rtn;
    }

    private isClose(left: RecognizedWord, right: RecognizedWord, ratio: number): boolean {
        const gap = right.box.minX - left.box.maxX;
        const avgWidth = (left.box.width + right.box.width) / 2;
        return gap < avgWidth * ratio;
    }

}
