/**
 * Copyright (c) 2024 Discover Financial Services
*/
import { Log } from "./log.js";

export type GroupingStrategy = "none" | "line_word" | "dilation";

export type PresetName = "handwriting" | "printed";

export type HsvTriple = [number, number, number];

/**
 * An inclusive HSV range in OpenCV units (H in [0,180], S and V in [0,255]).
 * A pixel inside any configured range is treated as ink.
 */
export interface InkRange {
    lower: HsvTriple;
    upper: HsvTriple;
}

const groupingStrategies: GroupingStrategy[] = ["none", "line_word", "dilation"];

type FieldOfType<T> = { [K in keyof Config]: Config[K] extends T ? K : never }[keyof Config];

type NumericField = FieldOfType<number>;
type BooleanField = FieldOfType<boolean>;

const numericFields: NumericField[] = [
    "minGlyphWidth", "minGlyphHeight", "maxGlyphWidth", "maxGlyphHeight",
    "minAspectRatio", "maxAspectRatio", "minConfidence",
    "wordSpacingRatio", "dilationX", "dilationY",
    "preLineThresholdRatio", "postLineThresholdRatio",
    "lowConfidenceThreshold", "mergeDistanceRatio",
    "recImageHeight", "recMaxWidth", "morphKernelWidth", "morphKernelHeight",
    "slowRequestMs", "hungRequestMs",
];

const booleanFields: BooleanField[] = ["confidenceMerging"];

const presets: { [name in PresetName]: ConfigOpts } = {
    handwriting: {
        minConfidence: 0.3,
        minGlyphWidth: 10,
        minGlyphHeight: 6,
        maxGlyphWidth: 1500,
        maxGlyphHeight: 300,
        minAspectRatio: 0.3,
        maxAspectRatio: 25,
        groupingStrategy: "line_word",
        wordSpacingRatio: 1.5,
    },
    printed: {
        minConfidence: 0.4,
        minGlyphWidth: 15,
        minGlyphHeight: 8,
        maxGlyphWidth: 1000,
        maxGlyphHeight: 200,
        minAspectRatio: 0.5,
        maxAspectRatio: 20,
        groupingStrategy: "line_word",
        wordSpacingRatio: 1.5,
    },
};

export class Config {

    public static fromEnv(env: {[name: string]: (string | undefined)}): Config {
        const cfg = new Config();
        cfg.setEnv(env);
        return cfg;
    }

    /**
     * Scanner presets: "handwriting" loosens the glyph bounds for irregular
     * strokes, "printed" keeps the defaults and raises the confidence floor.
     */
    public static preset(name: PresetName, opts?: ConfigOpts): Config {
        const cfg = new Config();
        cfg.merge(presets[name]);
        if (opts) cfg.merge(opts);
        return cfg;
    }

    public static isGroupingStrategy(name: string): name is GroupingStrategy {
        return groupingStrategies.some((s) => s === name);
    }

    public static toGroupingStrategy(name: string): GroupingStrategy {
        const lower = name.toLowerCase();
        if (!Config.isGroupingStrategy(lower)) {
            throw new Error(`'${name}' is an invalid grouping strategy; expecting one of ${JSON.stringify(groupingStrategies)}`);
        }
        return lower;
    }

    /**
     * Parse ink ranges written as "h,s,v-h,s,v" pairs separated by ";",
     * for example "0,0,0-180,255,100;0,50,50-180,255,150".
     */
    public static parseInkRanges(str: string): InkRange[] {
        const rtn: InkRange[] = [];
        for (const part of str.split(";")) {
            if (part.trim() === "") continue;
            const bounds = part.split("-");
            if (bounds.length !== 2) throw new Error(`'${part}' is an invalid ink range; expecting 'h,s,v-h,s,v'`);
            rtn.push({ lower: Config.parseHsv(bounds[0] ?? ""), upper: Config.parseHsv(bounds[1] ?? "") });
        }
        return rtn;
    }

    private static parseHsv(str: string): HsvTriple {
        const nums = str.split(",").map((s) => parseFloat(s.trim()));
        const [h, s, v] = nums;
        if (nums.length !== 3 || h === undefined || s === undefined || v === undefined || nums.some(Number.isNaN)) {
            throw new Error(`'${str}' is an invalid HSV value; expecting three comma separated numbers`);
        }
        return [h, s, v];
    }

    // Detection
    public minGlyphWidth = 15;
    public minGlyphHeight = 8;
    public maxGlyphWidth = 1000;
    public maxGlyphHeight = 200;
    public minAspectRatio = 0.5;
    public maxAspectRatio = 20;
    public morphKernelWidth = 5;
    public morphKernelHeight = 3;
    public inkRanges: InkRange[] = [
        { lower: [0, 0, 0], upper: [180, 255, 100] },
        { lower: [0, 50, 50], upper: [180, 255, 150] },
    ];
    public detectorGrouping: GroupingStrategy = "none";
    // Recognition
    public minConfidence = 0.3;
    public recImageHeight = 48;
    public recMaxWidth = 320;
    // Grouping
    public groupingStrategy: GroupingStrategy = "line_word";
    public wordSpacingRatio = 1.5;
    public dilationX = 0.5;
    public dilationY = 0.3;
    public preLineThresholdRatio = 0.3;
    public postLineThresholdRatio = 0.5;
    public confidenceMerging = false;
    public lowConfidenceThreshold = 0.5;
    public mergeDistanceRatio = 0.8;
    // Logging
    public logLevel = "info";
    public slowRequestMs = 0;
    public hungRequestMs = 0;
    public slowOrHungRequestLogLevel = "debug";

    constructor() {}

    public merge(opts: ConfigOpts) {
        this.minGlyphWidth = opts.minGlyphWidth ?? this.minGlyphWidth;
        this.minGlyphHeight = opts.minGlyphHeight ?? this.minGlyphHeight;
        this.maxGlyphWidth = opts.maxGlyphWidth ?? this.maxGlyphWidth;
        this.maxGlyphHeight = opts.maxGlyphHeight ?? this.maxGlyphHeight;
        this.minAspectRatio = opts.minAspectRatio ?? this.minAspectRatio;
        this.maxAspectRatio = opts.maxAspectRatio ?? this.maxAspectRatio;
        this.morphKernelWidth = opts.morphKernelWidth ?? this.morphKernelWidth;
        this.morphKernelHeight = opts.morphKernelHeight ?? this.morphKernelHeight;
        if (opts.inkRanges) this.inkRanges = opts.inkRanges.map((r) => ({ lower: [...r.lower], upper: [...r.upper] }));
        this.detectorGrouping = opts.detectorGrouping ?? this.detectorGrouping;
        this.minConfidence = opts.minConfidence ?? this.minConfidence;
        this.recImageHeight = opts.recImageHeight ?? this.recImageHeight;
        this.recMaxWidth = opts.recMaxWidth ?? this.recMaxWidth;
        this.groupingStrategy = opts.groupingStrategy ?? this.groupingStrategy;
        this.wordSpacingRatio = opts.wordSpacingRatio ?? this.wordSpacingRatio;
        this.dilationX = opts.dilationX ?? this.dilationX;
        this.dilationY = opts.dilationY ?? this.dilationY;
        this.preLineThresholdRatio = opts.preLineThresholdRatio ?? this.preLineThresholdRatio;
        this.postLineThresholdRatio = opts.postLineThresholdRatio ?? this.postLineThresholdRatio;
        this.confidenceMerging = opts.confidenceMerging ?? this.confidenceMerging;
        this.lowConfidenceThreshold = opts.lowConfidenceThreshold ?? this.lowConfidenceThreshold;
        this.mergeDistanceRatio = opts.mergeDistanceRatio ?? this.mergeDistanceRatio;
        this.logLevel = opts.logLevel ?? this.logLevel;
        this.slowRequestMs = opts.slowRequestMs ?? this.slowRequestMs;
        this.hungRequestMs = opts.hungRequestMs ?? this.hungRequestMs;
        this.slowOrHungRequestLogLevel = opts.slowOrHungRequestLogLevel ?? this.slowOrHungRequestLogLevel;
    }

    /**
     * Copy this configuration, optionally overlaying per-request options.
     */
    public clone(opts?: ConfigOpts): Config {
        const cfg = new Config();
        cfg.merge(this);
        if (opts) cfg.merge(opts);
        return cfg;
    }

    /**
     * Fail fast on settings that no image could make sense of.
     * @throws an Error naming the first invalid setting
     */
    public validate(): this {
        const self: Config = this;
        for (const field of numericFields) {
            const value = self[field];
            if (!Number.isFinite(value) || value < 0) throw new Error(`'${field}' must be a non-negative number but found ${value}`);
        }
        if (this.minGlyphWidth > this.maxGlyphWidth) throw new Error(`minGlyphWidth (${this.minGlyphWidth}) exceeds maxGlyphWidth (${this.maxGlyphWidth})`);
        if (this.minGlyphHeight > this.maxGlyphHeight) throw new Error(`minGlyphHeight (${this.minGlyphHeight}) exceeds maxGlyphHeight (${this.maxGlyphHeight})`);
        if (this.minAspectRatio > this.maxAspectRatio) throw new Error(`minAspectRatio (${this.minAspectRatio}) exceeds maxAspectRatio (${this.maxAspectRatio})`);
        if (this.minConfidence > 1) throw new Error(`'minConfidence' must be in [0,1] but found ${this.minConfidence}`);
        if (this.lowConfidenceThreshold > 1) throw new Error(`'lowConfidenceThreshold' must be in [0,1] but found ${this.lowConfidenceThreshold}`);
        if (this.recImageHeight < 1 || this.recMaxWidth < 1) throw new Error(`recImageHeight and recMaxWidth must be at least 1`);
        if (this.morphKernelWidth < 1 || this.morphKernelHeight < 1) throw new Error(`morphKernelWidth and morphKernelHeight must be at least 1`);
        if (!Config.isGroupingStrategy(this.groupingStrategy)) throw new Error(`'${this.groupingStrategy}' is an invalid groupingStrategy`);
        if (!Config.isGroupingStrategy(this.detectorGrouping)) throw new Error(`'${this.detectorGrouping}' is an invalid detectorGrouping`);
        if (this.inkRanges.length === 0) throw new Error(`at least one ink range is required`);
        if (!Log.isLevelName(this.logLevel)) throw new Error(`'${this.logLevel}' is an invalid logLevel`);
        if (!Log.isLevelName(this.slowOrHungRequestLogLevel)) throw new Error(`'${this.slowOrHungRequestLogLevel}' is an invalid slowOrHungRequestLogLevel`);
        return this;
    }

    /**
     * Given a map of environment variable names, find those starting with "OCR_" and attempt
     * to map them to one of the fields of this class.
     */
    public setEnv(env: {[name: string]: (string | undefined)}) {
        const self: Config = this;
        const prefix = "OCR_";
        for (const key of Object.keys(env)) {
            if (!key.startsWith(prefix) || key.length < prefix.length + 1) continue;
            const value = env[key];
            if (value === undefined) continue;
            const fieldName = this.varNameToFieldName(key.slice(prefix.length));
            const numericField = numericFields.find((f) => f === fieldName);
            const booleanField = booleanFields.find((f) => f === fieldName);
            if (numericField) {
                const num = parseFloat(value);
                if (Number.isNaN(num)) throw new Error(`'${key}' must be numeric but found '${value}'`);
                self[numericField] = num;
            } else if (booleanField) {
                if (value.toLowerCase() === "true") self[booleanField] = true;
                else if (value.toLowerCase() === "false") self[booleanField] = false;
                else throw new Error(`'${key}' must have value 'true' or 'false' but found '${value}'`);
            } else if (fieldName === "groupingStrategy") {
                this.groupingStrategy = Config.toGroupingStrategy(value);
            } else if (fieldName === "detectorGrouping") {
                this.detectorGrouping = Config.toGroupingStrategy(value);
            } else if (fieldName === "inkRanges") {
                this.inkRanges = Config.parseInkRanges(value);
            } else if (fieldName === "logLevel") {
                this.logLevel = value;
            } else if (fieldName === "slowOrHungRequestLogLevel") {
                this.slowOrHungRequestLogLevel = value;
            } else {
                throw new Error(`'${key}' is an invalid environment variable name`);
            }
        }
    }

    /**
     * Convert an snake-case environment variable name to a camel-case field name.
     */
    private varNameToFieldName(varName: string): string {
        let fieldName = varName.charAt(0).toLowerCase();
        let prevUnderscore = false;
        for (let i = 1; i < varName.length; i++) {
            const c = varName.charAt(i);
            if (c == "_") {
                prevUnderscore = true;
                continue;
            }
            fieldName += prevUnderscore ? c.toUpperCase() : c.toLowerCase();
            prevUnderscore = false;
        }
        return fieldName;
    }

}

export interface ConfigOpts {
    minGlyphWidth?: number;
    minGlyphHeight?: number;
    maxGlyphWidth?: number;
    maxGlyphHeight?: number;
    minAspectRatio?: number;
    maxAspectRatio?: number;
    morphKernelWidth?: number;
    morphKernelHeight?: number;
    inkRanges?: InkRange[];
    detectorGrouping?: GroupingStrategy;
    minConfidence?: number;
    recImageHeight?: number;
    recMaxWidth?: number;
    groupingStrategy?: GroupingStrategy;
    wordSpacingRatio?: number;
    dilationX?: number;
    dilationY?: number;
    preLineThresholdRatio?: number;
    postLineThresholdRatio?: number;
    confidenceMerging?: boolean;
    lowConfidenceThreshold?: number;
    mergeDistanceRatio?: number;
    logLevel?: string;
    slowRequestMs?: number;
    hungRequestMs?: number;
    slowOrHungRequestLogLevel?: string;
}
