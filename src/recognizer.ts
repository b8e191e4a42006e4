/**
 * Copyright (c) 2024 Discover Financial Services
*/
import type { Config } from "./config.js";
import type { CharDictionary } from "./dictionary.js";
import type { Image } from "./image.js";
import { Outcome, Outcomes } from "./outcome.js";

/** Batch, channels, height and width of a recognition tensor. */
export type TensorDims = readonly [number, number, number, number];

/**
 * Per-timestep class scores, row-major: the score of class c at timestep t
 * is data[t * numClasses + c].
 */
export interface ScoreMatrix {
    timeSteps: number;
    numClasses: number;
    data: Float32Array | number[];
}

/**
 * A sequence recognition model supplied by the host.  Class 0 of the
 * output is the CTC blank.
 */
export interface RecognitionModel {
    readonly name: string;
    score(tensor: Float32Array, dims: TensorDims): ScoreMatrix;
    /** Release the model's resources. */
    delete(): void;
}

export interface Recognition {
    text: string;
    confidence: number;
}

export interface RecognitionInput {
    tensor: Float32Array;
    dims: TensorDims;
}

const noRecognition: Recognition = { text: "", confidence: 0 };

/**
 * Greedy CTC decoding.  Each timestep contributes its arg-max class unless it
 * is the blank, repeats the previous timestep's class, or is outside the
 * dictionary.  The confidence is the mean of the per-timestep maxima over all
 * timesteps.
 * @throws if the matrix holds fewer scores than its dimensions claim
 */
export function ctcGreedyDecode(scores: ScoreMatrix, dict: CharDictionary): Recognition {
    const { timeSteps, numClasses, data } = scores;
    if (timeSteps <= 0 || numClasses <= 0) return { ...noRecognition };
    if (data.length < timeSteps * numClasses) {
        throw new Error(`score matrix of ${timeSteps}x${numClasses} has only ${data.length} values`);
    }
    let text = "";
    let sum = 0;
    let lastIdx = 0;
    for (let t = 0; t < timeSteps; t++) {
        const row = t * numClasses;
        let maxIdx = 0;
        let maxVal = Number.NEGATIVE_INFINITY;
        for (let c = 0; c < numClasses; c++) {
            const v = data[row + c] ?? Number.NEGATIVE_INFINITY;
            if (v > maxVal) {
                maxVal = v;
                maxIdx = c;
            }
        }
        sum += maxVal;
        if (maxIdx > 0 && maxIdx !== lastIdx && maxIdx < dict.size) {
            text += dict.charAt(maxIdx) ?? "";
        }
        lastIdx = maxIdx;
    }
    return { text, confidence: sum / timeSteps };
}

/**
 * Recognize the text of one upright glyph crop.
 */
export class SequenceRecognizer {

    public readonly model: RecognitionModel;
    public readonly dict: CharDictionary;
    public readonly cfg: Config;

    constructor(model: RecognitionModel, dict: CharDictionary, cfg: Config) {
        this.model = model;
        this.dict = dict;
        this.cfg = cfg;
    }

    /**
     * Resize to the model's fixed height, keeping the aspect ratio, and
     * normalize to a [1, 3, H, W] tensor.
     * @returns undefined if the resized image would have no pixels
     */
    public preprocess(image: Image): RecognitionInput | undefined {
        if (image.isEmpty()) return undefined;
        const height = this.cfg.recImageHeight;
        const width = Math.min(Math.trunc(image.width * height / image.height), this.cfg.recMaxWidth);
        if (width <= 0 || height <= 0) return undefined;
        const resized = image.resize(width, height, { name: "rec-input" });
        const dims: TensorDims = [1, resized.channels(), height, width];
        return { tensor: resized.toPlanarFloat(), dims };
    }

    /**
     * @throws whatever the model throws
     */
    public recognize(image: Image): Recognition {
        const ctx = image.ctx;
        const input = this.preprocess(image);
        if (!input) {
            if (ctx.isDebugEnabled()) ctx.debug(`image ${image.name} of size ${image.width}x${image.height} is too small to recognize`);
            return { ...noRecognition };
        }
        const scores = this.model.score(input.tensor, input.dims);
        const rtn = ctcGreedyDecode(scores, this.dict);
        if (ctx.isTraceEnabled()) ctx.trace(`${this.model.name} recognized '${rtn.text}' with confidence ${rtn.confidence}`);
        return rtn;
    }

    public recognizeOutcome(image: Image): Outcome<Recognition> {
        return Outcomes.attempt(() => Outcomes.ok(this.recognize(image)));
    }

}
