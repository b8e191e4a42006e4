/**
 * Copyright (c) 2024 Discover Financial Services
*/
import { CharDictionary, PixelImage, RecognitionModel, ScoreMatrix, TensorDims } from "../src";

export type RGB = [number, number, number];

export function blankPixels(width: number, height: number, color?: RGB): PixelImage {
    const [r, g, b]: RGB = color || [255, 255, 255];
    const data = new Uint8Array(width * height * 3);
    for (let i = 0; i < width * height; i++) {
        data[i * 3] = r;
        data[i * 3 + 1] = g;
        data[i * 3 + 2] = b;
    }
    return { width, height, format: "rgb", data };
}

export function fillRect(img: PixelImage, x: number, y: number, w: number, h: number, color?: RGB): PixelImage {
    const [r, g, b]: RGB = color || [0, 0, 0];
    for (let row = y; row < y + h; row++) {
        for (let col = x; col < x + w; col++) {
            const i = (row * img.width + col) * 3;
            img.data[i] = r;
            img.data[i + 1] = g;
            img.data[i + 2] = b;
        }
    }
    return img;
}

/**
 * A 200x80 page with two words of two 20x20 glyphs each.
 */
export function twoWordPage(): PixelImage {
    const img = blankPixels(200, 80);
    fillRect(img, 10, 30, 20, 20);
    fillRect(img, 40, 30, 20, 20);
    fillRect(img, 120, 30, 20, 20);
    fillRect(img, 150, 30, 20, 20);
    return img;
}

/**
 * A model that always reads the same text.  Each character is emitted at
 * its own timestep followed by a blank timestep, and every timestep's
 * maximum score is the given confidence.
 */
export class FakeModel implements RecognitionModel {

    public readonly name = "fake";
    public calls: TensorDims[] = [];
    public deleted = false;
    public readonly classes: number[];
    public readonly numClasses: number;
    public readonly confidence: number;
    public failWith?: string;

    constructor(dict: CharDictionary, text: string, opts?: { confidence?: number }) {
        opts = opts || {};
        this.classes = [...text].map((ch) => dict.indexOf(ch));
        this.numClasses = dict.size;
        this.confidence = opts.confidence ?? 0.75;
    }

    public score(tensor: Float32Array, dims: TensorDims): ScoreMatrix {
        this.calls.push(dims);
        if (this.failWith) throw new Error(this.failWith);
        const steps: number[] = [];
        for (const c of this.classes) steps.push(c, 0);
        const timeSteps = steps.length;
        const rest = (1 - this.confidence) / (this.numClasses - 1);
        const data = new Float32Array(timeSteps * this.numClasses).fill(rest);
        steps.forEach((c, t) => { data[t * this.numClasses + c] = this.confidence; });
        return { timeSteps, numClasses: this.numClasses, data };
    }

    public delete() {
        this.deleted = true;
    }

}
