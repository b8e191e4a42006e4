/**
 * Copyright (c) 2024 Capital One
*/
import Jimp from "jimp";
import { cv } from "./ocv.js";

export interface IPoint {
    x: number;
    y: number;
}

export interface DebuggableRequest {
    debug?: string[];
}

/** Decoded RGBA pixels of an encoded image file. */
export interface DecodedImage {
    width: number;
    height: number;
    data: Uint8Array;
}

export type Env = { [name: string]: string | undefined };

export class Util {

    /**
     * Determine if a generic debuggable request should be debugged.
     * @param req Any debuggable request
     * @param category A category to debug
     * @returns true if should debug; otherwise, false;
     */
    public static debug(req: DebuggableRequest, category: string): boolean {
        const categories = req.debug;
        if (!categories) return false;
        if (categories.indexOf("*") >= 0) return true;
        return categories.indexOf(category) >= 0;
    }

    /**
     * Decode a PNG, JPEG, BMP, TIFF or GIF file into RGBA pixels.
     */
    public static async decodeImage(buf: Buffer | ArrayBuffer | Uint8Array): Promise<DecodedImage> {
        const buffer = Buffer.isBuffer(buf) ? buf : Buffer.from(buf instanceof ArrayBuffer ? new Uint8Array(buf) : buf);
        const image = await Jimp.read(buffer).catch((e: unknown) => {
            throw new Error(`Failed to decode image: ${Util.errorMessage(e)}`);
        });
        const bitmap = image.bitmap;
        return { width: bitmap.width, height: bitmap.height, data: new Uint8Array(bitmap.data) };
    }

    /**
     * Encode a 1, 3 or 4 channel 8-bit mat as a PNG.
     */
    public static async matToPng(mat: cv.Mat): Promise<Buffer> {
        const channels = mat.channels();
        if (channels !== 1 && channels !== 3 && channels !== 4) {
            throw new Error(`matToPng: can only encode gray scale, RGB or RGBA images but found ${channels} channels`);
        }
        const rgba = new cv.Mat();
        try {
            if (channels === 1) cv.cvtColor(mat, rgba, cv.COLOR_GRAY2RGBA);
            else if (channels === 3) cv.cvtColor(mat, rgba, cv.COLOR_RGB2RGBA);
            else mat.copyTo(rgba);
            const jimp = new Jimp({ data: Buffer.from(rgba.data), width: rgba.cols, height: rgba.rows });
            return await jimp.getBufferAsync(Jimp.MIME_PNG);
        } finally {
            rgba.delete();
        }
    }

    public static distance(p1: IPoint, p2: IPoint): number {
        return Math.hypot(p2.x - p1.x, p2.y - p1.y);
    }

    // Get average of an array of numbers
    public static average(nums: number[]): number {
        const sum = nums.reduce((a, b) => a + b, 0);
        return (sum / nums.length) || 0;
    }

    /**
     * The upper median: the element at index floor(n/2) of the sorted values.
     * Returns 0 for an empty array.
     */
    public static median(nums: number[]): number {
        if (nums.length === 0) return 0;
        const sorted = [...nums].sort((a, b) => a - b);
        return sorted[Math.floor(sorted.length / 2)] ?? 0;
    }

    // Get a random string of certain length
    public static randString(len: number): string {
        return Math.random().toString(36).substring(2, 2 + len);
    }

    public static errorMessage(e: unknown): string {
        return e instanceof Error ? e.message : String(e);
    }

}
