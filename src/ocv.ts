/**
 * Copyright (c) 2024 Capital One
*/
/*
 * Wrap OpenCV.js and expose a readiness check.  The WASM runtime initializes
 * asynchronously, so nothing in this package may touch cv.Mat before
 * OCV.init() resolves.
 */
import cv from '@techstark/opencv-js';
export {cv};

export class OCV {

    public static async init() {
        await isReady();
    }

    private constructor() {}

}

let ready = false;
let pending: Promise<void> | undefined;

export async function isReady(): Promise<boolean> {
    if (ready) return true;
    // The runtime may have finished before anyone asked.
    if (typeof cv.Mat === "function") {
        ready = true;
        return true;
    }
    if (!pending) {
        pending = new Promise<void>(resolve => {
            cv.onRuntimeInitialized = () => {
                ready = true;
                resolve();
            };
        });
    }
    await pending;
    return true;
}
