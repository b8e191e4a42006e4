/**
 * Copyright (c) 2024 Capital One
*/
import { cv } from "./ocv.js";
import { Config } from "./config.js";
import { Images } from "./image.js";
import type { Image } from "./image.js";
import { Log } from "./log.js";
import { Util } from "./util.js";

export interface Deletable {
    delete: () => void;
}

let counter = 0;

/**
 * A Context scopes one unit of work: it owns the OpenCV memory allocated
 * while serving a request and frees all of it on release().
 **/
export class Context extends Log {

    public static obtain(id?: string, config?: Config): Context {
        id = id || Util.randString(7);
        return new Context(id, config);
    }

    public readonly images = new Images();
    public debugImages = false;
    private deletables: Deletable[] = [];
    public slowRequestMs = 0;
    public hungRequestMs = 0;
    private startTime = 0;
    private finished = false;
    private hungTimer: ReturnType<typeof setTimeout> | undefined;
    private readonly count = ++counter;

    private constructor(id: string, config?: Config) {
        super(id, config ? config.logLevel : undefined);
        if (config) {
            this.slowRequestMs = config.slowRequestMs;
            this.hungRequestMs = config.hungRequestMs;
            if (this.slowRequestMs !== 0 || this.hungRequestMs !== 0) {
                this.startTime = Date.now();
                this.setBufferLogLevel(config.slowOrHungRequestLogLevel);
                if (this.hungRequestMs !== 0) {
                    this.hungTimer = setTimeout(() => this.hungRequestCallback(), this.hungRequestMs);
                    this.hungTimer.unref();
                }
            }
        }
    }

    public release() {
        if (this.finished) return;
        if (this.hungTimer) clearTimeout(this.hungTimer);
        this.clear();
        if (this.slowRequestMs !== 0) {
            const elapsed = Date.now() - this.startTime;
            if (elapsed > this.slowRequestMs) {
                this.flushBuffer(`Slow request was detected (${elapsed} ms)`);
            }
        }
        this.finished = true;
    }

    public isReleased(): boolean {
        return this.finished;
    }

    public numDeletables(): number {
        return this.deletables.length;
    }

    public addDeletable<T extends Deletable>(deletable: T): T {
        this.deletables.push(deletable);
        return deletable;
    }

    public newMat(): cv.Mat {
        return this.addDeletable(new cv.Mat());
    }

    public newMatVector(): cv.MatVector {
        return this.addDeletable(new cv.MatVector());
    }

    public newCustomMat(height: number, width: number, type: number): cv.Mat {
        return this.addDeletable(new cv.Mat(height, width, type));
    }

    public addImage(image: Image, name?: string) {
        this.images.add(image.clone(name));
    }

    private clear() {
        const count = this.deletables.length;
        for (;;) {
            const d = this.deletables.pop();
            if (!d) break;
            try {
                d.delete();
            } catch (e) {
                this.warn("failed to delete", e);
            }
        }
        if (this.isDebugEnabled()) this.debug(`cleared context ${this.count} id=${this.id} (${count} deletables)`);
    }

    private hungRequestCallback() {
        if (!this.finished) this.flushBuffer(`Hung request was detected`);
    }

}
