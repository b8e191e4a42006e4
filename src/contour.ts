/**
 * Copyright (c) 2024 Discover Financial Services
*/
import { cv } from "./ocv.js";
import type { Image } from './image.js';
import type { Context } from './context.js';
import { Box } from './box.js';

export interface FilterContourOpts {
    minWidth?: number;
    minHeight?: number;
    maxWidth?: number;
    maxHeight?: number;
    minAspectRatio?: number;
    maxAspectRatio?: number;
};

export class Contour {

    public readonly mat: cv.Mat;
    public readonly image: Image;
    public readonly rect: cv.Rect;
    public readonly ctx: Context;

    public readonly width: number;
    public readonly height: number;
    public idx = -1;

    constructor(mat: cv.Mat, image: Image) {
        this.mat = mat;
        this.image = image;
        this.ctx = image.ctx;
        this.rect = cv.boundingRect(mat);
        this.width = this.rect.width;
        this.height = this.rect.height;
    }

    /** Width over height of the bounding rectangle. */
    public aspectRatio(): number {
        return this.height > 0 ? this.width / this.height : 0;
    }

    /**
     * @returns true if the contour should be skipped
     */
    public filter(opts: FilterContourOpts): boolean {
        const rect = this.rect;
        const i = this.idx;
        if (opts.minWidth !== undefined && rect.width < opts.minWidth) {
            if (this.ctx.isDebugEnabled()) this.ctx.debug(`skip contour ${i}, width ${rect.width} < ${opts.minWidth}`);
            return true;
        }
        if (opts.minHeight !== undefined && rect.height < opts.minHeight) {
            if (this.ctx.isDebugEnabled()) this.ctx.debug(`skip contour ${i}, height ${rect.height} < ${opts.minHeight}`);
            return true;
        }
        if (opts.maxWidth !== undefined && rect.width > opts.maxWidth) {
            if (this.ctx.isDebugEnabled()) this.ctx.debug(`skip contour ${i}, width ${rect.width} > ${opts.maxWidth}`);
            return true;
        }
        if (opts.maxHeight !== undefined && rect.height > opts.maxHeight) {
            if (this.ctx.isDebugEnabled()) this.ctx.debug(`skip contour ${i}, height ${rect.height} > ${opts.maxHeight}`);
            return true;
        }
        const ar = this.aspectRatio();
        if (opts.minAspectRatio !== undefined && ar < opts.minAspectRatio) {
            if (this.ctx.isDebugEnabled()) this.ctx.debug(`skip contour ${i}, aspect ratio ${ar} < ${opts.minAspectRatio}`);
            return true;
        }
        if (opts.maxAspectRatio !== undefined && ar > opts.maxAspectRatio) {
            if (this.ctx.isDebugEnabled()) this.ctx.debug(`skip contour ${i}, aspect ratio ${ar} > ${opts.maxAspectRatio}`);
            return true;
        }
        return false;
    }

    public toBox(): Box {
        const r = this.rect;
        return Box.fromRect(r.x, r.y, r.width, r.height);
    }

    public toJSON() {
        return { idx: this.idx, rect: { x: this.rect.x, y: this.rect.y, width: this.rect.width, height: this.rect.height } };
    }

    public static filterContours(contours: Contour[], filter: FilterContourOpts): Contour[] {
        const rtn: Contour[] = [];
        for (const contour of contours) {
            if (!contour.filter(filter)) rtn.push(contour);
        }
        return rtn;
    }

}
