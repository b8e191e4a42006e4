/**
 * Copyright (c) 2024 Discover Financial Services
*/
import { Box, Quad } from "./box.js";
import type { Image } from "./image.js";
import { Util } from "./util.js";

export interface CropSize {
    width: number;
    height: number;
}

/**
 * Cut a quadrilateral region out of an image and warp it upright.
 */
export class PerspectiveCropper {

    /**
     * Width is the longer of the top and bottom edges and height the longer
     * of the left and right edges, truncated and at least 1.
     */
    public static outputSize(quad: Quad): CropSize {
        const [tl, tr, br, bl] = quad;
        const width = Math.trunc(Math.max(Util.distance(tl, tr), Util.distance(bl, br)));
        const height = Math.trunc(Math.max(Util.distance(tl, bl), Util.distance(tr, br)));
        return { width: Math.max(1, width), height: Math.max(1, height) };
    }

    /**
     * A quad enclosing no area has no perspective transform; it is replaced by
     * its bounding rectangle grown to at least one pixel each way.
     */
    public cropAndStraighten(image: Image, box: Box, opts?: { name?: string }): Image {
        opts = opts || {};
        const ordered = box.ordered();
        const source = ordered.area() > 0
            ? ordered
            : Box.fromRect(box.minX, box.minY, Math.max(1, box.width), Math.max(1, box.height));
        const quad = source.points;
        const size = PerspectiveCropper.outputSize(quad);
        const ctx = image.ctx;
        if (ctx.isTraceEnabled()) ctx.trace(`cropping ${JSON.stringify(box)} to ${size.width}x${size.height}`);
        return image.warpQuad(quad, size.width, size.height, { name: opts.name || "glyph" });
    }

}
