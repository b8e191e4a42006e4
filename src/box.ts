/**
 * Copyright (c) 2024 Discover Financial Services
*/
export interface Point {
    readonly x: number;
    readonly y: number;
}

export type Quad = readonly [Point, Point, Point, Point];

/** A box as plain corner coordinates, in the order the box holds them. */
export type QuadArray = [[number, number], [number, number], [number, number], [number, number]];

/**
 * Anything that can be placed on the page by its box.
 */
export interface Boxed {
    readonly box: Box;
}

/**
 * A quadrilateral in pixel coordinates.
 *
 * The scalar bounds are computed once at construction; grouping compares
 * boxes pairwise, so they are never re-derived from the points.
 */
export class Box implements Boxed {

    public static fromRect(x: number, y: number, width: number, height: number): Box {
        return new Box([
            { x, y },
            { x: x + width, y },
            { x: x + width, y: y + height },
            { x, y: y + height },
        ]);
    }

    public static fromBounds(minX: number, minY: number, maxX: number, maxY: number): Box {
        return Box.fromRect(minX, minY, maxX - minX, maxY - minY);
    }

    public static fromArray(points: ReadonlyArray<readonly [number, number]>): Box {
        if (points.length !== 4) throw new Error(`a box requires 4 points but found ${points.length}`);
        const [p0, p1, p2, p3] = points.map(([x, y]) => ({ x, y }));
        if (!p0 || !p1 || !p2 || !p3) throw new Error(`a box requires 4 points`);
        return new Box([p0, p1, p2, p3]);
    }

    /**
     * The axis-aligned box enclosing every given box.
     * @throws if boxes is empty
     */
    public static union(boxes: ReadonlyArray<Box>): Box {
        if (boxes.length === 0) throw new Error(`cannot compute the union of zero boxes`);
        let minX = Number.POSITIVE_INFINITY;
        let minY = Number.POSITIVE_INFINITY;
        let maxX = Number.NEGATIVE_INFINITY;
        let maxY = Number.NEGATIVE_INFINITY;
        for (const b of boxes) {
            minX = Math.min(minX, b.minX);
            minY = Math.min(minY, b.minY);
            maxX = Math.max(maxX, b.maxX);
            maxY = Math.max(maxY, b.maxY);
        }
        return Box.fromBounds(minX, minY, maxX, maxY);
    }

    /**
     * Order four points as top-left, top-right, bottom-right, bottom-left.
     * The two points with the smallest y form the top edge and the other two
     * the bottom edge; each edge is then ordered by x.
     */
    public static orderPoints(points: Quad): Quad {
        const sorted = [...points].sort((a, b) => (a.y - b.y) || (a.x - b.x));
        const [a, b, c, d] = sorted;
        if (!a || !b || !c || !d) throw new Error(`a box requires 4 points`);
        const [tl, tr]: [Point, Point] = a.x <= b.x ? [a, b] : [b, a];
        const [bl, br]: [Point, Point] = c.x <= d.x ? [c, d] : [d, c];
        return [tl, tr, br, bl];
    }

    public readonly points: Quad;
    public readonly minX: number;
    public readonly maxX: number;
    public readonly minY: number;
    public readonly maxY: number;
    public readonly centerX: number;
    public readonly centerY: number;
    public readonly width: number;
    public readonly height: number;

    constructor(points: Quad) {
        this.points = points;
        const xs = points.map((p) => p.x);
        const ys = points.map((p) => p.y);
        this.minX = Math.min(...xs);
        this.maxX = Math.max(...xs);
        this.minY = Math.min(...ys);
        this.maxY = Math.max(...ys);
        this.centerX = (this.minX + this.maxX) / 2;
        this.centerY = (this.minY + this.maxY) / 2;
        this.width = this.maxX - this.minX;
        this.height = this.maxY - this.minY;
    }

    public get box(): Box {
        return this;
    }

    public isDegenerate(): boolean {
        return this.width <= 0 || this.height <= 0;
    }

    /** Area enclosed by the points, in the order they are held (shoelace formula). */
    public area(): number {
        let sum = 0;
        for (let i = 0; i < 4; i++) {
            const p = this.points[i];
            const q = this.points[(i + 1) % 4];
            if (p && q) sum += p.x * q.y - q.x * p.y;
        }
        return Math.abs(sum) / 2;
    }

    /** The same quadrilateral with its corners in clockwise, top-left-first order. */
    public ordered(): Box {
        return new Box(Box.orderPoints(this.points));
    }

    /**
     * Grow the box by a fraction of its own size on every side.  The result
     * is axis-aligned.
     */
    public expand(fractionX: number, fractionY: number): Box {
        const dx = this.width * fractionX;
        const dy = this.height * fractionY;
        return Box.fromBounds(this.minX - dx, this.minY - dy, this.maxX + dx, this.maxY + dy);
    }

    /** Standard AABB test: overlapping unless separated on either axis. */
    public overlaps(other: Box): boolean {
        return !(this.maxX < other.minX || other.maxX < this.minX ||
                 this.maxY < other.minY || other.maxY < this.minY);
    }

    /**
     * Vertical overlap divided by the smaller of the two heights.
     */
    public verticalOverlapRatio(other: Box): number {
        const overlap = Math.max(0, Math.min(this.maxY, other.maxY) - Math.max(this.minY, other.minY));
        const denom = Math.min(this.height, other.height);
        if (denom <= 0) return 0;
        return overlap / denom;
    }

    public toArray(): QuadArray {
        const [p0, p1, p2, p3] = this.points;
        return [[p0.x, p0.y], [p1.x, p1.y], [p2.x, p2.y], [p3.x, p3.y]];
    }

    public toJSON() {
        return this.toArray();
    }

}
