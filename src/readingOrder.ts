/**
 * Copyright (c) 2024 Discover Financial Services
*/
import type { Boxed } from "./box.js";

/**
 * Sort top-to-bottom, then left-to-right, by the top-left bound of each box.
 * Returns a new array; items with equal bounds keep their input order.
 */
export function sortReadingOrder<T extends Boxed>(items: ReadonlyArray<T>): T[] {
    return [...items].sort((a, b) => (a.box.minY - b.box.minY) || (a.box.minX - b.box.minX));
}
