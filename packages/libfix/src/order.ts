// libfix/src/order.ts
// List positioning, matching the Nix module system:
//
//   mkBefore = mkOrder 500;   default = 1000;   mkAfter = mkOrder 1500;
//
// Lower order comes first; equal orders keep contribution order.

import type { Ordered, OrderedList, Segment } from './types.js';

export const DEFAULT_ORDER = 1000;
export const BEFORE_ORDER = 500;
export const AFTER_ORDER = 1500;

export function mkOrder<T>(order: number, items: T[]): Ordered<T> {
    return { __ordered: true, order, items };
}

export function mkBefore<T>(items: T[]): Ordered<T> {
    return mkOrder(BEFORE_ORDER, items);
}

export function mkAfter<T>(items: T[]): Ordered<T> {
    return mkOrder(AFTER_ORDER, items);
}

export function isOrdered(val: unknown): val is Ordered {
    return val !== null && typeof val === 'object' && (val as Ordered).__ordered === true;
}

export function isOrderedList(val: unknown): val is OrderedList {
    return val !== null && typeof val === 'object' && (val as OrderedList).__orderedList === true;
}

export function isArrayLike(val: unknown): boolean {
    return Array.isArray(val) || isOrdered(val) || isOrderedList(val);
}

/**
 * Split an array-like value into ordered segments. Ordered wrappers
 * embedded in a plain array become their own segments; the plain items
 * around them keep the default order.
 */
export function toSegments(val: unknown): Segment[] {
    if (isOrderedList(val)) return val.segments;
    if (isOrdered(val)) return [{ order: val.order, items: val.items }];
    if (!Array.isArray(val)) {
        throw new TypeError(`Expected a list, got ${typeof val}`);
    }

    const segments: Segment[] = [];
    let plain: unknown[] = [];
    for (const item of val) {
        if (!isOrdered(item)) {
            plain.push(item);
            continue;
        }
        if (plain.length > 0) {
            segments.push({ order: DEFAULT_ORDER, items: plain });
            plain = [];
        }
        segments.push({ order: item.order, items: item.items });
    }
    if (plain.length > 0 || segments.length === 0) {
        segments.push({ order: DEFAULT_ORDER, items: plain });
    }
    return segments;
}

export function toOrderedList(val: unknown): OrderedList {
    return { __orderedList: true, segments: toSegments(val) };
}
