// libfix/src/resolve.ts
// Force thunks, unwrap priorities and flatten ordered lists, recursively.

import { isDeferred } from './deferred.js';
import { isOverride } from './priority.js';
import { isOrdered, isOrderedList } from './order.js';
import type { Attrs, OrderedList } from './types.js';

/**
 * True for object literals and `Object.create(null)` records. Class
 * instances are opaque to resolution and merging.
 */
export function isPlainRecord(val: unknown): val is Attrs {
    if (val === null || typeof val !== 'object' || Array.isArray(val)) return false;
    const proto: unknown = Object.getPrototypeOf(val);
    return proto === Object.prototype || proto === null;
}

/**
 * Walk a value and return it with every thunk forced, every priority
 * wrapper unwrapped and every ordered list flattened. Only plain records
 * and arrays are descended into; anything else is returned as is.
 */
export function resolveDeferred(obj: unknown, seen: WeakMap<object, unknown> = new WeakMap()): unknown {
    if (isOverride(obj)) return resolveDeferred(obj.value, seen);
    if (isDeferred(obj)) return resolveDeferred(obj.fn(), seen);
    if (isOrderedList(obj)) return flatten(obj, seen);
    if (isOrdered(obj)) return resolveDeferred(obj.items, seen);

    if (!Array.isArray(obj) && !isPlainRecord(obj)) return obj;
    // Shared sub-structures resolve once; cycles get the copy in progress.
    if (seen.has(obj)) return seen.get(obj);

    if (Array.isArray(obj)) {
        const items: unknown[] = [];
        seen.set(obj, items);
        for (const item of obj) items.push(resolveDeferred(item, seen));
        return items;
    }

    const resolved: Attrs = {};
    seen.set(obj, resolved);
    for (const [key, value] of Object.entries(obj)) {
        resolved[key] = resolveDeferred(value, seen);
    }
    return resolved;
}

function flatten(list: OrderedList, seen: WeakMap<object, unknown>): unknown[] {
    // Array.prototype.sort is stable, so equal orders keep merge order.
    const sorted = [...list.segments].sort((a, b) => a.order - b.order);
    const items: unknown[] = [];
    for (const segment of sorted) {
        const resolved = resolveDeferred(segment.items, seen);
        if (Array.isArray(resolved)) {
            items.push(...resolved);
        } else if (resolved !== null && resolved !== undefined) {
            items.push(resolved);
        }
    }
    return items;
}
