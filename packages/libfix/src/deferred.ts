// libfix/src/deferred.ts
// Thunks: values computed on first use, after overlays settle.

import type { Deferred } from './types.js';

/**
 * Wrap a computation as a thunk. The result is cached after the first
 * successful call; a computation that throws is retried on the next force.
 *
 * @example
 * const overlay = (final) => ({
 *   app: deferred(() => buildApp(final.toolchain)),
 * });
 */
export function deferred<T>(fn: () => T): Deferred<T> {
    let cell: { value: T } | undefined;
    const memo = (): T => {
        if (cell === undefined) {
            cell = { value: fn() };
        }
        return cell.value;
    };
    return { __deferred: true, fn: memo };
}

export function isDeferred(val: unknown): val is Deferred {
    return val !== null && typeof val === 'object' && (val as Deferred).__deferred === true;
}

function isThunkOf<T>(val: T | Deferred<T>): val is Deferred<T> {
    return isDeferred(val);
}

/** Force a thunk (and any thunk it returns); other values pass through. */
export function force<T>(val: T | Deferred<T>): T {
    return isThunkOf(val) ? force(val.fn()) : val;
}
