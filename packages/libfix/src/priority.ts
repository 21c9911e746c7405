// libfix/src/priority.ts
// Numeric priorities for scalar conflicts, matching the Nix module system:
//
//   mkOverride = priority: content: { _type = "override"; ... };
//   mkDefault  = mkOverride 1000;
//   mkForce    = mkOverride 50;
//   a bare value sits at 100.

import type { Override } from './types.js';

export const DEFAULT_PRIORITY = 100;
export const MKDEFAULT_PRIORITY = 1000;
export const MKFORCE_PRIORITY = 50;

/** Attach an explicit priority; the lower number wins a conflict. */
export function mkOverride<T>(priority: number, value: T): Override<T> {
    return { __type: 'override', priority, value };
}

/** A fallback any bare value replaces. */
export function mkDefault<T>(value: T): Override<T> {
    return mkOverride(MKDEFAULT_PRIORITY, value);
}

/** Beats bare values and defaults. */
export function mkForce<T>(value: T): Override<T> {
    return mkOverride(MKFORCE_PRIORITY, value);
}

export function isOverride(val: unknown): val is Override {
    return (
        val !== null &&
        typeof val === 'object' &&
        (val as Override).__type === 'override'
    );
}

export function getPriority(val: unknown): number {
    return isOverride(val) ? val.priority : DEFAULT_PRIORITY;
}

export function unwrapPriority(val: unknown): unknown {
    return isOverride(val) ? val.value : val;
}
