// libfix/src/overlay.ts
// Overlay application: the TypeScript rendering of
//
//   fix (extends overlays (final: base))
//
// Nix gets `final` for free from lazy evaluation. Here it is a proxy that
// refuses reads until every overlay has been merged; overlays that need a
// final value wrap the read in `deferred()`, and those thunks are forced in
// a second pass.

import { EagerFinalAccessError } from './errors.js';
import { resolveDeferred } from './resolve.js';
import type { ApplyOverlaysOptions, Attrs, MergeFn, OverlayFn } from './types.js';

/**
 * Fold overlays over `base` and resolve the result.
 *
 * @returns A fresh record; `base` is never mutated.
 */
export function applyOverlays(
    base: Attrs,
    overlays: readonly OverlayFn[],
    options: ApplyOverlaysOptions = {},
): Attrs {
    const merge = options.merge ?? shallowMerge;
    let settled: Attrs | null = null;

    const final = new Proxy(Object.create(null) as Attrs, {
        get(_: Attrs, prop: string | symbol): unknown {
            if (settled === null) {
                throw new EagerFinalAccessError(
                    `Cannot read final.${String(prop)} while overlays are merging. ` +
                    `Wrap the read in deferred(() => final.${String(prop)}).`,
                );
            }
            return typeof prop === 'string' ? settled[prop] : undefined;
        },
        has(_: Attrs, prop: string | symbol): boolean {
            if (settled === null) {
                throw new EagerFinalAccessError(`Cannot test membership of final while overlays are merging.`);
            }
            return prop in settled;
        },
        ownKeys(): Array<string | symbol> {
            if (settled === null) {
                throw new EagerFinalAccessError(`Cannot enumerate final while overlays are merging.`);
            }
            return Reflect.ownKeys(settled);
        },
        getOwnPropertyDescriptor(_: Attrs, prop: string | symbol): PropertyDescriptor | undefined {
            if (settled === null || typeof prop !== 'string' || !(prop in settled)) return undefined;
            return { value: settled[prop], writable: true, enumerable: true, configurable: true };
        },
    });

    // Phase 1: merge
    let current: Attrs = { ...base };
    for (const overlay of overlays) {
        current = merge(current, overlay(final, current));
    }

    // Phase 2: force thunks; they may read `final`, which now sees the merged state
    settled = current;
    const resolved = resolveDeferred(current);
    settled = isRecord(resolved) ? resolved : current;
    return settled;
}

function isRecord(val: unknown): val is Attrs {
    return val !== null && typeof val === 'object' && !Array.isArray(val);
}

/** Later keys replace earlier ones. The default merge. */
export const shallowMerge: MergeFn = (current, extension) => ({ ...current, ...extension });
