// libfix/src/module-merge.ts
// Module-system merge: each module contributes a fragment and the engine
// reconciles them per value kind.
//
//   lists   → ordered segments (mkBefore / mkAfter / mkOrder), flattened on resolve
//   records → deep merge; keys in `uniqueKeyFields` reject duplicate sub-keys
//   scalars → priority resolution; equal priority with different values is a conflict

import { isDeferred } from './deferred.js';
import { MergeConflictError } from './errors.js';
import { getPriority, isOverride, unwrapPriority } from './priority.js';
import { isArrayLike, isOrdered, isOrderedList, toOrderedList, toSegments } from './order.js';
import { isPlainRecord } from './resolve.js';
import type { Attrs, MergeFn } from './types.js';

function isMergeableRecord(val: unknown): val is Attrs {
    return isPlainRecord(val) && !isDeferred(val) && !isOverride(val) && !isOrdered(val) && !isOrderedList(val);
}

function deepMerge(target: Attrs, source: Attrs): Attrs {
    const result = { ...target };
    for (const [key, value] of Object.entries(source)) {
        const existing = result[key];
        if (isMergeableRecord(existing) && isMergeableRecord(value)) {
            result[key] = deepMerge(existing, value);
        } else if (Array.isArray(existing) && Array.isArray(value)) {
            result[key] = [...existing, ...value];
        } else {
            result[key] = value;
        }
    }
    return result;
}

export interface ModuleMergeOptions {
    /**
     * Record-valued keys whose sub-keys may be defined by one module only,
     * e.g. `['env']` makes two modules setting `env.RUST_LOG` a conflict.
     */
    uniqueKeyFields?: string[];
}

export function createModuleMerge(options: ModuleMergeOptions = {}): MergeFn {
    const uniqueKeyFields = new Set(options.uniqueKeyFields ?? []);

    return (current, extension) => {
        const result: Attrs = { ...current };

        for (const [key, extRaw] of Object.entries(extension)) {
            if (extRaw === undefined) continue;
            const curRaw = result[key];

            if (curRaw === undefined) {
                result[key] = isArrayLike(extRaw) ? toOrderedList(extRaw) : extRaw;
                continue;
            }

            if (isDeferred(extRaw) || isDeferred(curRaw)) {
                result[key] = extRaw;
                continue;
            }

            const curIsList = isArrayLike(curRaw);
            const extIsList = isArrayLike(extRaw);
            if (curIsList || extIsList) {
                if (!curIsList || !extIsList) {
                    throw new MergeConflictError(key, `Type mismatch for "${key}": cannot merge a list with a non-list`);
                }
                result[key] = { __orderedList: true, segments: [...toSegments(curRaw), ...toSegments(extRaw)] };
                continue;
            }

            const curVal = unwrapPriority(curRaw);
            const extVal = unwrapPriority(extRaw);

            if (isMergeableRecord(curVal) && isMergeableRecord(extVal)) {
                if (uniqueKeyFields.has(key)) {
                    const duplicate = Object.keys(extVal).find(k => k in curVal);
                    if (duplicate !== undefined) {
                        throw new MergeConflictError(key, `"${key}.${duplicate}" is defined more than once`);
                    }
                }
                result[key] = deepMerge(curVal, extVal);
                continue;
            }

            const curPri = getPriority(curRaw);
            const extPri = getPriority(extRaw);
            if (curPri === extPri) {
                if (curVal === extVal) continue;
                throw new MergeConflictError(
                    key,
                    `Conflicting values for "${key}": ${JSON.stringify(curVal)} and ${JSON.stringify(extVal)} ` +
                    `at priority ${curPri}`,
                );
            }
            if (extPri < curPri) {
                result[key] = extRaw;
            }
        }

        return result;
    };
}
