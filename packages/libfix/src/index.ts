// libfix/src/index.ts
// Public API.

export type {
    Attrs,
    Deferred,
    Override,
    Ordered,
    OrderedList,
    Segment,
    MergeFn,
    OverlayFn,
    ApplyOverlaysOptions,
} from './types.js';
export type { ModuleMergeOptions } from './module-merge.js';

export { MergeConflictError, EagerFinalAccessError } from './errors.js';

export { deferred, isDeferred, force } from './deferred.js';

export {
    DEFAULT_PRIORITY,
    MKDEFAULT_PRIORITY,
    MKFORCE_PRIORITY,
    mkOverride,
    mkDefault,
    mkForce,
    isOverride,
    getPriority,
    unwrapPriority,
} from './priority.js';

export {
    DEFAULT_ORDER,
    BEFORE_ORDER,
    AFTER_ORDER,
    mkOrder,
    mkBefore,
    mkAfter,
    isOrdered,
    isOrderedList,
    isArrayLike,
} from './order.js';

export { resolveDeferred, isPlainRecord } from './resolve.js';

export { applyOverlays, shallowMerge } from './overlay.js';

export { createModuleMerge } from './module-merge.js';
