// libfix/src/types.ts
// Shared shapes for thunks, priority wrappers, ordered lists and overlays.

/** Attribute set: the unit every overlay and merge works on. */
export type Attrs = Record<string, unknown>;

// ─── Deferred ───────────────────────────────────────────────────────

/** A thunk, forced after all overlays merge. */
export interface Deferred<T = unknown> {
    readonly __deferred: true;
    readonly fn: () => T;
}

// ─── Priority ───────────────────────────────────────────────────────

/**
 * Priority wrapper for scalar conflicts. Lower number wins:
 *   mkForce 50 < bare value 100 < mkDefault 1000
 */
export interface Override<T = unknown> {
    readonly __type: 'override';
    readonly priority: number;
    readonly value: T;
}

// ─── Order ──────────────────────────────────────────────────────────

/** List segment placed by sort order (mkBefore / mkAfter / mkOrder). */
export interface Ordered<T = unknown> {
    readonly __ordered: true;
    readonly order: number;
    readonly items: T[];
}

export interface Segment<T = unknown> {
    order: number;
    items: T[];
}

/** Segments accumulated while merging; flattened on resolve. */
export interface OrderedList<T = unknown> {
    readonly __orderedList: true;
    readonly segments: Array<Segment<T>>;
}

// ─── Overlays ───────────────────────────────────────────────────────

/** Combines the accumulated state with one overlay's extension. */
export type MergeFn = (current: Attrs, extension: Attrs) => Attrs;

/**
 * Overlay: `prev` is the state so far, `final` the state after every
 * overlay (readable only inside a deferred).
 */
export type OverlayFn = (final: Attrs, prev: Attrs) => Attrs;

export interface ApplyOverlaysOptions {
    merge?: MergeFn;
}
