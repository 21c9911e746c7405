// libfix/src/errors.ts

/** Two overlay or module contributions cannot be reconciled. */
export class MergeConflictError extends Error {
    constructor(
        readonly key: string,
        message: string,
    ) {
        super(message);
        this.name = 'MergeConflictError';
    }
}

/** `final` was read while overlays were still being merged. */
export class EagerFinalAccessError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'EagerFinalAccessError';
    }
}
