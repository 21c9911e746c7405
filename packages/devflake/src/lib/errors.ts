// devflake/src/lib/errors.ts
// Configuration errors. Evaluation stops at the first one for the affected
// platform; nothing is retried and no partial result is returned. Failures
// raised by an external build engine are never wrapped in these.

export type FlakeErrorKind = 'unresolved-reference' | 'unsupported-platform' | 'invalid-definition';

export abstract class FlakeError extends Error {
    abstract readonly kind: FlakeErrorKind;
}

/** A pin, lookup or tool name refers to something that is not declared. */
export class UnresolvedReferenceError extends FlakeError {
    readonly kind = 'unresolved-reference';

    constructor(
        readonly names: readonly string[],
        readonly scope: string,
    ) {
        const quoted = names.map(name => `"${name}"`).join(', ');
        super(`${scope}: undefined ${names.length === 1 ? 'name' : 'names'} ${quoted}`);
        this.name = 'UnresolvedReferenceError';
    }
}

export class UnsupportedPlatformError extends FlakeError {
    readonly kind = 'unsupported-platform';

    constructor(
        readonly platform: string,
        readonly supported: readonly string[],
    ) {
        super(`Platform "${platform}" is not supported (supported: ${supported.join(', ') || 'none'})`);
        this.name = 'UnsupportedPlatformError';
    }
}

/** A declaration or a value produced by a source has the wrong shape. */
export class InvalidDefinitionError extends FlakeError {
    readonly kind = 'invalid-definition';

    constructor(
        message: string,
        readonly issues: readonly string[] = [],
        options?: ErrorOptions,
    ) {
        super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, options);
        this.name = 'InvalidDefinitionError';
    }
}

export function isFlakeError(error: unknown): error is FlakeError {
    return error instanceof FlakeError;
}

export type SerializedError = { name?: string; kind?: FlakeErrorKind; message: string };

export const serializeError = (error: unknown): SerializedError => {
    if (error instanceof FlakeError) {
        return { name: error.name, kind: error.kind, message: error.message };
    }

    if (error instanceof Error) {
        return { name: error.name, message: error.message };
    }

    if (error && typeof error === 'object') {
        try {
            return { message: JSON.stringify(error) };
        } catch {
            return { message: '[object]' };
        }
    }

    return { message: String(error) };
};
