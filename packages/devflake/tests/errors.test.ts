// tests/errors.test.ts — Tests for the error taxonomy and serializeError
import { describe, it, expect } from 'vitest';
import {
    FlakeError,
    UnresolvedReferenceError, UnsupportedPlatformError, InvalidDefinitionError,
    isFlakeError, serializeError,
} from '../src/index.js';

describe('UnresolvedReferenceError', () => {
    it('names a single missing reference and its scope', () => {
        const error = new UnresolvedReferenceError(['cargo-edit'], 'package index (x86_64-linux)');
        expect(error.message).toBe('package index (x86_64-linux): undefined name "cargo-edit"');
        expect(error.kind).toBe('unresolved-reference');
        expect(error.names).toEqual(['cargo-edit']);
        expect(error.scope).toBe('package index (x86_64-linux)');
    });

    it('lists several missing references', () => {
        const error = new UnresolvedReferenceError(['rustfmt', 'rust-analyzer'], 'scope');
        expect(error.message).toBe('scope: undefined names "rustfmt", "rust-analyzer"');
    });

    it('is a FlakeError and an Error', () => {
        const error = new UnresolvedReferenceError(['x'], 'scope');
        expect(error).toBeInstanceOf(FlakeError);
        expect(error).toBeInstanceOf(Error);
        expect(error.name).toBe('UnresolvedReferenceError');
    });
});

describe('UnsupportedPlatformError', () => {
    it('lists the supported platforms', () => {
        const error = new UnsupportedPlatformError('riscv64-linux', ['x86_64-linux', 'aarch64-linux']);
        expect(error.message).toBe(
            'Platform "riscv64-linux" is not supported (supported: x86_64-linux, aarch64-linux)',
        );
        expect(error.kind).toBe('unsupported-platform');
    });

    it('says none when nothing is supported', () => {
        expect(new UnsupportedPlatformError('x64-win32', []).message)
            .toBe('Platform "x64-win32" is not supported (supported: none)');
    });
});

describe('InvalidDefinitionError', () => {
    it('appends its issues to the message', () => {
        const error = new InvalidDefinitionError('Invalid input declarations', ['a: bad', 'b: worse']);
        expect(error.message).toBe('Invalid input declarations: a: bad; b: worse');
        expect(error.issues).toEqual(['a: bad', 'b: worse']);
        expect(error.kind).toBe('invalid-definition');
    });

    it('keeps a bare message without issues', () => {
        expect(new InvalidDefinitionError('Cyclic follows').message).toBe('Cyclic follows');
    });

    it('carries its cause', () => {
        const cause = new Error('inner');
        expect(new InvalidDefinitionError('outer', [], { cause }).cause).toBe(cause);
    });
});

describe('isFlakeError', () => {
    it('separates configuration errors from everything else', () => {
        expect(isFlakeError(new InvalidDefinitionError('x'))).toBe(true);
        expect(isFlakeError(new Error('x'))).toBe(false);
        expect(isFlakeError('x')).toBe(false);
    });
});

describe('serializeError', () => {
    it('includes the kind of a FlakeError', () => {
        expect(serializeError(new UnresolvedReferenceError(['naersk'], 'package index (x86_64-linux)'))).toEqual({
            name: 'UnresolvedReferenceError',
            kind: 'unresolved-reference',
            message: 'package index (x86_64-linux): undefined name "naersk"',
        });
    });

    it('keeps name and message of a plain Error', () => {
        expect(serializeError(new TypeError('nope'))).toEqual({ name: 'TypeError', message: 'nope' });
    });

    it('stringifies objects and primitives', () => {
        expect(serializeError({ code: 101 })).toEqual({ message: '{"code":101}' });
        expect(serializeError('boom')).toEqual({ message: 'boom' });
        expect(serializeError(undefined)).toEqual({ message: 'undefined' });
    });
});
