// tests/module-merge.test.ts — Tests for module merge and priorities
import { describe, it, expect } from 'vitest';
import {
    mkDefault, mkForce, mkOverride,
    mkBefore, mkAfter, mkOrder,
    getPriority, unwrapPriority,
    applyOverlays,
    createModuleMerge,
    MergeConflictError,
} from '../src/index.js';
import type { MergeFn } from '../src/index.js';

function mergeWith(merge: MergeFn, ...fragments: Array<Record<string, unknown>>): Record<string, unknown> {
    return applyOverlays({}, fragments.map(f => () => f), { merge });
}

const moduleMerge = createModuleMerge();

// ─── Lists ──────────────────────────────────────────────────────────

describe('module merge: lists', () => {
    it('concatenates plain lists in contribution order', () => {
        expect(mergeWith(moduleMerge, { xs: ['a', 'b'] }, { xs: ['c'] }).xs).toEqual(['a', 'b', 'c']);
    });

    it('places mkBefore first and mkAfter last', () => {
        const result = mergeWith(
            moduleMerge,
            { xs: mkAfter(['last']) },
            { xs: ['middle'] },
            { xs: mkBefore(['first']) },
        );
        expect(result.xs).toEqual(['first', 'middle', 'last']);
    });

    it('keeps contribution order among equal orders', () => {
        const result = mergeWith(
            moduleMerge,
            { xs: mkOrder(700, ['a']) },
            { xs: mkOrder(700, ['b']) },
        );
        expect(result.xs).toEqual(['a', 'b']);
    });

    it('splits ordered wrappers embedded in a plain list', () => {
        const result = mergeWith(moduleMerge, { xs: ['mid', mkBefore(['head'])] });
        expect(result.xs).toEqual(['head', 'mid']);
    });

    it('rejects a list merged with a scalar', () => {
        expect(() => mergeWith(moduleMerge, { xs: [1] }, { xs: 'one' })).toThrow(MergeConflictError);
    });

    it('merges underscore-prefixed keys like any other list', () => {
        expect(mergeWith(moduleMerge, { _seen: ['a'] }, { _seen: ['b'] })._seen).toEqual(['a', 'b']);
    });
});

// ─── Scalars ────────────────────────────────────────────────────────

describe('module merge: scalars', () => {
    it('prefers a bare value over mkDefault', () => {
        expect(mergeWith(moduleMerge, { name: mkDefault('fallback') }, { name: 'chosen' }).name).toBe('chosen');
        expect(mergeWith(moduleMerge, { name: 'chosen' }, { name: mkDefault('fallback') }).name).toBe('chosen');
    });

    it('prefers mkForce over a bare value', () => {
        expect(mergeWith(moduleMerge, { n: mkForce(1) }, { n: 2 }).n).toBe(1);
    });

    it('accepts equal values at equal priority', () => {
        expect(mergeWith(moduleMerge, { n: 3 }, { n: 3 }).n).toBe(3);
    });

    it('rejects different values at equal priority', () => {
        expect(() => mergeWith(moduleMerge, { n: 1 }, { n: 2 }))
            .toThrow('Conflicting values for "n": 1 and 2 at priority 100');
    });

    it('reads priorities off wrappers', () => {
        expect(getPriority(mkOverride(7, 'x'))).toBe(7);
        expect(getPriority('x')).toBe(100);
        expect(unwrapPriority(mkDefault('x'))).toBe('x');
    });
});

// ─── Records ────────────────────────────────────────────────────────

describe('module merge: records', () => {
    it('deep merges nested records', () => {
        const result = mergeWith(moduleMerge, { env: { A: '1', deep: { x: 1 } } }, { env: { B: '2', deep: { y: 2 } } });
        expect(result.env).toEqual({ A: '1', B: '2', deep: { x: 1, y: 2 } });
    });

    it('rejects duplicate sub-keys of unique fields', () => {
        const merge = createModuleMerge({ uniqueKeyFields: ['env'] });
        expect(() => mergeWith(merge, { env: { A: '1' } }, { env: { A: '2' } }))
            .toThrow('"env.A" is defined more than once');
    });
});
