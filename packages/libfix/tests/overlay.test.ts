// tests/overlay.test.ts — Tests for applyOverlays
import { describe, it, expect } from 'vitest';
import {
    deferred,
    applyOverlays, createModuleMerge,
    EagerFinalAccessError,
} from '../src/index.js';

describe('applyOverlays', () => {
    it('threads accumulated state through prev', () => {
        const result = applyOverlays(
            { a: 1 },
            [
                (_final, prev) => ({ b: (prev.a as number) + 1 }),
                (_final, prev) => ({ c: (prev.b as number) + 10 }),
            ],
        );
        expect(result).toEqual({ a: 1, b: 2, c: 12 });
    });

    it('later overlays replace keys under the default merge', () => {
        expect(applyOverlays({ a: 1 }, [() => ({ a: 2 }), () => ({ a: 3 })])).toEqual({ a: 3 });
    });

    it('does not mutate the base', () => {
        const base = { a: 1 };
        applyOverlays(base, [() => ({ a: 2 })]);
        expect(base).toEqual({ a: 1 });
    });

    it('lets an early overlay read a later value through final', () => {
        const result = applyOverlays(
            { tools: ['rustc'] },
            [
                (final) => ({ count: deferred(() => (final.tools as string[]).length) }),
                (_final, prev) => ({ tools: [...(prev.tools as string[]), 'cargo'] }),
            ],
        );
        expect(result.count).toBe(2);
    });

    it('resolves a thunk that reads another thunk through final', () => {
        const result = applyOverlays(
            { a: 1 },
            [
                (final) => ({
                    b: deferred(() => (final.a as number) + 1),
                    c: deferred(() => final.b),
                }),
            ],
        );
        expect(result.c).toBe(2);
    });

    it('rejects eager reads of final', () => {
        expect(() => applyOverlays({ a: 1 }, [(final) => ({ b: final.a })]))
            .toThrow(EagerFinalAccessError);
        expect(() => applyOverlays({ a: 1 }, [(final) => ({ b: 'a' in final })]))
            .toThrow(/Cannot test membership of final/);
        expect(() => applyOverlays({ a: 1 }, [(final) => ({ b: Object.keys(final) })]))
            .toThrow(/Cannot enumerate final/);
    });

    it('uses the merge strategy it is given', () => {
        const result = applyOverlays(
            {},
            [() => ({ list: ['a'] }), () => ({ list: ['b'] })],
            { merge: createModuleMerge() },
        );
        expect(result.list).toEqual(['a', 'b']);
    });
});
