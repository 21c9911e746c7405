// tests/flake.test.ts — Tests for flake evaluation and the invocation surface
import { describe, it, expect } from 'vitest';
import { force } from 'libfix';
import { pino } from 'pino';
import {
    defineFlake, evaluateFlake, selectDefaultPackage, selectDevShell, perPlatformAttrs,
    requireOutputs, isPackageSetSource, isSystemsList, importPackageIndex, mkShell,
    PlatformEnumeration, BundledSourceResolver, DEFAULT_SYSTEMS,
    UnresolvedReferenceError, UnsupportedPlatformError,
} from '../src/index.js';
import type { Derivation, Platform, ShellDescriptor } from '../src/index.js';

function captureLogger() {
    const lines: string[] = [];
    const logger = pino({ level: 'debug' }, { write: (line: string) => { lines.push(line); } });
    const messages = (): string[] => lines.map(line => JSON.parse(line).msg);
    return { logger, messages };
}

/** A flake whose default package only exists on Linux. */
function testFlake(constructed: Platform[] = []) {
    return defineFlake({
        description: 'test flake',
        inputs: {
            nixpkgs: 'github:nixos/nixpkgs/nixos-24.11',
            systems: 'github:nix-systems/default',
        },
        outputs: ({ nixpkgs, systems }, { logger }) => {
            const { packageSet } = requireOutputs(nixpkgs, isPackageSetSource, 'a package set');
            const { systems: platforms } = requireOutputs(systems, isSystemsList, 'a systems list');
            return {
                platforms: new PlatformEnumeration(platforms, system => {
                    constructed.push(system);
                    return importPackageIndex(packageSet, { system, logger });
                }),
                defaultPackage: ctx => ctx.derivation('valgrind'),
                devShell: ctx => mkShell(ctx, { packages: ['rustc', 'cargo'] }),
                overlay: () => ({}),
            };
        },
    });
}

const resolver = new BundledSourceResolver();

describe('evaluateFlake', () => {
    it('declares every platform of the systems input', () => {
        const outputs = evaluateFlake(testFlake(), resolver);
        expect(outputs.description).toBe('test flake');
        expect(outputs.platforms).toEqual(DEFAULT_SYSTEMS);
        expect(Object.keys(outputs.perPlatform)).toEqual(DEFAULT_SYSTEMS);
    });

    it('builds no context until an output is requested', () => {
        const constructed: Platform[] = [];
        evaluateFlake(testFlake(constructed), resolver);
        expect(constructed).toEqual([]);
    });

    it('shares one context between the outputs of a platform', () => {
        const constructed: Platform[] = [];
        const outputs = evaluateFlake(testFlake(constructed), resolver);
        selectDefaultPackage(outputs, 'x86_64-linux');
        selectDevShell(outputs, 'x86_64-linux');
        expect(constructed).toEqual(['x86_64-linux']);
    });

    it('keeps a failure on one platform away from the others', () => {
        const outputs = evaluateFlake(testFlake(), resolver);
        expect(() => selectDefaultPackage(outputs, 'aarch64-darwin')).toThrow(UnresolvedReferenceError);
        expect(() => selectDefaultPackage(outputs, 'aarch64-darwin'))
            .toThrow('package index (aarch64-darwin): undefined name "valgrind"');
        expect(selectDevShell(outputs, 'aarch64-darwin').system).toBe('aarch64-darwin');
        expect(selectDefaultPackage(outputs, 'x86_64-linux').name).toBe('valgrind-3.23.0');
    });

    it('rejects platforms outside the enumeration', () => {
        const outputs = evaluateFlake(testFlake(), resolver);
        expect(() => selectDevShell(outputs, 'riscv64-linux')).toThrow(UnsupportedPlatformError);
        expect(() => selectDevShell(outputs, 'riscv64-linux')).toThrow(
            'Platform "riscv64-linux" is not supported ' +
            '(supported: aarch64-darwin, aarch64-linux, x86_64-darwin, x86_64-linux)',
        );
    });

    it('logs input resolution at debug level', () => {
        const { logger, messages } = captureLogger();
        evaluateFlake(testFlake(), resolver, { logger });
        expect(messages()).toEqual(['input resolved', 'input resolved', 'flake outputs declared']);
    });
});

describe('perPlatformAttrs', () => {
    it('lays outputs out attribute first', () => {
        const attrs = perPlatformAttrs(evaluateFlake(testFlake(), resolver));
        expect(Object.keys(attrs)).toEqual(['defaultPackage', 'devShell']);
        expect(Object.keys(attrs.devShell)).toEqual(DEFAULT_SYSTEMS);
        expect(force<Derivation | ShellDescriptor>(attrs.devShell['x86_64-darwin'])).toMatchObject({ type: 'shell', system: 'x86_64-darwin' });
    });
});
