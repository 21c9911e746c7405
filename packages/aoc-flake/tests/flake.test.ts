// tests/flake.test.ts — Tests for the evaluated advent-of-code-2023 flake
import { describe, it, expect } from 'vitest';
import {
    BundledSourceResolver, DEFAULT_SYSTEMS,
    evaluateFlake, lockInputs, selectDefaultPackage, selectDevShell,
    UnsupportedPlatformError,
} from 'devflake';
import type { Derivation } from 'devflake';
import { flake, DEV_TOOLS } from '../src/index.js';

const outputs = evaluateFlake(flake, new BundledSourceResolver());

const platformIndependent = (drv: Derivation) => ({
    name: drv.name,
    pname: drv.pname,
    version: drv.version,
    builder: drv.builder,
    src: drv.src,
    attrs: drv.attrs,
});

describe('advent-of-code-2023 flake', () => {
    it('covers every default system', () => {
        expect(outputs.platforms).toEqual(DEFAULT_SYSTEMS);
    });

    it('has a package and a shell for every platform', () => {
        for (const platform of outputs.platforms) {
            expect(selectDefaultPackage(outputs, platform).system).toBe(platform);
            expect(selectDevShell(outputs, platform).system).toBe(platform);
        }
        expect(typeof outputs.overlay).toBe('function');
    });

    it('builds the same source on every platform', () => {
        const [first, ...rest] = outputs.platforms.map(platform => selectDefaultPackage(outputs, platform));
        expect(first.src).toBe('.');
        for (const drv of rest) {
            expect(platformIndependent(drv)).toEqual(platformIndependent(first));
        }
    });

    it('pins the builder helper to the declared package index', () => {
        expect(outputs.inputs.naersk.inputs.nixpkgs).toBe(outputs.inputs.nixpkgs);
        expect(Object.keys(lockInputs(outputs.inputs).nodes).sort())
            .toEqual(['flake-utils', 'naersk', 'nixpkgs', 'root', 'systems']);
    });

    it('builds x86_64-linux from the workspace root', () => {
        const drv = selectDefaultPackage(outputs, 'x86_64-linux');
        expect(drv).toMatchObject({
            type: 'derivation',
            name: 'source-0.0.0',
            system: 'x86_64-linux',
            builder: 'naersk',
            src: '.',
        });
        expect(drv.nativeBuildInputs.map(input => input.name)).toEqual(['cargo-1.82.0', 'rustc-1.82.0']);
    });

    it('gives x86_64-linux a shell of exactly the four tools', () => {
        const shell = selectDevShell(outputs, 'x86_64-linux');
        expect(shell.nativeBuildInputs.map(input => input.pname))
            .toEqual(['rustc', 'cargo-edit', 'rust-analyzer', 'rustfmt']);
        expect(Object.values(DEV_TOOLS)).toEqual(['rustc', 'cargo-edit', 'rust-analyzer', 'rustfmt']);
        expect(shell.nativeBuildInputs.every(input => input.system === 'x86_64-linux')).toBe(true);
    });

    it('rejects platforms outside the default systems', () => {
        expect(() => selectDefaultPackage(outputs, 'riscv64-linux')).toThrow(UnsupportedPlatformError);
        expect(() => selectDevShell(outputs, 'x86_64-windows')).toThrow(UnsupportedPlatformError);
    });
});
