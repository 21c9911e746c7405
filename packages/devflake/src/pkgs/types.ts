// devflake/src/pkgs/types.ts
// Records handed to the external build engine, and the entries a package
// index can hold.

import type { Deferred } from 'libfix';

import type { Platform } from '../platform/platform.js';

export type DerivationAttr = string | number | boolean | readonly string[];

export interface DerivationMeta {
    description?: string;
    homepage?: string;
    license?: string;
    mainProgram?: string;
}

/** Declarative build description. Realised later by an external engine. */
export interface Derivation {
    readonly type: 'derivation';
    readonly name: string;
    readonly pname: string;
    readonly version: string;
    readonly system: Platform;
    readonly builder: string;
    /** Source location, relative to the flake root. Absent for prebuilt tools. */
    readonly src?: string;
    readonly nativeBuildInputs: readonly Derivation[];
    readonly attrs: Readonly<Record<string, DerivationAttr>>;
    readonly meta: Readonly<DerivationMeta>;
}

/** Environment of an interactive development shell. */
export interface ShellDescriptor {
    readonly type: 'shell';
    readonly name: string;
    readonly system: Platform;
    readonly nativeBuildInputs: readonly Derivation[];
    readonly shellHook: string;
    readonly env: Readonly<Record<string, string>>;
}

/**
 * A helper registered in an index, instantiated with the index entries
 * it `requires` (the callPackage pattern).
 */
export interface PackageHelper<T = unknown> {
    readonly type: 'helper';
    readonly name: string;
    readonly requires: readonly string[];
    readonly instantiate: (args: Readonly<Record<string, IndexEntry>>) => T;
}

export type IndexEntry = Derivation | PackageHelper;

/** What an index overlay may return for a name: an entry or a thunk producing one. */
export type IndexValue = IndexEntry | Deferred<IndexEntry>;
