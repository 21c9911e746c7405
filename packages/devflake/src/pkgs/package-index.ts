// devflake/src/pkgs/package-index.ts
// Instantiation context: one platform's view of a package set.
//
// The index is the fixpoint of a base set and a list of overlays, exactly
// like `import nixpkgs { inherit system; overlays = [ … ]; }`. Overlays see
// `final` and `prev` as PackageIndex views; a lookup on `final` must sit
// inside `deferred()` because the fixpoint does not exist until every
// overlay has been merged.

import { z } from 'zod';
import { applyOverlays, force } from 'libfix';
import type { Attrs, OverlayFn } from 'libfix';

import { InvalidDefinitionError, UnresolvedReferenceError, UnsupportedPlatformError } from '../lib/errors.js';
import { silentLogger } from '../lib/logger.js';
import type { Logger } from '../lib/logger.js';
import { parsePlatform } from '../platform/platform.js';
import type { Platform } from '../platform/platform.js';
import type { Derivation, IndexEntry, IndexValue, PackageHelper } from './types.js';

// ─── Entry validation ───────────────────────────────────────────────

const derivationSchema: z.ZodType<unknown> = z.lazy(() =>
    z.object({
        type: z.literal('derivation'),
        name: z.string().min(1),
        pname: z.string().min(1),
        version: z.string(),
        system: z.string(),
        builder: z.string().min(1),
        src: z.string().optional(),
        nativeBuildInputs: z.array(derivationSchema),
        attrs: z.record(z.union([z.string(), z.number(), z.boolean(), z.array(z.string())])),
        meta: z.record(z.string()),
    }),
);

const helperSchema = z.object({
    type: z.literal('helper'),
    name: z.string().min(1),
    requires: z.array(z.string()),
    instantiate: z.function(),
});

const entrySchema = z.union([derivationSchema, helperSchema]);

function isIndexEntry(value: unknown): value is IndexEntry {
    return entrySchema.safeParse(value).success;
}

function isDerivationEntry(entry: IndexEntry): entry is Derivation {
    return entry.type === 'derivation';
}

// ─── Package set sources ────────────────────────────────────────────

/** A platform-parametric package set, as provided by a base package index input. */
export interface BasePackageSet {
    readonly id: string;
    readonly systems: readonly Platform[];
    packagesFor(system: Platform): Record<string, IndexValue>;
}

export type IndexOverlay = (final: PackageIndex, prev: PackageIndex) => Record<string, IndexValue>;

export interface ImportOptions {
    system: string;
    overlays?: readonly IndexOverlay[];
    logger?: Logger;
}

interface IndexOrigin {
    base: BasePackageSet;
    overlays: readonly IndexOverlay[];
    logger: Logger;
}

// ─── PackageIndex ───────────────────────────────────────────────────

export class PackageIndex {
    readonly scope: string;

    constructor(
        readonly system: Platform,
        private readonly attrs: Readonly<Attrs>,
        private readonly origin?: IndexOrigin,
    ) {
        this.scope = `package index (${system})`;
    }

    has(name: string): boolean {
        return name in this.attrs && Object.hasOwn(this.attrs, name);
    }

    names(): string[] {
        return Object.keys(this.attrs).sort();
    }

    get(name: string): IndexEntry | undefined {
        if (!this.has(name)) return undefined;
        const value = force(this.attrs[name]);
        if (!isIndexEntry(value)) {
            throw new InvalidDefinitionError(`${this.scope}: "${name}" is neither a derivation nor a helper`);
        }
        if (isDerivationEntry(value) && value.system !== this.system) {
            throw new InvalidDefinitionError(
                `${this.scope}: "${name}" is built for ${value.system}`,
            );
        }
        return value;
    }

    require(name: string): IndexEntry {
        const entry = this.get(name);
        if (entry === undefined) {
            throw new UnresolvedReferenceError([name], this.scope);
        }
        return entry;
    }

    derivation(name: string): Derivation {
        const entry = this.require(name);
        if (!isDerivationEntry(entry)) {
            throw new InvalidDefinitionError(`${this.scope}: "${name}" is a helper, not a derivation`);
        }
        return entry;
    }

    /** Look up several derivations at once; every missing name is reported together. */
    derivations(names: readonly string[]): Derivation[] {
        const missing = names.filter(name => !this.has(name));
        if (missing.length > 0) {
            throw new UnresolvedReferenceError(missing, this.scope);
        }
        return names.map(name => this.derivation(name));
    }

    /**
     * Instantiate the helper registered under `name` with the entries it
     * requires, and check the result with `guard`.
     */
    callHelper<T>(name: string, guard: (value: unknown) => value is T): T {
        const entry = this.require(name);
        if (isDerivationEntry(entry)) {
            throw new InvalidDefinitionError(`${this.scope}: "${name}" is a derivation, not a helper`);
        }
        const helper: PackageHelper = entry;
        const missing = helper.requires.filter(dep => !this.has(dep));
        if (missing.length > 0) {
            throw new UnresolvedReferenceError(missing, `${this.scope}, required by "${name}"`);
        }
        const args = Object.fromEntries(helper.requires.map(dep => [dep, this.require(dep)]));
        const instance = helper.instantiate(args);
        if (!guard(instance)) {
            throw new InvalidDefinitionError(`${this.scope}: helper "${name}" returned an unexpected value`);
        }
        return instance;
    }

    /** A new index with `overlay` applied after the existing ones. */
    extend(overlay: IndexOverlay): PackageIndex {
        if (this.origin === undefined) {
            throw new InvalidDefinitionError(`${this.scope}: an overlay view cannot be extended`);
        }
        const { base, overlays, logger } = this.origin;
        return importPackageIndex(base, { system: this.system, overlays: [...overlays, overlay], logger });
    }
}

// ─── Construction ───────────────────────────────────────────────────

function toOverlayFn(overlay: IndexOverlay, system: Platform): OverlayFn {
    return (final, prev) => overlay(new PackageIndex(system, final), new PackageIndex(system, prev));
}

/**
 * Build the index for one platform. Every entry is forced and validated
 * before this returns, so a dangling reference fails here rather than at
 * first use.
 */
export function importPackageIndex(base: BasePackageSet, options: ImportOptions): PackageIndex {
    const system = parsePlatform(options.system);
    if (!base.systems.includes(system)) {
        throw new UnsupportedPlatformError(system, base.systems);
    }
    const overlays = options.overlays ?? [];
    const logger = options.logger ?? silentLogger;

    const attrs = applyOverlays(
        base.packagesFor(system),
        overlays.map(overlay => toOverlayFn(overlay, system)),
    );
    const index = new PackageIndex(system, attrs, { base, overlays, logger });
    for (const name of index.names()) {
        index.require(name);
    }

    logger.debug({ index: base.id, system, entries: index.names().length }, 'package index constructed');
    return index;
}
