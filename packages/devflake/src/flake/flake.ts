// devflake/src/flake/flake.ts
// Flake evaluation: inputs → platforms → { defaultPackage, devShell } per
// platform, plus one platform-independent overlay.
//
// Per-platform resolution and the overlay are produced independently and
// only combined here. Every per-platform value is a thunk, so a failure on
// one platform (or in one attribute) leaves the others usable.

import { deferred, force } from 'libfix';
import type { Deferred } from 'libfix';

import { UnsupportedPlatformError } from '../lib/errors.js';
import { silentLogger } from '../lib/logger.js';
import type { Logger } from '../lib/logger.js';
import { declareInputs, resolveInputs } from '../inputs/registry.js';
import type { InputDeclarations, InputRegistry, ResolvedInputs, SourceResolver } from '../inputs/registry.js';
import { eachSystem } from '../platform/enumerator.js';
import type { PlatformEnumeration } from '../platform/enumerator.js';
import type { Platform } from '../platform/platform.js';
import type { IndexOverlay, PackageIndex } from '../pkgs/package-index.js';
import type { Derivation, ShellDescriptor } from '../pkgs/types.js';

// ─── Definition ─────────────────────────────────────────────────────

export interface OutputsContext {
    logger: Logger;
}

export interface FlakeOutputs {
    platforms: PlatformEnumeration<PackageIndex>;
    defaultPackage(ctx: PackageIndex): Derivation;
    devShell(ctx: PackageIndex): ShellDescriptor;
    overlay: IndexOverlay;
}

export interface FlakeDefinition {
    description: string;
    inputs: InputDeclarations;
    outputs(inputs: ResolvedInputs, context: OutputsContext): FlakeOutputs;
}

export interface Flake extends FlakeDefinition {
    readonly registry: InputRegistry;
}

/** Validates the input declarations up front. */
export function defineFlake(definition: FlakeDefinition): Flake {
    return { ...definition, registry: declareInputs(definition.inputs) };
}

// ─── Output set ─────────────────────────────────────────────────────

export interface PlatformOutputs {
    readonly defaultPackage: Deferred<Derivation>;
    readonly devShell: Deferred<ShellDescriptor>;
}

export interface OutputSet {
    readonly description: string;
    readonly inputs: ResolvedInputs;
    readonly platforms: readonly Platform[];
    readonly perPlatform: Readonly<Record<Platform, PlatformOutputs>>;
    readonly overlay: IndexOverlay;
}

/** One context per platform, built on first use and shared by its attributes. */
export function resolvePerPlatform(outputs: FlakeOutputs): Record<Platform, PlatformOutputs> {
    const result: Record<Platform, PlatformOutputs> = {};
    for (const platform of outputs.platforms) {
        const ctx = deferred(() => outputs.platforms.contextFor(platform));
        result[platform] = {
            defaultPackage: deferred(() => outputs.defaultPackage(force(ctx))),
            devShell: deferred(() => outputs.devShell(force(ctx))),
        };
    }
    return result;
}

export interface EvaluateOptions {
    logger?: Logger;
}

export function evaluateFlake(flake: Flake, resolver: SourceResolver, options: EvaluateOptions = {}): OutputSet {
    const logger = options.logger ?? silentLogger;
    const inputs = resolveInputs(flake.registry, resolver, { logger });
    const outputs = flake.outputs(inputs, { logger });
    const platforms = [...outputs.platforms];

    logger.debug({ platforms }, 'flake outputs declared');
    return {
        description: flake.description,
        inputs,
        platforms,
        perPlatform: resolvePerPlatform(outputs),
        overlay: outputs.overlay,
    };
}

// ─── Invocation surface ─────────────────────────────────────────────

export function platformOutputs(outputs: OutputSet, platform: string): PlatformOutputs {
    const found = outputs.platforms.find(candidate => candidate === platform);
    if (found === undefined) {
        throw new UnsupportedPlatformError(platform, outputs.platforms);
    }
    return outputs.perPlatform[found];
}

/** `build`: the default package for one platform. */
export function selectDefaultPackage(outputs: OutputSet, platform: string): Derivation {
    return force(platformOutputs(outputs, platform).defaultPackage);
}

/** `develop`: the development shell for one platform. */
export function selectDevShell(outputs: OutputSet, platform: string): ShellDescriptor {
    return force(platformOutputs(outputs, platform).devShell);
}

/** The attribute-first layout (`defaultPackage.<platform>`), still lazy. */
export function perPlatformAttrs(
    outputs: OutputSet,
): Record<string, Record<Platform, Deferred<Derivation> | Deferred<ShellDescriptor>>> {
    return eachSystem(outputs.platforms, platform => {
        const { defaultPackage, devShell } = outputs.perPlatform[platform];
        return { defaultPackage, devShell };
    });
}
