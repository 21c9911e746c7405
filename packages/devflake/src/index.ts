// devflake/src/index.ts
// Public API.

// ─── Ambient ────────────────────────────────────────────────────────

export type { FlakeErrorKind, SerializedError } from './lib/errors.js';
export {
    FlakeError,
    UnresolvedReferenceError,
    UnsupportedPlatformError,
    InvalidDefinitionError,
    isFlakeError,
    serializeError,
} from './lib/errors.js';

export type { Logger, LogLevel } from './lib/logger.js';
export { LOG_LEVELS, createLogger, silentLogger } from './lib/logger.js';

export type { DevflakeConfig } from './lib/config.js';
export { loadConfig } from './lib/config.js';

// ─── Inputs ─────────────────────────────────────────────────────────

export type { Locator } from './inputs/locator.js';
export { parseLocator, formatLocator, locatorAttrs } from './inputs/locator.js';

export type {
    InputDeclaration,
    InputDeclarations,
    DeclaredInput,
    InputRegistry,
    SourceDescriptor,
    SourceResolver,
    ResolvedInput,
    ResolvedInputs,
    ResolveOptions,
} from './inputs/registry.js';
export { declareInputs, resolveInputs, requireOutputs } from './inputs/registry.js';

export type { LockEdge, LockNode, LockFile } from './inputs/lock.js';
export { lockInputs } from './inputs/lock.js';

// ─── Platforms ──────────────────────────────────────────────────────

export type { Platform } from './platform/platform.js';
export { platformSchema, parsePlatform, hostPlatform } from './platform/platform.js';

export type { ContextFactory } from './platform/enumerator.js';
export { PlatformEnumeration, eachSystem } from './platform/enumerator.js';

// ─── Packages and shells ────────────────────────────────────────────

export type {
    Derivation,
    DerivationAttr,
    DerivationMeta,
    ShellDescriptor,
    PackageHelper,
    IndexEntry,
    IndexValue,
} from './pkgs/types.js';

export type { BasePackageSet, IndexOverlay, ImportOptions } from './pkgs/package-index.js';
export { PackageIndex, importPackageIndex } from './pkgs/package-index.js';

export type { ShellFragment } from './shell/mk-shell.js';
export { mkShell } from './shell/mk-shell.js';

// ─── Flake ──────────────────────────────────────────────────────────

export type {
    OutputsContext,
    FlakeOutputs,
    FlakeDefinition,
    Flake,
    PlatformOutputs,
    OutputSet,
    EvaluateOptions,
} from './flake/flake.js';
export {
    defineFlake,
    evaluateFlake,
    resolvePerPlatform,
    platformOutputs,
    selectDefaultPackage,
    selectDevShell,
    perPlatformAttrs,
} from './flake/flake.js';

export type { BuildEngine, BuildResult } from './flake/realise.js';
export { DryRunEngine, realise } from './flake/realise.js';

// ─── Bundled sources ────────────────────────────────────────────────

export type { PackageCatalog, PackageSpec, PackageSetSource } from './sources/package-set.js';
export {
    parsePackageCatalog,
    loadPackageCatalog,
    prebuiltPackage,
    packageSetFromChannel,
    isPackageSetSource,
} from './sources/package-set.js';

export type { SystemsList, SystemsHelper } from './sources/systems.js';
export { DEFAULT_SYSTEMS, isSystemsList, isSystemsHelper, systemsHelper } from './sources/systems.js';

export type { BuildPackageOptions, RustPackageBuilder, RustBuilderSource } from './sources/rust-builder.js';
export {
    isRustPackageBuilder,
    rustBuilderHelper,
    rustBuilderSource,
    isRustBuilderSource,
} from './sources/rust-builder.js';

export { BundledSourceResolver } from './sources/bundled.js';
