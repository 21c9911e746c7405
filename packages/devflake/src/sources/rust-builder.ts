// devflake/src/sources/rust-builder.ts
// Stand-in for a Rust package-builder helper. Registered in a package
// index, it is instantiated with the index's `cargo` and `rustc` and turns
// a source location into a build derivation.

import { z } from 'zod';

import { InvalidDefinitionError } from '../lib/errors.js';
import type { IndexOverlay } from '../pkgs/package-index.js';
import type { Derivation, IndexEntry, PackageHelper } from '../pkgs/types.js';

const buildOptionsSchema = z.object({
    src: z.string().min(1),
    pname: z.string().min(1).default('source'),
    version: z.string().min(1).default('0.0.0'),
    release: z.boolean().default(true),
    doCheck: z.boolean().default(false),
    cargoBuildOptions: z.array(z.string()).default([]),
}).strict();

export type BuildPackageOptions = z.input<typeof buildOptionsSchema>;

export interface RustPackageBuilder {
    buildPackage(options: BuildPackageOptions): Derivation;
}

export function isRustPackageBuilder(value: unknown): value is RustPackageBuilder {
    return (
        typeof value === 'object' &&
        value !== null &&
        'buildPackage' in value &&
        typeof value.buildPackage === 'function'
    );
}

function toolchainArg(args: Readonly<Record<string, IndexEntry>>, name: string, helper: string): Derivation {
    const entry = args[name];
    if (entry === undefined || entry.type !== 'derivation') {
        throw new InvalidDefinitionError(`Helper "${helper}" needs "${name}" to be a derivation`);
    }
    return entry;
}

export function rustBuilderHelper(name = 'naersk'): PackageHelper<RustPackageBuilder> {
    return {
        type: 'helper',
        name,
        requires: ['cargo', 'rustc'],
        instantiate(args) {
            const cargo = toolchainArg(args, 'cargo', name);
            const rustc = toolchainArg(args, 'rustc', name);
            return {
                buildPackage(options) {
                    const parsed = buildOptionsSchema.safeParse(options);
                    if (!parsed.success) {
                        throw new InvalidDefinitionError(
                            `Invalid ${name}.buildPackage options`,
                            parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
                        );
                    }
                    const { src, pname, version, release, doCheck, cargoBuildOptions } = parsed.data;
                    return {
                        type: 'derivation',
                        name: `${pname}-${version}`,
                        pname,
                        version,
                        system: rustc.system,
                        builder: name,
                        src,
                        nativeBuildInputs: [cargo, rustc],
                        attrs: { release, doCheck, cargoBuildOptions },
                        meta: {},
                    };
                },
            };
        },
    };
}

/** Outputs of a package-builder helper input. */
export interface RustBuilderSource {
    readonly helper: PackageHelper<RustPackageBuilder>;
    /** Registers the helper in an index under its own name. */
    readonly overlay: IndexOverlay;
}

export function rustBuilderSource(name = 'naersk'): RustBuilderSource {
    const helper = rustBuilderHelper(name);
    return { helper, overlay: () => ({ [name]: helper }) };
}

const rustBuilderSourceSchema = z.object({
    helper: z.object({ type: z.literal('helper'), name: z.string() }).passthrough(),
    overlay: z.function(),
});

export function isRustBuilderSource(value: unknown): value is RustBuilderSource {
    return rustBuilderSourceSchema.safeParse(value).success;
}
