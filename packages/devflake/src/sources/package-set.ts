// devflake/src/sources/package-set.ts
// Stand-in for a base package index: prebuilt tool packages per channel,
// read from data/base-packages.json.

import { readFileSync } from 'node:fs';
import { z } from 'zod';

import { InvalidDefinitionError, UnresolvedReferenceError } from '../lib/errors.js';
import { platformSchema } from '../platform/platform.js';
import type { Platform } from '../platform/platform.js';
import type { BasePackageSet } from '../pkgs/package-index.js';
import type { Derivation, DerivationMeta, IndexValue } from '../pkgs/types.js';

const DEFAULT_CATALOG = new URL('../../data/base-packages.json', import.meta.url);

const packageSchema = z.object({
    version: z.string().min(1),
    description: z.string().optional(),
    homepage: z.string().optional(),
    license: z.string().optional(),
    mainProgram: z.string().optional(),
    platforms: z.array(platformSchema).optional(),
});

const channelSchema = z.object({
    systems: z.array(platformSchema).min(1),
    packages: z.record(packageSchema),
});

const catalogSchema = z.object({
    channels: z.record(channelSchema),
});

export type PackageSpec = z.infer<typeof packageSchema>;
export type PackageCatalog = z.infer<typeof catalogSchema>;

export function parsePackageCatalog(raw: unknown): PackageCatalog {
    const parsed = catalogSchema.safeParse(raw);
    if (!parsed.success) {
        throw new InvalidDefinitionError(
            'Invalid package catalog',
            parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
        );
    }
    return parsed.data;
}

export function loadPackageCatalog(file: URL = DEFAULT_CATALOG): PackageCatalog {
    return parsePackageCatalog(JSON.parse(readFileSync(file, 'utf8')));
}

function metaOf(spec: PackageSpec): DerivationMeta {
    const meta: DerivationMeta = {};
    if (spec.description !== undefined) meta.description = spec.description;
    if (spec.homepage !== undefined) meta.homepage = spec.homepage;
    if (spec.license !== undefined) meta.license = spec.license;
    if (spec.mainProgram !== undefined) meta.mainProgram = spec.mainProgram;
    return meta;
}

export function prebuiltPackage(pname: string, spec: PackageSpec, system: Platform): Derivation {
    return {
        type: 'derivation',
        name: `${pname}-${spec.version}`,
        pname,
        version: spec.version,
        system,
        builder: 'stdenv',
        nativeBuildInputs: [],
        attrs: {},
        meta: metaOf(spec),
    };
}

export function packageSetFromChannel(catalog: PackageCatalog, channel: string): BasePackageSet {
    const spec = catalog.channels[channel];
    if (spec === undefined) {
        throw new UnresolvedReferenceError([channel], 'package catalog channels');
    }
    return {
        id: `nixpkgs/${channel}`,
        systems: spec.systems,
        packagesFor(system: Platform): Record<string, IndexValue> {
            const packages: Record<string, IndexValue> = {};
            for (const [pname, pkg] of Object.entries(spec.packages)) {
                if (pkg.platforms !== undefined && !pkg.platforms.includes(system)) continue;
                packages[pname] = prebuiltPackage(pname, pkg, system);
            }
            return packages;
        },
    };
}

/** Outputs of a base package index input. */
export interface PackageSetSource {
    readonly packageSet: BasePackageSet;
}

const packageSetSourceSchema = z.object({
    packageSet: z.object({
        id: z.string(),
        systems: z.array(z.string()),
        packagesFor: z.function(),
    }),
});

export function isPackageSetSource(value: unknown): value is PackageSetSource {
    return packageSetSourceSchema.safeParse(value).success;
}
