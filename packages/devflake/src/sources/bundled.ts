// devflake/src/sources/bundled.ts
// In-process SourceResolver serving the stand-in sources. It knows four
// repositories and fetches nothing.

import { UnresolvedReferenceError } from '../lib/errors.js';
import { formatLocator, locatorAttrs } from '../inputs/locator.js';
import type { Locator } from '../inputs/locator.js';
import { requireOutputs } from '../inputs/registry.js';
import type { SourceDescriptor, SourceResolver } from '../inputs/registry.js';
import { loadPackageCatalog, packageSetFromChannel } from './package-set.js';
import type { PackageCatalog, PackageSetSource } from './package-set.js';
import { rustBuilderSource } from './rust-builder.js';
import { DEFAULT_SYSTEMS, isSystemsList, systemsHelper } from './systems.js';

const DEFAULT_CHANNEL = 'nixpkgs-unstable';

type Repository = 'nixos/nixpkgs' | 'numtide/flake-utils' | 'nix-systems/default' | 'nix-community/naersk';

/** Indirect ids the way a flake registry maps them. */
const REGISTRY: Readonly<Record<string, Repository>> = {
    nixpkgs: 'nixos/nixpkgs',
    'flake-utils': 'numtide/flake-utils',
    systems: 'nix-systems/default',
    naersk: 'nix-community/naersk',
};

function isRepository(value: string): value is Repository {
    return Object.values(REGISTRY).some(repo => repo === value);
}

export class BundledSourceResolver implements SourceResolver {
    constructor(private readonly catalog: PackageCatalog = loadPackageCatalog()) {}

    resolve(locator: Locator): SourceDescriptor {
        const target = this.route(locator);
        if (target === undefined) {
            throw new UnresolvedReferenceError([formatLocator(locator)], 'bundled sources');
        }
        const locked = locatorAttrs(locator);

        switch (target.repo) {
            case 'nixos/nixpkgs': {
                const packageSet = packageSetFromChannel(this.catalog, target.ref ?? DEFAULT_CHANNEL);
                return {
                    locked,
                    dependencies: {},
                    load: (): PackageSetSource => ({ packageSet }),
                };
            }
            case 'nix-systems/default':
                return { locked, dependencies: {}, load: () => ({ systems: DEFAULT_SYSTEMS }) };
            case 'numtide/flake-utils':
                return {
                    locked,
                    dependencies: { systems: 'github:nix-systems/default' },
                    load: inputs => {
                        const { systems } = requireOutputs(inputs.systems, isSystemsList, 'a systems list');
                        return systemsHelper(systems);
                    },
                };
            case 'nix-community/naersk':
                return {
                    locked,
                    dependencies: { nixpkgs: `github:nixos/nixpkgs/${DEFAULT_CHANNEL}` },
                    load: () => rustBuilderSource('naersk'),
                };
        }
    }

    private route(locator: Locator): { repo: Repository; ref?: string } | undefined {
        if (locator.type === 'github') {
            const repo = `${locator.owner}/${locator.repo}`;
            return isRepository(repo) ? { repo, ref: locator.ref } : undefined;
        }
        if (locator.type === 'indirect') {
            const repo = REGISTRY[locator.id];
            return repo === undefined ? undefined : { repo, ref: locator.ref };
        }
        return undefined;
    }
}
