// aoc-flake/src/flake.ts — Flake definition: inputs and per-platform outputs

import {
    defineFlake,
    importPackageIndex,
    isPackageSetSource,
    isRustBuilderSource,
    isSystemsHelper,
    PlatformEnumeration,
    requireOutputs,
} from 'devflake';

import { buildDefaultPackage } from './outputs/package.js';
import { buildDevShell } from './outputs/dev-shell.js';
import { overlay } from './outputs/overlay.js';

export const flake = defineFlake({
    description: 'Advent of Code 2023 solutions',

    inputs: {
        nixpkgs: 'github:nixos/nixpkgs/nixos-24.11',
        'flake-utils': 'github:numtide/flake-utils',
        naersk: { url: 'github:nix-community/naersk', follows: { nixpkgs: 'nixpkgs' } },
    },

    outputs: ({ nixpkgs, 'flake-utils': flakeUtils, naersk }, { logger }) => {
        const { packageSet } = requireOutputs(nixpkgs, isPackageSetSource, 'a package set');
        const { defaultSystems } = requireOutputs(flakeUtils, isSystemsHelper, 'a systems helper');
        const builder = requireOutputs(naersk, isRustBuilderSource, 'a package builder helper');

        return {
            platforms: new PlatformEnumeration(defaultSystems, system =>
                importPackageIndex(packageSet, { system, overlays: [builder.overlay], logger }),
            ),
            defaultPackage: buildDefaultPackage,
            devShell: buildDevShell,
            overlay,
        };
    },
});
