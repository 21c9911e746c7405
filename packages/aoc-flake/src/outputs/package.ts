// aoc-flake/src/outputs/package.ts — The workspace's build derivation

import { isRustPackageBuilder } from 'devflake';
import type { Derivation, PackageIndex } from 'devflake';

export const PACKAGE_NAME = 'advent-of-code-2023';

/** Name the builder helper is registered under in the context. */
export const BUILDER_HELPER = 'naersk';

/** The whole workspace, relative to the flake root. */
export const SOURCE_ROOT = '.';

export function buildDefaultPackage(ctx: PackageIndex): Derivation {
    return ctx.callHelper(BUILDER_HELPER, isRustPackageBuilder).buildPackage({ src: SOURCE_ROOT });
}
