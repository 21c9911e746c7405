// aoc-flake/src/outputs/overlay.ts — Publishes the package into other package indexes
//
// The entry is a thunk over `final`, so the derivation is built from the
// consumer's own toolchain and builder helper once their index settles.

import { deferred } from 'libfix';
import type { IndexOverlay } from 'devflake';

import { buildDefaultPackage, PACKAGE_NAME } from './package.js';

export const overlay: IndexOverlay = final => ({
    [PACKAGE_NAME]: deferred(() => buildDefaultPackage(final)),
});
