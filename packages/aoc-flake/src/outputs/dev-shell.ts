// aoc-flake/src/outputs/dev-shell.ts — Interactive development environment

import { mkShell } from 'devflake';
import type { PackageIndex, ShellDescriptor } from 'devflake';

/** Tool role → package name in the context. */
export const DEV_TOOLS = {
    compiler: 'rustc',
    'package-list-editor': 'cargo-edit',
    'language-server': 'rust-analyzer',
    formatter: 'rustfmt',
} as const satisfies Record<string, string>;

export type DevToolRole = keyof typeof DEV_TOOLS;

export function buildDevShell(ctx: PackageIndex): ShellDescriptor {
    return mkShell(ctx, { packages: Object.values(DEV_TOOLS) });
}
