// aoc-flake/src/index.ts — advent-of-code-2023 configuration
//
// Inputs: nixpkgs (nixos-24.11), flake-utils, naersk with its nixpkgs
// pinned to ours. Outputs per default system: the workspace build and a
// shell with compiler, package-list editor, language server and formatter.
// Plus one overlay publishing the build into any package index.

export { flake } from './flake.js';
export { buildDefaultPackage, PACKAGE_NAME, BUILDER_HELPER, SOURCE_ROOT } from './outputs/package.js';
export type { DevToolRole } from './outputs/dev-shell.js';
export { buildDevShell, DEV_TOOLS } from './outputs/dev-shell.js';
export { overlay } from './outputs/overlay.js';

export type { Command, CliOptions } from './cli/options.js';
export { CliError, parseCliOptions, USAGE } from './cli/options.js';
export type { CliIO, CliDeps } from './cli/main.js';
export { main } from './cli/main.js';
export { renderOutputTree } from './cli/show.js';
