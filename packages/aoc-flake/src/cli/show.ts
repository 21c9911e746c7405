// aoc-flake/src/cli/show.ts — Output tree, in the layout of `nix flake show`

import { force } from 'libfix';
import type { Deferred } from 'libfix';
import { isFlakeError, perPlatformAttrs } from 'devflake';
import type { Derivation, OutputSet, ShellDescriptor } from 'devflake';

const BRANCH = '├───';
const LAST = '└───';
const PIPE = '│   ';

function describeOutput(value: Derivation | ShellDescriptor): string {
    return value.type === 'derivation'
        ? `package '${value.name}'`
        : `development environment '${value.name}'`;
}

/** Platform outputs are forced one by one; a configuration error only marks its own leaf. */
function describeLeaf(thunk: Deferred<Derivation> | Deferred<ShellDescriptor>): string {
    try {
        return describeOutput(force<Derivation | ShellDescriptor>(thunk));
    } catch (error) {
        if (!isFlakeError(error)) throw error;
        return `error: ${error.message}`;
    }
}

export function renderOutputTree(outputs: OutputSet): string[] {
    const lines = [outputs.description];
    const attrs = Object.entries(perPlatformAttrs(outputs));

    attrs.forEach(([attr, byPlatform]) => {
        lines.push(`${BRANCH}${attr}`);
        const platforms = Object.entries(byPlatform);
        platforms.forEach(([platform, thunk], i) => {
            const connector = i === platforms.length - 1 ? LAST : BRANCH;
            lines.push(`${PIPE}${connector}${platform}: ${describeLeaf(thunk)}`);
        });
    });
    lines.push(`${LAST}overlay: package index overlay`);

    return lines;
}
