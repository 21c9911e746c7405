// devflake/src/shell/mk-shell.ts
// Development shell composer. Fragments merge like modules:
//
//   packages, shellHook → ordered lists (mkBefore / mkAfter / mkOrder)
//   env                 → record; a variable may be set by one fragment only
//   name                → scalar by priority, default mkDefault('nix-shell')
//
// Package names are resolved against the instantiation context only after
// merging, so every missing tool is reported in one error and a shell is
// never returned with part of its tools.

import { z } from 'zod';
import { applyOverlays, createModuleMerge, mkDefault, MergeConflictError } from 'libfix';
import type { Attrs, Ordered, Override } from 'libfix';

import { InvalidDefinitionError } from '../lib/errors.js';
import type { PackageIndex } from '../pkgs/package-index.js';
import type { ShellDescriptor } from '../pkgs/types.js';

export type ShellFragment = {
    name?: string | Override<string>;
    packages?: Array<string | Ordered<string>> | Ordered<string>;
    shellHook?: Array<string | Ordered<string>> | Ordered<string>;
    env?: Record<string, string>;
};

const shellMerge = createModuleMerge({ uniqueKeyFields: ['env'] });

const mergedShellSchema = z.object({
    name: z.string().min(1),
    packages: z.array(z.string().min(1)),
    shellHook: z.array(z.string()),
    env: z.record(z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'invalid variable name'), z.string()),
});

function mergeFragments(fragments: readonly ShellFragment[]): Attrs {
    const base: Attrs = { name: mkDefault('nix-shell'), packages: [], shellHook: [], env: {} };
    try {
        return applyOverlays(base, fragments.map(fragment => () => ({ ...fragment })), { merge: shellMerge });
    } catch (error) {
        if (error instanceof MergeConflictError) {
            throw new InvalidDefinitionError('Conflicting shell fragments', [error.message], { cause: error });
        }
        throw error;
    }
}

export function mkShell(ctx: PackageIndex, ...fragments: ShellFragment[]): ShellDescriptor {
    const parsed = mergedShellSchema.safeParse(mergeFragments(fragments));
    if (!parsed.success) {
        throw new InvalidDefinitionError(
            'Invalid shell definition',
            parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
        );
    }
    const { name, packages, shellHook, env } = parsed.data;

    return {
        type: 'shell',
        name,
        system: ctx.system,
        nativeBuildInputs: ctx.derivations([...new Set(packages)]),
        shellHook: shellHook.join('\n'),
        env,
    };
}
