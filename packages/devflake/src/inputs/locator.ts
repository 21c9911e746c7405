// devflake/src/inputs/locator.ts
// Input locators, written the way flake references are:
//
//   github:nixos/nixpkgs/nixos-24.11    gitlab:group/project
//   git+https://example.org/repo?ref=main
//   path:./vendor/helper                nixpkgs, nixpkgs/nixos-24.11

import { InvalidDefinitionError } from '../lib/errors.js';

export type Locator =
    | { type: 'github' | 'gitlab'; owner: string; repo: string; ref?: string }
    | { type: 'git'; url: string; ref?: string }
    | { type: 'path'; path: string }
    | { type: 'indirect'; id: string; ref?: string };

const FORGE = /^(github|gitlab):([\w.-]+)\/([\w.-]+)(?:\/(.+))?$/;
const GIT = /^git\+((?:https?|ssh|file):\/\/[^?]+)(?:\?ref=(.+))?$/;
const PATH = /^path:(.+)$/;
const INDIRECT = /^([a-zA-Z][\w-]*)(?:\/(.+))?$/;

function withRef<T extends object>(locator: T, ref: string | undefined): T & { ref?: string } {
    return ref === undefined ? locator : { ...locator, ref };
}

export function parseLocator(text: string): Locator {
    const forge = FORGE.exec(text);
    if (forge) {
        const [, host, owner, repo, ref] = forge;
        const type: 'github' | 'gitlab' = host === 'gitlab' ? 'gitlab' : 'github';
        return withRef({ type, owner, repo }, ref);
    }

    const git = GIT.exec(text);
    if (git) {
        const [, url, ref] = git;
        return withRef({ type: 'git' as const, url }, ref);
    }

    const path = PATH.exec(text);
    if (path) {
        return { type: 'path', path: path[1] };
    }

    const indirect = INDIRECT.exec(text);
    if (indirect) {
        const [, id, ref] = indirect;
        return withRef({ type: 'indirect' as const, id }, ref);
    }

    throw new InvalidDefinitionError(`Invalid input locator "${text}"`);
}

export function formatLocator(locator: Locator): string {
    switch (locator.type) {
        case 'github':
        case 'gitlab':
            return `${locator.type}:${locator.owner}/${locator.repo}${locator.ref ? `/${locator.ref}` : ''}`;
        case 'git':
            return `git+${locator.url}${locator.ref ? `?ref=${locator.ref}` : ''}`;
        case 'path':
            return `path:${locator.path}`;
        case 'indirect':
            return `${locator.id}${locator.ref ? `/${locator.ref}` : ''}`;
    }
}

/** Flat string attributes, as written in the `original` field of a lock node. */
export function locatorAttrs(locator: Locator): Record<string, string> {
    const attrs: Record<string, string> = {};
    for (const [key, value] of Object.entries(locator)) {
        if (typeof value === 'string') attrs[key] = value;
    }
    return attrs;
}
