// devflake/src/inputs/registry.ts
// Input registry: named external sources, plus pins that make one input's
// own dependency resolve to another declared input.
//
//   declareInputs({
//     nixpkgs: 'github:nixos/nixpkgs/nixos-24.11',
//     naersk: { url: 'github:nix-community/naersk', follows: { nixpkgs: 'nixpkgs' } },
//   })
//
// Fetching is not done here. A SourceResolver materializes each locator;
// this module only decides which locator each dependency edge points at.

import { z } from 'zod';

import { InvalidDefinitionError, UnresolvedReferenceError } from '../lib/errors.js';
import { silentLogger } from '../lib/logger.js';
import type { Logger } from '../lib/logger.js';
import { formatLocator, parseLocator } from './locator.js';
import type { Locator } from './locator.js';

// ─── Declarations ───────────────────────────────────────────────────

export interface InputDeclaration {
    url: string;
    /** Own dependency name → declared input it should resolve to. */
    follows?: Record<string, string>;
}

export type InputDeclarations = Record<string, string | InputDeclaration>;

const declarationsSchema = z.record(
    z.string().regex(/^[a-zA-Z][\w-]*$/, 'input names must be identifiers'),
    z.union([
        z.string().min(1),
        z.object({
            url: z.string().min(1),
            follows: z.record(z.string().min(1)).default({}),
        }).strict(),
    ]),
);

export interface DeclaredInput {
    readonly name: string;
    readonly locator: Locator;
    readonly follows: Readonly<Record<string, string>>;
}

export interface InputRegistry {
    readonly inputs: Readonly<Record<string, DeclaredInput>>;
}

/**
 * Validate declarations eagerly: every locator must parse and every pin
 * must target a declared input.
 */
export function declareInputs(declarations: InputDeclarations): InputRegistry {
    const parsed = declarationsSchema.safeParse(declarations);
    if (!parsed.success) {
        throw new InvalidDefinitionError(
            'Invalid input declarations',
            parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
        );
    }

    const inputs: Record<string, DeclaredInput> = {};
    for (const [name, decl] of Object.entries(parsed.data)) {
        const url = typeof decl === 'string' ? decl : decl.url;
        const follows: Record<string, string> = typeof decl === 'string' ? {} : decl.follows;
        inputs[name] = { name, locator: parseLocator(url), follows };
    }

    for (const input of Object.values(inputs)) {
        const undeclared = Object.values(input.follows).filter(target => !(target in inputs));
        if (undeclared.length > 0) {
            throw new UnresolvedReferenceError(undeclared, `follows of input "${input.name}"`);
        }
    }

    return { inputs };
}

// ─── Resolution ─────────────────────────────────────────────────────

/** What a resolver knows about one source. */
export interface SourceDescriptor<T = unknown> {
    /** Identity of the fetched revision (lock node `locked`). */
    readonly locked: Readonly<Record<string, string>>;
    /** The source's own inputs, with its default locators. */
    readonly dependencies: Readonly<Record<string, string>>;
    /** Produce the source's outputs from its resolved dependencies. */
    load(inputs: Readonly<Record<string, ResolvedInput>>): T;
}

/** External collaborator that fetches and materializes sources. */
export interface SourceResolver {
    resolve(locator: Locator): SourceDescriptor;
}

export interface ResolvedInput<T = unknown> {
    readonly name: string;
    readonly locator: Locator;
    readonly locked: Readonly<Record<string, string>>;
    readonly inputs: Readonly<Record<string, ResolvedInput>>;
    readonly follows: Readonly<Record<string, string>>;
    readonly outputs: T;
}

export type ResolvedInputs = Readonly<Record<string, ResolvedInput>>;

export interface ResolveOptions {
    logger?: Logger;
}

/**
 * Materialize every declared input. A pinned dependency is the very same
 * ResolvedInput object as its target; an unpinned one is resolved from the
 * source's own default locator as a separate node.
 */
export function resolveInputs(
    registry: InputRegistry,
    resolver: SourceResolver,
    options: ResolveOptions = {},
): ResolvedInputs {
    const logger = options.logger ?? silentLogger;
    const resolved = new Map<string, ResolvedInput>();
    const pending: string[] = [];

    const resolveTransitive = (name: string, locator: Locator, chain: readonly string[]): ResolvedInput => {
        const key = formatLocator(locator);
        if (chain.includes(key)) {
            throw new InvalidDefinitionError('Cyclic source dependency', [[...chain, key].join(' -> ')]);
        }
        const source = resolver.resolve(locator);
        const inputs: Record<string, ResolvedInput> = {};
        for (const [dep, depUrl] of Object.entries(source.dependencies)) {
            inputs[dep] = resolveTransitive(dep, parseLocator(depUrl), [...chain, key]);
        }
        logger.debug({ input: name, locator: key, transitive: true }, 'input resolved');
        return { name, locator, locked: source.locked, inputs, follows: {}, outputs: source.load(inputs) };
    };

    const resolveDeclared = (name: string): ResolvedInput => {
        const done = resolved.get(name);
        if (done !== undefined) return done;
        if (pending.includes(name)) {
            throw new InvalidDefinitionError('Cyclic follows', [[...pending, name].join(' -> ')]);
        }
        pending.push(name);

        const declared = registry.inputs[name];
        if (declared === undefined) {
            throw new UnresolvedReferenceError([name], 'input registry');
        }
        const key = formatLocator(declared.locator);
        const source = resolver.resolve(declared.locator);

        const unknownDeps = Object.keys(declared.follows).filter(dep => !(dep in source.dependencies));
        if (unknownDeps.length > 0) {
            throw new UnresolvedReferenceError(unknownDeps, `dependencies of input "${name}" (${key})`);
        }

        const inputs: Record<string, ResolvedInput> = {};
        for (const [dep, depUrl] of Object.entries(source.dependencies)) {
            const target = declared.follows[dep];
            inputs[dep] = target !== undefined
                ? resolveDeclared(target)
                : resolveTransitive(dep, parseLocator(depUrl), [key]);
        }

        const input: ResolvedInput = {
            name,
            locator: declared.locator,
            locked: source.locked,
            inputs,
            follows: declared.follows,
            outputs: source.load(inputs),
        };
        pending.pop();
        resolved.set(name, input);
        logger.debug({ input: name, locator: key, follows: declared.follows }, 'input resolved');
        return input;
    };

    const result: Record<string, ResolvedInput> = {};
    for (const name of Object.keys(registry.inputs)) {
        result[name] = resolveDeclared(name);
    }
    return result;
}

/** Narrow an input's outputs to the shape the caller expects. */
export function requireOutputs<T>(
    input: ResolvedInput,
    guard: (outputs: unknown) => outputs is T,
    expected: string,
): T {
    if (!guard(input.outputs)) {
        throw new InvalidDefinitionError(
            `Input "${input.name}" (${formatLocator(input.locator)}) does not provide ${expected}`,
        );
    }
    return input.outputs;
}
