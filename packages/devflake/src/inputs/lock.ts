// devflake/src/inputs/lock.ts
// Render a resolved input graph as a flake.lock document (version 7).
// Pinned edges are written as follows-paths (`["nixpkgs"]`); unpinned
// transitive sources get their own nodes, suffixed on name collisions
// (`nixpkgs_2`).

import { locatorAttrs } from './locator.js';
import type { ResolvedInput, ResolvedInputs } from './registry.js';

export type LockEdge = string | string[];

export interface LockNode {
    inputs?: Record<string, LockEdge>;
    locked?: Record<string, string>;
    original?: Record<string, string>;
}

export interface LockFile {
    version: 7;
    root: 'root';
    nodes: Record<string, LockNode>;
}

export function lockInputs(inputs: ResolvedInputs): LockFile {
    const nodes: Record<string, LockNode> = { root: {} };
    const keys = new Map<ResolvedInput, string>();
    const written = new Set<string>();

    const allocate = (preferred: string): string => {
        let key = preferred;
        for (let n = 2; key in nodes; n++) {
            key = `${preferred}_${n}`;
        }
        nodes[key] = {};
        return key;
    };

    const visit = (input: ResolvedInput, preferred: string): string => {
        const key = keys.get(input) ?? allocate(preferred);
        keys.set(input, key);
        if (written.has(key)) return key;
        written.add(key);

        const edges: Record<string, LockEdge> = {};
        for (const [dep, child] of Object.entries(input.inputs)) {
            const target = input.follows[dep];
            edges[dep] = target !== undefined ? [target] : visit(child, dep);
        }

        nodes[key] = {
            ...(Object.keys(edges).length > 0 ? { inputs: edges } : {}),
            locked: { ...input.locked },
            original: locatorAttrs(input.locator),
        };
        return key;
    };

    // Declared inputs claim their own names before any transitive node can.
    for (const [name, input] of Object.entries(inputs)) {
        keys.set(input, allocate(name));
    }
    const rootEdges: Record<string, LockEdge> = {};
    for (const [name, input] of Object.entries(inputs)) {
        rootEdges[name] = visit(input, name);
    }
    nodes.root = { inputs: rootEdges };

    return { version: 7, root: 'root', nodes };
}
