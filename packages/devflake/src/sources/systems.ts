// devflake/src/sources/systems.ts
// Stand-ins for the platform-enumeration helpers: a plain systems list and
// a helper built on top of it.

import { z } from 'zod';

import { eachSystem } from '../platform/enumerator.js';
import { platformSchema } from '../platform/platform.js';
import type { Platform } from '../platform/platform.js';

export const DEFAULT_SYSTEMS: readonly Platform[] = [
    'aarch64-darwin',
    'aarch64-linux',
    'x86_64-darwin',
    'x86_64-linux',
];

/** Outputs of a systems-list input. */
export interface SystemsList {
    readonly systems: readonly Platform[];
}

const systemsListSchema = z.object({ systems: z.array(platformSchema) });

export function isSystemsList(value: unknown): value is SystemsList {
    return systemsListSchema.safeParse(value).success;
}

/** Outputs of a platform-enumeration helper input. */
export interface SystemsHelper {
    readonly defaultSystems: readonly Platform[];
    eachDefaultSystem<T>(fn: (platform: Platform) => Record<string, T>): Record<string, Record<Platform, T>>;
}

const systemsHelperSchema = z.object({
    defaultSystems: z.array(platformSchema).min(1),
    eachDefaultSystem: z.function(),
});

export function isSystemsHelper(value: unknown): value is SystemsHelper {
    return systemsHelperSchema.safeParse(value).success;
}

export function systemsHelper(systems: readonly Platform[]): SystemsHelper {
    return {
        defaultSystems: systems,
        eachDefaultSystem<T>(fn: (platform: Platform) => Record<string, T>) {
            return eachSystem(systems, fn);
        },
    };
}
