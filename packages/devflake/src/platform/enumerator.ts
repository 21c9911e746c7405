// devflake/src/platform/enumerator.ts
// The supported platforms, and a fresh instantiation context for each one.

import { UnsupportedPlatformError } from '../lib/errors.js';
import type { Platform } from './platform.js';

export type ContextFactory<C> = (platform: Platform) => C;

/**
 * A finite, restartable sequence of platforms. Every iteration starts from
 * the first platform, so independent consumers can walk it side by side.
 * Contexts are built on demand and never cached or shared.
 */
export class PlatformEnumeration<C> implements Iterable<Platform> {
    private readonly platforms: readonly Platform[];

    constructor(
        platforms: Iterable<Platform>,
        private readonly makeContext: ContextFactory<C>,
    ) {
        this.platforms = [...new Set(platforms)];
    }

    *[Symbol.iterator](): Iterator<Platform> {
        yield* this.platforms;
    }

    get size(): number {
        return this.platforms.length;
    }

    has(platform: string): platform is Platform {
        return this.platforms.some(candidate => candidate === platform);
    }

    /** Throws `UnsupportedPlatformError` for identifiers outside the sequence. */
    require(platform: string): Platform {
        if (!this.has(platform)) {
            throw new UnsupportedPlatformError(platform, this.platforms);
        }
        return platform;
    }

    contextFor(platform: string): C {
        return this.makeContext(this.require(platform));
    }
}

/**
 * Transpose per-platform attribute sets into `attr → platform → value`,
 * the layout flake outputs use:
 *
 *   eachSystem(['x86_64-linux'], p => ({ devShell: shellFor(p) }))
 *   // → { devShell: { 'x86_64-linux': … } }
 */
export function eachSystem<T>(
    platforms: Iterable<Platform>,
    fn: (platform: Platform) => Record<string, T>,
): Record<string, Record<Platform, T>> {
    const result: Record<string, Record<Platform, T>> = {};
    for (const platform of platforms) {
        for (const [key, value] of Object.entries(fn(platform))) {
            const bucket = result[key] ?? {};
            bucket[platform] = value;
            result[key] = bucket;
        }
    }
    return result;
}
