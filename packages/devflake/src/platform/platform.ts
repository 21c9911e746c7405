// devflake/src/platform/platform.ts
// Target platform identifiers: `<arch>-<os>`, e.g. `x86_64-linux`.

import { z } from 'zod';

import { InvalidDefinitionError, UnsupportedPlatformError } from '../lib/errors.js';

export type Platform = `${string}-${string}`;

export const platformSchema = z
    .string()
    .regex(/^[a-z0-9_]+-[a-z0-9]+$/, 'expected <arch>-<os>, e.g. x86_64-linux')
    .transform((value): Platform => {
        const [arch, os] = value.split('-');
        return `${arch}-${os}`;
    });

export function parsePlatform(value: string): Platform {
    const parsed = platformSchema.safeParse(value);
    if (!parsed.success) {
        throw new InvalidDefinitionError(
            `Invalid platform "${value}"`,
            parsed.error.issues.map(issue => issue.message),
        );
    }
    return parsed.data;
}

const NODE_ARCH: Readonly<Record<string, string>> = {
    x64: 'x86_64',
    arm64: 'aarch64',
    ia32: 'i686',
    riscv64: 'riscv64',
};

const NODE_OS: Readonly<Record<string, string>> = {
    linux: 'linux',
    darwin: 'darwin',
    freebsd: 'freebsd',
};

/** The platform of the running process, in `<arch>-<os>` form. */
export function hostPlatform(
    arch: string = process.arch,
    os: string = process.platform,
): Platform {
    const mappedArch = NODE_ARCH[arch];
    const mappedOs = NODE_OS[os];
    if (mappedArch === undefined || mappedOs === undefined) {
        throw new UnsupportedPlatformError(`${arch}-${os}`, []);
    }
    return `${mappedArch}-${mappedOs}`;
}
