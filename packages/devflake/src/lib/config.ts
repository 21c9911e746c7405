// devflake/src/lib/config.ts
// Runtime settings read from the environment.

import { z } from 'zod';

import { InvalidDefinitionError } from './errors.js';
import { LOG_LEVELS } from './logger.js';
import type { LogLevel } from './logger.js';
import { platformSchema } from '../platform/platform.js';
import type { Platform } from '../platform/platform.js';

const configSchema = z.object({
    DEVFLAKE_SYSTEM: platformSchema.optional(),
    DEVFLAKE_LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),
});

export interface DevflakeConfig {
    /** Overrides the host platform when set. */
    system?: Platform;
    logLevel: LogLevel;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): DevflakeConfig {
    const parsed = configSchema.safeParse({
        DEVFLAKE_SYSTEM: env.DEVFLAKE_SYSTEM || undefined,
        DEVFLAKE_LOG_LEVEL: env.DEVFLAKE_LOG_LEVEL || undefined,
    });
    if (!parsed.success) {
        throw new InvalidDefinitionError(
            'Invalid environment configuration',
            parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
        );
    }
    const { DEVFLAKE_SYSTEM, DEVFLAKE_LOG_LEVEL } = parsed.data;
    return {
        ...(DEVFLAKE_SYSTEM !== undefined ? { system: DEVFLAKE_SYSTEM } : {}),
        logLevel: DEVFLAKE_LOG_LEVEL,
    };
}
