// devflake/src/flake/realise.ts
// Hand-off to the external build engine. Its failures are not inspected:
// they are logged and re-thrown exactly as raised.

import { serializeError } from '../lib/errors.js';
import { silentLogger } from '../lib/logger.js';
import type { Logger } from '../lib/logger.js';
import type { Derivation } from '../pkgs/types.js';

export interface BuildResult {
    readonly derivation: Derivation;
    /** False when the engine only accepted the description. */
    readonly built: boolean;
}

export interface BuildEngine {
    realise(derivation: Derivation): Promise<BuildResult>;
}

/** Accepts every derivation and builds nothing. */
export class DryRunEngine implements BuildEngine {
    async realise(derivation: Derivation): Promise<BuildResult> {
        return { derivation, built: false };
    }
}

export async function realise(
    derivation: Derivation,
    engine: BuildEngine,
    logger: Logger = silentLogger,
): Promise<BuildResult> {
    logger.debug({ derivation: derivation.name, system: derivation.system }, 'realising derivation');
    try {
        return await engine.realise(derivation);
    } catch (error) {
        logger.error({ derivation: derivation.name, error: serializeError(error) }, 'build engine failed');
        throw error;
    }
}
