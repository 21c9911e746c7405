// devflake/src/lib/logger.ts

import { destination as createDestination, pino } from 'pino';
import type { DestinationStream, Logger } from 'pino';

export type { Logger };

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/** Logs go to stderr by default; stdout is reserved for command output. */
export function createLogger(level: LogLevel = 'warn', destination: DestinationStream = createDestination(2)): Logger {
    return pino({ name: 'devflake', level }, destination);
}

export const silentLogger: Logger = pino({ level: 'silent' });
