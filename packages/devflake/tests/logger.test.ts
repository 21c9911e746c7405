// tests/logger.test.ts — Tests for logger construction
import { describe, it, expect } from 'vitest';
import { createLogger, silentLogger } from '../src/index.js';

describe('createLogger', () => {
    it('defaults to warn on stderr', () => {
        const logger = createLogger();
        expect(logger.level).toBe('warn');
        expect(logger.isLevelEnabled('warn')).toBe(true);
        expect(logger.isLevelEnabled('info')).toBe(false);
    });

    it('keeps the stderr default when only the level is given', () => {
        expect(createLogger('debug').level).toBe('debug');
    });

    it('writes named JSON lines to the given destination', () => {
        const lines: string[] = [];
        const logger = createLogger('info', { write: (line: string) => { lines.push(line); } });

        logger.debug('dropped');
        logger.info({ platform: 'x86_64-linux' }, 'evaluating');

        expect(lines).toHaveLength(1);
        expect(JSON.parse(lines[0] ?? '')).toMatchObject({
            level: 30,
            name: 'devflake',
            platform: 'x86_64-linux',
            msg: 'evaluating',
        });
    });
});

describe('silentLogger', () => {
    it('has every level disabled', () => {
        expect(silentLogger.level).toBe('silent');
        expect(silentLogger.isLevelEnabled('fatal')).toBe(false);
    });
});
