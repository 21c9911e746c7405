// tests/realise.test.ts — Tests for the build engine hand-off
import { describe, it, expect } from 'vitest';
import { pino } from 'pino';
import { realise, DryRunEngine, prebuiltPackage } from '../src/index.js';
import type { BuildEngine } from '../src/index.js';

const drv = prebuiltPackage('rustc', { version: '1.82.0' }, 'x86_64-linux');

describe('realise', () => {
    it('returns what the engine reports', async () => {
        await expect(realise(drv, new DryRunEngine())).resolves.toEqual({ derivation: drv, built: false });
    });

    it('re-throws engine failures unchanged and logs them', async () => {
        const lines: string[] = [];
        const logger = pino({ level: 'error' }, { write: (line: string) => { lines.push(line); } });
        const failure = new Error('builder exited with code 101');
        const engine: BuildEngine = {
            realise: async () => {
                throw failure;
            },
        };

        await expect(realise(drv, engine, logger)).rejects.toBe(failure);
        expect(lines).toHaveLength(1);
        expect(JSON.parse(lines[0])).toMatchObject({
            msg: 'build engine failed',
            derivation: 'rustc-1.82.0',
            error: { name: 'Error', message: 'builder exited with code 101' },
        });
    });
});
