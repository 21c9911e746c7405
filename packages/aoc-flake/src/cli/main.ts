// aoc-flake/src/cli/main.ts — Command dispatch
//
// Exit codes: 0 success, 1 configuration error, 2 bad invocation. Anything
// else, build engine failures included, propagates unchanged.

import process from 'node:process';
import type { Writable } from 'node:stream';

import {
    BundledSourceResolver,
    createLogger,
    DryRunEngine,
    evaluateFlake,
    hostPlatform,
    isFlakeError,
    loadConfig,
    lockInputs,
    realise,
    selectDefaultPackage,
    selectDevShell,
    serializeError,
} from 'devflake';
import type { BuildEngine, Logger, OutputSet, SourceResolver } from 'devflake';

import { flake } from '../flake.js';
import { CliError, parseCliOptions, USAGE } from './options.js';
import type { CliOptions } from './options.js';
import { renderOutputTree } from './show.js';

export type CliIO = {
    stdout: Writable;
    stderr: Writable;
};

export interface CliDeps {
    env: NodeJS.ProcessEnv;
    resolver: SourceResolver;
    engine: BuildEngine;
}

const defaultIO: CliIO = {
    stdout: process.stdout,
    stderr: process.stderr,
};

const printJson = (io: CliIO, value: unknown): void => {
    io.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
};

interface RunContext {
    io: CliIO;
    logger: Logger;
    engine: BuildEngine;
    /** Resolved only by the commands that need a platform. */
    system: () => string;
}

async function run(
    command: CliOptions['command'],
    outputs: OutputSet,
    { io, logger, engine, system }: RunContext,
): Promise<void> {
    switch (command) {
        case 'build': {
            const result = await realise(selectDefaultPackage(outputs, system()), engine, logger);
            printJson(io, result.derivation);
            return;
        }
        case 'develop':
            printJson(io, selectDevShell(outputs, system()));
            return;
        case 'show':
            io.stdout.write(`${renderOutputTree(outputs).join('\n')}\n`);
            return;
        case 'lock':
            printJson(io, lockInputs(outputs.inputs));
            return;
    }
}

export const main = async (
    argv: readonly string[] = process.argv.slice(2),
    io: CliIO = defaultIO,
    deps: Partial<CliDeps> = {},
): Promise<number> => {
    let options: CliOptions;
    try {
        options = parseCliOptions(argv);
    } catch (error) {
        if (!(error instanceof CliError)) throw error;
        io.stderr.write(`error: ${error.message}\n${USAGE}\n`);
        return 2;
    }

    const resolver = deps.resolver ?? new BundledSourceResolver();
    const engine = deps.engine ?? new DryRunEngine();

    let logger: Logger | undefined;
    try {
        const config = loadConfig(deps.env ?? process.env);
        logger = createLogger(config.logLevel, io.stderr);
        const outputs = evaluateFlake(flake, resolver, { logger });
        const system = () => options.system ?? config.system ?? hostPlatform();
        await run(options.command, outputs, { io, logger, engine, system });
        return 0;
    } catch (error) {
        if (!isFlakeError(error)) throw error;
        logger?.error({ command: options.command, error: serializeError(error) }, 'evaluation failed');
        io.stderr.write(`error: ${error.message}\n`);
        return 1;
    }
};
