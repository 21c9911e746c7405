// aoc-flake/src/cli/options.ts — Command line parsing

import { parseArgs } from 'node:util';

export type Command = 'build' | 'develop' | 'show' | 'lock';

const COMMANDS: readonly Command[] = ['build', 'develop', 'show', 'lock'];

export const USAGE = 'Usage: aoc-flake <build|develop|show|lock> [--system <platform>]';

/** Bad invocation; reported with the usage line. */
export class CliError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'CliError';
    }
}

export interface CliOptions {
    command: Command;
    /** Target platform for build and develop. */
    system?: string;
}

const isCommand = (value: string): value is Command => COMMANDS.some(command => command === value);

const parse = (argv: readonly string[]) => {
    try {
        return parseArgs({
            args: [...argv],
            options: {
                system: { type: 'string' },
            },
            allowPositionals: true,
        });
    } catch (error) {
        throw new CliError(error instanceof Error ? error.message : String(error));
    }
};

export const parseCliOptions = (argv: readonly string[]): CliOptions => {
    const { values, positionals } = parse(argv);
    const [command, ...rest] = positionals;

    if (command === undefined) throw new CliError('Missing command');
    if (!isCommand(command)) throw new CliError(`Unknown command: ${command}`);
    if (rest.length > 0) throw new CliError(`Unexpected arguments: ${rest.join(' ')}`);

    const system = values.system?.trim();
    if (system !== undefined) {
        if (!system) throw new CliError('--system cannot be empty');
        if (command === 'show' || command === 'lock') {
            throw new CliError(`--system has no effect on ${command}`);
        }
        return { command, system };
    }
    return { command };
};
