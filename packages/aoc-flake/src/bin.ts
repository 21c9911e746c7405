// aoc-flake/src/bin.ts — Executable entry

import process from 'node:process';

import { main } from './cli/main.js';

process.exitCode = await main();
