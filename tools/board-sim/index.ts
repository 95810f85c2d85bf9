#!/usr/bin/env tsx
/*
 * Headless board simulator: seeds one board, steps it N times through the
 * contract and prints every generation to stdout.
 */

import { isLifeboardError, type BitBoard } from '@lifeboard/core';

import {
  CliUsageError,
  formatFrame,
  parseArgs,
  runSimulation,
  seedBoard,
  type CliArgs,
} from './lib.js';

function printHelpAndExit(code: number): never {
  console.error(
    `Usage: board-sim --steps <n> [options]\n\n` +
      `Options:\n` +
      `  --steps <n>          Number of generations to advance (required)\n` +
      `  --cells <x,y;...>    Live cells of the seed board (default: glider fragment)\n` +
      `  --field <base64>     Seed board as a base64 packed field\n` +
      `  --hold-height        Keep the clock at height 0 for every step\n`,
  );
  // eslint-disable-next-line no-process-exit
  process.exit(code);
}

async function main(): Promise<void> {
  let args: CliArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(`Error: ${error.message}`);
      printHelpAndExit(2);
    }
    throw error;
  }

  if (args.help) {
    printHelpAndExit(0);
  }

  let seed: BitBoard;
  try {
    seed = seedBoard(args);
  } catch (error) {
    if (isLifeboardError(error)) {
      console.error(`Error: --field ${error.message}`);
      printHelpAndExit(2);
    }
    throw error;
  }

  const frames = runSimulation({ seed, steps: args.steps, holdHeight: args.holdHeight });
  process.stdout.write(frames.map(formatFrame).join('\n\n') + '\n');
}

// eslint-disable-next-line unicorn/prefer-top-level-await
main().catch((error) => {
  console.error('board-sim failed:', error instanceof Error ? error.message : String(error));
  // eslint-disable-next-line no-process-exit
  process.exit(1);
});
