#!/usr/bin/env node
/**
 * Nine-column patience in the terminal.
 *
 * Usage:
 *   npm start -- [--seed <n>]
 */

import { createInterface } from 'node:readline';
import { PatienceGame } from './PatienceGame';
import type { CliOptions, TerminalIO } from './PatienceCli';
import { USAGE, parseArgs, runSession } from './PatienceCli';

async function main(): Promise<void> {
  let options: CliOptions;
  try {
    options = parseArgs(process.argv.slice(2));
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    console.log(USAGE);
    process.exit(1);
  }

  if (options.help) {
    console.log(USAGE);
    return;
  }

  const rl = createInterface({ input: process.stdin, terminal: false });
  const lines = rl[Symbol.asyncIterator]();

  const io: TerminalIO = {
    async ask(prompt) {
      process.stdout.write(prompt);
      const next = await lines.next();
      return next.done ? undefined : next.value;
    },
    write(text) {
      process.stdout.write(text);
    },
  };

  try {
    const game = new PatienceGame({ seed: options.seed });
    await runSession(game, io);
  } finally {
    rl.close();
  }
}

main().catch((err) => {
  console.error('Unhandled error:', err);
  process.exit(1);
});
