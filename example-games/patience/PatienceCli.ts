/**
 * Terminal driver for nine-column patience.
 *
 * Reads two labels per turn (origin `e`-`t`, destination `a`-`m`),
 * applies the move when the board permits it and redraws. Input and
 * output go through TerminalIO so that the loop runs headless in tests.
 */

import { formatCard } from '../../src/card-system/Card';
import { renderBoard } from './BoardRenderer';
import type { PatienceGame } from './PatienceGame';
import type { Label } from './PatienceState';
import { isDestinationLabel, isOriginLabel } from './PatienceRules';

// ── Constants ───────────────────────────────────────────────

/** ANSI: clear the screen and home the cursor. */
export const CLEAR_SCREEN = '\x1b[2J\x1b[1;1H';

export const FROM_PROMPT = '\nEnter position to move FROM (labelled e-t): ';
export const TO_PROMPT = '\nEnter position to move TO (labelled a-m): ';

/** Typed at the FROM prompt to ask for a suggested move. */
export const HINT_KEY = '?';

export const USAGE = `
Usage: npm start -- [--seed <n>]

Options:
  --seed <n>   Shuffle with a fixed seed for a reproducible deal
  --help, -h   Show this message

Move a card by typing the label of the location it leaves (e-t),
then the label of the location it joins (a-m). Type ? for a hint.
`;

// ── I/O ─────────────────────────────────────────────────────

/**
 * Line-oriented terminal access. `ask` resolves to `undefined` once
 * input has ended.
 */
export interface TerminalIO {
  ask(prompt: string): Promise<string | undefined>;
  write(text: string): void;
}

// ── CLI Arg Parsing ─────────────────────────────────────────

export interface CliOptions {
  readonly help: boolean;
  readonly seed?: number;
}

/**
 * Parse command-line arguments (without the node and script entries).
 *
 * @throws If `--seed` is missing its value or the value is not an integer.
 */
export function parseArgs(args: readonly string[]): CliOptions {
  let help = false;
  let seed: number | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--help' || arg === '-h') {
      help = true;
    } else if (arg === '--seed' || arg === '-s') {
      const value = args[++i];
      if (value === undefined) {
        throw new Error('--seed needs a value');
      }
      seed = Number(value);
      if (!Number.isInteger(seed)) {
        throw new Error(`--seed must be an integer, got "${value}"`);
      }
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return seed === undefined ? { help } : { help, seed };
}

// ── Input ───────────────────────────────────────────────────

/**
 * Ask until the reply is a single character accepted by `accept`.
 *
 * Replies of any other length (in code points) re-prompt silently; a single character
 * outside the range prints `rangeMessage` first. `extra` lists further
 * single characters returned as-is.
 *
 * @returns The chosen label or extra key, or `undefined` once input ends.
 */
export async function readLabel(
  io: TerminalIO,
  prompt: string,
  accept: (value: string) => value is Label,
  rangeMessage: string,
  extra: readonly string[] = [],
): Promise<string | undefined> {
  for (;;) {
    const reply = await io.ask(prompt);
    if (reply === undefined) return undefined;

    const value = reply.trim();
    if ([...value].length !== 1) continue;
    if (accept(value) || extra.includes(value)) return value;

    io.write(`${rangeMessage}\n`);
  }
}

// ── Game loop ───────────────────────────────────────────────

export type SessionEnd = 'won' | 'input-closed';

function redraw(game: PatienceGame, io: TerminalIO): void {
  io.write(`${CLEAR_SCREEN}\n${renderBoard(game.board)}\n`);
}

function writeHint(game: PatienceGame, io: TerminalIO): void {
  const hint = game.hint();
  if (!hint) {
    io.write('No moves remain.\n');
    return;
  }
  const card = game.board.locationAt(hint.origin).activeCard();
  const shown = card ? formatCard(card).trim() : '';
  io.write(`Try moving ${shown} from ${hint.origin} to ${hint.destination}.\n`);
}

/**
 * Play until the board is won or input ends.
 */
export async function runSession(
  game: PatienceGame,
  io: TerminalIO,
): Promise<SessionEnd> {
  const stopRedraw = game.events.on('card-moved', () => redraw(game, io));
  const stopRejected = game.events.on('move-rejected', () =>
    io.write('That move is not permitted, try again!\n'),
  );
  const stopWon = game.events.on('game-won', ({ moveCount }) => {
    const moves = moveCount === 1 ? 'move' : 'moves';
    io.write(`All four foundations are complete. You won in ${moveCount} ${moves}!\n`);
  });

  try {
    redraw(game, io);

    for (;;) {
      const origin = await readLabel(
        io,
        FROM_PROMPT,
        isOriginLabel,
        'You must enter a letter from e to t',
        [HINT_KEY],
      );
      if (origin === undefined) return 'input-closed';
      if (origin === HINT_KEY || !isOriginLabel(origin)) {
        writeHint(game, io);
        continue;
      }

      const destination = await readLabel(
        io,
        TO_PROMPT,
        isDestinationLabel,
        'You must enter a letter from a to m',
      );
      if (destination === undefined) return 'input-closed';
      if (!isDestinationLabel(destination)) continue;

      const outcome = game.tryMove({ origin, destination });
      if (outcome.kind === 'applied' && outcome.victory === 'won') {
        return 'won';
      }
      if (outcome.kind === 'applied' && game.isStuck()) {
        io.write('No moves remain.\n');
      }
    }
  } finally {
    stopRedraw();
    stopRejected();
    stopWon();
  }
}
