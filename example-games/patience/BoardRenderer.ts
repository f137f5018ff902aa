/**
 * Plain-text rendering of a patience board for the terminal driver.
 *
 * Every card occupies a 3-character cell (see formatCard); cells are
 * separated by two spaces so that they line up under their labels.
 */

import { formatCard, suitSymbol } from '../../src/card-system/Card';
import type { Board } from './PatienceBoard';
import type { Foundation } from './Locations';

const RULE = '_'.repeat(44);
const BLANK_CELL = '   ';
const GAP = '  ';

function foundationCell(foundation: Foundation): string {
  const card = foundation.activeCard();
  return card ? formatCard(card) : `  ${suitSymbol(foundation.suit)}`;
}

/**
 * Render the board as text: foundations, the column grid and the hand,
 * each under its row of labels. The column grid runs one row past the
 * tallest column.
 */
export function renderBoard(board: Board): string {
  const lines: string[] = [];

  const foundations: string[] = [];
  for (let fi = 0; fi < board.foundationCount(); fi++) {
    foundations.push(foundationCell(board.foundation(fi)));
  }
  lines.push(`${' '.repeat(27)}a    b    c    d`);
  lines.push(RULE);
  lines.push(' '.repeat(26) + foundations.join(GAP));
  lines.push('', '');

  lines.push('  e    f    g    h    i    j    k    l    m');
  lines.push(RULE);
  let tallest = 0;
  for (let col = 0; col < board.columnCount(); col++) {
    tallest = Math.max(tallest, board.column(col).size());
  }
  for (let row = 0; row <= tallest; row++) {
    const cells: string[] = [];
    for (let col = 0; col < board.columnCount(); col++) {
      const card = board.column(col).cardAt(row);
      cells.push(card ? formatCard(card) : BLANK_CELL);
    }
    lines.push(cells.join(GAP));
  }
  lines.push('');

  lines.push('  n    o    p    q    r    s    t');
  lines.push(RULE);
  const hand: string[] = [];
  for (let cell = 0; cell < board.handSize(); cell++) {
    const card = board.handCell(cell).activeCard();
    hand.push(card ? formatCard(card) : BLANK_CELL);
  }
  lines.push(hand.join(GAP) + GAP);

  return lines.join('\n') + '\n';
}
