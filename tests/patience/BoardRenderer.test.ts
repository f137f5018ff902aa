import { describe, it, expect } from 'vitest';
import { renderBoard } from '../../example-games/patience/BoardRenderer';
import { Board } from '../../example-games/patience/PatienceBoard';
import { createStandardDeck } from '../../src/card-system/Deck';
import { RANKS, createCard } from '../../src/card-system/Card';

const RULE = '_'.repeat(44);

describe('renderBoard', () => {
  it('should lay out an unshuffled deal under its labels', () => {
    const board = new Board(createStandardDeck());

    const expected = [
      ' '.repeat(27) + 'a    b    c    d',
      RULE,
      ' '.repeat(26) + '  ♠    ♡    ♢    ♣',
      '',
      '',
      '  e    f    g    h    i    j    k    l    m',
      RULE,
      ' A♠   2♠   4♠   7♠   J♠   3♡   9♡   3♢   J♢',
      '      3♠   5♠   8♠   Q♠   4♡  10♡   4♢   Q♢',
      '           6♠   9♠   K♠   5♡   J♡   5♢   K♢',
      '               10♠   A♡   6♡   Q♡   6♢   A♣',
      '                     2♡   7♡   K♡   7♢   2♣',
      '                          8♡   A♢   8♢   3♣',
      '                               2♢   9♢   4♣',
      '                                   10♢   5♣',
      '                                         6♣',
      ' '.repeat(43),
      '',
      '  n    o    p    q    r    s    t',
      RULE,
      ' 7♣   8♣   9♣  10♣   J♣   Q♣   K♣  ',
      '',
    ];

    expect(renderBoard(board).split('\n')).toEqual(expected);
  });

  it('should end with a newline', () => {
    const text = renderBoard(new Board(createStandardDeck()));
    expect(text.endsWith('  \n')).toBe(true);
  });

  it('should show a built foundation by its top card', () => {
    const board = new Board(createStandardDeck());
    board.execute({ origin: 'e', destination: 'a' });

    const lines = renderBoard(board).split('\n');
    expect(lines[2]).toBe(' '.repeat(26) + ' A♠    ♡    ♢    ♣');
  });

  it('should blank out emptied columns and hand cells', () => {
    const board = new Board(createStandardDeck());
    board.execute({ origin: 'e', destination: 'a' });
    board.execute({ origin: 'n', destination: 'j' });

    const lines = renderBoard(board).split('\n');
    expect(lines[7]).toBe('      2♠   4♠   7♠   J♠   3♡   9♡   3♢   J♢');
    expect(lines[12]).toBe('                          8♡   A♢   8♢   3♣');
    expect(lines[13]).toBe('                          7♣   2♢   9♢   4♣');
    expect(lines[lines.length - 2]).toBe(
      '      8♣   9♣  10♣   J♣   Q♣   K♣  ',
    );
  });

  it('should grow the grid with the tallest column', () => {
    const board = new Board(createStandardDeck());
    const lines = renderBoard(board).split('\n');
    expect(lines).toHaveLength(22);

    // Place ten more cards on column e directly, making it 11 tall
    const e = board.column(0);
    for (const rank of RANKS.slice(1, 10)) {
      e.receive(createCard(rank, 'hearts'));
    }
    e.receive(createCard(12, 'clubs'));
    expect(e.size()).toBe(11);

    const grown = renderBoard(board).split('\n');
    expect(grown).toHaveLength(24);
    expect(grown[17]).toBe(' Q♣' + ' '.repeat(40));
    expect(grown[18]).toBe(' '.repeat(43));
  });
});
