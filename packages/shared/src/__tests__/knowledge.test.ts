import { describe, it, expect } from 'vitest';
import {
  applyClue,
  clueMatches,
  createKnowledge,
  isKnowledgeSuperset,
  summarizeKnowledge,
} from '../knowledge';
import { buildDeck, createCard, dealCards, shuffleDeck } from '../cards';
import { createRandom } from '../random';
import { IllegalMoveError } from '../errors';
import { COLORS, RANKS } from '../types';
import type { Clue, HandSlot } from '../types';
import { captureError } from './helpers';

function handOf(...cards: [string, number][]): HandSlot[] {
  return cards.map(([color, rank], i) => {
    const card = buildDeck().find((c) => c.color === color && c.rank === rank);
    if (!card) throw new Error(`bad card ${color} ${rank}`);
    return { card: { ...card, id: i }, knowledge: createKnowledge() };
  });
}

const ALL_CLUES: Clue[] = [
  ...COLORS.map((color): Clue => ({ type: 'color', color })),
  ...RANKS.map((rank): Clue => ({ type: 'rank', rank })),
];

describe('Clue matching', () => {
  it('matches on color or rank', () => {
    const card = createCard(0, 'red', 3);
    expect(clueMatches(card, { type: 'color', color: 'red' })).toBe(true);
    expect(clueMatches(card, { type: 'color', color: 'blue' })).toBe(false);
    expect(clueMatches(card, { type: 'rank', rank: 3 })).toBe(true);
    expect(clueMatches(card, { type: 'rank', rank: 4 })).toBe(false);
  });
});

describe('Applying clues', () => {
  const hand = handOf(['red', 1], ['green', 1], ['red', 3], ['blue', 2], ['yellow', 5]);

  it('reports the matching slots, 1-based', () => {
    const { affectedSlots } = applyClue(hand, { type: 'color', color: 'red' }, 0, 0);
    expect(affectedSlots).toEqual([1, 3]);
  });

  it('adds positive facts to matching slots and exclusions to the rest', () => {
    const { hand: clued } = applyClue(hand, { type: 'color', color: 'red' }, 0, 4);

    expect(clued[0]?.knowledge.colors).toEqual(['red']);
    expect(clued[0]?.knowledge.notColors).toEqual([]);
    expect(clued[1]?.knowledge.colors).toEqual([]);
    expect(clued[1]?.knowledge.notColors).toEqual(['red']);
    expect(clued[2]?.knowledge.colors).toEqual(['red']);
    expect(clued[4]?.knowledge.notColors).toEqual(['red']);
  });

  it('records the clue on every slot with who gave it', () => {
    const { hand: clued } = applyClue(hand, { type: 'rank', rank: 1 }, 2, 7);
    expect(clued[0]?.knowledge.clues).toEqual([
      { giverSeat: 2, turn: 7, clue: { type: 'rank', rank: 1 }, matched: true },
    ]);
    expect(clued[3]?.knowledge.clues).toEqual([
      { giverSeat: 2, turn: 7, clue: { type: 'rank', rank: 1 }, matched: false },
    ]);
  });

  it('leaves the input hand untouched', () => {
    applyClue(hand, { type: 'rank', rank: 5 }, 1, 0);
    expect(hand.every((slot) => slot.knowledge.clues.length === 0)).toBe(true);
  });

  it('does not repeat a fact that is already known', () => {
    const once = applyClue(hand, { type: 'color', color: 'red' }, 0, 0).hand;
    const twice = applyClue(once, { type: 'color', color: 'red' }, 1, 1).hand;
    expect(twice[0]?.knowledge.colors).toEqual(['red']);
    expect(twice[1]?.knowledge.notColors).toEqual(['red']);
    expect(twice[0]?.knowledge.clues).toHaveLength(2);
  });

  it('rejects a clue that touches no card', () => {
    const error = captureError(() => applyClue(hand, { type: 'color', color: 'white' }, 0, 0));
    expect(error).toBeInstanceOf(IllegalMoveError);
    expect(error).toMatchObject({ reason: 'noMatchingCards' });
  });

  it('rejects exactly the clues that match nothing, for many hands', () => {
    const random = createRandom(99);
    for (let round = 0; round < 50; round++) {
      const { hands } = dealCards(shuffleDeck(buildDeck(), random), 4);
      for (const h of hands) {
        for (const clue of ALL_CLUES) {
          const matches = h.some((slot) => clueMatches(slot.card, clue));
          if (matches) {
            expect(() => applyClue(h, clue, 0, 0)).not.toThrow();
          } else {
            expect(() => applyClue(h, clue, 0, 0)).toThrow(IllegalMoveError);
          }
        }
      }
    }
  });

  it('only ever adds knowledge across a sequence of clues', () => {
    const random = createRandom(5);
    let current = handOf(['red', 1], ['red', 2], ['white', 1], ['blue', 4], ['green', 5]);

    for (let i = 0; i < 40; i++) {
      const clue = ALL_CLUES[Math.floor(random() * ALL_CLUES.length)];
      if (!clue || !current.some((slot) => clueMatches(slot.card, clue))) continue;
      const next = applyClue(current, clue, 1, i).hand;
      next.forEach((slot, s) => {
        const prev = current[s];
        if (!prev) throw new Error('slot disappeared');
        expect(isKnowledgeSuperset(slot.knowledge, prev.knowledge)).toBe(true);
      });
      current = next;
    }
  });
});

describe('Knowledge summaries', () => {
  it('reports unknown for an unclued card', () => {
    expect(summarizeKnowledge(createKnowledge())).toEqual({
      state: 'unknown',
      color: null,
      rank: null,
      possibleColors: ['red', 'green', 'white', 'blue', 'yellow'],
      possibleRanks: [1, 2, 3, 4, 5],
    });
  });

  it('reports partial knowledge after one clue', () => {
    const [slot] = applyClue(handOf(['blue', 2]), { type: 'rank', rank: 2 }, 1, 0).hand;
    expect(slot && summarizeKnowledge(slot.knowledge)).toEqual({
      state: 'partial',
      color: null,
      rank: 2,
      possibleColors: ['red', 'green', 'white', 'blue', 'yellow'],
      possibleRanks: [2],
    });
  });

  it('narrows possibilities from exclusions alone', () => {
    let hand = handOf(['yellow', 4], ['red', 1], ['green', 2], ['white', 3], ['blue', 5]);
    hand = applyClue(hand, { type: 'color', color: 'red' }, 0, 0).hand;
    hand = applyClue(hand, { type: 'color', color: 'green' }, 0, 1).hand;
    hand = applyClue(hand, { type: 'color', color: 'white' }, 0, 2).hand;
    hand = applyClue(hand, { type: 'color', color: 'blue' }, 0, 3).hand;

    const first = hand[0];
    expect(first && summarizeKnowledge(first.knowledge)).toEqual({
      state: 'partial',
      color: 'yellow',
      rank: null,
      possibleColors: ['yellow'],
      possibleRanks: [1, 2, 3, 4, 5],
    });
  });

  it('reports a card as known once color and rank are both revealed', () => {
    let hand = handOf(['green', 5], ['red', 1]);
    hand = applyClue(hand, { type: 'color', color: 'green' }, 1, 0).hand;
    hand = applyClue(hand, { type: 'rank', rank: 5 }, 1, 1).hand;
    const first = hand[0];
    expect(first && summarizeKnowledge(first.knowledge)).toMatchObject({
      state: 'known',
      color: 'green',
      rank: 5,
    });
    const second = hand[1];
    expect(second && summarizeKnowledge(second.knowledge)).toMatchObject({
      state: 'partial',
      possibleColors: ['red', 'white', 'blue', 'yellow'],
      possibleRanks: [1, 2, 3, 4],
    });
  });
});
