import { buildDeck } from '../cards';
import { addToStack } from '../rules';
import { COLORS } from '../types';
import type { Card, Clue, Color, GameState, Rank } from '../types';

export type CardSpec = [Color, Rank];

/**
 * Take one physical card of the given color and rank out of `pool`
 */
function take(pool: Card[], [color, rank]: CardSpec): Card {
  const index = pool.findIndex((c) => c.color === color && c.rank === rank);
  const card = pool[index];
  if (index === -1 || !card) {
    throw new Error(`No ${color} ${rank} left in the pool`);
  }
  pool.splice(index, 1);
  return card;
}

/**
 * Build a full 50-card deck that deals the given hands (round robin, like
 * dealCards does), followed by `next` in order, then every other card.
 */
export function stackedDeck(hands: CardSpec[][], next: CardSpec[] = []): Card[] {
  const pool = buildDeck();
  const handSize = Math.max(...hands.map((h) => h.length));
  const front: Card[] = [];

  for (let i = 0; i < handSize; i++) {
    for (const hand of hands) {
      const wanted = hand[i];
      if (wanted) front.push(take(pool, wanted));
    }
  }

  const following = next.map((wanted) => take(pool, wanted));
  return [...front, ...following, ...pool];
}

/**
 * Move cards from the deck onto the stacks so each color reaches the given top
 */
export function withStacks(game: GameState, tops: Partial<Record<Color, number>>): GameState {
  const deck = [...game.deck];
  let stacks = game.stacks;

  for (const color of COLORS) {
    const top = tops[color] ?? 0;
    for (let rank = stacks[color].length + 1; rank <= top; rank++) {
      const index = deck.findIndex((c) => c.color === color && c.rank === rank);
      const card = deck[index];
      if (index === -1 || !card) throw new Error(`${color} ${rank} is not in the deck`);
      deck.splice(index, 1);
      stacks = addToStack(stacks, card);
    }
  }

  return { ...game, deck, stacks };
}

/**
 * Move deck cards to the discard pile until only `keep` remain
 */
export function drainDeck(game: GameState, keep: number): GameState {
  const drained = game.deck.slice(0, game.deck.length - keep);
  return {
    ...game,
    deck: game.deck.slice(game.deck.length - keep),
    discardPile: [...game.discardPile, ...drained],
  };
}

/**
 * A clue that is sure to touch the first card of `seat`'s hand
 */
export function clueForFirstCard(game: GameState, seat: number): Clue {
  const first = game.hands[seat]?.[0];
  if (!first) throw new Error(`Seat ${seat} has no cards`);
  return { type: 'color', color: first.card.color };
}

/**
 * Run `fn` and return what it threw
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected the call to throw');
}
