import type { Card, Color, Rank, HandSlot, GameState } from './types';
import { COLORS, RANKS } from './types';
import { RANK_COUNTS, MIN_PLAYERS, MAX_PLAYERS, getHandSize } from './constants';
import { ConfigurationError } from './errors';
import { createKnowledge } from './knowledge';
import { fisherYates, type RandomSource } from './random';

// ============================================================================
// Card Creation & Utilities
// ============================================================================

/**
 * Create a card
 */
export function createCard(id: number, color: Color, rank: Rank): Card {
  return { id, color, rank };
}

/**
 * Two cards are interchangeable when color and rank match, whatever their id
 */
export function cardsEqual(a: Card, b: Card): boolean {
  return a.color === b.color && a.rank === b.rank;
}

/**
 * Get a display string for a card, e.g. "red 3"
 */
export function cardToString(card: Card): string {
  return `${card.color} ${card.rank}`;
}

export function isColor(value: string): value is Color {
  return COLORS.some((color) => color === value);
}

export function isRank(value: number): value is Rank {
  return RANKS.some((rank) => rank === value);
}

// ============================================================================
// Deck Operations
// ============================================================================

/**
 * Create the 50-card deck in a fixed order: colors in display order,
 * ranks ascending with duplicates next to each other
 */
export function buildDeck(): Card[] {
  const deck: Card[] = [];

  for (const color of COLORS) {
    for (const rank of RANKS) {
      for (let copy = 0; copy < RANK_COUNTS[rank]; copy++) {
        deck.push(createCard(deck.length, color, rank));
      }
    }
  }

  return deck;
}

/**
 * Uniform random permutation of the deck.
 * Returns a new shuffled array (does not mutate original)
 */
export function shuffleDeck(deck: Card[], random: RandomSource = Math.random): Card[] {
  return fisherYates(deck, random);
}

/**
 * Deal cards to players, one at a time around the table, from the front of the deck.
 * Returns { hands, remainingDeck }
 */
export function dealCards(
  deck: Card[],
  numPlayers: number,
  handSize: number = getHandSize(numPlayers)
): { hands: HandSlot[][]; remainingDeck: Card[] } {
  if (!Number.isInteger(numPlayers) || numPlayers < MIN_PLAYERS || numPlayers > MAX_PLAYERS) {
    throw new ConfigurationError(
      'invalidPlayerCount',
      `Hanabi needs ${MIN_PLAYERS} to ${MAX_PLAYERS} players, got ${numPlayers}`
    );
  }

  if (deck.length < numPlayers * handSize) {
    throw new ConfigurationError('deckTooSmall', 'Not enough cards in deck');
  }

  const hands: HandSlot[][] = Array.from({ length: numPlayers }, () => []);
  let deckIndex = 0;

  for (let cardNum = 0; cardNum < handSize; cardNum++) {
    for (const hand of hands) {
      const card = deck[deckIndex];
      if (!card) {
        throw new ConfigurationError('deckTooSmall', 'Not enough cards in deck');
      }
      hand.push({ card, knowledge: createKnowledge() });
      deckIndex++;
    }
  }

  return {
    hands,
    remainingDeck: deck.slice(deckIndex),
  };
}

/**
 * Total cards across deck, hands, discard pile and stacks. Always 50.
 */
export function countCards(game: GameState): number {
  const inHands = game.hands.reduce((sum, hand) => sum + hand.length, 0);
  const inStacks = COLORS.reduce((sum, color) => sum + game.stacks[color].length, 0);
  return game.deck.length + inHands + game.discardPile.length + inStacks;
}
