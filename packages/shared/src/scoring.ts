import type { Card, Color, GameState, Rank } from './types';
import { COLORS, RANKS } from './types';
import { RANK_COUNTS } from './constants';
import { getStackTop } from './rules';

// ============================================================================
// Scoring
// ============================================================================

/**
 * Score = sum of the top rank of every stack (0-25)
 */
export function getScore(game: GameState): number {
  return COLORS.reduce((sum, color) => sum + getStackTop(game.stacks, color), 0);
}

/**
 * Count how many copies of each card sit in the discard pile
 */
function countDiscarded(discardPile: Card[], color: Color, rank: Rank): number {
  return discardPile.filter((c) => c.color === color && c.rank === rank).length;
}

/**
 * Highest score still reachable given the discard pile.
 *
 * A stack can never grow past the first rank whose copies are all discarded.
 */
export function getMaxAchievableScore(game: GameState): number {
  let total = 0;

  for (const color of COLORS) {
    let reachable = getStackTop(game.stacks, color);
    for (const rank of RANKS) {
      if (rank <= reachable) continue;
      if (countDiscarded(game.discardPile, color, rank) >= RANK_COUNTS[rank]) break;
      reachable = rank;
    }
    total += reachable;
  }

  return total;
}

/**
 * Group the discard pile by color, ranks ascending within each color
 */
export function getDiscardsByColor(game: GameState): Record<Color, Rank[]> {
  const grouped: Record<Color, Rank[]> = { red: [], green: [], white: [], blue: [], yellow: [] };
  for (const card of game.discardPile) {
    grouped[card.color].push(card.rank);
  }
  for (const color of COLORS) {
    grouped[color].sort((a, b) => a - b);
  }
  return grouped;
}
