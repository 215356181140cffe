import type { Card, Color, GameState, HandSlot, Stacks } from './types';
import { COLORS } from './types';
import { MAX_CLUE_TOKENS, MAX_RANK } from './constants';
import { IllegalMoveError } from './errors';

// ============================================================================
// Stacks
// ============================================================================

export function createStacks(): Stacks {
  return { red: [], green: [], white: [], blue: [], yellow: [] };
}

/**
 * Put a card on its color's stack. Returns new stacks.
 */
export function addToStack(stacks: Stacks, card: Card): Stacks {
  const next: Stacks = { ...stacks };
  next[card.color] = [...stacks[card.color], card];
  return next;
}

/**
 * Rank on top of a color's stack, 0 when nothing has been played
 */
export function getStackTop(stacks: Stacks, color: Color): number {
  return stacks[color].length;
}

/**
 * A card is playable when it is exactly one above its stack's top
 */
export function isPlayable(stacks: Stacks, card: Card): boolean {
  return card.rank === getStackTop(stacks, card.color) + 1;
}

export function allStacksComplete(stacks: Stacks): boolean {
  return COLORS.every((color) => getStackTop(stacks, color) === MAX_RANK);
}

export function getStackTops(stacks: Stacks): Record<Color, number> {
  return {
    red: getStackTop(stacks, 'red'),
    green: getStackTop(stacks, 'green'),
    white: getStackTop(stacks, 'white'),
    blue: getStackTop(stacks, 'blue'),
    yellow: getStackTop(stacks, 'yellow'),
  };
}

// ============================================================================
// Move Validation
// ============================================================================

/**
 * Check that the game accepts moves and that `seat` is the active seat
 */
export function assertCanAct(game: GameState, seat: number): void {
  if (game.status !== 'inProgress') {
    throw new IllegalMoveError('gameNotInProgress', 'The game is not in progress');
  }

  if (seat !== game.currentSeat) {
    const current = game.players[game.currentSeat] ?? 'another player';
    throw new IllegalMoveError('notYourTurn', `It's not your turn yet, it's ${current}'s`);
  }
}

/**
 * Resolve a 1-based slot index against a hand
 */
export function getSlot(hand: HandSlot[], slot: number): HandSlot {
  const found = Number.isInteger(slot) ? hand[slot - 1] : undefined;
  if (!found || slot < 1) {
    throw new IllegalMoveError(
      'noSuchCard',
      `There is no card ${slot} in your hand. Card indexing starts at 1.`
    );
  }
  return found;
}

export function canDiscard(game: GameState): boolean {
  return game.clueTokens < MAX_CLUE_TOKENS;
}

export function canClue(game: GameState): boolean {
  return game.clueTokens > 0;
}

// ============================================================================
// Turn Order
// ============================================================================

export function getNextSeat(currentSeat: number, numPlayers: number): number {
  return (currentSeat + 1) % numPlayers;
}

export function isTerminal(game: GameState): boolean {
  return (
    game.status === 'won' ||
    game.status === 'completed' ||
    game.status === 'lost' ||
    game.status === 'abandoned'
  );
}
