import type { Rank, RuleOptions } from './types';

// Game constants

export const MIN_PLAYERS = 2;
export const MAX_PLAYERS = 5;

// Copies of each rank per color: 1×3, 2×2, 3×2, 4×2, 5×1
export const RANK_COUNTS: Record<Rank, number> = {
  1: 3,
  2: 2,
  3: 2,
  4: 2,
  5: 1,
};

export const DECK_SIZE = 50;

export const MAX_CLUE_TOKENS = 8;
export const MAX_BOMB_TOKENS = 3;

export const MAX_RANK: Rank = 5;
export const PERFECT_SCORE = 25;

// Hand size depends on table size: 5 cards for 2-3 players, 4 for 4-5
export function getHandSize(numPlayers: number): number {
  return numPlayers <= 3 ? 5 : 4;
}

export const DEFAULT_RULES: RuleOptions = {
  bonusClueOnStackCompletion: true,
  finalLapStart: 'lastDraw',
};
