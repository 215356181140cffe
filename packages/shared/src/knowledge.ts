import type {
  Card,
  Clue,
  Color,
  Rank,
  HandSlot,
  KnowledgeRecord,
  KnowledgeSummary,
} from './types';
import { COLORS, RANKS } from './types';
import { IllegalMoveError } from './errors';

// ============================================================================
// Knowledge Records
// ============================================================================

export function createKnowledge(): KnowledgeRecord {
  return { colors: [], ranks: [], notColors: [], notRanks: [], clues: [] };
}

/**
 * Does the card carry the clued attribute?
 */
export function clueMatches(card: Card, clue: Clue): boolean {
  return clue.type === 'color' ? card.color === clue.color : card.rank === clue.rank;
}

function withValue<T>(values: T[], value: T): T[] {
  return values.includes(value) ? values : [...values, value];
}

/**
 * Add one clue to a card's knowledge. Produces a new record; the
 * old one is left as is, and every set in the new one contains the old set.
 */
export function addClueToKnowledge(
  knowledge: KnowledgeRecord,
  card: Card,
  clue: Clue,
  giverSeat: number,
  turn: number
): KnowledgeRecord {
  const matched = clueMatches(card, clue);
  const next: KnowledgeRecord = {
    ...knowledge,
    clues: [...knowledge.clues, { giverSeat, turn, clue, matched }],
  };

  if (clue.type === 'color') {
    if (matched) next.colors = withValue(knowledge.colors, clue.color);
    else next.notColors = withValue(knowledge.notColors, clue.color);
  } else {
    if (matched) next.ranks = withValue(knowledge.ranks, clue.rank);
    else next.notRanks = withValue(knowledge.notRanks, clue.rank);
  }

  return next;
}

/**
 * Apply a clue to a whole hand.
 *
 * Matching slots learn the attribute, the others learn they do not have it.
 * A clue must touch at least one card; otherwise it is rejected and nothing changes.
 * Returns the new hand and the 1-based positions of the matching slots.
 */
export function applyClue(
  hand: HandSlot[],
  clue: Clue,
  giverSeat: number,
  turn: number
): { hand: HandSlot[]; affectedSlots: number[] } {
  const affectedSlots: number[] = [];
  hand.forEach((slot, i) => {
    if (clueMatches(slot.card, clue)) affectedSlots.push(i + 1);
  });

  if (affectedSlots.length === 0) {
    throw new IllegalMoveError('noMatchingCards', `No card in that hand is ${clueToString(clue)}`);
  }

  return {
    hand: hand.map((slot) => ({
      card: slot.card,
      knowledge: addClueToKnowledge(slot.knowledge, slot.card, clue, giverSeat, turn),
    })),
    affectedSlots,
  };
}

export function clueToString(clue: Clue): string {
  return clue.type === 'color' ? clue.color : `a ${clue.rank}`;
}

// ============================================================================
// Summaries (for views, never for rule checks)
// ============================================================================

export function possibleColors(knowledge: KnowledgeRecord): Color[] {
  const known = knowledge.colors[0];
  if (known !== undefined) return [known];
  return COLORS.filter((c) => !knowledge.notColors.includes(c));
}

export function possibleRanks(knowledge: KnowledgeRecord): Rank[] {
  const known = knowledge.ranks[0];
  if (known !== undefined) return [known];
  return RANKS.filter((r) => !knowledge.notRanks.includes(r));
}

/**
 * Summarize what the owner knows about one card
 */
export function summarizeKnowledge(knowledge: KnowledgeRecord): KnowledgeSummary {
  const colors = possibleColors(knowledge);
  const ranks = possibleRanks(knowledge);

  // Exclusions alone can narrow a card down to one value
  const color = colors.length === 1 ? (colors[0] ?? null) : null;
  const rank = ranks.length === 1 ? (ranks[0] ?? null) : null;

  let state: KnowledgeSummary['state'];
  if (color !== null && rank !== null) {
    state = 'known';
  } else if (colors.length < COLORS.length || ranks.length < RANKS.length) {
    state = 'partial';
  } else {
    state = 'unknown';
  }

  return { state, color, rank, possibleColors: colors, possibleRanks: ranks };
}

/**
 * True when `next` holds every fact `prev` holds
 */
export function isKnowledgeSuperset(next: KnowledgeRecord, prev: KnowledgeRecord): boolean {
  const covers = <T>(a: T[], b: T[]) => b.every((v) => a.includes(v));
  return (
    covers(next.colors, prev.colors) &&
    covers(next.ranks, prev.ranks) &&
    covers(next.notColors, prev.notColors) &&
    covers(next.notRanks, prev.notRanks) &&
    next.clues.length >= prev.clues.length
  );
}
