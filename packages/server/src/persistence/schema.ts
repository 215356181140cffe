import { z } from 'zod';
import { COLORS, DECK_SIZE, MAX_BOMB_TOKENS, MAX_CLUE_TOKENS, countCards } from '@hanabi/shared';

export const SNAPSHOT_VERSION = 1;

export const ColorSchema = z.enum(COLORS);

export const RankSchema = z.union([
  z.literal(1),
  z.literal(2),
  z.literal(3),
  z.literal(4),
  z.literal(5),
]);

export const CardSchema = z.object({
  id: z.number().int().nonnegative(),
  color: ColorSchema,
  rank: RankSchema,
});

export const ClueSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('color'), color: ColorSchema }),
  z.object({ type: z.literal('rank'), rank: RankSchema }),
]);

export const KnowledgeSchema = z.object({
  colors: z.array(ColorSchema),
  ranks: z.array(RankSchema),
  notColors: z.array(ColorSchema),
  notRanks: z.array(RankSchema),
  clues: z.array(
    z.object({
      giverSeat: z.number().int().nonnegative(),
      turn: z.number().int().nonnegative(),
      clue: ClueSchema,
      matched: z.boolean(),
    })
  ),
});

export const HandSlotSchema = z.object({
  card: CardSchema,
  knowledge: KnowledgeSchema,
});

export const StacksSchema = z.object({
  red: z.array(CardSchema),
  green: z.array(CardSchema),
  white: z.array(CardSchema),
  blue: z.array(CardSchema),
  yellow: z.array(CardSchema),
});

export const RuleOptionsSchema = z.object({
  bonusClueOnStackCompletion: z.boolean(),
  finalLapStart: z.enum(['lastDraw', 'emptyDraw']),
});

export const GameStateSchema = z
  .object({
    id: z.string().min(1),
    createdAt: z.number(),
    rules: RuleOptionsSchema,
    status: z.enum(['forming', 'inProgress', 'won', 'completed', 'lost', 'abandoned']),
    players: z.array(z.string().min(1)).min(2).max(5),
    deck: z.array(CardSchema),
    hands: z.array(z.array(HandSlotSchema)),
    discardPile: z.array(CardSchema),
    stacks: StacksSchema,
    clueTokens: z.number().int().min(0).max(MAX_CLUE_TOKENS),
    bombTokens: z.number().int().min(0).max(MAX_BOMB_TOKENS),
    currentSeat: z.number().int().nonnegative(),
    turnNumber: z.number().int().nonnegative(),
    finalTurnsRemaining: z.number().int().nullable(),
    endReason: z.enum(['won', 'completed', 'lost', 'abandoned']).nullable(),
  })
  .refine((game) => game.hands.length === game.players.length, {
    message: 'Every seat needs exactly one hand',
  })
  .refine((game) => game.currentSeat < game.players.length, {
    message: 'Current seat is out of range',
  })
  .refine((game) => countCards(game) === DECK_SIZE, {
    message: `A game must account for all ${DECK_SIZE} cards`,
  })
  .refine(
    (game) => COLORS.every((color) => game.stacks[color].every((c, i) => c.color === color && c.rank === i + 1)),
    { message: 'Stacks must run 1..k in their own color' }
  );

export const LobbySnapshotSchema = z
  .object({
    version: z.literal(SNAPSHOT_VERSION),
    savedAt: z.string(),
    waiting: z.array(z.string().min(1)),
    games: z.array(GameStateSchema),
  })
  .refine(
    (snapshot) => {
      const everyone = [...snapshot.waiting, ...snapshot.games.flatMap((g) => g.players)];
      return new Set(everyone).size === everyone.length;
    },
    { message: 'A player may wait or sit in at most one game' }
  );

export type LobbySnapshot = z.infer<typeof LobbySnapshotSchema>;

/**
 * Validate an untrusted snapshot. Throws a ZodError describing every problem.
 */
export function parseSnapshot(data: unknown): LobbySnapshot {
  return LobbySnapshotSchema.parse(data);
}
