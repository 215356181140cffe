import { z } from 'zod';
import type { Clue, Command, Rank } from '@hanabi/shared';
import { isColor, isRank } from '@hanabi/shared';
import { ClueSchema } from './persistence/schema.js';

const SlotSchema = z.number().int();
const TargetSchema = z.string().min(1);

/**
 * Structured commands arriving from a client
 */
export const CommandSchema: z.ZodType<Command> = z.discriminatedUnion('type', [
  z.object({ type: z.literal('join') }),
  z.object({ type: z.literal('leave') }),
  z.object({ type: z.literal('start'), count: z.number().int().optional() }),
  z.object({ type: z.literal('quit') }),
  z.object({ type: z.literal('play'), slot: SlotSchema }),
  z.object({ type: z.literal('discard'), slot: SlotSchema }),
  z.object({ type: z.literal('clue'), target: TargetSchema, clue: ClueSchema }),
  z.object({ type: z.literal('hands') }),
  z.object({ type: z.literal('discards') }),
  z.object({ type: z.literal('deckCount') }),
  z.object({ type: z.literal('ping') }),
  z.object({ type: z.literal('clues'), target: TargetSchema }),
  z.object({ type: z.literal('players') }),
]);

export type ParseResult =
  | { ok: true; command: Command }
  | { ok: false; error: string };

const RANK_WORDS = new Map<string, Rank>([
  ['one', 1],
  ['two', 2],
  ['three', 3],
  ['four', 4],
  ['five', 5],
]);

const HELP =
  'Commands: join, leave, start [players], quit, play <card>, discard <card>, ' +
  'clue <player> <color|number>, hands, discards, deck, ping, clues <player>, players';

function isMention(token: string): boolean {
  return token.startsWith('@') || (token.startsWith('<@') && token.endsWith('>'));
}

/**
 * "@bob" and "<@bob>" both name bob
 */
export function stripMention(token: string): string {
  if (token.startsWith('<@') && token.endsWith('>')) {
    return token.slice(2, -1);
  }
  return token.startsWith('@') ? token.slice(1) : token;
}

export function parseClue(specifier: string): Clue | null {
  const word = specifier.toLowerCase();
  if (isColor(word)) {
    return { type: 'color', color: word };
  }
  const rank = /^\d$/.test(word) ? Number(word) : RANK_WORDS.get(word);
  return rank !== undefined && isRank(rank) ? { type: 'rank', rank } : null;
}

function parseSlot(token: string | undefined): number | null {
  if (token === undefined || !/^\d+$/.test(token)) return null;
  return Number(token);
}

const fail = (error: string): ParseResult => ({ ok: false, error });

/**
 * Decode one chat message into a command. A message that starts with a
 * mention is a clue to that player.
 */
export function parseCommand(text: string): ParseResult {
  const tokens = text.trim().split(/\s+/).filter(Boolean);
  const first = tokens[0];
  if (first === undefined) {
    return fail(HELP);
  }

  const mentioned = isMention(first);
  const name = mentioned ? 'clue' : first.toLowerCase();
  const args = mentioned ? tokens : tokens.slice(1);

  const noArgs = (command: Command): ParseResult =>
    args.length === 0 ? { ok: true, command } : fail(`"${name}" takes no arguments.`);

  switch (name) {
    case 'join':
      return noArgs({ type: 'join' });
    case 'leave':
      return noArgs({ type: 'leave' });
    case 'quit':
      return noArgs({ type: 'quit' });
    case 'hands':
      return noArgs({ type: 'hands' });
    case 'discards':
      return noArgs({ type: 'discards' });
    case 'deck':
      return noArgs({ type: 'deckCount' });
    case 'ping':
      return noArgs({ type: 'ping' });
    case 'players':
      return noArgs({ type: 'players' });

    case 'start': {
      if (args.length === 0) return { ok: true, command: { type: 'start' } };
      const count = parseSlot(args[0]);
      if (count === null || args.length > 1) {
        return fail('To start, give the number of players you want (for example "start 3"), or nothing.');
      }
      return { ok: true, command: { type: 'start', count } };
    }

    case 'play':
    case 'discard': {
      const slot = parseSlot(args[0]);
      if (slot === null || args.length > 1) {
        return fail(`To ${name}, give the position of the card in your hand, counting from 1 on the left.`);
      }
      return { ok: true, command: name === 'play' ? { type: 'play', slot } : { type: 'discard', slot } };
    }

    case 'clue': {
      const [target, specifier, ...rest] = args;
      if (target === undefined || specifier === undefined || rest.length > 0) {
        return fail('To clue, give a player and a color or number (for example "clue @bob red"), and nothing else.');
      }
      const clue = parseClue(specifier);
      if (!clue) {
        return fail(`A card can't be ${specifier}.`);
      }
      return { ok: true, command: { type: 'clue', target: stripMention(target), clue } };
    }

    case 'clues': {
      const [target, ...rest] = args;
      if (target === undefined || rest.length > 0) {
        return fail('Say whose clues you want to see, for example "clues @bob".');
      }
      return { ok: true, command: { type: 'clues', target: stripMention(target) } };
    }

    default:
      return fail(`Unknown command "${name}". ${HELP}`);
  }
}
