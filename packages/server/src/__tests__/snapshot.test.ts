import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { addToStack, createGame, createRandom, startGame } from '@hanabi/shared';
import type { GameState } from '@hanabi/shared';
import { parseSnapshot, SNAPSHOT_VERSION } from '../persistence/schema.js';
import type { LobbySnapshot } from '../persistence/schema.js';
import { MemorySnapshotStore } from '../persistence/snapshot-store.js';

function runningGame(): GameState {
  return startGame(createGame(['ann', 'ben'], { id: 'g1', now: 0 }), createRandom(4)).game;
}

function snapshotOf(games: GameState[], waiting: string[] = []): LobbySnapshot {
  return { version: SNAPSHOT_VERSION, savedAt: '1970-01-01T00:00:00.000Z', waiting, games };
}

describe('Snapshot schema', () => {
  it('accepts a snapshot of a running game', () => {
    const snapshot = snapshotOf([runningGame()], ['cat']);
    expect(parseSnapshot(JSON.parse(JSON.stringify(snapshot)))).toEqual(snapshot);
  });

  it('rejects a game that lost a card', () => {
    const game = runningGame();
    const broken = { ...game, deck: game.deck.slice(1) };
    expect(() => parseSnapshot(snapshotOf([broken]))).toThrow('A game must account for all 50 cards');
  });

  it('rejects stacks that skip a rank', () => {
    const game = runningGame();
    const high = game.deck.find((c) => c.rank > 1);
    if (!high) throw new Error('deck holds only 1s');
    const broken = {
      ...game,
      deck: game.deck.filter((c) => c !== high),
      stacks: addToStack(game.stacks, high),
    };
    expect(() => parseSnapshot(snapshotOf([broken]))).toThrow('Stacks must run 1..k in their own color');
  });

  it('rejects a player who is both waiting and seated', () => {
    expect(() => parseSnapshot(snapshotOf([runningGame()], ['ann']))).toThrow(
      'A player may wait or sit in at most one game'
    );
  });

  it('rejects out-of-range tokens and unknown versions', () => {
    expect(() => parseSnapshot(snapshotOf([{ ...runningGame(), clueTokens: 9 }]))).toThrow(ZodError);
    expect(() => parseSnapshot({ ...snapshotOf([]), version: 2 })).toThrow(ZodError);
    expect(() => parseSnapshot('not a snapshot')).toThrow(ZodError);
  });
});

describe('MemorySnapshotStore', () => {
  it('starts empty', async () => {
    expect(await new MemorySnapshotStore().load()).toBeNull();
  });

  it('returns copies of what was saved', async () => {
    const store = new MemorySnapshotStore();
    const snapshot = snapshotOf([runningGame()]);
    await store.save(snapshot);

    const loaded = await store.load();
    expect(loaded).toEqual(snapshot);
    expect(loaded).not.toBe(snapshot);
  });
});
