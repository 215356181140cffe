import { v4 as uuidv4 } from 'uuid';
import {
  Clue,
  Command,
  CommandResult,
  EngineEvent,
  GameState,
  GameSummary,
  MoveResult,
  PlayerView,
  RandomSource,
  Reply,
  RuleOptions,
  DEFAULT_RULES,
  LobbyError,
  MAX_PLAYERS,
  MIN_PLAYERS,
  abandonGame,
  createGame,
  discardCard,
  fisherYates,
  getDiscardsByColor,
  getPlayerView,
  getPublicKnowledge,
  getScore,
  giveClue,
  isTerminal,
  playCard,
  startGame,
  toRejection,
} from '@hanabi/shared';
import { KeyedQueue } from './command-queue.js';
import { MemorySnapshotStore } from '../persistence/snapshot-store.js';
import type { SnapshotStore } from '../persistence/snapshot-store.js';
import { SNAPSHOT_VERSION } from '../persistence/schema.js';
import type { LobbySnapshot } from '../persistence/schema.js';

// Queue keys. Lock order is always game -> lobby, never the reverse.
const LOBBY = 'lobby';
const SNAPSHOT = 'snapshot';
const gameKey = (gameId: string) => `game:${gameId}`;

export interface SessionManagerOptions {
  store?: SnapshotStore;
  rules?: Partial<RuleOptions>;
  random?: RandomSource;
  now?: () => number;
}

interface Seat {
  game: GameState;
  seat: number;
}

interface QueryResult {
  events?: EngineEvent[];
  reply: Reply;
}

export class SessionManager {
  private waiting: string[] = [];
  private games: Map<string, GameState> = new Map();
  private playerGames: Map<string, string> = new Map(); // player -> gameId
  private queue = new KeyedQueue();

  private readonly store: SnapshotStore;
  private readonly rules: RuleOptions;
  private readonly random: RandomSource;
  private readonly now: () => number;

  constructor(options: SessionManagerOptions = {}) {
    this.store = options.store ?? new MemorySnapshotStore();
    this.rules = { ...DEFAULT_RULES, ...options.rules };
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
  }

  // ==========================================================================
  // Lobby
  // ==========================================================================

  join(player: string): Promise<CommandResult> {
    return this.guard(async () => {
      const events = await this.queue.run(LOBBY, (): EngineEvent[] => {
        if (this.playerGames.has(player)) {
          throw new LobbyError('alreadyInGame', "You're already in a game. Quit it before joining again.");
        }
        if (this.waiting.includes(player)) {
          return [];
        }

        this.waiting.push(player);
        const waiting = [...this.waiting];
        const joined: EngineEvent[] = [{ type: 'playerJoined', player, waiting }];
        if (waiting.length === MIN_PLAYERS) {
          joined.push({ type: 'lobbyReady', waiting });
        }
        return joined;
      });

      if (events.length > 0) {
        console.log(`[SessionManager] ${player} joined the lobby (${this.waiting.length} waiting)`);
        await this.persist();
      }
      return { ok: true, events };
    });
  }

  leave(player: string): Promise<CommandResult> {
    return this.guard(async () => {
      const events = await this.queue.run(LOBBY, (): EngineEvent[] => {
        const index = this.waiting.indexOf(player);
        if (index === -1) {
          return [];
        }
        this.waiting.splice(index, 1);
        return [{ type: 'playerLeft', player, waiting: [...this.waiting] }];
      });

      if (events.length > 0) {
        console.log(`[SessionManager] ${player} left the lobby`);
        await this.persist();
      }
      return { ok: true, events };
    });
  }

  /**
   * Form a game from the waiting list. The initiator always gets a seat; the
   * other seats go to the earliest joiners, and seats follow join order.
   */
  start(initiator: string, count?: number): Promise<CommandResult> {
    return this.guard(async () => {
      const { game, events } = await this.queue.run(LOBBY, () => {
        if (this.playerGames.has(initiator)) {
          throw new LobbyError('alreadyInGame', "You're already in a game.");
        }
        if (!this.waiting.includes(initiator)) {
          throw new LobbyError('notWaiting', 'Join the lobby before starting a game.');
        }
        if (this.waiting.length < MIN_PLAYERS) {
          throw new LobbyError(
            'notEnoughPlayers',
            "Unfortunately, there aren't enough players to start a game yet."
          );
        }

        const max = Math.min(MAX_PLAYERS, this.waiting.length);
        const size = count ?? max;
        if (!Number.isInteger(size) || size < MIN_PLAYERS || size > max) {
          throw new LobbyError(
            'invalidPlayerCount',
            `A game can have ${MIN_PLAYERS} to ${max} players right now, not ${size}.`
          );
        }

        const others = this.waiting.filter(p => p !== initiator).slice(0, size - 1);
        const players = this.waiting.filter(p => p === initiator || others.includes(p));

        const created = createGame(players, { id: uuidv4(), rules: this.rules, now: this.now() });
        const started = startGame(created, this.random);

        this.waiting = this.waiting.filter(p => !players.includes(p));
        this.games.set(started.game.id, started.game);
        for (const p of players) {
          this.playerGames.set(p, started.game.id);
        }

        return started;
      });

      console.log(`[SessionManager] Started game ${game.id} with ${game.players.length} players: ${game.players.join(', ')}`);
      await this.persist();

      return {
        ok: true,
        events,
        reply: { type: 'started', gameId: game.id, players: [...game.players] },
      };
    });
  }

  /**
   * Abandon the player's game and send everyone at the table back to the lobby
   */
  quit(player: string): Promise<CommandResult> {
    return this.runMove(player, (game) => abandonGame(game, player));
  }

  /**
   * The game a player is seated in, if any
   */
  resolve(player: string): GameState | undefined {
    const gameId = this.playerGames.get(player);
    return gameId ? this.games.get(gameId) : undefined;
  }

  // ==========================================================================
  // Moves
  // ==========================================================================

  play(player: string, slot: number): Promise<CommandResult> {
    return this.runMove(player, (game, seat) => playCard(game, seat, slot));
  }

  discard(player: string, slot: number): Promise<CommandResult> {
    return this.runMove(player, (game, seat) => discardCard(game, seat, slot));
  }

  clue(player: string, target: string, clue: Clue): Promise<CommandResult> {
    return this.runMove(player, (game, seat) => giveClue(game, seat, target, clue));
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  hands(player: string): Promise<CommandResult> {
    return this.runQuery(player, (game, seat) => ({
      reply: { type: 'hands', view: getPlayerView(game, seat) },
    }));
  }

  discards(player: string): Promise<CommandResult> {
    return this.runQuery(player, (game) => ({
      reply: { type: 'discards', discards: getDiscardsByColor(game) },
    }));
  }

  deckCount(player: string): Promise<CommandResult> {
    return this.runQuery(player, (game) => ({
      reply: { type: 'deckCount', deckCount: game.deck.length },
    }));
  }

  clues(player: string, target: string): Promise<CommandResult> {
    return this.runQuery(player, (game) => ({
      reply: { type: 'clues', target, knowledge: getPublicKnowledge(game, target) },
    }));
  }

  /**
   * Nudge whoever's turn it is. Pinging yourself only reports that it is your turn.
   */
  ping(player: string): Promise<CommandResult> {
    return this.runQuery(player, (game, seat) => {
      const view = getPlayerView(game, seat);
      if (view.isMyTurn) {
        return { reply: { type: 'ping', currentPlayer: player, isYourTurn: true } };
      }
      return {
        events: [{ type: 'pinged', from: player, target: view.currentPlayer, gameId: game.id }],
        reply: { type: 'ping', currentPlayer: view.currentPlayer, isYourTurn: false },
      };
    });
  }

  players(): Promise<CommandResult> {
    return this.guard(async () => {
      const reply = await this.queue.run(LOBBY, (): Reply => ({
        type: 'players',
        waiting: [...this.waiting],
        games: this.getGameSummaries(),
      }));
      return { ok: true, events: [], reply };
    });
  }

  /**
   * Run a decoded command on behalf of `player`
   */
  execute(player: string, command: Command): Promise<CommandResult> {
    switch (command.type) {
      case 'join':
        return this.join(player);
      case 'leave':
        return this.leave(player);
      case 'start':
        return this.start(player, command.count);
      case 'quit':
        return this.quit(player);
      case 'play':
        return this.play(player, command.slot);
      case 'discard':
        return this.discard(player, command.slot);
      case 'clue':
        return this.clue(player, command.target, command.clue);
      case 'hands':
        return this.hands(player);
      case 'discards':
        return this.discards(player);
      case 'deckCount':
        return this.deckCount(player);
      case 'ping':
        return this.ping(player);
      case 'clues':
        return this.clues(player, command.target);
      case 'players':
        return this.players();
      default: {
        const unknown: never = command;
        throw new Error(`Unhandled command: ${JSON.stringify(unknown)}`);
      }
    }
  }

  // ==========================================================================
  // State for the transport
  // ==========================================================================

  getPlayerView(player: string): PlayerView | null {
    const game = this.resolve(player);
    if (!game) {
      return null;
    }
    return getPlayerView(game, game.players.indexOf(player));
  }

  getWaiting(): string[] {
    return [...this.waiting];
  }

  getGameSummaries(): GameSummary[] {
    return [...this.games.values()].map(game => ({
      gameId: game.id,
      players: [...game.players],
      currentPlayer: game.players[game.currentSeat] ?? '',
      score: getScore(game),
    }));
  }

  getGameCount(): number {
    return this.games.size;
  }

  // ==========================================================================
  // Persistence
  // ==========================================================================

  snapshot(): LobbySnapshot {
    return {
      version: SNAPSHOT_VERSION,
      savedAt: new Date(this.now()).toISOString(),
      waiting: [...this.waiting],
      games: [...this.games.values()],
    };
  }

  /**
   * Replace the lobby with the stored snapshot, if there is one.
   * Returns whether anything was restored.
   */
  async restore(): Promise<boolean> {
    const snapshot = await this.store.load();
    if (!snapshot) {
      return false;
    }

    await this.queue.run(LOBBY, () => {
      this.waiting = [...snapshot.waiting];
      this.games = new Map();
      this.playerGames = new Map();

      for (const game of snapshot.games) {
        if (isTerminal(game)) {
          this.requeue(game);
          continue;
        }
        this.games.set(game.id, game);
        for (const player of game.players) {
          this.playerGames.set(player, game.id);
        }
      }
    });

    console.log(
      `[Snapshot] Restored ${this.games.size} games and ${this.waiting.length} waiting players`
    );
    return true;
  }

  private async persist(): Promise<void> {
    try {
      // Taken when the save runs, so saves never land out of order
      await this.queue.run(SNAPSHOT, () => this.store.save(this.snapshot()));
    } catch (error) {
      console.error('[Snapshot] Failed to save snapshot:', error);
    }
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  /**
   * Turn engine errors into rejections. Anything else is a bug and propagates.
   */
  private async guard(work: () => Promise<CommandResult>): Promise<CommandResult> {
    try {
      return await work();
    } catch (error) {
      const rejection = toRejection(error);
      if (!rejection) {
        throw error;
      }
      return { ok: false, rejection };
    }
  }

  private requireGameId(player: string): string {
    const gameId = this.playerGames.get(player);
    if (!gameId) {
      throw new LobbyError('notInGame', "You're not currently in any games.");
    }
    return gameId;
  }

  /**
   * Look the player up again once the game's queue is ours; the game may have
   * ended while the command waited.
   */
  private requireSeat(player: string, gameId: string): Seat {
    const game = this.games.get(gameId);
    if (!game || this.playerGames.get(player) !== gameId) {
      throw new LobbyError('notInGame', "You're not currently in any games.");
    }
    return { game, seat: game.players.indexOf(player) };
  }

  private runMove(player: string, move: (game: GameState, seat: number) => MoveResult): Promise<CommandResult> {
    return this.guard(async () => {
      const gameId = this.requireGameId(player);

      const events = await this.queue.run(gameKey(gameId), async (): Promise<EngineEvent[]> => {
        const { game, seat } = this.requireSeat(player, gameId);
        const result = move(game, seat);

        if (isTerminal(result.game)) {
          const lobbyEvents = await this.queue.run(LOBBY, () => this.finishGame(result.game));
          return [...result.events, ...lobbyEvents];
        }

        this.games.set(gameId, result.game);
        return result.events;
      });

      await this.persist();
      return { ok: true, events };
    });
  }

  private runQuery(player: string, read: (game: GameState, seat: number) => QueryResult): Promise<CommandResult> {
    return this.guard(async () => {
      const gameId = this.requireGameId(player);
      const { events, reply } = await this.queue.run(gameKey(gameId), () => {
        const { game, seat } = this.requireSeat(player, gameId);
        return read(game, seat);
      });
      return { ok: true, events: events ?? [], reply };
    });
  }

  /**
   * Drop a finished game and return its players to the lobby. Caller holds the lobby queue.
   */
  private finishGame(game: GameState): EngineEvent[] {
    this.games.delete(game.id);
    this.requeue(game);

    console.log(
      `[SessionManager] Game ${game.id} ended (${game.endReason ?? game.status}) with a score of ${getScore(game)}/25`
    );

    if (this.waiting.length >= MIN_PLAYERS) {
      return [{ type: 'lobbyReady', waiting: [...this.waiting] }];
    }
    return [];
  }

  private requeue(game: GameState): void {
    for (const player of fisherYates(game.players, this.random)) {
      if (this.playerGames.get(player) === game.id) {
        this.playerGames.delete(player);
      }
      if (!this.playerGames.has(player) && !this.waiting.includes(player)) {
        this.waiting.push(player);
      }
    }
  }
}
