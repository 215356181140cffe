import type { Server, Socket } from 'socket.io';
import { z } from 'zod';
import type { Command, CommandResult, EngineEvent, PlayerView, Reply } from '@hanabi/shared';
import type { SessionManager } from './game/session-manager.js';
import { CommandSchema, parseCommand } from './commands.js';

export interface AckResponse {
  success: boolean;
  error?: string;
  reason?: string;
  reply?: Reply;
  view?: PlayerView | null;
}

type Ack = (response: AckResponse) => void;

// The ack is whatever the client sent last, if anything
export interface ClientToServerEvents {
  'hanabi:identify': (data: unknown, callback?: unknown) => void;
  'hanabi:command': (command: unknown, callback?: unknown) => void;
  'hanabi:message': (text: unknown, callback?: unknown) => void;
}

export interface ServerToClientEvents {
  'hanabi:event': (event: EngineEvent) => void;
  'hanabi:state': (view: PlayerView) => void;
}

export type HanabiServer = Server<ClientToServerEvents, ServerToClientEvents>;
type HanabiSocket = Socket<ClientToServerEvents, ServerToClientEvents>;

/**
 * What the handlers need from one client connection
 */
export interface Connection {
  id: string;
  join(room: string): void;
  leave(room: string): void;
}

/**
 * Delivers to every socket in a room
 */
export interface Outbox {
  event(room: string, event: EngineEvent): void;
  state(room: string, view: PlayerView): void;
}

export interface ConnectionHandlers {
  identify(data: unknown, callback?: unknown): void;
  command(data: unknown, callback?: unknown): Promise<void>;
  message(text: unknown, callback?: unknown): Promise<void>;
  disconnect(): void;
}

const IdentifySchema = z.object({ player: z.string().trim().min(1).max(64) });

// Every socket of a player joins that player's room
export function playerRoom(player: string): string {
  return `player:${player}`;
}

/**
 * Players who should hear about an event. Lobby events go to everyone waiting;
 * game events go to the table.
 */
export function recipientsFor(event: EngineEvent, table: readonly string[]): string[] {
  switch (event.type) {
    case 'playerJoined':
    case 'playerLeft':
      return unique([...event.waiting, event.player]);
    case 'lobbyReady':
      return unique(event.waiting);
    case 'pinged':
      return unique([event.target, event.from]);
    case 'gameFormed':
    case 'gameEnded':
      return unique(event.players);
    default:
      return unique(table);
  }
}

function unique(players: readonly string[]): string[] {
  return [...new Set(players)];
}

function toAck(callback: unknown): Ack {
  if (typeof callback !== 'function') {
    return () => {};
  }
  return (response) => {
    callback(response);
  };
}

/**
 * Transport-independent command handling. `setupSocketHandlers` binds it to
 * socket.io; each connection gets its own set of handlers.
 */
export function createCommandRouter(manager: SessionManager, outbox: Outbox) {
  const socketToPlayer: Map<string, string> = new Map(); // socketId -> player

  async function runCommand(player: string | undefined, command: Command, ack: Ack): Promise<void> {
    if (!player) {
      ack({ success: false, error: 'Identify yourself before sending commands' });
      return;
    }

    let response: AckResponse;
    try {
      const tableBefore = manager.resolve(player)?.players ?? [];
      const result = await manager.execute(player, command);
      deliver(result, unique([...tableBefore, ...(manager.resolve(player)?.players ?? [])]));

      response = result.ok
        ? { success: true, reply: result.reply }
        : { success: false, error: result.rejection.message, reason: result.rejection.reason };
    } catch (error) {
      console.error(`[Socket] Command ${command.type} from ${player} failed:`, error);
      response = { success: false, error: 'Internal error' };
    }
    ack(response);
  }

  /**
   * Send accepted events to the players they concern, then push a fresh view to
   * everyone still seated at the table.
   */
  function deliver(result: CommandResult, table: string[]): void {
    if (!result.ok) return;

    for (const event of result.events) {
      for (const recipient of recipientsFor(event, table)) {
        outbox.event(playerRoom(recipient), event);
      }
    }

    const changedGame = result.events.some(e => 'gameId' in e && e.type !== 'pinged');
    if (!changedGame) return;

    for (const player of table) {
      const view = manager.getPlayerView(player);
      if (view) {
        outbox.state(playerRoom(player), view);
      }
    }
  }

  function connect(connection: Connection): ConnectionHandlers {
    return {
      identify(data, callback) {
        const ack = toAck(callback);
        const parsed = IdentifySchema.safeParse(data);
        if (!parsed.success) {
          ack({ success: false, error: 'A player name is required' });
          return;
        }

        const { player } = parsed.data;
        const previous = socketToPlayer.get(connection.id);
        if (previous && previous !== player) {
          connection.leave(playerRoom(previous));
        }

        socketToPlayer.set(connection.id, player);
        connection.join(playerRoom(player));
        console.log(`[Socket] ${connection.id} identified as ${player}`);
        ack({ success: true, view: manager.getPlayerView(player) });
      },

      async command(data, callback) {
        const ack = toAck(callback);
        const parsed = CommandSchema.safeParse(data);
        if (!parsed.success) {
          ack({ success: false, error: 'Malformed command' });
          return;
        }
        await runCommand(socketToPlayer.get(connection.id), parsed.data, ack);
      },

      async message(text, callback) {
        const ack = toAck(callback);
        if (typeof text !== 'string') {
          ack({ success: false, error: 'Messages must be text' });
          return;
        }
        const parsed = parseCommand(text);
        if (!parsed.ok) {
          ack({ success: false, error: parsed.error });
          return;
        }
        await runCommand(socketToPlayer.get(connection.id), parsed.command, ack);
      },

      disconnect() {
        // Seats and the waiting list belong to the player, not the socket
        socketToPlayer.delete(connection.id);
      },
    };
  }

  return { connect };
}

export function setupSocketHandlers(io: HanabiServer, manager: SessionManager): void {
  const router = createCommandRouter(manager, {
    event: (room, event) => {
      io.to(room).emit('hanabi:event', event);
    },
    state: (room, view) => {
      io.to(room).emit('hanabi:state', view);
    },
  });

  io.on('connection', (socket: HanabiSocket) => {
    console.log(`[Socket] Client connected: ${socket.id}`);

    const handlers = router.connect({
      id: socket.id,
      join: (room) => {
        void socket.join(room);
      },
      leave: (room) => {
        void socket.leave(room);
      },
    });

    socket.on('hanabi:identify', (data, callback) => {
      handlers.identify(data, callback);
    });

    socket.on('hanabi:command', (data, callback) => {
      void handlers.command(data, callback);
    });

    socket.on('hanabi:message', (text, callback) => {
      void handlers.message(text, callback);
    });

    socket.on('disconnect', () => {
      handlers.disconnect();
      console.log(`[Socket] Client disconnected: ${socket.id}`);
    });
  });
}
