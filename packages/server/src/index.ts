import express from 'express';
import { createServer } from 'http';
import { Server } from 'socket.io';
import cors from 'cors';
import { createRandom, stringToSeed } from '@hanabi/shared';
import { loadConfig } from './config.js';
import { setupSocketHandlers } from './socket-handlers.js';
import type { ClientToServerEvents, ServerToClientEvents } from './socket-handlers.js';
import { SessionManager } from './game/session-manager.js';
import { createSupabase } from './services/supabase.js';
import { MemorySnapshotStore, SupabaseSnapshotStore } from './persistence/snapshot-store.js';

async function main(): Promise<void> {
  const config = loadConfig();
  console.log('CORS_ORIGINS:', config.corsOrigins);

  const supabase = createSupabase(config);
  const store = supabase ? new SupabaseSnapshotStore(supabase) : new MemorySnapshotStore();

  const manager = new SessionManager({
    store,
    rules: config.rules,
    random: config.seed ? createRandom(stringToSeed(config.seed)) : Math.random,
  });
  await manager.restore();

  const app = express();
  app.use(cors({
    origin: config.corsOrigins,
    methods: ['GET', 'POST'],
    credentials: true,
  }));
  app.use(express.json());

  const httpServer = createServer(app);
  const io = new Server<ClientToServerEvents, ServerToClientEvents>(httpServer, {
    cors: {
      origin: config.corsOrigins,
      methods: ['GET', 'POST'],
      credentials: true,
    },
  });

  // REST endpoints
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', games: manager.getGameCount(), waiting: manager.getWaiting().length });
  });

  app.get('/api/games', (_req, res) => {
    res.json(manager.getGameSummaries());
  });

  setupSocketHandlers(io, manager);

  httpServer.listen(config.port, () => {
    console.log(`🎆 Hanabi server running on port ${config.port}`);
  });
}

main().catch((error: unknown) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
