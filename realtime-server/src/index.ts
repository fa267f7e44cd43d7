import { WebSocketServer } from 'ws';
import { loadConfig } from './config';
import { archiveAgents, createAgentArchive, toAgentRecord } from './db';
import { createGame } from './game';
import {
  handlePlayerConnection,
  handleSpectatorConnection,
  type ServerContext,
} from './handlers';
import { broadcastToSpectators } from './network';
import { toWorldSnapshotMessage } from './protocol';
import { spectators } from './state';

// ============================================================================
// REALTIME SERVER - Play and watch endpoints around one tick engine
// ============================================================================

function closeServer(wss: WebSocketServer): Promise<void> {
  return new Promise((resolve) => {
    for (const client of wss.clients) {
      client.terminate();
    }
    wss.close(() => resolve());
  });
}

async function main(): Promise<void> {
  const config = loadConfig();
  const archive = createAgentArchive(config.supabase);

  let shuttingDown = false;

  const game = createGame(config.world, {
    onSnapshot: (snapshot) => broadcastToSpectators(toWorldSnapshotMessage(snapshot)),
    onEvicted: (agent, tick) => {
      archive.save(toAgentRecord(agent, tick)).catch((error: unknown) => {
        const reason = error instanceof Error ? error.message : String(error);
        console.error(`[Archive] ${agent.entityId}: ${reason}`);
      });
    },
    onFatal: () => {
      void shutdown(1);
    },
  });

  const ctx: ServerContext = {
    engine: game.engine,
    queue: game.queue,
    sessions: game.sessions,
    maxBufferedBytes: config.maxBufferedBytes,
  };

  // ==========================================================================
  // PLAY WEBSOCKET SERVER
  // ==========================================================================

  const playWss = new WebSocketServer({ port: config.playPort });
  console.log(`[Server] Play server running on ws://localhost:${config.playPort}`);

  playWss.on('connection', (ws) => {
    handlePlayerConnection(ws, ctx);
  });
  playWss.on('error', (error: Error) => {
    console.error(`[Server] Play server error: ${error.message}`);
  });

  // ==========================================================================
  // WATCH WEBSOCKET SERVER
  // ==========================================================================

  const watchWss = new WebSocketServer({ port: config.watchPort });
  console.log(`[Server] Watch server running on ws://localhost:${config.watchPort}`);

  watchWss.on('connection', (ws) => {
    handleSpectatorConnection(ws, ctx, game.world.getSnapshot());
  });
  watchWss.on('error', (error: Error) => {
    console.error(`[Server] Watch server error: ${error.message}`);
  });

  // ==========================================================================
  // SHUTDOWN
  // ==========================================================================

  async function shutdown(code: number): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log('[Server] Shutting down...');

    game.engine.stop();
    const agents = game.world.getAgents();
    const saved = await archiveAgents(archive, agents, game.world.tick);
    console.log(`[Server] Archived ${saved}/${agents.length} agents (${archive.kind})`);

    await Promise.all([closeServer(playWss), closeServer(watchWss)]);
    spectators.clear();
    process.exit(code);
  }

  process.on('SIGINT', () => void shutdown(0));
  process.on('SIGTERM', () => void shutdown(0));

  game.engine.start();
}

main().catch((error: unknown) => {
  console.error('[Server] Failed to start:', error instanceof Error ? error.message : error);
  process.exit(1);
});
