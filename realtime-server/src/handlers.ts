import type { RawData } from 'ws';
import type {
  ActionQueue,
  SessionRegistry,
  TickEngine,
  WorldSnapshot,
} from '../../world/index.ts';
import { ClientMessageSchema } from './types';
import { send, WebSocketChannel, type ClosableSocket, type SocketLike } from './network';
import { toStatusMessage, toWorldSnapshotMessage } from './protocol';
import { spectators, takeConnectionNumber, takeWatcherNumber } from './state';

/** What a connection handler may touch: never the world itself */
export interface ServerContext {
  readonly engine: TickEngine;
  readonly queue: ActionQueue;
  readonly sessions: SessionRegistry;
  readonly maxBufferedBytes: number;
}

function rawToString(data: RawData | string): string {
  if (typeof data === 'string') return data;
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  return Buffer.from(data).toString('utf8');
}

/** A client socket as the handlers use it; ws's WebSocket satisfies it */
export interface ClientSocket extends ClosableSocket {
  on(event: 'message', listener: (data: RawData) => void): unknown;
  on(event: 'close', listener: () => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
}

/**
 * Decode one client message and queue it for the next tick.
 * Returns true if an intent was queued.
 */
export function handleMessage(
  ctx: ServerContext,
  ws: SocketLike,
  agentId: string,
  data: RawData | string
): boolean {
  let json: unknown;
  try {
    json = JSON.parse(rawToString(data));
  } catch {
    send(ws, { type: 'error', message: 'Invalid JSON format' });
    return false;
  }

  const parsed = ClientMessageSchema.safeParse(json);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'message'}: ${issue.message}`)
      .join('; ');
    send(ws, { type: 'error', message: `Invalid message: ${detail}` });
    return false;
  }

  ctx.queue.submit(agentId, parsed.data.action, parsed.data.params);
  return true;
}

/** The agent lingers in the world until the registry evicts it */
export function handleClose(ctx: ServerContext, agentId: string): void {
  if (ctx.sessions.unregister(agentId)) {
    console.log(`[Server] Client disconnected: ${agentId.slice(0, 8)}`);
  }
}

/**
 * Admit an agent for a new play connection and wire its socket.
 * Returns the agent id sent to the client.
 */
export function handlePlayerConnection(ws: ClientSocket, ctx: ServerContext): string {
  const displayName = `RemoteAgent_${takeConnectionNumber()}`;
  const agentId = ctx.engine.admit(displayName);
  ctx.sessions.register(agentId, new WebSocketChannel(ws, ctx.maxBufferedBytes));

  ws.on('message', (data: RawData) => {
    // A channel that failed delivery is being torn down
    if (!ctx.sessions.isConnected(agentId)) return;
    handleMessage(ctx, ws, agentId, data);
  });
  ws.on('close', () => handleClose(ctx, agentId));
  ws.on('error', (error: Error) => {
    console.warn(`[Server] Socket error for ${agentId.slice(0, 8)}: ${error.message}`);
  });

  send(ws, {
    type: 'connection_established',
    agent_id: agentId,
    message: `Connected as ${displayName}`,
  });
  console.log(`[Server] Client connected: ${displayName} (${agentId.slice(0, 8)})`);
  return agentId;
}

/**
 * Wire a watch-only connection: status and the current world first, then a
 * world_snapshot every tick through the spectator set.
 */
export function handleSpectatorConnection(
  ws: ClientSocket,
  ctx: ServerContext,
  snapshot: WorldSnapshot
): string {
  const watcherId = `watcher-${takeWatcherNumber()}`;
  spectators.add(ws);
  console.log(`[Server] Spectator connected: ${watcherId}`);

  send(ws, toStatusMessage(snapshot, ctx.sessions.connectedCount));
  send(ws, toWorldSnapshotMessage(snapshot));

  ws.on('close', () => {
    if (spectators.delete(ws)) {
      console.log(`[Server] Spectator disconnected: ${watcherId}`);
    }
  });
  ws.on('error', (error: Error) => {
    console.warn(`[Server] Spectator ${watcherId} error: ${error.message}`);
    spectators.delete(ws);
    ws.terminate();
  });
  return watcherId;
}
