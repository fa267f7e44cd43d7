import { WebSocket } from 'ws';
import type { AgentStateView, OutboundChannel } from '../../world/index.ts';
import { spectators } from './state';
import { encodeAgentView } from './protocol';
import type { ServerMessage } from './types';

/** The parts of a ws socket the server writes through */
export interface SocketLike {
  readonly readyState: number;
  readonly bufferedAmount: number;
  send(data: string, cb?: (error?: Error) => void): void;
}

/** A socket the server can also drop outright */
export interface ClosableSocket extends SocketLike {
  terminate(): void;
}

export class ChannelClosedError extends Error {
  constructor(message = 'Socket is not open') {
    super(message);
    this.name = 'ChannelClosedError';
  }
}

export class BackpressureError extends Error {
  constructor(buffered: number, limit: number) {
    super(`Socket has ${buffered} bytes queued (limit ${limit})`);
    this.name = 'BackpressureError';
  }
}

export function send(ws: SocketLike, message: ServerMessage) {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}

/** Send to every spectator; a closed one is skipped */
export function broadcastToSpectators(message: ServerMessage) {
  if (spectators.size === 0) return;
  const data = JSON.stringify(message);
  for (const ws of spectators) {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(data);
    }
  }
}

/**
 * Per-agent outbound channel over a ws socket.
 * Bounded by the socket's send buffer: a client that stops reading is
 * reported as a failed delivery instead of growing memory without limit,
 * and the registry then closes the socket.
 */
export class WebSocketChannel implements OutboundChannel {
  private readonly ws: ClosableSocket;
  private readonly maxBufferedBytes: number;

  constructor(ws: ClosableSocket, maxBufferedBytes: number) {
    this.ws = ws;
    this.maxBufferedBytes = maxBufferedBytes;
  }

  send(view: AgentStateView): Promise<void> {
    if (this.ws.readyState !== WebSocket.OPEN) {
      throw new ChannelClosedError();
    }
    if (this.ws.bufferedAmount > this.maxBufferedBytes) {
      throw new BackpressureError(this.ws.bufferedAmount, this.maxBufferedBytes);
    }

    const writes = encodeAgentView(view).map(
      (frame) =>
        new Promise<void>((resolve, reject) => {
          this.ws.send(JSON.stringify(frame), (error?: Error) => {
            if (error) reject(error);
            else resolve();
          });
        })
    );
    return Promise.all(writes).then(() => undefined);
  }

  close(): void {
    this.ws.terminate();
  }
}
