import 'dotenv/config';
import WebSocket from 'ws';

// ============================================================================
// TEST CLIENT - Connects to the play port and walks through a short script
// ============================================================================

const PLAY_URL = process.env.PLAY_URL || `ws://localhost:${process.env.PLAY_PORT || 8765}`;
const STEP_DELAY_MS = 500;

const COMMANDS: ReadonlyArray<{ action: string; params: Record<string, number> }> = [
  { action: 'move', params: { dx: 1, dy: 0 } },
  { action: 'move', params: { dx: 0, dy: 1 } },
  { action: 'harvest', params: {} },
  { action: 'move', params: { dx: -1, dy: 0 } },
  { action: 'craft', params: {} },
];

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

const ws = new WebSocket(PLAY_URL);
let lastTick = -1;

async function runScript(): Promise<void> {
  for (const command of COMMANDS) {
    await delay(STEP_DELAY_MS);
    console.log(`[Client] -> ${command.action} ${JSON.stringify(command.params)}`);
    ws.send(JSON.stringify(command));
  }
  await delay(STEP_DELAY_MS);
  ws.close();
}

ws.on('open', () => {
  console.log(`[Client] Connected to ${PLAY_URL}`);
  runScript().catch((error: unknown) => {
    console.error('[Client] Script failed:', error);
    ws.close();
  });
});

ws.on('message', (data) => {
  const msg: unknown = JSON.parse(data.toString());
  if (typeof msg !== 'object' || msg === null || !('type' in msg)) return;

  switch (msg.type) {
    case 'game_state':
      // One line per second is enough to follow along
      if ('tick' in msg && typeof msg.tick === 'number' && msg.tick - lastTick >= 10) {
        lastTick = msg.tick;
        console.log(`[Client] <- ${JSON.stringify(msg)}`);
      }
      break;
    default:
      console.log(`[Client] <- ${JSON.stringify(msg)}`);
  }
});

ws.on('close', () => {
  console.log('[Client] Disconnected');
});

ws.on('error', (error) => {
  console.error(`[Client] ${error.message}`);
  process.exitCode = 1;
});
