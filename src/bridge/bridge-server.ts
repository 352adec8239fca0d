/**
 * WebSocket Bridge Server — drive the game from another process.
 *
 * Accepts JSON messages over WebSocket: reset, step, close.
 * Each connection gets its own HeadlessDriver instance.
 * Binds to localhost only (no LAN exposure).
 */

import { WebSocketServer, WebSocket, type RawData } from 'ws';
import { HeadlessDriver, parseUpgrades } from './headless-driver';
import { formatDistance, formatRunTime } from '../utils/format';

export const DEFAULT_BRIDGE_PORT = 9877;

type Message = Record<string, unknown>;

function parseMessage(data: RawData): Message {
  const parsed: unknown = JSON.parse(data.toString());
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error('message must be a JSON object');
  }
  return Object.fromEntries(Object.entries(parsed));
}

/**
 * Handle one message for one connection. Returns the reply and the driver
 * the connection should keep.
 */
export function dispatch(
  msg: Message,
  driver: HeadlessDriver | null,
): { response: object; driver: HeadlessDriver | null } {
  switch (msg.type) {
    case 'reset': {
      const levelId = typeof msg.levelId === 'string' ? msg.levelId : 'mountain-valley';
      const next = new HeadlessDriver(levelId, parseUpgrades(msg.upgrades));
      const result = next.reset();
      return { response: { type: 'reset_result', hud: result.hud, info: result.info }, driver: next };
    }
    case 'step': {
      if (!driver) {
        return { response: { type: 'error', message: 'Call reset before step' }, driver };
      }
      const result = driver.step(msg.action);
      if (result.done) {
        const { tick } = result.info;
        const time = typeof tick === 'number' ? formatRunTime(tick) : '--:--.---';
        console.log(`[bridge] run ended: ${result.phase} after ${formatDistance(result.hud.distance)} in ${time}`);
      }
      return {
        response: {
          type: 'step_result',
          hud: result.hud,
          events: result.events,
          done: result.done,
          phase: result.phase,
          info: result.info,
        },
        driver,
      };
    }
    case 'close':
      return { response: { type: 'close_result' }, driver: null };
    default:
      return { response: { type: 'error', message: `Unknown message type: ${String(msg.type)}` }, driver };
  }
}

export function startBridgeServer(port = DEFAULT_BRIDGE_PORT) {
  const wss = new WebSocketServer({
    port,
    host: '127.0.0.1',
    perMessageDeflate: false,
    maxPayload: 65_536,
    clientTracking: true,
  });

  wss.on('connection', (ws, req) => {
    req.socket.setNoDelay(true);

    let driver: HeadlessDriver | null = null;

    ws.on('message', (data: RawData) => {
      let response: object;
      try {
        const result = dispatch(parseMessage(data), driver);
        driver = result.driver;
        response = result.response;
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.error('[bridge] error:', message);
        response = { type: 'error', message };
      }
      ws.send(JSON.stringify(response));
    });

    ws.on('close', () => { driver = null; });
    ws.on('error', (err) => {
      console.error('[bridge] connection error:', err.message);
      driver = null;
    });
  });

  function shutdown() {
    console.log('[bridge] shutting down...');
    wss.clients.forEach((client) => {
      if (client.readyState === WebSocket.OPEN) {
        client.close(1001, 'Server shutting down');
      }
    });
    wss.close(() => {
      console.log('[bridge] closed');
      process.exit(0);
    });
    setTimeout(() => process.exit(1), 5000).unref();
  }

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  wss.on('listening', () => {
    console.log(`[bridge] listening on ws://127.0.0.1:${port}`);
  });

  return { wss, shutdown };
}
