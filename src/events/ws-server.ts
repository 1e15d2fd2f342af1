/**
 * Totem Boost — WebSocket Broadcast Server
 *
 * Attaches a WebSocket server to the existing HTTP server.
 * Subscribes to engine events via the BoostEmitter and broadcasts them
 * as JSON messages to all connected clients.
 */

import { WebSocketServer, WebSocket } from 'ws';
import type { Server as HttpServer } from 'node:http';
import { boostEmitter as defaultEmitter } from './emitter.js';
import type { BoostEmitter } from './emitter.js';
import { BOOST_EVENT_TYPES } from './types.js';
import type { WSEvent } from './types.js';

let wss: WebSocketServer | null = null;
let clientCount = 0;
const alive = new WeakMap<WebSocket, boolean>();

/**
 * Initialize the WebSocket server on an existing HTTP server.
 * Call this once after creating the HTTP server.
 */
export function initWebSocketServer(
  server: HttpServer,
  emitter: BoostEmitter = defaultEmitter,
): WebSocketServer {
  wss = new WebSocketServer({ server, path: '/ws' });

  wss.on('connection', (ws) => {
    clientCount++;
    console.log(`[WS] Client connected (${clientCount} total)`);

    const initEvent: WSEvent = {
      type: 'connection:init',
      payload: {
        serverTime: Date.now(),
        connectedClients: clientCount,
      },
    };
    ws.send(JSON.stringify(initEvent));

    alive.set(ws, true);
    ws.on('pong', () => {
      alive.set(ws, true);
    });

    ws.on('close', () => {
      clientCount--;
      console.log(`[WS] Client disconnected (${clientCount} remaining)`);
    });

    ws.on('error', (err) => {
      console.error('[WS] Client error:', err.message);
    });
  });

  // Keepalive ping every 30s
  const pingInterval = setInterval(() => {
    if (!wss) return;
    wss.clients.forEach((ws) => {
      if (alive.get(ws) === false) {
        ws.terminate();
        return;
      }
      alive.set(ws, false);
      ws.ping();
    });
  }, 30_000);

  wss.on('close', () => {
    clearInterval(pingInterval);
  });

  for (const eventType of BOOST_EVENT_TYPES) {
    emitter.on(eventType, (event: WSEvent) => {
      broadcast(event);
    });
  }

  console.log('[WS] WebSocket server initialized on /ws');
  return wss;
}

function broadcast(event: WSEvent): void {
  if (!wss) return;
  const data = JSON.stringify(event);
  wss.clients.forEach((client) => {
    if (client.readyState === WebSocket.OPEN) {
      client.send(data);
    }
  });
}

/**
 * Close the WebSocket server gracefully.
 */
export function closeWebSocketServer(): Promise<void> {
  return new Promise((resolve) => {
    if (!wss) {
      resolve();
      return;
    }
    wss.close(() => {
      wss = null;
      clientCount = 0;
      resolve();
    });
  });
}
