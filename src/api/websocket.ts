/**
 * WebSocket live event feed.
 * Broadcasts every committed ledger event (vote.cast, revenue.notified,
 * auction.purchased, etc.) to all connected WebSocket clients.
 */

import type { FastifyInstance } from 'fastify';
import { eventBus, EventType } from '../infra/eventBus.js';
import { isoNow } from '../utils/time.js';

interface WSLike {
  readyState: number;
  send(data: string): void;
  on(event: string, cb: () => void): void;
}

export interface LiveFeed {
  /** Number of currently connected WebSocket clients. */
  connectedClients(): number;
}

const OPEN = 1;

export const feedMessage = (type: string, data: unknown): string => JSON.stringify({ type, data, ts: isoNow() });

/**
 * Register the WebSocket endpoint and subscribe to the event bus.
 * Must be called AFTER @fastify/websocket is registered on the Fastify instance.
 */
export async function registerWebSocket(app: FastifyInstance): Promise<LiveFeed> {
  const clients = new Set<WSLike>();

  const unsubscribe = eventBus.on('*', (event: EventType, data: unknown) => {
    const message = feedMessage(event, data);
    for (const ws of clients) {
      if (ws.readyState === OPEN) {
        ws.send(message);
      }
    }
  });

  app.addHook('onClose', async () => {
    unsubscribe();
    clients.clear();
  });

  app.get('/ws', { websocket: true }, (socket: WSLike) => {
    clients.add(socket);

    socket.send(feedMessage('connected', { clients: clients.size }));

    socket.on('close', () => {
      clients.delete(socket);
    });

    socket.on('error', () => {
      clients.delete(socket);
    });
  });

  return {
    connectedClients: () => clients.size,
  };
}
