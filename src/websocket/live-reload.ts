/**
 * Live reload — a WebSocket endpoint that tells open deck tabs to refresh
 * after each successful rebuild.
 */

import type { Server } from 'http';
import { WebSocketServer, type WebSocket } from 'ws';
import { LIVE_RELOAD_PATH } from '../config.js';
import { errorMessage } from '../errors.js';

export interface ReloadMessage {
  type: 'reload';
}

/** The part of a `ws` socket the broadcaster relies on. */
export interface ReloadClient {
  readonly readyState: number;
  readonly OPEN: number;
  send(data: string): void;
}

/**
 * ReloadBroadcaster — tracks connected tabs and fans reload messages out
 * to the ones still open.
 */
export class ReloadBroadcaster {
  private clients: Set<ReloadClient> = new Set();

  subscribe(client: ReloadClient): void {
    this.clients.add(client);
  }

  unsubscribe(client: ReloadClient): void {
    this.clients.delete(client);
  }

  /**
   * Send a reload message to every open client.
   * Returns the number of clients that received it.
   */
  broadcast(): number {
    const message: ReloadMessage = { type: 'reload' };
    const data = JSON.stringify(message);
    let count = 0;
    for (const client of this.clients) {
      if (client.readyState !== client.OPEN) continue;
      try {
        client.send(data);
        count++;
      } catch (err) {
        console.error(`[live-reload] Failed to notify client: ${errorMessage(err)}`);
      }
    }
    return count;
  }

  getStats(): { clientCount: number } {
    return { clientCount: this.clients.size };
  }

  clear(): void {
    this.clients.clear();
  }
}

export interface LiveReloadServer {
  /** Returns the number of tabs notified. */
  notifyReload(): number;
  close(): Promise<void>;
}

export function createLiveReloadServer(httpServer: Server): LiveReloadServer {
  const wss = new WebSocketServer({ server: httpServer, path: LIVE_RELOAD_PATH });
  const broadcaster = new ReloadBroadcaster();

  wss.on('connection', (ws: WebSocket) => {
    broadcaster.subscribe(ws);
    ws.on('close', () => broadcaster.unsubscribe(ws));
    ws.on('error', (err) => {
      console.warn(`[live-reload] Client error: ${err.message}`);
    });
  });

  wss.on('error', (err) => {
    console.error(`[live-reload] Server error: ${err.message}`);
  });

  return {
    notifyReload() {
      const count = broadcaster.broadcast();
      if (count > 0) console.log(`[live-reload] Reloaded ${count} tab(s)`);
      return count;
    },
    close() {
      for (const client of wss.clients) {
        client.terminate();
      }
      broadcaster.clear();
      return new Promise<void>((resolve, reject) => {
        wss.close((err) => (err ? reject(err) : resolve()));
      });
    },
  };
}
