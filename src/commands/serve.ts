/**
 * `slidemark serve` — initial build, static server, file watcher and live
 * reload, running until interrupted.
 *
 * The HTTP/WebSocket side and the watch → debounce → rebuild loop share
 * nothing but the output file and the reload notification.
 */

import { stat } from 'fs/promises';
import { resolve } from 'path';
import { buildDeck, defaultOutputPath } from '../build/index.js';
import { DEBOUNCE_MS } from '../config.js';
import { DeckNotFoundError, errorMessage } from '../errors.js';
import { createHttpServer } from '../http/server.js';
import { shutdown, startListening } from '../lifecycle.js';
import { DeckWatcher, type WatchFactory } from '../watch/deck-watcher.js';
import { RebuildScheduler } from '../watch/scheduler.js';
import { createLiveReloadServer } from '../websocket/live-reload.js';

export interface ServeCommandOptions {
  deck: string;
  port: number;
  host: string;
  theme?: string;
  debounceMs?: number;
  /** Replaces chokidar in tests. */
  watch?: WatchFactory;
}

export interface ServeSession {
  deckDir: string;
  port: number;
  url: string;
  /** Run one watch-loop rebuild immediately, as a file change would after the debounce. */
  rebuild(): Promise<void>;
  /** Stop watching, close live-reload clients, release the port. Safe to call twice. */
  stop(): Promise<void>;
}

async function assertDeckDir(deckDir: string): Promise<void> {
  try {
    if ((await stat(deckDir)).isDirectory()) return;
  } catch {
    // Reported below
  }
  throw new DeckNotFoundError(deckDir);
}

/**
 * Build once, then start serving and watching. Rejects when the deck
 * directory is missing or the port cannot be bound; a failing initial build
 * is only logged.
 */
export async function startServe(options: ServeCommandOptions): Promise<ServeSession> {
  const deckDir = resolve(options.deck);
  await assertDeckDir(deckDir);

  const build = () => buildDeck({ deckDir, theme: options.theme, liveReload: true });

  const initial = await build();
  if (!initial.ok) {
    console.error(`[build] Build failed: ${initial.error}`);
    console.error('[serve] Serving anyway; fix the deck and save to rebuild');
  }

  const server = createHttpServer({ rootDir: deckDir });
  const liveReload = createLiveReloadServer(server);

  let port: number;
  try {
    port = await startListening(server, options.port, options.host);
  } catch (err) {
    await liveReload.close();
    throw err;
  }

  const rebuild = async () => {
    const result = await build();
    if (result.ok) {
      liveReload.notifyReload();
    } else {
      console.error(`[watch] Rebuild failed: ${result.error}`);
    }
  };

  const scheduler = new RebuildScheduler(rebuild, options.debounceMs ?? DEBOUNCE_MS);
  const watcher = new DeckWatcher({
    deckDir,
    outputPath: defaultOutputPath(deckDir),
    onChange: () => scheduler.notify(),
    watch: options.watch,
  });
  await watcher.start();

  const url = `http://${options.host}:${port}`;
  console.log(`[serve] Serving ${deckDir} at ${url}`);
  console.log('[serve] Press Ctrl+C to stop');

  let stopping: Promise<void> | null = null;

  return {
    deckDir,
    port,
    url,
    rebuild,
    stop() {
      if (!stopping) stopping = shutdown(server, [watcher, scheduler, liveReload]);
      return stopping;
    },
  };
}

/** Serve until SIGINT or SIGTERM; resolves with the process exit code. */
export async function serveCommand(options: ServeCommandOptions): Promise<number> {
  let session: ServeSession;
  try {
    session = await startServe(options);
  } catch (err) {
    console.error(`[serve] ${errorMessage(err)}`);
    return 1;
  }

  await new Promise<void>((resolveStop) => {
    const onSignal = () => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      session.stop().then(resolveStop, (err: unknown) => {
        console.error(`[serve] Shutdown failed: ${errorMessage(err)}`);
        resolveStop();
      });
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  });

  return 0;
}
