/**
 * DeckWatcher — recursive file watching of a deck directory via chokidar.
 */

import chokidar from 'chokidar';
import { relative, resolve, sep } from 'path';
import { DEBUG } from '../config.js';
import { errorMessage } from '../errors.js';

export interface WatchHandlers {
  ignored: (path: string) => boolean;
  onChange: (eventName: string, path: string) => void;
  onError: (err: unknown) => void;
  /** Initial scan finished; later changes are reported. */
  onReady: () => void;
}

export interface WatchHandle {
  close(): Promise<void>;
}

/** Starts a recursive watch on `root`. Swappable so tests need no real file events. */
export type WatchFactory = (root: string, handlers: WatchHandlers) => WatchHandle;

export const chokidarWatch: WatchFactory = (root, handlers) => {
  const watcher = chokidar.watch(root, {
    ignored: (path: string) => handlers.ignored(path),
    ignoreInitial: true,
    persistent: true,
  });
  watcher.on('all', (eventName, path) => handlers.onChange(eventName, path));
  watcher.on('error', (err) => handlers.onError(err));
  watcher.on('ready', () => handlers.onReady());
  return watcher;
};

export interface DeckWatcherOptions {
  deckDir: string;
  /** Generated file; writes to it never count as changes. */
  outputPath: string;
  /** Called with the absolute path of each changed source file. */
  onChange: (path: string) => void;
  watch?: WatchFactory;
}

export class DeckWatcher {
  private readonly deckDir: string;
  private readonly outputPath: string;
  private readonly onChange: (path: string) => void;
  private readonly watch: WatchFactory;
  private handle: WatchHandle | null = null;
  private ready: Promise<void> | null = null;

  constructor(options: DeckWatcherOptions) {
    this.deckDir = resolve(options.deckDir);
    this.outputPath = resolve(options.outputPath);
    this.onChange = options.onChange;
    this.watch = options.watch ?? chokidarWatch;
  }

  /** Output file and anything under a dot-prefixed path segment (e.g. `.git`). */
  isIgnored(path: string): boolean {
    const absolute = resolve(this.deckDir, path);
    if (absolute === this.outputPath) return true;
    const rel = relative(this.deckDir, absolute);
    if (rel === '') return false;
    return rel.split(sep).some((segment) => segment.startsWith('.') && segment !== '..');
  }

  /** Resolves once the initial scan is done and changes are being reported. */
  start(): Promise<void> {
    if (this.ready) return this.ready;
    this.ready = new Promise<void>((resolveReady) => {
      this.handle = this.watch(this.deckDir, {
        ignored: (path) => this.isIgnored(path),
        onChange: (eventName, path) => {
          if (this.isIgnored(path)) return;
          if (DEBUG) console.debug(`[watch] ${eventName} ${path}`);
          this.onChange(resolve(this.deckDir, path));
        },
        onError: (err) => {
          console.error(`[watch] Watcher error: ${errorMessage(err)}`);
        },
        onReady: () => {
          console.log(`[watch] Watching ${this.deckDir}`);
          resolveReady();
        },
      });
    });
    return this.ready;
  }

  async close(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    this.ready = null;
    if (handle) await handle.close();
  }
}
