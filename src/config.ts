/**
 * Process-wide configuration — constants, asset paths, MIME types.
 */

import { join, dirname } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));

/**
 * Package root directory.
 * One level up from src/ (and from dist/ once compiled).
 */
export const PACKAGE_ROOT = join(__dirname, '..');

export const ASSETS_DIR = join(PACKAGE_ROOT, 'assets');
export const THEMES_DIR = join(ASSETS_DIR, 'themes');
export const CLIENT_ASSETS_DIR = join(ASSETS_DIR, 'client');
export const SCAFFOLD_DIR = join(ASSETS_DIR, 'scaffold');

/** Generated deck file, written inside the deck directory unless overridden. */
export const OUTPUT_FILE = 'index.html';

/** Project-local theme picked up when nothing else names one. */
export const DECK_THEME_FILE = 'theme.css';

export const DEFAULT_TITLE = 'Slide Deck';

export const DEFAULT_MARKDOWN_FILE = 'deck.md';

/** WebSocket path the live-reload client connects to. */
export const LIVE_RELOAD_PATH = '/__livereload';

export const MATHJAX_URL = 'https://cdn.jsdelivr.net/npm/mathjax@3/es5/tex-chtml.js';

function parseIntEnv(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export const PORT = parseIntEnv(process.env.PORT, 8000);

export const HOST = process.env.HOST ?? '127.0.0.1';

/** Quiet period after the last file event before a rebuild runs. */
export const DEBOUNCE_MS = parseIntEnv(process.env.SLIDEMARK_DEBOUNCE_MS, 300);

export const DEBUG = process.env.SLIDEMARK_DEBUG === '1';

export const MIME_TYPES: Record<string, string> = {
  '.html': 'text/html; charset=utf-8',
  '.css': 'text/css; charset=utf-8',
  '.js': 'application/javascript; charset=utf-8',
  '.json': 'application/json',
  '.md': 'text/markdown; charset=utf-8',
  '.txt': 'text/plain; charset=utf-8',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
  '.svg': 'image/svg+xml',
  '.ico': 'image/x-icon',
  '.pdf': 'application/pdf',
  '.mp3': 'audio/mpeg',
  '.mp4': 'video/mp4',
  '.webm': 'video/webm',
  '.ttf': 'font/ttf',
  '.woff': 'font/woff',
  '.woff2': 'font/woff2',
};
