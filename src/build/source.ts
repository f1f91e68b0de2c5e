/**
 * Locating the markdown source inside a deck directory.
 */

import { readdir } from 'fs/promises';
import { join } from 'path';
import { DEBUG } from '../config.js';
import { SourceNotFoundError } from '../errors.js';

/** Markdown files that usually sit next to a deck without being one. */
export const COMMON_NON_DECK_FILES = new Set(['readme.md', 'agents.md', 'contributing.md', 'changelog.md']);

function isNonDeckFile(name: string): boolean {
  return COMMON_NON_DECK_FILES.has(name.toLowerCase());
}

/**
 * Pick the deck's markdown file: the first `*.md` by name, preferring files
 * that are not README-style documents.
 */
export async function findMarkdownFile(deckDir: string): Promise<string> {
  const entries = await readdir(deckDir, { withFileTypes: true });
  const candidates = entries
    .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith('.md'))
    .map((entry) => entry.name)
    .sort();

  if (candidates.length === 0) {
    throw new SourceNotFoundError(deckDir);
  }

  const chosen = candidates.find((name) => !isNonDeckFile(name)) ?? candidates[0];

  if (isNonDeckFile(chosen)) {
    console.warn(`[build] Using '${chosen}', which may not be a slide deck file`);
    console.warn('[build] Run from your deck directory or pass the deck path explicitly');
  }

  if (candidates.length > 1) {
    const others = candidates.filter((name) => name !== chosen);
    console.warn(`[build] Multiple markdown files found. Using '${chosen}'. Others: ${others.join(', ')}`);
  }

  if (DEBUG) console.debug(`[build] Building from ${chosen}`);

  return join(deckDir, chosen);
}
