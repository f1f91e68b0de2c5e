/**
 * Theme resolution — decides which single stylesheet a build inlines.
 *
 * Precedence, highest first:
 *   1. explicit override (CLI --theme)
 *   2. `theme` from front matter
 *   3. theme.css in the deck directory
 *   4. the bundled default theme
 */

import { readFile, stat } from 'fs/promises';
import { extname, join, resolve } from 'path';
import { DECK_THEME_FILE } from '../config.js';
import { ThemeNotFoundError } from '../errors.js';
import {
  DEFAULT_THEME,
  builtInThemePath,
  findBuiltInTheme,
  getBuiltInThemeCss,
} from './registry.js';

export type ThemeSource = 'override' | 'front-matter' | 'deck-theme' | 'default';

export interface ThemeSelection {
  source: ThemeSource;
  /** Built-in name, or the value the author wrote for a custom theme. */
  name: string;
  path: string;
  css: string;
}

export interface ResolveThemeOptions {
  override?: string | null;
  frontMatterTheme?: string | null;
  deckDir: string;
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

/**
 * Locations tried for a custom theme value: relative to the deck directory
 * first, then as given. Values without a .css extension are also tried with it.
 */
export function themeCandidatePaths(value: string, deckDir: string): string[] {
  const names = extname(value).toLowerCase() === '.css' ? [value] : [value, `${value}.css`];
  const paths: string[] = [];
  for (const base of [deckDir, process.cwd()]) {
    for (const name of names) {
      const path = resolve(base, name);
      if (!paths.includes(path)) paths.push(path);
    }
  }
  return paths;
}

async function resolveNamedTheme(
  value: string,
  source: 'override' | 'front-matter',
  deckDir: string,
): Promise<ThemeSelection> {
  const builtIn = findBuiltInTheme(value);
  if (builtIn) {
    return {
      source,
      name: builtIn,
      path: builtInThemePath(builtIn),
      css: getBuiltInThemeCss(builtIn),
    };
  }

  for (const path of themeCandidatePaths(value, deckDir)) {
    if (await isFile(path)) {
      return { source, name: value, path, css: await readFile(path, 'utf-8') };
    }
  }

  throw new ThemeNotFoundError(value, source);
}

export async function resolveTheme({
  override,
  frontMatterTheme,
  deckDir,
}: ResolveThemeOptions): Promise<ThemeSelection> {
  const overrideValue = override?.trim();
  if (overrideValue) {
    return resolveNamedTheme(overrideValue, 'override', deckDir);
  }

  const frontMatterValue = frontMatterTheme?.trim();
  if (frontMatterValue) {
    return resolveNamedTheme(frontMatterValue, 'front-matter', deckDir);
  }

  const deckThemePath = join(deckDir, DECK_THEME_FILE);
  if (await isFile(deckThemePath)) {
    return {
      source: 'deck-theme',
      name: DECK_THEME_FILE,
      path: deckThemePath,
      css: await readFile(deckThemePath, 'utf-8'),
    };
  }

  return {
    source: 'default',
    name: DEFAULT_THEME,
    path: builtInThemePath(DEFAULT_THEME),
    css: getBuiltInThemeCss(DEFAULT_THEME),
  };
}
