/**
 * Built-in themes shipped as CSS files under assets/themes/.
 *
 * The name list is fixed; the CSS texts are read once, on first use, and the
 * table is never modified afterwards.
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import { THEMES_DIR } from '../config.js';

export const BUILT_IN_THEMES = [
  'default',
  'academic',
  'corporate',
  'midnight',
  'minimal',
  'paper',
  'solarized',
  'sunset',
  'terminal',
] as const;

export type BuiltInTheme = (typeof BUILT_IN_THEMES)[number];

export const DEFAULT_THEME: BuiltInTheme = 'default';

let themeTable: ReadonlyMap<BuiltInTheme, string> | undefined;

export function builtInThemePath(name: BuiltInTheme): string {
  return join(THEMES_DIR, `${name}.css`);
}

function loadThemeTable(): ReadonlyMap<BuiltInTheme, string> {
  if (themeTable) return themeTable;
  themeTable = new Map(
    BUILT_IN_THEMES.map((name) => [name, readFileSync(builtInThemePath(name), 'utf-8')] as const),
  );
  return themeTable;
}

export function getBuiltInThemeCss(name: BuiltInTheme): string {
  const css = loadThemeTable().get(name);
  if (css === undefined) {
    throw new Error(`Built-in theme '${name}' is missing from ${THEMES_DIR}`);
  }
  return css;
}

/**
 * Match a user-supplied theme value against the built-in names.
 * Case-insensitive, with or without a `.css` suffix.
 */
export function findBuiltInTheme(value: string): BuiltInTheme | null {
  const normalized = value.trim().toLowerCase().replace(/\.css$/, '');
  return BUILT_IN_THEMES.find((name) => name === normalized) ?? null;
}
