/**
 * Shiki highlighter shared by every build in the process.
 *
 * Themes and languages are loaded on first use, so a deck only pays for the
 * grammars its code blocks actually name.
 */

import {
  bundledLanguages,
  bundledThemes,
  createHighlighter,
  type BundledLanguage,
  type BundledTheme,
  type Highlighter,
} from 'shiki';
import { DEBUG } from '../config.js';

export const FALLBACK_HIGHLIGHT_THEME: BundledTheme = 'monokai';

let highlighterPromise: Promise<Highlighter> | null = null;

function getHighlighter(): Promise<Highlighter> {
  if (!highlighterPromise) {
    highlighterPromise = createHighlighter({ themes: [], langs: [] });
  }
  return highlighterPromise;
}

export function isBundledTheme(name: string): name is BundledTheme {
  return Object.prototype.hasOwnProperty.call(bundledThemes, name);
}

function isBundledLanguage(name: string): name is BundledLanguage {
  return Object.prototype.hasOwnProperty.call(bundledLanguages, name);
}

/**
 * Map a front-matter style name onto a shiki theme.
 * Unknown names log a warning and fall back to monokai.
 */
export function resolveHighlightTheme(style: string): BundledTheme {
  const normalized = style.trim().toLowerCase();
  if (isBundledTheme(normalized)) return normalized;
  console.warn(
    `[highlight] Unknown code_highlight style '${style}'. Falling back to '${FALLBACK_HIGHLIGHT_THEME}'.`,
  );
  return FALLBACK_HIGHLIGHT_THEME;
}

/**
 * Highlight one code block to a `<pre class="shiki">` element with inline colours.
 * Languages shiki does not bundle are rendered as plain text.
 */
export async function highlightCode(code: string, lang: string, theme: BundledTheme): Promise<string> {
  const highlighter = await getHighlighter();

  if (!highlighter.getLoadedThemes().includes(theme)) {
    await highlighter.loadTheme(theme);
  }

  const language = lang.trim().toLowerCase();
  let resolvedLang = 'text';
  if (isBundledLanguage(language)) {
    if (!highlighter.getLoadedLanguages().includes(language)) {
      await highlighter.loadLanguage(language);
    }
    resolvedLang = language;
  } else if (language && DEBUG) {
    console.debug(`[highlight] Unknown code language '${lang}'. Rendering as plain text.`);
  }

  return highlighter.codeToHtml(code, { lang: resolvedLang, theme });
}
