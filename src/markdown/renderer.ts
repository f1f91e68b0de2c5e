/**
 * Markdown → HTML for a single slide.
 *
 * One renderer is created per build. Every slide goes through its own
 * `parse` call, so reference-style link definitions never leak between slides.
 */

import { Marked } from 'marked';
import markedShiki from 'marked-shiki';
import type { BundledTheme } from 'shiki';
import { errorMessage } from '../errors.js';
import { escapeHtml } from '../render/html.js';
import { highlightCode, resolveHighlightTheme } from './highlighter.js';
import { isMathToken, mathExtension } from './math.js';

export interface RenderedSlide {
  html: string;
  /** True when the slide has `$…$` / `$$…$$` spans that need MathJax. */
  hasMath: boolean;
}

export interface MarkdownRenderer {
  render(markdown: string): Promise<RenderedSlide>;
}

export interface MarkdownRendererOptions {
  /** Highlighter style name, or null to leave code blocks unstyled. */
  highlightStyle: string | null;
}

async function highlightOrPlain(code: string, lang: string, theme: BundledTheme): Promise<string> {
  try {
    return await highlightCode(code, lang, theme);
  } catch (err) {
    console.warn(`[markdown] Could not highlight '${lang}' block: ${errorMessage(err)}`);
    return `<pre><code>${escapeHtml(code)}</code></pre>`;
  }
}

function containsMath(instance: Marked, markdown: string): boolean {
  let found = false;
  instance.walkTokens(instance.lexer(markdown), (token) => {
    if (isMathToken(token)) found = true;
  });
  return found;
}

export function createMarkdownRenderer({ highlightStyle }: MarkdownRendererOptions): MarkdownRenderer {
  const instance = new Marked({ async: true, gfm: true, breaks: false });
  instance.use(mathExtension());

  if (highlightStyle !== null) {
    const theme = resolveHighlightTheme(highlightStyle);
    instance.use(
      markedShiki({
        highlight(code, lang) {
          return highlightOrPlain(code, lang, theme);
        },
      }),
    );
  }

  return {
    async render(markdown: string): Promise<RenderedSlide> {
      try {
        const hasMath = containsMath(instance, markdown);
        const html = await instance.parse(markdown);
        return { html, hasMath };
      } catch (err) {
        console.warn(`[markdown] Slide could not be rendered, showing its source: ${errorMessage(err)}`);
        return { html: `<pre class="render-error">${escapeHtml(markdown)}</pre>\n`, hasMath: false };
      }
    },
  };
}
