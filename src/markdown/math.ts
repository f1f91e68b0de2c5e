/**
 * marked extension that keeps TeX math intact for MathJax.
 *
 * `$x$` and `$$x$$` spans come out escaped with their delimiters, so the
 * emphasis and escape rules never touch `_`, `*` or `\` inside formulas.
 */

import type { MarkedExtension, Token, Tokens } from 'marked';
import { escapeHtml } from '../render/html.js';

const BLOCK_MATH = /^\$\$([\s\S]+?)\$\$[ \t]*(?:\n+|$)/;
// A display block may only interrupt a paragraph at the start of a line;
// `$$…$$` mid-line stays inline.
const BLOCK_MATH_START = /\n\$\$/;
const INLINE_DISPLAY_MATH = /^\$\$([^$]+?)\$\$/;
// Opening `$` not followed by a space, closing `$` not preceded by one and
// not followed by a digit, so "$5 and $10" stays plain text.
const INLINE_MATH = /^\$(?!\s)([^$\n]+?)(?<!\s)\$(?!\d)/;

const MATH_TOKEN_TYPES = new Set(['blockMath', 'inlineMath']);

function mathText(token: Tokens.Generic): string {
  return escapeHtml(String(token.text));
}

export function mathExtension(): MarkedExtension {
  return {
    extensions: [
      {
        name: 'blockMath',
        level: 'block',
        start(src: string) {
          const match = BLOCK_MATH_START.exec(src);
          if (!match) return undefined;
          return match.index + 1;
        },
        tokenizer(src: string) {
          const match = BLOCK_MATH.exec(src);
          if (!match) return undefined;
          return { type: 'blockMath', raw: match[0], text: match[1].trim() };
        },
        renderer(token: Tokens.Generic) {
          return `<div class="math math-display">$$${mathText(token)}$$</div>\n`;
        },
      },
      {
        name: 'inlineMath',
        level: 'inline',
        start(src: string) {
          const index = src.indexOf('$');
          return index === -1 ? undefined : index;
        },
        tokenizer(src: string) {
          const display = INLINE_DISPLAY_MATH.exec(src);
          if (display) {
            return { type: 'inlineMath', raw: display[0], text: display[1], display: true };
          }
          const inline = INLINE_MATH.exec(src);
          if (inline) {
            return { type: 'inlineMath', raw: inline[0], text: inline[1], display: false };
          }
          return undefined;
        },
        renderer(token: Tokens.Generic) {
          return token.display === true
            ? `<span class="math math-display">$$${mathText(token)}$$</span>`
            : `<span class="math math-inline">$${mathText(token)}$</span>`;
        },
      },
    ],
  };
}

export function isMathToken(token: Token): boolean {
  return MATH_TOKEN_TYPES.has(token.type);
}
