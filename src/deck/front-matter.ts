/**
 * Front matter — the optional YAML block at the very top of a deck.
 *
 * ---
 * title: Quarterly review
 * theme: midnight
 * ---
 * # First slide
 */

import { parse as parseYaml } from 'yaml';
import { errorMessage } from '../errors.js';
import { isSeparatorLine } from './segmenter.js';

/** Flat key → string mapping. Scalars are stringified; nested values are dropped. */
export type FrontMatter = Record<string, string>;

export interface FrontMatterResult {
  /** null when the document has no (well-formed) front matter block. */
  frontMatter: FrontMatter | null;
  /** Everything after the closing separator line, or the original text. */
  body: string;
}

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toFrontMatter(data: Record<string, unknown>): FrontMatter {
  const frontMatter: FrontMatter = {};
  for (const [key, value] of Object.entries(data)) {
    if (typeof value === 'string') {
      frontMatter[key] = value;
    } else if (typeof value === 'number' || typeof value === 'boolean') {
      frontMatter[key] = String(value);
    }
  }
  return frontMatter;
}

/**
 * Split a document into its front matter and the remaining body.
 *
 * A block needs a separator on the first line and a closing separator on a
 * later line, and must parse to a YAML mapping. Anything else (no closing
 * line, invalid YAML, a block that is really slide content) leaves the text
 * untouched and reports no front matter.
 */
export function extractFrontMatter(text: string): FrontMatterResult {
  const noFrontMatter: FrontMatterResult = { frontMatter: null, body: text };

  const lines = text.split('\n');
  if (lines.length < 2 || !isSeparatorLine(lines[0])) {
    return noFrontMatter;
  }

  const closing = lines.findIndex((line, i) => i > 0 && isSeparatorLine(line));
  if (closing === -1) {
    return noFrontMatter;
  }

  const block = lines.slice(1, closing).join('\n');
  const body = lines.slice(closing + 1).join('\n');

  let data: unknown;
  try {
    data = parseYaml(block);
  } catch (err) {
    console.warn(`[front-matter] Ignoring front matter, invalid YAML: ${errorMessage(err)}`);
    return noFrontMatter;
  }

  if (isMapping(data)) {
    return { frontMatter: toFrontMatter(data), body };
  }
  if ((data === null || data === undefined) && block.trim() === '') {
    return { frontMatter: {}, body };
  }
  return noFrontMatter;
}
