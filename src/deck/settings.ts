/**
 * Display settings derived from front matter: title, alignment, code highlighting.
 */

import { z } from 'zod';
import { DEFAULT_TITLE } from '../config.js';
import type { FrontMatter } from './front-matter.js';

export const ALIGNMENTS = ['left', 'center', 'right'] as const;

export type Alignment = (typeof ALIGNMENTS)[number];

export interface DeckSettings {
  title: string;
  alignment: Alignment;
  /** Highlighter style name, or null when code highlighting is off. */
  highlightStyle: string | null;
}

const DISABLED_HIGHLIGHT_VALUES = new Set(['off', 'false', 'no', 'none']);

const TitleSchema = z.string().trim().min(1);

const AlignmentSchema = z.string().trim().toLowerCase().pipe(z.enum(ALIGNMENTS));

const HighlightStyleSchema = z
  .string()
  .trim()
  .min(1)
  .refine((value) => !DISABLED_HIGHLIGHT_VALUES.has(value.toLowerCase()), {
    message: 'Code highlighting disabled',
  });

export const DEFAULT_SETTINGS: Readonly<DeckSettings> = Object.freeze({
  title: DEFAULT_TITLE,
  alignment: 'left',
  highlightStyle: null,
});

function resolveAlignment(raw: string | undefined): Alignment {
  if (raw === undefined) return DEFAULT_SETTINGS.alignment;
  const parsed = AlignmentSchema.safeParse(raw);
  if (parsed.success) return parsed.data;
  console.warn(
    `[settings] Invalid align '${raw.trim()}' in front matter. Using '${DEFAULT_SETTINGS.alignment}'.`,
  );
  return DEFAULT_SETTINGS.alignment;
}

export function resolveDeckSettings(frontMatter: FrontMatter | null): DeckSettings {
  if (!frontMatter) return { ...DEFAULT_SETTINGS };

  const title = TitleSchema.safeParse(frontMatter.title);
  const highlightStyle = HighlightStyleSchema.safeParse(frontMatter.code_highlight);

  return {
    title: title.success ? title.data : DEFAULT_SETTINGS.title,
    alignment: resolveAlignment(frontMatter.align),
    highlightStyle: highlightStyle.success ? highlightStyle.data : null,
  };
}
