/**
 * Build orchestration — one deck directory in, one HTML file out.
 *
 * read source → front matter → slides → markdown → theme → document → write
 */

import { readFile, stat, writeFile } from 'fs/promises';
import { join, resolve } from 'path';
import { DEBUG, OUTPUT_FILE } from '../config.js';
import { extractFrontMatter } from '../deck/front-matter.js';
import { splitSlides } from '../deck/segmenter.js';
import { resolveDeckSettings } from '../deck/settings.js';
import { DeckNotFoundError, errorMessage } from '../errors.js';
import { createMarkdownRenderer, type RenderedSlide } from '../markdown/renderer.js';
import { composeStylesheet, renderDeck } from '../render/deck-template.js';
import { resolveTheme, type ThemeSelection } from '../themes/resolver.js';
import { findMarkdownFile } from './source.js';

export { findMarkdownFile, COMMON_NON_DECK_FILES } from './source.js';

export interface BuildOptions {
  deckDir: string;
  /** Theme override: a built-in name or a CSS path. Beats front matter. */
  theme?: string | null;
  /** Output file; defaults to index.html inside the deck directory. */
  output?: string | null;
  /** Embed the live-reload client (serve mode). */
  liveReload?: boolean;
}

export interface BuildSuccess {
  ok: true;
  outputPath: string;
  sourcePath: string;
  slideCount: number;
  theme: ThemeSelection;
}

export interface BuildFailure {
  ok: false;
  error: string;
}

export type BuildResult = BuildSuccess | BuildFailure;

export function defaultOutputPath(deckDir: string): string {
  return join(resolve(deckDir), OUTPUT_FILE);
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

async function runBuild(options: BuildOptions): Promise<BuildSuccess> {
  const deckDir = resolve(options.deckDir);
  if (!(await isDirectory(deckDir))) {
    throw new DeckNotFoundError(deckDir);
  }

  const sourcePath = await findMarkdownFile(deckDir);
  const source = await readFile(sourcePath, 'utf-8');

  const { frontMatter, body } = extractFrontMatter(source);
  const settings = resolveDeckSettings(frontMatter);

  const renderer = createMarkdownRenderer({ highlightStyle: settings.highlightStyle });
  const slides: RenderedSlide[] = [];
  for (const slideSource of splitSlides(body)) {
    slides.push(await renderer.render(slideSource));
  }

  const theme = await resolveTheme({
    override: options.theme,
    frontMatterTheme: frontMatter?.theme,
    deckDir,
  });
  if (DEBUG) console.debug(`[build] Theme '${theme.name}' (${theme.source}) from ${theme.path}`);

  const html = renderDeck({
    slides: slides.map((slide) => slide.html),
    css: composeStylesheet(theme.css, settings.highlightStyle !== null),
    settings,
    hasMath: slides.some((slide) => slide.hasMath),
    liveReload: options.liveReload ?? false,
  });

  const outputPath = options.output ? resolve(options.output) : defaultOutputPath(deckDir);
  await writeFile(outputPath, html, 'utf-8');

  return { ok: true, outputPath, sourcePath, slideCount: slides.length, theme };
}

/**
 * Build a deck. Never throws: failures come back as `{ ok: false, error }`
 * and leave any previous output file untouched.
 */
export async function buildDeck(options: BuildOptions): Promise<BuildResult> {
  try {
    const result = await runBuild(options);
    const noun = result.slideCount === 1 ? 'slide' : 'slides';
    console.log(`[build] Built ${result.slideCount} ${noun} → ${result.outputPath}`);
    return result;
  } catch (err) {
    return { ok: false, error: errorMessage(err) };
  }
}
