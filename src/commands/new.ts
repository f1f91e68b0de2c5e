/**
 * `slidemark new` — scaffold `<project>/deck/` with a sample deck and an
 * editable copy of the default theme.
 */

import { copyFile, mkdir, readdir } from 'fs/promises';
import { basename, join, resolve } from 'path';
import { DECK_THEME_FILE, DEFAULT_MARKDOWN_FILE, SCAFFOLD_DIR } from '../config.js';
import { errorMessage } from '../errors.js';
import { builtInThemePath, DEFAULT_THEME } from '../themes/registry.js';

export interface NewCommandOptions {
  project: string;
  markdown?: string;
}

/** Adds `.md` when missing; null when the name is not a plain file name. */
export function normalizeMarkdownName(name: string): string | null {
  const trimmed = name.trim();
  if (trimmed === '' || trimmed === '.' || trimmed === '..' || basename(trimmed) !== trimmed) {
    return null;
  }
  return trimmed.toLowerCase().endsWith('.md') ? trimmed : `${trimmed}.md`;
}

async function isEmptyOrMissing(dir: string): Promise<boolean> {
  try {
    return (await readdir(dir)).length === 0;
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return true;
    throw err;
  }
}

export async function newCommand({ project, markdown = DEFAULT_MARKDOWN_FILE }: NewCommandOptions): Promise<number> {
  const markdownName = normalizeMarkdownName(markdown);
  if (!markdownName) {
    console.error(`[new] Invalid markdown file name: '${markdown}'`);
    return 1;
  }

  const projectDir = resolve(project);
  const deckDir = join(projectDir, 'deck');

  try {
    if (!(await isEmptyOrMissing(deckDir))) {
      console.error(`[new] ${deckDir} already exists and is not empty`);
      return 1;
    }

    await mkdir(deckDir, { recursive: true });
    await copyFile(join(SCAFFOLD_DIR, DEFAULT_MARKDOWN_FILE), join(deckDir, markdownName));
    await copyFile(builtInThemePath(DEFAULT_THEME), join(deckDir, DECK_THEME_FILE));
  } catch (err) {
    console.error(`[new] Could not create project: ${errorMessage(err)}`);
    return 1;
  }

  console.log(`[new] Created ${deckDir}`);
  console.log(`  ${markdownName}   slides`);
  console.log(`  ${DECK_THEME_FILE}   theme, edit freely`);
  console.log('');
  console.log('Next steps:');
  console.log(`  cd ${join(project, 'deck')}`);
  console.log('  slidemark serve');
  return 0;
}
