/**
 * `slidemark build` — one build, exit code from the result.
 */

import { buildDeck } from '../build/index.js';

export interface BuildCommandOptions {
  deck: string;
  output?: string;
  theme?: string;
}

export async function buildCommand({ deck, output, theme }: BuildCommandOptions): Promise<number> {
  const result = await buildDeck({ deckDir: deck, output, theme });
  if (!result.ok) {
    console.error(`[build] Build failed: ${result.error}`);
    return 1;
  }
  return 0;
}
