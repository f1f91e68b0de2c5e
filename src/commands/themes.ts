/**
 * `slidemark themes` — list the built-in theme names.
 */

import { BUILT_IN_THEMES, DEFAULT_THEME } from '../themes/registry.js';

export function themesCommand(): number {
  console.log('Built-in themes:');
  for (const name of BUILT_IN_THEMES) {
    console.log(name === DEFAULT_THEME ? `  ${name} (default)` : `  ${name}`);
  }
  return 0;
}
