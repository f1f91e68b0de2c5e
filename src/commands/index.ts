/**
 * Command dispatch — parsed argv in, process exit code out.
 */

import { parseCliArgs, USAGE } from './args.js';
import { buildCommand } from './build.js';
import { newCommand } from './new.js';
import { serveCommand } from './serve.js';
import { themesCommand } from './themes.js';

export { parseCliArgs, USAGE, type CliCommand } from './args.js';
export { buildCommand } from './build.js';
export { newCommand } from './new.js';
export { serveCommand, startServe, type ServeSession } from './serve.js';
export { themesCommand } from './themes.js';

export async function run(argv: string[]): Promise<number> {
  const command = parseCliArgs(argv);

  switch (command.kind) {
    case 'help':
      console.log(USAGE);
      return 0;
    case 'error':
      console.error(`Error: ${command.message}\n`);
      console.error(USAGE);
      return 1;
    case 'build':
      return buildCommand(command.args);
    case 'serve':
      return serveCommand(command.args);
    case 'new':
      return newCommand(command.args);
    case 'themes':
      return themesCommand();
  }
}
