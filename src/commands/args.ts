/**
 * Command-line parsing. `parseArgs` splits the argv, zod validates the values.
 */

import { parseArgs } from 'util';
import { z } from 'zod';
import { DEFAULT_MARKDOWN_FILE, HOST, PORT } from '../config.js';
import { errorMessage } from '../errors.js';

export const USAGE = `Usage: slidemark <command> [options]

Commands:
  build [deck]      Build the deck into a standalone HTML file
    -o, --output <file>     Output file (default: <deck>/index.html)
    -t, --theme <theme>     Built-in theme name or path to a CSS file

  serve [deck]      Build, serve and rebuild on change with live reload
    -p, --port <port>       Port to listen on (default: ${PORT})
        --host <host>       Interface to bind (default: ${HOST})
    -t, --theme <theme>     Built-in theme name or path to a CSS file

  new <project>     Scaffold <project>/deck with a sample deck
    -m, --markdown <file>   Markdown file name (default: ${DEFAULT_MARKDOWN_FILE})

  themes            List built-in themes

The deck directory defaults to the current directory.
Options:
  -h, --help        Show this help`;

const PortSchema = z
  .string()
  .trim()
  .regex(/^\d+$/, 'Port must be a whole number')
  .transform(Number)
  .pipe(z.number().int().min(0).max(65535, 'Port must be between 0 and 65535'));

const NonEmpty = z.string().trim().min(1);

const BuildArgsSchema = z.object({
  deck: NonEmpty.default('.'),
  output: NonEmpty.optional(),
  theme: NonEmpty.optional(),
});

const ServeArgsSchema = z.object({
  deck: NonEmpty.default('.'),
  port: PortSchema.optional(),
  host: NonEmpty.default(HOST),
  theme: NonEmpty.optional(),
});

const NewArgsSchema = z.object({
  project: NonEmpty,
  markdown: NonEmpty.default(DEFAULT_MARKDOWN_FILE),
});

export type BuildArgs = z.output<typeof BuildArgsSchema>;
export type ServeArgs = Omit<z.output<typeof ServeArgsSchema>, 'port'> & { port: number };
export type NewArgs = z.output<typeof NewArgsSchema>;

export type CliCommand =
  | { kind: 'build'; args: BuildArgs }
  | { kind: 'serve'; args: ServeArgs }
  | { kind: 'new'; args: NewArgs }
  | { kind: 'themes' }
  | { kind: 'help' }
  | { kind: 'error'; message: string };

function wantsHelp(argv: string[]): boolean {
  return argv.includes('-h') || argv.includes('--help');
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function validate<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
): { ok: true; value: z.output<T> } | { ok: false; message: string } {
  const parsed = schema.safeParse(input);
  return parsed.success
    ? { ok: true, value: parsed.data }
    : { ok: false, message: formatIssues(parsed.error) };
}

function tooMany(command: string, positionals: string[], max: number): string | null {
  return positionals.length > max
    ? `Unexpected argument for '${command}': ${positionals.slice(max).join(' ')}`
    : null;
}

function parseBuild(argv: string[]): CliCommand {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      output: { type: 'string', short: 'o' },
      theme: { type: 'string', short: 't' },
    },
  });
  const extra = tooMany('build', positionals, 1);
  if (extra) return { kind: 'error', message: extra };

  const result = validate(BuildArgsSchema, { deck: positionals[0], ...values });
  return result.ok ? { kind: 'build', args: result.value } : { kind: 'error', message: result.message };
}

function parseServe(argv: string[]): CliCommand {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      port: { type: 'string', short: 'p' },
      host: { type: 'string' },
      theme: { type: 'string', short: 't' },
    },
  });
  const extra = tooMany('serve', positionals, 1);
  if (extra) return { kind: 'error', message: extra };

  const result = validate(ServeArgsSchema, { deck: positionals[0], ...values });
  if (!result.ok) return { kind: 'error', message: result.message };
  return { kind: 'serve', args: { ...result.value, port: result.value.port ?? PORT } };
}

function parseNew(argv: string[]): CliCommand {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      markdown: { type: 'string', short: 'm' },
    },
  });
  if (positionals.length === 0) return { kind: 'error', message: "'new' needs a project name" };
  const extra = tooMany('new', positionals, 1);
  if (extra) return { kind: 'error', message: extra };

  const result = validate(NewArgsSchema, { project: positionals[0], ...values });
  return result.ok ? { kind: 'new', args: result.value } : { kind: 'error', message: result.message };
}

function parseThemes(argv: string[]): CliCommand {
  const { positionals } = parseArgs({ args: argv, allowPositionals: true, options: {} });
  const extra = tooMany('themes', positionals, 0);
  return extra ? { kind: 'error', message: extra } : { kind: 'themes' };
}

const PARSERS: Record<string, (argv: string[]) => CliCommand> = {
  build: parseBuild,
  serve: parseServe,
  new: parseNew,
  themes: parseThemes,
};

export function parseCliArgs(argv: string[]): CliCommand {
  const [command, ...rest] = argv;
  if (command === undefined || command === '-h' || command === '--help') {
    return { kind: 'help' };
  }

  const parse = Object.prototype.hasOwnProperty.call(PARSERS, command) ? PARSERS[command] : undefined;
  if (!parse) {
    return { kind: 'error', message: `Unknown command '${command}'` };
  }
  if (wantsHelp(rest)) return { kind: 'help' };

  try {
    return parse(rest);
  } catch (err) {
    // parseArgs rejects unknown options and options missing their value
    return { kind: 'error', message: errorMessage(err) };
  }
}
