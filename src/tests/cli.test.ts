import { existsSync } from 'fs';
import { join } from 'path';
import { HOST, PORT } from '../config.js';
import { parseCliArgs, run } from '../commands/index.js';
import { createTempDir, muteConsole, removeDir } from './helpers.js';

describe('parseCliArgs', () => {
  it('shows help without a command or with --help', () => {
    expect(parseCliArgs([])).toEqual({ kind: 'help' });
    expect(parseCliArgs(['--help'])).toEqual({ kind: 'help' });
    expect(parseCliArgs(['build', '-h'])).toEqual({ kind: 'help' });
  });

  it('parses build with defaults', () => {
    expect(parseCliArgs(['build'])).toEqual({ kind: 'build', args: { deck: '.' } });
  });

  it('parses build options', () => {
    expect(parseCliArgs(['build', 'talks/q3', '-o', 'out.html', '--theme', 'paper'])).toEqual({
      kind: 'build',
      args: { deck: 'talks/q3', output: 'out.html', theme: 'paper' },
    });
  });

  it('parses serve with environment defaults', () => {
    expect(parseCliArgs(['serve'])).toEqual({
      kind: 'serve',
      args: { deck: '.', port: PORT, host: HOST },
    });
  });

  it('parses serve options', () => {
    expect(parseCliArgs(['serve', 'deck', '-p', '3000', '--host', '0.0.0.0', '-t', 'midnight'])).toEqual({
      kind: 'serve',
      args: { deck: 'deck', port: 3000, host: '0.0.0.0', theme: 'midnight' },
    });
  });

  it('rejects ports that are not numbers or out of range', () => {
    expect(parseCliArgs(['serve', '-p', 'abc'])).toEqual({
      kind: 'error',
      message: 'port: Port must be a whole number',
    });
    expect(parseCliArgs(['serve', '--port', '70000'])).toEqual({
      kind: 'error',
      message: 'port: Port must be between 0 and 65535',
    });
  });

  it('parses new with the default markdown name', () => {
    expect(parseCliArgs(['new', 'talk'])).toEqual({
      kind: 'new',
      args: { project: 'talk', markdown: 'deck.md' },
    });
    expect(parseCliArgs(['new', 'talk', '-m', 'slides.md'])).toEqual({
      kind: 'new',
      args: { project: 'talk', markdown: 'slides.md' },
    });
  });

  it('requires a project name for new', () => {
    expect(parseCliArgs(['new'])).toEqual({ kind: 'error', message: "'new' needs a project name" });
  });

  it('rejects unknown commands, options and extra arguments', () => {
    expect(parseCliArgs(['publish'])).toEqual({ kind: 'error', message: "Unknown command 'publish'" });
    expect(parseCliArgs(['build', '--watch']).kind).toBe('error');
    expect(parseCliArgs(['themes', 'extra'])).toEqual({
      kind: 'error',
      message: "Unexpected argument for 'themes': extra",
    });
  });

  it('does not treat inherited object keys as commands', () => {
    expect(parseCliArgs(['toString']).kind).toBe('error');
  });
});

describe('run', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('lists built-in themes', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    expect(await run(['themes'])).toBe(0);
    expect(log).toHaveBeenCalledWith('  default (default)');
    expect(log).toHaveBeenCalledWith('  terminal');
  });

  it('prints usage and exits 1 for an unknown command', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    expect(await run(['publish'])).toBe(1);
    expect(error).toHaveBeenCalledWith("Error: Unknown command 'publish'\n");
  });

  it('builds a deck and exits 0', async () => {
    muteConsole();
    const deckDir = await createTempDir({ 'deck.md': '# A' });

    try {
      expect(await run(['build', deckDir])).toBe(0);
      expect(existsSync(join(deckDir, 'index.html'))).toBe(true);
    } finally {
      await removeDir(deckDir);
    }
  });

  it('exits 1 without writing output when the theme override is missing', async () => {
    muteConsole();
    const deckDir = await createTempDir({ 'deck.md': '# A' });

    try {
      expect(await run(['build', deckDir, '--theme', 'nope.css'])).toBe(1);
      expect(existsSync(join(deckDir, 'index.html'))).toBe(false);
      expect(console.error).toHaveBeenCalledWith(
        "[build] Build failed: Theme 'nope.css' not found (not a built-in theme or an existing file)",
      );
    } finally {
      await removeDir(deckDir);
    }
  });

  it('prints usage and exits 0 for help', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    expect(await run([])).toBe(0);
    expect(log.mock.calls[0][0]).toContain('Usage: slidemark <command> [options]');
  });
});
