/**
 * Typed failures. Build errors stop a single deck build before any output is
 * written; listen errors stop the serve command at startup.
 */

export class SlidemarkError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class DeckNotFoundError extends SlidemarkError {
  constructor(readonly deckDir: string) {
    super(`Deck directory not found: ${deckDir}`);
  }
}

export class SourceNotFoundError extends SlidemarkError {
  constructor(readonly deckDir: string) {
    super(`No markdown file found in ${deckDir}`);
  }
}

export class ThemeNotFoundError extends SlidemarkError {
  constructor(
    readonly theme: string,
    readonly origin: 'override' | 'front-matter',
  ) {
    super(
      origin === 'override'
        ? `Theme '${theme}' not found (not a built-in theme or an existing file)`
        : `Theme '${theme}' from front matter not found (not a built-in theme or an existing file)`,
    );
  }
}

/** The serve command could not bind its port. */
export class ListenError extends SlidemarkError {
  constructor(
    message: string,
    readonly code: string | undefined,
  ) {
    super(message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
