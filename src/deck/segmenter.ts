/**
 * Slide segmentation — splits a deck body on horizontal-rule lines.
 *
 * This is plain line matching with no markdown awareness: a `---` inside a
 * fenced code block, or under a setext heading, also starts a new slide.
 */

const SEPARATOR_LINE = /^\s*-{3,}\s*$/;

/**
 * True for a line made only of three or more hyphens (surrounding whitespace
 * and a trailing carriage return allowed).
 */
export function isSeparatorLine(line: string): boolean {
  return SEPARATOR_LINE.test(line);
}

/**
 * Split body text into trimmed slide sources, in source order.
 * Segments that are empty after trimming are dropped.
 */
export function splitSlides(body: string): string[] {
  const slides: string[] = [];
  let current: string[] = [];

  const flush = () => {
    const text = current.join('\n').trim();
    if (text) slides.push(text);
    current = [];
  };

  for (const line of body.split('\n')) {
    if (isSeparatorLine(line)) {
      flush();
    } else {
      current.push(line);
    }
  }
  flush();

  return slides;
}
