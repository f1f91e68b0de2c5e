import { createMarkdownRenderer } from '../markdown/renderer.js';
import { resolveHighlightTheme } from '../markdown/highlighter.js';
import { escapeHtml } from '../render/html.js';

describe('createMarkdownRenderer', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('without highlighting', () => {
    const renderer = createMarkdownRenderer({ highlightStyle: null });

    it('renders headings and paragraphs', async () => {
      expect(await renderer.render('# A')).toEqual({ html: '<h1>A</h1>\n', hasMath: false });
      expect((await renderer.render('Some *text*')).html).toBe('<p>Some <em>text</em></p>\n');
    });

    it('renders GitHub tables', async () => {
      const { html } = await renderer.render('| a | b |\n| - | - |\n| 1 | 2 |');
      expect(html).toContain('<table>');
      expect(html).toContain('<td>1</td>');
    });

    it('leaves fenced code as a plain block', async () => {
      const { html } = await renderer.render('```js\nconst a = 1 < 2;\n```');
      expect(html).toBe('<pre><code class="language-js">const a = 1 &lt; 2;\n</code></pre>\n');
    });

    it('keeps inline math intact and flags it', async () => {
      const slide = await renderer.render('Energy $E=mc^2$ here');
      expect(slide.html).toBe('<p>Energy <span class="math math-inline">$E=mc^2$</span> here</p>\n');
      expect(slide.hasMath).toBe(true);
    });

    it('does not apply emphasis inside math', async () => {
      const { html } = await renderer.render('$a_1 * b_2$');
      expect(html).toBe('<p><span class="math math-inline">$a_1 * b_2$</span></p>\n');
    });

    it('escapes HTML inside math', async () => {
      const { html } = await renderer.render('$a<b$');
      expect(html).toBe('<p><span class="math math-inline">$a&lt;b$</span></p>\n');
    });

    it('renders display math blocks', async () => {
      const slide = await renderer.render('$$\nx^2 + y^2\n$$');
      expect(slide.html).toBe('<div class="math math-display">$$x^2 + y^2$$</div>\n');
      expect(slide.hasMath).toBe(true);
    });

    it('keeps $$…$$ at the end of a line inside its paragraph', async () => {
      const slide = await renderer.render('Euler wrote $$e^{i\\pi}$$\nand moved on.');
      expect(slide.html).toBe(
        '<p>Euler wrote <span class="math math-display">$$e^{i\\pi}$$</span>\nand moved on.</p>\n',
      );
      expect(slide.hasMath).toBe(true);
    });

    it('lets a display block on its own lines end the paragraph above it', async () => {
      const { html } = await renderer.render('Intro\n$$\nx^2\n$$');
      expect(html).toBe('<p>Intro</p>\n<div class="math math-display">$$x^2$$</div>\n');
    });

    it('does not treat prices as math', async () => {
      const slide = await renderer.render('Costs $5 and $10');
      expect(slide.hasMath).toBe(false);
      expect(slide.html).toBe('<p>Costs $5 and $10</p>\n');
    });

    it('keeps reference links local to their slide', async () => {
      const first = await renderer.render('[home][h]\n\n[h]: https://example.com');
      const second = await renderer.render('[home][h]');
      expect(first.html).toContain('<a href="https://example.com">home</a>');
      expect(second.html).toBe('<p>[home][h]</p>\n');
    });
  });

  describe('with highlighting', () => {
    it('highlights fenced code with the named shiki theme', async () => {
      const renderer = createMarkdownRenderer({ highlightStyle: 'github-dark' });
      const { html } = await renderer.render('```ts\nconst a: number = 1;\n```');
      expect(html).toContain('<pre class="shiki github-dark"');
    });

    it('renders unknown languages as plain highlighted text', async () => {
      const renderer = createMarkdownRenderer({ highlightStyle: 'github-dark' });
      const { html } = await renderer.render('```not-a-language\nhello\n```');
      expect(html).toContain('<pre class="shiki github-dark"');
      expect(html).toContain('hello');
    });
  });
});

describe('resolveHighlightTheme', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('accepts bundled theme names case-insensitively', () => {
    expect(resolveHighlightTheme('Dracula')).toBe('dracula');
  });

  it('falls back to monokai for unknown names', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    expect(resolveHighlightTheme('sparkly')).toBe('monokai');
    expect(warn).toHaveBeenCalledWith("[highlight] Unknown code_highlight style 'sparkly'. Falling back to 'monokai'.");
  });
});

describe('escapeHtml', () => {
  it('escapes markup and quotes', () => {
    expect(escapeHtml(`<a href="x">Tom & 'Jerry'</a>`)).toBe(
      '&lt;a href=&quot;x&quot;&gt;Tom &amp; &#039;Jerry&#039;&lt;/a&gt;',
    );
  });
});
