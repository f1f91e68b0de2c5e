import { composeStylesheet, renderDeck, type RenderContext } from '../render/deck-template.js';
import { MATHJAX_URL } from '../config.js';

function context(overrides: Partial<RenderContext> = {}): RenderContext {
  return {
    slides: ['<h1>A</h1>\n', '<h1>B</h1>\n'],
    css: '.slide { color: navy; }',
    settings: { title: 'Deck', alignment: 'left', highlightStyle: null },
    hasMath: false,
    liveReload: false,
    ...overrides,
  };
}

describe('renderDeck', () => {
  it('wraps each slide in a section, the first one active', () => {
    const html = renderDeck(context());

    expect(html).toContain('<section class="slide active" id="slide-1" data-index="1">\n<h1>A</h1>\n</section>');
    expect(html).toContain('<section class="slide" id="slide-2" data-index="2">\n<h1>B</h1>\n</section>');
    expect(html).toContain('<span class="deck-current">1</span> / <span class="deck-total">2</span>');
  });

  it('escapes the title and sets the alignment class', () => {
    const html = renderDeck(
      context({ settings: { title: 'Q&A <live>', alignment: 'center', highlightStyle: null } }),
    );

    expect(html).toContain('<title>Q&amp;A &lt;live&gt;</title>');
    expect(html).toContain('<body class="align-center">');
  });

  it('inlines the theme stylesheet', () => {
    expect(renderDeck(context())).toContain('<style>\n.slide { color: navy; }\n  </style>');
  });

  it('loads MathJax only when a slide has math', () => {
    expect(renderDeck(context())).not.toContain(MATHJAX_URL);
    expect(renderDeck(context({ hasMath: true }))).toContain(`<script async src="${MATHJAX_URL}"></script>`);
  });

  it('embeds the live-reload client only when asked', () => {
    expect(renderDeck(context())).not.toContain('data-live-reload-path');
    expect(renderDeck(context({ liveReload: true }))).toContain('<script data-live-reload-path="/__livereload">');
  });

  it('renders an empty deck with a zero counter', () => {
    const html = renderDeck(context({ slides: [] }));

    expect(html).toContain('<main class="deck">\n\n</main>');
    expect(html).toContain('<span class="deck-current">0</span> / <span class="deck-total">0</span>');
  });

  it('produces identical output for identical input', () => {
    expect(renderDeck(context())).toBe(renderDeck(context()));
  });
});

describe('composeStylesheet', () => {
  it('returns the theme untouched when highlighting is off', () => {
    expect(composeStylesheet('body {}', false)).toBe('body {}');
  });

  it('appends code highlighting rules when on', () => {
    const css = composeStylesheet('body {}', true);
    expect(css.startsWith('body {}\n\n/* Code highlighting */\npre.shiki {')).toBe(true);
  });
});
