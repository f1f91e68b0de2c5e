/**
 * Deck document — assembles slide fragments, theme CSS and settings into one
 * self-contained HTML page.
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import { CLIENT_ASSETS_DIR, LIVE_RELOAD_PATH, MATHJAX_URL } from '../config.js';
import type { DeckSettings } from '../deck/settings.js';
import { escapeHtml } from './html.js';

export interface RenderContext {
  /** Rendered slide fragments, in source order. */
  slides: string[];
  /** Theme stylesheet, inlined as-is. */
  css: string;
  settings: DeckSettings;
  hasMath: boolean;
  liveReload: boolean;
}

type ClientAsset = 'navigation.js' | 'live-reload.js';

const clientAssets = new Map<ClientAsset, string>();

function loadClientAsset(name: ClientAsset): string {
  let script = clientAssets.get(name);
  if (script === undefined) {
    script = readFileSync(join(CLIENT_ASSETS_DIR, name), 'utf-8');
    clientAssets.set(name, script);
  }
  return script;
}

// Slide visibility and the navigation bar. Themes style everything else.
const STRUCTURAL_STYLES = `
.deck > .slide { display: none; }
.deck > .slide.active { display: block; }
.deck-controls { position: fixed; right: 1rem; bottom: 1rem; display: flex; align-items: center; gap: 0.5rem; z-index: 10; }
.deck-controls button { cursor: pointer; }
.deck-controls button:disabled { cursor: default; opacity: 0.4; }
@media print {
  .deck > .slide { display: block; page-break-after: always; break-after: page; }
  .deck-controls { display: none; }
}`;

// Highlighted blocks carry their colours inline; this only evens out spacing.
const HIGHLIGHT_STYLES = `pre.shiki { padding: 1em; border-radius: 6px; overflow-x: auto; line-height: 1.4; }
pre.shiki code { display: block; padding: 0; background: none; border-radius: 0; }`;

/**
 * Theme CSS plus, when code highlighting is on, the spacing rules for
 * highlighted blocks.
 */
export function composeStylesheet(themeCss: string, highlightEnabled: boolean): string {
  if (!highlightEnabled) return themeCss;
  return `${themeCss}\n\n/* Code highlighting */\n${HIGHLIGHT_STYLES}\n`;
}

function renderSlides(slides: string[]): string {
  return slides
    .map((html, i) => {
      const active = i === 0 ? ' active' : '';
      return `<section class="slide${active}" id="slide-${i + 1}" data-index="${i + 1}">\n${html}</section>`;
    })
    .join('\n');
}

function renderMathSupport(): string {
  return `  <script>window.MathJax = { tex: { inlineMath: [['$', '$']], displayMath: [['$$', '$$']] } };</script>
  <script async src="${MATHJAX_URL}"></script>
`;
}

function renderLiveReload(): string {
  return `<script data-live-reload-path="${LIVE_RELOAD_PATH}">
${loadClientAsset('live-reload.js')}</script>
`;
}

export function renderDeck({ slides, css, settings, hasMath, liveReload }: RenderContext): string {
  const total = slides.length;
  const first = total > 0 ? 1 : 0;

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(settings.title)}</title>
  <style>${STRUCTURAL_STYLES}
  </style>
  <style>
${css}
  </style>
${hasMath ? renderMathSupport() : ''}</head>
<body class="align-${settings.alignment}">
<main class="deck">
${renderSlides(slides)}
</main>
<nav class="deck-controls" aria-label="Slide navigation">
  <button type="button" class="deck-prev" aria-label="Previous slide">&larr;</button>
  <span class="deck-counter"><span class="deck-current">${first}</span> / <span class="deck-total">${total}</span></span>
  <button type="button" class="deck-next" aria-label="Next slide">&rarr;</button>
</nav>
<script>
${loadClientAsset('navigation.js')}</script>
${liveReload ? renderLiveReload() : ''}</body>
</html>
`;
}
