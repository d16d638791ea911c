/**
 * Terminal rendering of model answers
 */

import { Marked } from 'marked';
import { markedTerminal } from 'marked-terminal';
import { errorMessage } from './errors.js';
import { createLogger } from './logger.js';

const logger = createLogger('markdown');

const MIN_WIDTH = 40;
const MAX_WIDTH = 100;

// Signals that an answer was written as markdown
const MARKDOWN_HINTS: readonly RegExp[] = [
  /^#{1,6}\s/m, // headings
  /\*\*[^*\n]+\*\*/, // bold
  /`[^`\n]+`/, // inline code
  /^```/m, // fences
  /^\s*[-*+]\s/m, // bullets
  /^\s*\d+\.\s/m, // numbered lists
  /\[[^\]\n]+\]\([^)\n]+\)/, // links
];

const renderers = new Map<number, Marked>();

/**
 * Wrap width for rendered answers, derived from the terminal when there is one
 */
export function terminalWidth(columns: number | undefined = process.stdout.columns): number {
  if (!columns || columns <= 0) {
    return MAX_WIDTH;
  }
  return Math.min(MAX_WIDTH, Math.max(MIN_WIDTH, columns - 2));
}

function rendererFor(width: number): Marked {
  let renderer = renderers.get(width);
  if (!renderer) {
    renderer = new Marked(
      markedTerminal({
        width,
        reflowText: true,
        showSectionPrefix: false,
        unescape: true,
        emoji: true,
        tab: 2,
      })
    );
    renderers.set(width, renderer);
  }
  return renderer;
}

export function containsMarkdown(text: string): boolean {
  return MARKDOWN_HINTS.some(hint => hint.test(text));
}

export function renderMarkdown(text: string, width: number = terminalWidth()): string {
  try {
    const rendered = rendererFor(width).parse(text);
    // Only async extensions produce a promise, and none are registered
    return typeof rendered === 'string' ? rendered.trimEnd() : text;
  } catch (error) {
    logger.debug(`Falling back to raw text: ${errorMessage(error)}`);
    return text;
  }
}

/**
 * Render an answer for display. Piped output keeps the raw markdown.
 */
export function formatForCLI(text: string, interactive: boolean = process.stdout.isTTY === true): string {
  return interactive && containsMarkdown(text) ? renderMarkdown(text) : text;
}
