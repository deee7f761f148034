/**
 * Markdown rendering
 *
 * Each pipeline builds its own Marked instance from the environment it is
 * given; nothing here is shared between builds.
 */

import { Marked } from 'marked';
import markedFootnote from 'marked-footnote';
import { slugifyAnchor } from '@wikigarden/core';
import type { Highlighter } from './highlight.js';

export type MarkdownRenderer = (source: string) => string;

/**
 * GFM with hard line breaks and raw HTML (the wikilink substitution emits
 * HTML). Headings get ids matching [[Page#Heading]] fragments; fenced code
 * goes through the highlighter. `[^n]` footnotes collect at the end.
 */
export function createMarkdownRenderer(highlight: Highlighter): MarkdownRenderer {
  const marked = new Marked({
    gfm: true,
    breaks: true,
    renderer: {
      heading(text: string, level: number, raw: string): string {
        return `<h${level} id="${slugifyAnchor(raw)}">${text}</h${level}>\n`;
      },
      code(code: string, infostring: string | undefined): string {
        const lang = (infostring ?? '').trim().split(/\s+/)[0];
        return `${highlight(code, lang || undefined)}\n`;
      },
    },
  });
  marked.use(markedFootnote());

  return (source: string): string => {
    const html = marked.parse(source);
    if (typeof html !== 'string') {
      throw new Error('Markdown renderer returned a promise; async extensions are not supported');
    }
    return html;
  };
}
