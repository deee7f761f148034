/**
 * Code block highlighting
 */

import hljs from 'highlight.js';
import { buildLog, escapeHtml } from '@wikigarden/core';

export type Highlighter = (code: string, lang: string | undefined) => string;

/**
 * Highlight a fenced code block. Blocks without a language, or with one
 * highlight.js doesn't know, are escaped but left uncoloured.
 */
export const highlight: Highlighter = (code, lang) => {
  if (!lang) {
    return `<div class="highlight"><pre><code>${escapeHtml(code)}</code></pre></div>`;
  }

  if (!hljs.getLanguage(lang)) {
    buildLog('render', `No highlighter for language "${lang}"`, 'warn');
    return `<div class="highlight"><pre><code>${escapeHtml(code)}</code></pre></div>`;
  }

  const { value } = hljs.highlight(code, { language: lang, ignoreIllegals: true });
  return `<div class="highlight"><pre><code class="hljs language-${escapeHtml(lang)}">${value}</code></pre></div>`;
};
