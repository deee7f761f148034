/**
 * Incremental page output
 *
 * A page file is rewritten only when its source is newer than the existing
 * output. The in-memory HTML is always populated, since feeds need it even
 * for pages whose file is reused.
 */

import * as fs from 'fs';
import * as path from 'path';
import { buildLog, escapeHtml, type ContentIndex, type Page } from '@wikigarden/core';
import type { MarkdownRenderer } from './markdown.js';
import type { SiteMeta, TemplateRenderer } from './templates.js';

/** What the page renderer needs from the pipeline */
export interface PageRenderContext {
  outputDir: string;
  site: SiteMeta;
  render: MarkdownRenderer;
  renderTemplate: TemplateRenderer;
}

export interface PageRenderResult {
  written: string[];   // link paths of files (re)written
  reused: string[];    // link paths of up-to-date files left alone
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Fill the page's HTML caches if they are empty. Safe to call repeatedly.
 */
export function ensureHtml(page: Page, render: MarkdownRenderer): void {
  if (page.html === undefined) {
    page.html = render(page.resolvedSource ?? page.source);
    page.escapedHtml = escapeHtml(page.html);
  }
}

/**
 * True if an output file exists and is newer than the page's modification time
 */
export async function isOutputFresh(page: Page, outputPath: string): Promise<boolean> {
  try {
    const stats = await fs.promises.stat(outputPath);
    return stats.mtimeMs > page.dates.modified.getTime();
  } catch (err) {
    if (isNotFound(err)) return false;
    throw err;
  }
}

/**
 * Render one page, writing its file unless the existing output is fresh.
 *
 * @returns true if the file was written
 */
export async function renderPage(page: Page, index: ContentIndex, ctx: PageRenderContext): Promise<boolean> {
  ensureHtml(page, ctx.render);

  const outputPath = path.join(ctx.outputDir, page.linkPath);
  if (await isOutputFresh(page, outputPath)) {
    return false;
  }

  const text = ctx.renderTemplate('page.html', {
    site: ctx.site,
    page,
    backlinks: index.backlinksOf(page),
  });
  await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });
  await fs.promises.writeFile(outputPath, text, 'utf-8');
  return true;
}

/**
 * Render every indexed page
 */
export async function renderPages(index: ContentIndex, ctx: PageRenderContext): Promise<PageRenderResult> {
  const result: PageRenderResult = { written: [], reused: [] };

  for (const page of index.pages()) {
    if (await renderPage(page, index, ctx)) {
      result.written.push(page.linkPath);
    } else {
      result.reused.push(page.linkPath);
    }
  }

  buildLog('render', `Pages: ${result.written.length} written, ${result.reused.length} up to date`);
  return result;
}
