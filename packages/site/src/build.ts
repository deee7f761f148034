/**
 * Site build pipeline
 *
 * Strictly staged: walk -> backlinks -> link substitution -> render ->
 * derived views. Each stage finishes before the next starts.
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  GitHistory,
  buildFileTree,
  buildLog,
  computeBacklinks,
  formatRfc3339,
  prepareSources,
  type ContentIndex,
  type HistorySource,
  type SubstitutionMiss,
  type UnresolvedLink,
} from '@wikigarden/core';
import type { SiteConfig } from './config.js';
import { highlight, type Highlighter } from './core/highlight.js';
import { ensureHtml, renderPages } from './core/incremental.js';
import { copyStylesheets } from './core/stylesheets.js';
import { createMarkdownRenderer, type MarkdownRenderer } from './core/markdown.js';
import { renderTemplate, type SiteMeta, type TemplateRenderer } from './core/templates.js';
import {
  directoryListings,
  pagesUnder,
  publishedTree,
  recencyDigest,
  recentPages,
  resolveScopedFeeds,
  searchEntries,
} from './core/views.js';

export * from './config.js';
export type { SiteMeta, TemplateRenderer, TemplateData, TemplateName } from './core/templates.js';
export type { MarkdownRenderer } from './core/markdown.js';
export type { Highlighter } from './core/highlight.js';

/**
 * The collaborators a build runs with. Created once per build and passed in;
 * tests swap in a fake clock or history source.
 */
export interface SiteEnvironment {
  render: MarkdownRenderer;
  renderTemplate: TemplateRenderer;
  highlight: Highlighter;
  history: HistorySource;
  now: () => Date;
}

export function createEnvironment(overrides: Partial<SiteEnvironment> = {}): SiteEnvironment {
  const highlighter = overrides.highlight ?? highlight;
  return {
    highlight: highlighter,
    render: overrides.render ?? createMarkdownRenderer(highlighter),
    renderTemplate: overrides.renderTemplate ?? renderTemplate,
    history: overrides.history ?? new GitHistory(),
    now: overrides.now ?? (() => new Date()),
  };
}

export interface BuildResult {
  pages: number;
  attachments: number;
  drafts: number;
  unresolvedLinks: UnresolvedLink[];
  substitutionMisses: SubstitutionMiss[];
  written: string[];
  reused: string[];
  feeds: string[];
  durationMs: number;
}

async function writeOutput(outputDir: string, relPath: string, text: string): Promise<void> {
  const target = path.join(outputDir, relPath);
  await fs.promises.mkdir(path.dirname(target), { recursive: true });
  await fs.promises.writeFile(target, text, 'utf-8');
}

async function copyAttachments(index: ContentIndex, outputDir: string): Promise<void> {
  for (const attachment of index.attachments()) {
    const target = path.join(outputDir, attachment.linkPath);
    await fs.promises.mkdir(path.dirname(target), { recursive: true });
    await fs.promises.copyFile(attachment.absolutePath, target);
  }
}

/**
 * Build the site described by `config` into config.outputDir
 */
export async function buildSite(config: SiteConfig, env: SiteEnvironment = createEnvironment()): Promise<BuildResult> {
  const startTime = Date.now();
  const site: SiteMeta = { title: config.siteTitle, url: config.siteUrl };
  const resolveOptions = { duplicateTitles: config.duplicateTitles };

  const { tree, index, drafts } = await buildFileTree(config.sourceDir, {
    ignore: config.ignore,
    useHistory: config.useGitTimes,
    history: env.history,
  });

  // Fail on a bad feed name before anything is written
  const scopedFeeds = resolveScopedFeeds(tree, config.feeds);

  const unresolvedLinks = computeBacklinks(index, resolveOptions);

  const outputDir = path.resolve(config.outputDir);
  await fs.promises.mkdir(outputDir, { recursive: true });
  await copyAttachments(index, outputDir);
  await copyStylesheets(outputDir);

  const substitutionMisses = prepareSources(index, resolveOptions);
  const pages = index.pages();

  await writeOutput(outputDir, 'search.html', env.renderTemplate('search.html', {
    site,
    entries: searchEntries(pages),
  }));

  // Page HTML must exist before the feeds are written
  const { written, reused } = await renderPages(index, {
    outputDir,
    site,
    render: env.render,
    renderTemplate: env.renderTemplate,
  });

  const now = env.now();
  const updated = formatRfc3339(now);

  const recentlyUpdated = recentPages(pages, config.recent);
  await writeOutput(outputDir, 'index.html', env.renderTemplate('index.html', {
    site,
    recentlyUpdated,
    tree: publishedTree(tree, index),
  }));
  for (const page of recentlyUpdated) ensureHtml(page, env.render);
  await writeOutput(outputDir, 'atom.xml', env.renderTemplate('atom.xml', {
    site,
    feedTitle: site.title,
    selfPath: 'atom.xml',
    posts: recentlyUpdated,
    updated,
  }));

  const feeds = ['atom.xml'];
  for (const feed of scopedFeeds) {
    const posts = recentPages(pagesUnder(feed.directory, index), config.recent);
    for (const page of posts) ensureHtml(page, env.render);
    await writeOutput(outputDir, feed.fileName, env.renderTemplate('atom.xml', {
      site,
      feedTitle: `${site.title}: ${feed.name}`,
      selfPath: feed.fileName,
      posts,
      updated,
    }));
    feeds.push(feed.fileName);
  }

  await writeOutput(outputDir, 'lastweek.html', env.renderTemplate('lastweek.html', {
    site,
    buckets: recencyDigest(pages, now),
  }));

  for (const listing of directoryListings(tree, index)) {
    await writeOutput(outputDir, listing.outputPath, env.renderTemplate('directory.html', { site, listing }));
  }

  const durationMs = Date.now() - startTime;
  buildLog('build', `Built ${pages.length} pages, ${index.attachmentCount} attachments in ${durationMs}ms`);

  return {
    pages: pages.length,
    attachments: index.attachmentCount,
    drafts: drafts.length,
    unresolvedLinks,
    substitutionMisses,
    written,
    reused,
    feeds,
    durationMs,
  };
}
