/**
 * Link substitution - rewrites wikilinks in Markdown source into HTML before
 * the Markdown renderer sees it.
 *
 * Embeds (![[file]]) run first, then crosslinks ([[Page|Alias]]). An embed
 * that resolves to nothing is removed; a crosslink that resolves to nothing
 * is left as its original text.
 */

import * as path from 'path';
import { slugifyAnchor } from './canon.js';
import { escapeHtml } from './html.js';
import { EMBED_PATTERN, WIKILINK_PATTERN, parseWikilink } from './links.js';
import { buildLog } from './log.js';
import { findTarget, type ResolveOptions } from './resolver.js';
import type { ContentIndex } from './contentIndex.js';
import type { Entity, Page } from './types.js';

/** MIME types of embeddable video formats */
const VIDEO_TYPES: Record<string, string> = {
  '.mov': 'video/quicktime',
  '.mp4': 'video/mp4',
  '.webm': 'video/webm',
};

/** A substitution that found no target */
export interface SubstitutionMiss {
  source: string;   // titlepath of the page being substituted
  token: string;
  kind: 'embed' | 'crosslink';
}

function href(entity: Entity, anchor = ''): string {
  return `/${encodeURI(entity.linkPath)}${anchor}`;
}

/**
 * Markup for an embedded attachment, chosen by the token's extension
 */
export function embedMarkup(token: string, target: Entity): string {
  if (target.kind === 'page') {
    return `<a href="${href(target)}">${escapeHtml(target.title)}</a>`;
  }

  const src = href(target);
  const ext = path.extname(token).toLowerCase();
  if (ext === '.pdf') {
    return `<iframe src="${src}" width="800" height="1200"></iframe>`;
  }
  const videoType = VIDEO_TYPES[ext];
  if (videoType) {
    return `<video controls><source src="${src}" type="${videoType}" /><a href="${src}">download</a></video>`;
  }
  return `<a href="${src}"><img src="${src}" style="max-width: 800px"></a>`;
}

/**
 * Replace every ![[file]] in the source with attachment markup
 */
export function substituteEmbeds(
  page: Page,
  source: string,
  index: ContentIndex,
  options: ResolveOptions = {},
  misses: SubstitutionMiss[] = []
): string {
  return source.replace(EMBED_PATTERN, (_match, inner: string) => {
    const { target: token } = parseWikilink(inner);
    const target = findTarget(index, token, options);
    if (!target) {
      buildLog('links', `Unable to find attachment "${token}" in ${page.title}`, 'error');
      misses.push({ source: page.titlepath, token, kind: 'embed' });
      return '';
    }
    return embedMarkup(token, target);
  });
}

/**
 * Replace every [[Page]], [[Page|Alias]] and [[Page#Anchor]] with an anchor tag
 */
export function substituteCrosslinks(
  page: Page,
  source: string,
  index: ContentIndex,
  options: ResolveOptions = {},
  misses: SubstitutionMiss[] = []
): string {
  return source.replace(WIKILINK_PATTERN, (match: string, inner: string) => {
    const { target: token, alias, anchor } = parseWikilink(inner);
    const target = findTarget(index, token, options);

    // Not every [[ is a link; leave the text as written
    if (!target) {
      buildLog('links', `Unable to find page "${token}" in ${page.title}`, 'warn');
      misses.push({ source: page.titlepath, token, kind: 'crosslink' });
      return match;
    }

    const fragment = anchor ? `#${slugifyAnchor(anchor)}` : '';
    return `<a href="${href(target, fragment)}">${escapeHtml(alias ?? token)}</a>`;
  });
}

/**
 * Run both substitution passes over every indexed page, exactly once per build,
 * storing the result in page.resolvedSource.
 */
export function prepareSources(index: ContentIndex, options: ResolveOptions = {}): SubstitutionMiss[] {
  const misses: SubstitutionMiss[] = [];
  for (const page of index.pages()) {
    const embedded = substituteEmbeds(page, page.source, index, options, misses);
    page.resolvedSource = substituteCrosslinks(page, embedded, index, options, misses);
  }
  return misses;
}
