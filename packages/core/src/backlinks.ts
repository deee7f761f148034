/**
 * Backlink graph
 *
 * After the walk, every page's raw out-edge tokens are resolved against the
 * index and the source page is recorded in the target's backlink set.
 */

import { buildLog } from './log.js';
import { findTarget, type ResolveOptions } from './resolver.js';
import type { ContentIndex } from './contentIndex.js';
import type { Page } from './types.js';

/**
 * Inbound references of one entity, stored as arena keys.
 *
 * Membership is by source title: two pages with the same title count as one
 * backlink, whichever is added first.
 */
export class BacklinkSet {
  private readonly byTitle = new Map<string, string>();

  /** @returns false if a page with this title was already present */
  add(source: Page): boolean {
    if (this.byTitle.has(source.title)) return false;
    this.byTitle.set(source.title, source.key);
    return true;
  }

  /** Add every member of another set */
  addAll(other: BacklinkSet): void {
    for (const [title, key] of other.byTitle) {
      if (!this.byTitle.has(title)) this.byTitle.set(title, key);
    }
  }

  has(source: Page): boolean {
    return this.byTitle.has(source.title);
  }

  /** Arena keys of the linking entities, in insertion order */
  keys(): string[] {
    return Array.from(this.byTitle.values());
  }

  get size(): number {
    return this.byTitle.size;
  }
}

/** A link token that matched nothing */
export interface UnresolvedLink {
  source: string;   // titlepath of the page containing the link
  token: string;
}

/**
 * Populate backlink sets for every indexed page's links.
 * Unresolved tokens are logged and returned; they never fail the build.
 */
export function computeBacklinks(index: ContentIndex, options: ResolveOptions = {}): UnresolvedLink[] {
  const unresolved: UnresolvedLink[] = [];

  for (const page of index.pages()) {
    for (const token of page.links) {
      const target = findTarget(index, token, options);
      if (!target) {
        buildLog('links', `Unable to find link "${token}" in ${page.title}`, 'warn');
        unresolved.push({ source: page.titlepath, token });
        continue;
      }
      target.backlinks.add(page);
    }
  }

  buildLog('links', `Backlinks computed: ${index.pageCount} pages, ${unresolved.length} unresolved links`);
  return unresolved;
}
