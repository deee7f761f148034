/**
 * Derived views - recency digest, search index, feeds and directory listings
 */

import {
  BacklinkSet,
  ConfigError,
  buildLog,
  collectDirectories,
  collectEntities,
  findDirectory,
  joinLinkPath,
  sanitizeDirectory,
  sanitizePathSegment,
  type ContentIndex,
  type DirectoryNode,
  type Entity,
  type FileTreeNode,
  type Page,
} from '@wikigarden/core';
import type { DigestBucket, DirectoryListing, SearchEntry } from './templates.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/** The first page older than this many days is the digest's last */
const DIGEST_MAX_DAYS = 21;

/** Newest first; ties keep walk order */
export function byModifiedDesc(pages: readonly Page[]): Page[] {
  return [...pages].sort((a, b) => b.dates.modified.getTime() - a.dates.modified.getTime());
}

/** The `count` most recently modified pages */
export function recentPages(pages: readonly Page[], count: number): Page[] {
  return byModifiedDesc(pages).slice(0, count);
}

/**
 * Bucket pages by whole weeks since modification: floor((daysAgo - 1) / 7),
 * newest first. The first page older than 21 days is included and ends the
 * digest. Pages touched within the last day land in bucket -1.
 */
export function recencyDigest(pages: readonly Page[], now: Date): DigestBucket[] {
  const buckets: DigestBucket[] = [];

  for (const page of byModifiedDesc(pages)) {
    const daysAgo = Math.floor((now.getTime() - page.dates.modified.getTime()) / DAY_MS);
    const weeksAgo = Math.floor((daysAgo - 1) / 7);
    const last = buckets[buckets.length - 1];
    if (last && last.weeksAgo === weeksAgo) {
      last.pages.push(page);
    } else {
      buckets.push({ weeksAgo, pages: [page] });
    }

    if (daysAgo > DIGEST_MAX_DAYS) break;
  }

  return buckets;
}

/** Search index rows, using the link-substituted source */
export function searchEntries(pages: readonly Page[]): SearchEntry[] {
  return pages.map(page => ({
    title: page.title,
    contents: page.resolvedSource ?? page.source,
    title_path: page.titlepath,
    link_path: page.linkPath,
  }));
}

/** A feed limited to one subtree */
export interface ScopedFeed {
  name: string;
  fileName: string;
  directory: DirectoryNode;
}

/**
 * Find the subtree for each requested feed. A name with no matching
 * directory is a configuration error.
 */
export function resolveScopedFeeds(tree: DirectoryNode, names: readonly string[]): ScopedFeed[] {
  return names.map(name => {
    const directory = findDirectory(tree, name);
    if (!directory) {
      throw new ConfigError(`Feed "${name}" names a directory that does not exist in the source tree`);
    }
    return { name, fileName: `${sanitizePathSegment(name)}.atom.xml`, directory };
  });
}

/** Indexed pages anywhere under a directory */
export function pagesUnder(directory: DirectoryNode, index: ContentIndex): Page[] {
  return collectEntities(directory).filter(
    (e): e is Page => e.kind === 'page' && index.isIndexed(e)
  );
}

function isListed(entity: Entity, index: ContentIndex): boolean {
  return entity.kind === 'attachment' || index.isIndexed(entity);
}

/**
 * A copy of the tree holding only entities that get output. A page displaced
 * from the index by a later one with the same titlepath is left out.
 */
export function publishedTree(tree: DirectoryNode, index: ContentIndex): DirectoryNode {
  const children: FileTreeNode[] = [];
  for (const child of tree.children) {
    if (child.kind === 'directory') {
      children.push(publishedTree(child, index));
    } else if (isListed(child.entity, index)) {
      children.push(child);
    }
  }
  return { ...tree, children };
}

/** Output path of a directory's listing page */
export function listingPath(directory: DirectoryNode): string {
  return joinLinkPath(sanitizeDirectory(directory.path), 'index.html');
}

/** An indexed page in the directory whose output is the listing's own path */
function folderNote(directory: DirectoryNode, index: ContentIndex): Page | undefined {
  const outputPath = listingPath(directory).toLowerCase();
  for (const child of directory.children) {
    if (child.kind === 'leaf' && child.entity.kind === 'page'
      && index.isIndexed(child.entity) && child.entity.linkPath.toLowerCase() === outputPath) {
      return child.entity;
    }
  }
  return undefined;
}

/**
 * One listing per directory below the root: its immediate pages, attachments
 * and subdirectories, plus the union of its direct children's backlinks.
 * A directory holding its own index.md keeps that page and gets no listing.
 */
export function directoryListings(tree: DirectoryNode, index: ContentIndex): DirectoryListing[] {
  const listings: DirectoryListing[] = [];

  for (const directory of collectDirectories(tree)) {
    const note = folderNote(directory, index);
    if (note) {
      buildLog('views', `Skipping listing for ${directory.path}: ${note.linkPath} is a page`, 'warn');
      continue;
    }

    const entries: Entity[] = [];
    const subdirectories: DirectoryListing['subdirectories'] = [];
    const backlinks = new BacklinkSet();

    for (const child of directory.children) {
      if (child.kind === 'directory') {
        subdirectories.push({ name: child.name, href: `/${encodeURI(listingPath(child))}` });
      } else if (isListed(child.entity, index)) {
        entries.push(child.entity);
        backlinks.addAll(child.entity.backlinks);
      }
    }

    const backlinkEntities: Entity[] = [];
    for (const key of backlinks.keys()) {
      const entity = index.get(key);
      if (entity) backlinkEntities.push(entity);
    }

    listings.push({
      directory,
      outputPath: listingPath(directory),
      entries,
      subdirectories,
      backlinks: backlinkEntities,
    });
  }

  return listings;
}
