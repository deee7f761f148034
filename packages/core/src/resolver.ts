/**
 * Link resolver - turns a wikilink token into the page or attachment it names
 *
 * Pages are matched by titlepath ("notes/duckdb"), then by canonical title
 * ("duckdb"). Attachments are matched by file name or link path.
 */

import { canonicalPath, sanitizeDirectory, joinLinkPath } from './canon.js';
import { AmbiguousLinkError } from './errors.js';
import type { ContentIndex } from './contentIndex.js';
import type { Attachment, Entity, Page } from './types.js';

/**
 * What to do when a bare title matches several pages:
 * - first: take the earliest page in walk order
 * - error: fail the build with AmbiguousLinkError
 */
export type DuplicateTitlePolicy = 'first' | 'error';

export interface ResolveOptions {
  duplicateTitles?: DuplicateTitlePolicy;
}

const MARKDOWN_SUFFIX = /\.md$/i;

function findPage(index: ContentIndex, token: string, policy: DuplicateTitlePolicy): Page | undefined {
  const target = canonicalPath(token);

  const exact = index.getPage(target);
  if (exact) return exact;

  const sameTitle = index.pagesWithTitle(target);
  if (sameTitle.length > 1 && policy === 'error') {
    throw new AmbiguousLinkError(token, sameTitle.map(p => p.titlepath));
  }
  return sameTitle[0];
}

function findAttachment(index: ContentIndex, token: string): Attachment | undefined {
  const byName = index.attachmentsNamed(token);
  if (byName.length > 0) return byName[0];

  const direct = index.getAttachment(token);
  if (direct) return direct;

  // "Some Dir/pic.png" -> "Some_Dir/pic.png": directories are sanitized, names are not
  const slash = token.lastIndexOf('/');
  if (slash > 0) {
    return index.getAttachment(joinLinkPath(sanitizeDirectory(token.slice(0, slash)), token.slice(slash + 1)));
  }
  return undefined;
}

/**
 * Resolve a link token (alias and anchor already stripped).
 * Returns undefined if the token doesn't name any page or attachment.
 */
export function findTarget(
  index: ContentIndex,
  token: string,
  options: ResolveOptions = {}
): Entity | undefined {
  const policy = options.duplicateTitles ?? 'first';
  if (!token) return undefined;

  const page = findPage(index, token, policy)
    ?? (MARKDOWN_SUFFIX.test(token) ? findPage(index, token.replace(MARKDOWN_SUFFIX, ''), policy) : undefined);
  if (page) return page;

  return findAttachment(index, token);
}
