/**
 * Core types for the content graph
 */

import type { BacklinkSet } from './backlinks.js';

/** Parsed front matter: always a mapping */
export type FrontMatter = Record<string, unknown>;

/** Where a page's timestamps came from */
export type TimestampSource = 'frontmatter' | 'history' | 'filesystem';

/** A (created, modified) pair of absolute instants */
export interface Timestamps {
  created: Date;
  modified: Date;
  source: TimestampSource;
}

/** Timestamps plus their human and interchange renderings */
export interface PageDates extends Timestamps {
  createdIso: string;      // RFC 3339, local offset, second precision
  modifiedIso: string;
  createdDisplay: string;  // e.g. "Apr 08, 2022"
  modifiedDisplay: string;
}

/** Fields shared by every node of the content graph */
interface EntityCommon {
  key: string;             // arena key: "page:<titlepath>" or "attachment:<linkPath>"
  title: string;           // file stem, author casing
  canonTitle: string;      // lower-cased title
  dir: string;             // sanitized directory relative to the source root ('' at the root)
  fileName: string;        // name on disk
  absolutePath: string;
  linkPath: string;        // path used in generated URLs
  links: string[];         // raw out-edge tokens, alias and anchor stripped
  backlinks: BacklinkSet;  // keys of entities linking here
}

/** A Markdown note */
export interface Page extends EntityCommon {
  kind: 'page';
  titlepath: string;       // dir + canonical title, the primary index key
  frontmatter: FrontMatter;
  dates: PageDates;
  source: string;          // Markdown without front matter
  resolvedSource?: string; // source after embed and crosslink substitution
  html?: string;           // rendered HTML cache
  escapedHtml?: string;    // the same HTML escaped for feeds
}

/** Any non-Markdown file, copied verbatim */
export interface Attachment extends EntityCommon {
  kind: 'attachment';
}

export type Entity = Page | Attachment;

/** A directory of the source tree */
export interface DirectoryNode {
  kind: 'directory';
  path: string;            // raw path relative to the source root ('' for the root)
  name: string;            // last path segment
  children: FileTreeNode[];
}

/** A page or attachment in the source tree */
export interface LeafNode {
  kind: 'leaf';
  entity: Entity;
}

export type FileTreeNode = DirectoryNode | LeafNode;

