/**
 * Tree builder - walks the source directory into a FileTree and a ContentIndex
 *
 * Entries are visited in case-insensitive path order at every level, so the
 * tree, the index and everything rendered from them are reproducible. Any I/O
 * error aborts the walk.
 */

import * as fs from 'fs';
import * as path from 'path';
import { BacklinkSet } from './backlinks.js';
import { canonicalizeTitle, joinLinkPath, outputName, sanitizeDirectory } from './canon.js';
import { ContentIndex } from './contentIndex.js';
import { isDraft, splitFrontMatter } from './frontmatter.js';
import { extractLinkTokens } from './links.js';
import { buildLog } from './log.js';
import { resolveTimestamps, withRenderings, type HistorySource } from './timestamps.js';
import type { Attachment, DirectoryNode, Entity, FileTreeNode, Page } from './types.js';

/** Author scratch files and folders, never published */
const UNTITLED_NAMES = new Set(['Untitled', 'Untitled.md']);

/** Bytes inspected when deciding whether a file is an empty placeholder */
const EMPTY_PROBE_BYTES = 16;

/** ASCII whitespace, as bytes */
const WHITESPACE_BYTES = new Set([0x20, 0x09, 0x0a, 0x0b, 0x0c, 0x0d]);

/** Options for building the file tree */
export interface TreeOptions {
  /** Entry names skipped at every depth (exact match) */
  ignore?: Iterable<string>;
  /** Take timestamps from version history when front matter has none */
  useHistory?: boolean;
  /** History source; defaults to git */
  history?: HistorySource;
}

/** Result of walking the source directory */
export interface FileTreeResult {
  root: string;
  tree: DirectoryNode;
  index: ContentIndex;
  /** Pages excluded by `draft` front matter, parsed but never indexed */
  drafts: Page[];
}

/**
 * True if a file has no non-whitespace bytes among its first 16.
 * Reads raw bytes so binary files are never decoded.
 */
export async function isEmptyFile(absolutePath: string): Promise<boolean> {
  const handle = await fs.promises.open(absolutePath, 'r');
  try {
    const probe = Buffer.alloc(EMPTY_PROBE_BYTES);
    const { bytesRead } = await handle.read(probe, 0, EMPTY_PROBE_BYTES, 0);
    for (let i = 0; i < bytesRead; i++) {
      if (!WHITESPACE_BYTES.has(probe[i])) return false;
    }
    return true;
  } finally {
    await handle.close();
  }
}

function compareEntries(a: fs.Dirent, b: fs.Dirent): number {
  const la = a.name.toLowerCase();
  const lb = b.name.toLowerCase();
  if (la !== lb) return la < lb ? -1 : 1;
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

async function buildPage(
  absolutePath: string,
  relDir: string,
  fileName: string,
  options: TreeOptions
): Promise<Page> {
  const raw = await fs.promises.readFile(absolutePath, 'utf-8');
  const { frontmatter, content } = splitFrontMatter(raw, absolutePath);

  const dir = sanitizeDirectory(relDir);
  const title = path.parse(fileName).name;
  const canonTitle = canonicalizeTitle(title);
  const titlepath = joinLinkPath(dir, canonTitle);

  const timestamps = await resolveTimestamps(frontmatter, absolutePath, {
    useHistory: options.useHistory ?? false,
    history: options.history,
  });

  return {
    kind: 'page',
    key: `page:${titlepath}`,
    title,
    canonTitle,
    dir,
    fileName,
    absolutePath,
    linkPath: joinLinkPath(dir, outputName(fileName)),
    titlepath,
    links: extractLinkTokens(content),
    backlinks: new BacklinkSet(),
    frontmatter,
    dates: withRenderings(timestamps),
    source: content,
  };
}

function buildAttachment(absolutePath: string, relDir: string, fileName: string): Attachment {
  const dir = sanitizeDirectory(relDir);
  const title = path.parse(fileName).name;
  const linkPath = joinLinkPath(dir, fileName);

  return {
    kind: 'attachment',
    key: `attachment:${linkPath}`,
    title,
    canonTitle: canonicalizeTitle(title),
    dir,
    fileName,
    absolutePath,
    linkPath,
    links: [],
    backlinks: new BacklinkSet(),
  };
}

async function isDirectoryEntry(entry: fs.Dirent, fullPath: string): Promise<boolean> {
  if (entry.isDirectory()) return true;
  if (entry.isSymbolicLink()) {
    const stats = await fs.promises.stat(fullPath);
    return stats.isDirectory();
  }
  return false;
}

/**
 * Walk `rootDir` and build the file tree plus the page and attachment indices.
 */
export async function buildFileTree(rootDir: string, options: TreeOptions = {}): Promise<FileTreeResult> {
  const root = path.resolve(rootDir);
  const ignore = new Set(options.ignore ?? []);
  const index = new ContentIndex();
  const drafts: Page[] = [];

  async function walk(node: DirectoryNode): Promise<DirectoryNode> {
    const dirPath = path.join(root, node.path);
    const entries = await fs.promises.readdir(dirPath, { withFileTypes: true });
    entries.sort(compareEntries);

    for (const entry of entries) {
      const fullPath = path.join(dirPath, entry.name);
      const relPath = node.path ? `${node.path}/${entry.name}` : entry.name;

      if (ignore.has(entry.name)) {
        buildLog('walk', `Ignoring ${relPath}`);
        continue;
      }

      if (UNTITLED_NAMES.has(entry.name)) {
        buildLog('walk', `Ignoring untitled ${relPath}`);
        continue;
      }

      if (await isDirectoryEntry(entry, fullPath)) {
        // Appended even if nothing under it gets indexed
        node.children.push(await walk({ kind: 'directory', path: relPath, name: entry.name, children: [] }));
        continue;
      }

      if (!entry.isFile() && !entry.isSymbolicLink()) {
        continue;
      }

      if (await isEmptyFile(fullPath)) {
        buildLog('walk', `Ignoring empty file ${relPath}`);
        continue;
      }

      let entity: Entity;
      if (path.extname(entry.name) === '.md') {
        const page = await buildPage(fullPath, node.path, entry.name, options);
        if (isDraft(page.frontmatter)) {
          buildLog('walk', `Skipping draft ${relPath}`);
          drafts.push(page);
          continue;
        }
        index.addPage(page);
        entity = page;
      } else {
        const attachment = buildAttachment(fullPath, node.path, entry.name);
        index.addAttachment(attachment);
        entity = attachment;
      }

      const leaf: FileTreeNode = { kind: 'leaf', entity };
      node.children.push(leaf);
    }

    return node;
  }

  buildLog('walk', `Scanning ${root}`);
  const tree = await walk({ kind: 'directory', path: '', name: path.basename(root), children: [] });
  buildLog('walk', `Found ${index.pageCount} pages, ${index.attachmentCount} attachments, ${drafts.length} drafts`);

  return { root, tree, index, drafts };
}

/**
 * Depth-first search for the first directory whose own name is `name`
 */
export function findDirectory(tree: DirectoryNode, name: string): DirectoryNode | undefined {
  for (const child of tree.children) {
    if (child.kind !== 'directory') continue;
    if (child.name === name) return child;
    const nested = findDirectory(child, name);
    if (nested) return nested;
  }
  return undefined;
}

/**
 * Every entity under a directory, depth first, in tree order
 */
export function collectEntities(tree: DirectoryNode): Entity[] {
  const entities: Entity[] = [];
  for (const child of tree.children) {
    if (child.kind === 'leaf') {
      entities.push(child.entity);
    } else {
      entities.push(...collectEntities(child));
    }
  }
  return entities;
}

/** All directory nodes below (not including) the given one, depth first */
export function collectDirectories(tree: DirectoryNode): DirectoryNode[] {
  const dirs: DirectoryNode[] = [];
  for (const child of tree.children) {
    if (child.kind === 'directory') {
      dirs.push(child, ...collectDirectories(child));
    }
  }
  return dirs;
}
