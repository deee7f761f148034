/**
 * Test utilities: in-memory pages and attachments, and temporary source trees
 */

import { mkdtemp, mkdir, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { BacklinkSet } from '../../src/backlinks.js';
import { canonicalizeTitle, joinLinkPath, outputName, sanitizeDirectory } from '../../src/canon.js';
import { extractLinkTokens } from '../../src/links.js';
import { withRenderings } from '../../src/timestamps.js';
import type { Attachment, FrontMatter, Page } from '../../src/types.js';

const DEFAULT_DATE = new Date('2024-01-15T12:00:00Z');

function splitRelPath(relPath: string): { dir: string; fileName: string } {
  const slash = relPath.lastIndexOf('/');
  return slash === -1
    ? { dir: '', fileName: relPath }
    : { dir: relPath.slice(0, slash), fileName: relPath.slice(slash + 1) };
}

/**
 * Build a page as the tree builder would, from a source-relative path
 * such as "notes/My Note.md".
 */
export function makePage(
  relPath: string,
  source = '',
  options: { modified?: Date; created?: Date; frontmatter?: FrontMatter } = {}
): Page {
  const { dir: rawDir, fileName } = splitRelPath(relPath);
  const dir = sanitizeDirectory(rawDir);
  const title = fileName.replace(/\.md$/, '');
  const canonTitle = canonicalizeTitle(title);
  const titlepath = joinLinkPath(dir, canonTitle);
  const modified = options.modified ?? DEFAULT_DATE;

  return {
    kind: 'page',
    key: `page:${titlepath}`,
    title,
    canonTitle,
    dir,
    fileName,
    absolutePath: `/vault/${relPath}`,
    linkPath: joinLinkPath(dir, outputName(fileName)),
    titlepath,
    links: extractLinkTokens(source),
    backlinks: new BacklinkSet(),
    frontmatter: options.frontmatter ?? {},
    dates: withRenderings({ created: options.created ?? modified, modified, source: 'frontmatter' }),
    source,
  };
}

/** Build an attachment from a source-relative path such as "images/pic 1.png" */
export function makeAttachment(relPath: string): Attachment {
  const { dir: rawDir, fileName } = splitRelPath(relPath);
  const dir = sanitizeDirectory(rawDir);
  const title = fileName.replace(/\.[^.]*$/, '');
  const linkPath = joinLinkPath(dir, fileName);

  return {
    kind: 'attachment',
    key: `attachment:${linkPath}`,
    title,
    canonTitle: canonicalizeTitle(title),
    dir,
    fileName,
    absolutePath: `/vault/${relPath}`,
    linkPath,
    links: [],
    backlinks: new BacklinkSet(),
  };
}

/**
 * Create a temporary source folder
 */
export async function createTempVault(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), 'wikigarden-test-'));
}

/**
 * Write a file inside the temporary folder, creating parent directories
 */
export async function writeVaultFile(
  vaultPath: string,
  relPath: string,
  content: string | Buffer
): Promise<string> {
  const fullPath = path.join(vaultPath, relPath);
  await mkdir(path.dirname(fullPath), { recursive: true });
  await writeFile(fullPath, content);
  return fullPath;
}

export async function cleanupTempVault(vaultPath: string): Promise<void> {
  await rm(vaultPath, { recursive: true, force: true });
}
