/**
 * Test utilities for the site pipeline
 */

import { mkdtemp, mkdir, rm, utimes, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import {
  BacklinkSet,
  canonicalizeTitle,
  joinLinkPath,
  outputName,
  sanitizeDirectory,
  withRenderings,
  type Page,
} from '@wikigarden/core';

export const PNG_BYTES = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x00, 0x00, 0x0d]);

/** An in-memory page at a source-relative path such as "notes/A.md" */
export function makePage(relPath: string, source = '', modified = new Date('2024-01-15T12:00:00Z')): Page {
  const slash = relPath.lastIndexOf('/');
  const dir = sanitizeDirectory(slash === -1 ? '' : relPath.slice(0, slash));
  const fileName = relPath.slice(slash + 1);
  const title = fileName.replace(/\.md$/, '');
  const canonTitle = canonicalizeTitle(title);
  const titlepath = joinLinkPath(dir, canonTitle);

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
    links: [],
    backlinks: new BacklinkSet(),
    frontmatter: {},
    dates: withRenderings({ created: modified, modified, source: 'filesystem' }),
    source,
  };
}

export async function createTempDir(prefix = 'wikigarden-site-'): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), prefix));
}

/**
 * Write a file under `root`, creating parent directories. With `mtime`, the
 * file's modification time is set as well.
 */
export async function writeTreeFile(
  root: string,
  relPath: string,
  content: string | Buffer,
  mtime?: Date
): Promise<string> {
  const fullPath = path.join(root, relPath);
  await mkdir(path.dirname(fullPath), { recursive: true });
  await writeFile(fullPath, content);
  if (mtime) {
    await utimes(fullPath, mtime, mtime);
  }
  return fullPath;
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}
