/**
 * Tests for the source tree walk
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir } from 'fs/promises';
import path from 'path';
import { FrontMatterError } from '../src/errors.js';
import { findTarget } from '../src/resolver.js';
import { clearBuildLog, getBuildLog } from '../src/log.js';
import {
  buildFileTree,
  collectDirectories,
  collectEntities,
  findDirectory,
  isEmptyFile,
} from '../src/tree.js';
import type { DirectoryNode, FileTreeNode } from '../src/types.js';
import { cleanupTempVault, createTempVault, writeVaultFile } from './helpers/fixtures.js';

const PNG_BYTES = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x00, 0x00, 0x0d]);

function childNames(node: DirectoryNode): string[] {
  return node.children.map((child: FileTreeNode) =>
    child.kind === 'directory' ? `${child.name}/` : child.entity.fileName
  );
}

describe('buildFileTree', () => {
  let vaultPath: string;

  beforeEach(async () => {
    vaultPath = await createTempVault();
    clearBuildLog();
  });

  afterEach(async () => {
    await cleanupTempVault(vaultPath);
  });

  it('should walk pages and attachments in case-insensitive order', async () => {
    await writeVaultFile(vaultPath, 'notes/A.md', 'See [[B]] and ![[pic.png]]');
    await writeVaultFile(vaultPath, 'notes/B.md', 'Hello');
    await writeVaultFile(vaultPath, 'notes/pic.png', PNG_BYTES);
    await writeVaultFile(vaultPath, 'Zeta.md', 'z');
    await writeVaultFile(vaultPath, 'alpha.md', 'a');

    const { tree, index } = await buildFileTree(vaultPath);

    expect(childNames(tree)).toEqual(['alpha.md', 'notes/', 'Zeta.md']);
    const notes = tree.children[1];
    expect(notes.kind).toBe('directory');
    if (notes.kind === 'directory') {
      expect(childNames(notes)).toEqual(['A.md', 'B.md', 'pic.png']);
    }

    expect(index.pages().map(p => p.titlepath)).toEqual(['alpha', 'notes/a', 'notes/b', 'zeta']);
    expect(index.attachments().map(a => a.linkPath)).toEqual(['notes/pic.png']);
  });

  it('should fill in page identity and raw links', async () => {
    await writeVaultFile(vaultPath, 'Data Analytics/My Note.md', 'See [[B|bee]] and ![[pic.png]]');

    const { index } = await buildFileTree(vaultPath);
    const page = index.getPage('Data_Analytics/my note');

    expect(page).toBeDefined();
    expect(page?.title).toBe('My Note');
    expect(page?.canonTitle).toBe('my note');
    expect(page?.dir).toBe('Data_Analytics');
    expect(page?.fileName).toBe('My Note.md');
    expect(page?.linkPath).toBe('Data_Analytics/My_Note.html');
    expect(page?.key).toBe('page:Data_Analytics/my note');
    expect(page?.links).toEqual(['B', 'pic.png']);
    expect(page?.source).toBe('See [[B|bee]] and ![[pic.png]]');
    expect(page?.dates.source).toBe('filesystem');
  });

  it('should keep raw directory names on directory nodes', async () => {
    await writeVaultFile(vaultPath, 'Data Analytics/Duckdb.md', 'x');

    const { tree } = await buildFileTree(vaultPath);
    const dir = tree.children[0];

    expect(dir).toMatchObject({ kind: 'directory', name: 'Data Analytics', path: 'Data Analytics' });
  });

  it('should skip ignored, untitled and empty entries', async () => {
    await writeVaultFile(vaultPath, 'keep.md', 'kept');
    await writeVaultFile(vaultPath, 'Untitled.md', 'scratch');
    await writeVaultFile(vaultPath, 'Untitled/inner.md', 'scratch');
    await writeVaultFile(vaultPath, 'empty.md', '   \n\t\n');
    await writeVaultFile(vaultPath, 'private/secret.md', 'hidden');
    await writeVaultFile(vaultPath, 'notes/private/also.md', 'hidden');

    const { tree, index } = await buildFileTree(vaultPath, { ignore: ['private'] });

    expect(childNames(tree)).toEqual(['keep.md', 'notes/']);
    expect(index.pages().map(p => p.titlepath)).toEqual(['keep']);

    const messages = getBuildLog({ component: 'walk' }).map(e => e.message);
    expect(messages).toContain('Ignoring empty file empty.md');
    expect(messages).toContain('Ignoring untitled Untitled.md');
    expect(messages).toContain('Ignoring untitled Untitled');
    expect(messages).toContain('Ignoring private');
    expect(messages).toContain('Ignoring notes/private');
  });

  it('should keep empty directories in the tree', async () => {
    await mkdir(path.join(vaultPath, 'empty-dir'));

    const { tree } = await buildFileTree(vaultPath);

    expect(tree.children).toEqual([{ kind: 'directory', path: 'empty-dir', name: 'empty-dir', children: [] }]);
  });

  it('should leave drafts out of the tree and the index', async () => {
    await writeVaultFile(vaultPath, 'B.md', 'Hello');
    await writeVaultFile(vaultPath, 'draft.md', '---\ndraft: true\n---\nSecret [[B]]');

    const { tree, index, drafts } = await buildFileTree(vaultPath);

    expect(childNames(tree)).toEqual(['B.md']);
    expect(drafts.map(d => d.title)).toEqual(['draft']);
    expect(index.getPage('draft')).toBeUndefined();
    expect(findTarget(index, 'draft')).toBeUndefined();
    expect(getBuildLog({ component: 'walk' }).map(e => e.message)).toContain('Skipping draft draft.md');
  });

  it('should take dates from front matter when both are present', async () => {
    await writeVaultFile(vaultPath, 'dated.md', '---\ncreated: 2022-04-08\nupdated: 2023-10-30\n---\nBody');

    const history = { revisions: vi.fn(async (_absolutePath: string) => null) };
    const { index } = await buildFileTree(vaultPath, { useHistory: true, history });
    const page = index.getPage('dated');

    expect(page?.dates.source).toBe('frontmatter');
    expect(page?.dates.created).toEqual(new Date('2022-04-08T00:00:00Z'));
    expect(page?.dates.modified).toEqual(new Date('2023-10-30T00:00:00Z'));
    expect(page?.source).toBe('Body');
    expect(history.revisions).not.toHaveBeenCalled();
  });

  it('should ask the history source when requested', async () => {
    const file = await writeVaultFile(vaultPath, 'tracked.md', 'Body');
    const created = new Date('2021-03-01T10:00:00Z');
    const modified = new Date('2021-09-01T10:00:00Z');
    const history = { revisions: vi.fn(async (_absolutePath: string) => ({ created, modified })) };

    const { index } = await buildFileTree(vaultPath, { useHistory: true, history });

    expect(history.revisions).toHaveBeenCalledWith(file);
    expect(index.getPage('tracked')?.dates).toMatchObject({ source: 'history', created, modified });
  });

  it('should index a note that opens with a horizontal rule', async () => {
    await writeVaultFile(vaultPath, 'Rule.md', '---\nSome notes after a rule\n\nMore text');

    const { index } = await buildFileTree(vaultPath);
    const page = index.getPage('rule');

    expect(page?.frontmatter).toEqual({});
    expect(page?.source).toBe('---\nSome notes after a rule\n\nMore text');
  });

  it('should fail the walk on front matter that is not a mapping', async () => {
    await writeVaultFile(vaultPath, 'bad.md', '---\n- a\n- b\n---\nBody');

    await expect(buildFileTree(vaultPath)).rejects.toThrow(FrontMatterError);
  });
});

describe('isEmptyFile', () => {
  let vaultPath: string;

  beforeEach(async () => {
    vaultPath = await createTempVault();
  });

  afterEach(async () => {
    await cleanupTempVault(vaultPath);
  });

  it('should only look at the first 16 bytes', async () => {
    const padded = await writeVaultFile(vaultPath, 'padded.md', `${' '.repeat(20)}x`);
    const text = await writeVaultFile(vaultPath, 'text.md', '\n\nHello');
    const empty = await writeVaultFile(vaultPath, 'empty.md', '');

    expect(await isEmptyFile(padded)).toBe(true);
    expect(await isEmptyFile(text)).toBe(false);
    expect(await isEmptyFile(empty)).toBe(true);
  });
});

describe('tree helpers', () => {
  let vaultPath: string;

  beforeEach(async () => {
    vaultPath = await createTempVault();
  });

  afterEach(async () => {
    await cleanupTempVault(vaultPath);
  });

  it('should find the first directory with a name, depth first', async () => {
    await writeVaultFile(vaultPath, 'a/journal/one.md', 'one');
    await writeVaultFile(vaultPath, 'journal/two.md', 'two');

    const { tree } = await buildFileTree(vaultPath);

    expect(findDirectory(tree, 'journal')?.path).toBe('a/journal');
    expect(findDirectory(tree, 'nope')).toBeUndefined();
  });

  it('should collect entities and directories in tree order', async () => {
    await writeVaultFile(vaultPath, 'a/one.md', 'one');
    await writeVaultFile(vaultPath, 'a/b/two.md', 'two');
    await writeVaultFile(vaultPath, 'three.md', 'three');

    const { tree } = await buildFileTree(vaultPath);

    expect(collectEntities(tree).map(e => e.title)).toEqual(['two', 'one', 'three']);
    expect(collectDirectories(tree).map(d => d.path)).toEqual(['a', 'a/b']);
  });
});
