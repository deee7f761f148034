/**
 * Tests for derived views
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'path';
import { ConfigError, buildFileTree, collectEntities, computeBacklinks } from '@wikigarden/core';
import {
  directoryListings,
  pagesUnder,
  publishedTree,
  recencyDigest,
  recentPages,
  resolveScopedFeeds,
  searchEntries,
} from '../src/core/views.js';
import { PNG_BYTES, createTempDir, makePage, removeTempDir, writeTreeFile } from './helpers/fixtures.js';

const NOW = new Date('2024-03-01T12:00:00Z');

describe('recencyDigest', () => {
  it('should bucket by whole weeks and end with the first page past 21 days', () => {
    const pages = [
      makePage('t40.md', '', new Date('2024-01-21T12:00:00Z')),
      makePage('t8.md', '', new Date('2024-02-22T12:00:00Z')),
      makePage('t0.md', '', new Date('2024-03-01T00:00:00Z')),
      makePage('t22.md', '', new Date('2024-02-08T12:00:00Z')),
      makePage('t3.md', '', new Date('2024-02-27T12:00:00Z')),
      makePage('t21.md', '', new Date('2024-02-09T12:00:00Z')),
      makePage('t10.md', '', new Date('2024-02-20T12:00:00Z')),
    ];

    const buckets = recencyDigest(pages, NOW).map(b => ({
      weeksAgo: b.weeksAgo,
      titles: b.pages.map(p => p.title),
    }));

    expect(buckets).toEqual([
      { weeksAgo: -1, titles: ['t0'] },
      { weeksAgo: 0, titles: ['t3'] },
      { weeksAgo: 1, titles: ['t8', 't10'] },
      { weeksAgo: 2, titles: ['t21'] },
      { weeksAgo: 3, titles: ['t22'] },
    ]);
  });

  it('should still show the newest page when nothing is recent', () => {
    const buckets = recencyDigest([
      makePage('old.md', '', new Date('2023-01-01T00:00:00Z')),
      makePage('older.md', '', new Date('2022-01-01T00:00:00Z')),
    ], NOW);

    // 425 days ago
    expect(buckets.map(b => ({ weeksAgo: b.weeksAgo, titles: b.pages.map(p => p.title) }))).toEqual([
      { weeksAgo: 60, titles: ['old'] },
    ]);
  });

  it('should be empty for no pages', () => {
    expect(recencyDigest([], NOW)).toEqual([]);
  });
});

describe('recentPages', () => {
  it('should take the newest pages, keeping walk order for ties', () => {
    const same = new Date('2024-02-01T00:00:00Z');
    const pages = [
      makePage('a.md', '', same),
      makePage('b.md', '', new Date('2024-02-10T00:00:00Z')),
      makePage('c.md', '', same),
    ];
    expect(recentPages(pages, 2).map(p => p.title)).toEqual(['b', 'a']);
    expect(recentPages(pages, 10).map(p => p.title)).toEqual(['b', 'a', 'c']);
  });
});

describe('searchEntries', () => {
  it('should index the link-substituted source', () => {
    const page = makePage('notes/A.md', 'See [[B]]');
    page.resolvedSource = 'See <a href="/notes/B.html">B</a>';

    expect(searchEntries([page])).toEqual([{
      title: 'A',
      contents: 'See <a href="/notes/B.html">B</a>',
      title_path: 'notes/a',
      link_path: 'notes/A.html',
    }]);
  });
});

describe('tree views', () => {
  let vaultPath: string;

  beforeEach(async () => {
    vaultPath = await createTempDir();
    await writeTreeFile(vaultPath, 'notes/A.md', 'See [[B]]');
    await writeTreeFile(vaultPath, 'notes/B.md', 'Hello');
    await writeTreeFile(vaultPath, 'notes/pic.png', PNG_BYTES);
    await writeTreeFile(vaultPath, 'notes/sub dir/C.md', 'Up to [[A]]');
    await writeTreeFile(vaultPath, 'Book Notes/D.md', 'Reading');
    await writeTreeFile(vaultPath, 'Top.md', '[[B]] and ![[pic.png]]');
  });

  afterEach(async () => {
    await removeTempDir(vaultPath);
  });

  it('should find scoped feed directories by name', async () => {
    const { tree } = await buildFileTree(vaultPath);

    const feeds = resolveScopedFeeds(tree, ['sub dir', 'Book Notes']);

    expect(feeds.map(f => [f.name, f.fileName, f.directory.path])).toEqual([
      ['sub dir', 'sub_dir.atom.xml', 'notes/sub dir'],
      ['Book Notes', 'Book_Notes.atom.xml', 'Book Notes'],
    ]);
  });

  it('should reject a feed for a missing directory', async () => {
    const { tree } = await buildFileTree(vaultPath);

    expect(() => resolveScopedFeeds(tree, ['journal'])).toThrow(ConfigError);
    expect(() => resolveScopedFeeds(tree, ['journal']))
      .toThrow('Feed "journal" names a directory that does not exist in the source tree');
  });

  it('should collect indexed pages under a directory', async () => {
    const { tree, index } = await buildFileTree(vaultPath);
    const [notes] = resolveScopedFeeds(tree, ['notes']);

    expect(pagesUnder(notes.directory, index).map(p => p.title)).toEqual(['A', 'B', 'C']);
  });

  it('should build one listing per directory below the root', async () => {
    const { tree, index } = await buildFileTree(vaultPath);
    computeBacklinks(index);

    const listings = directoryListings(tree, index);

    expect(listings.map(l => l.outputPath)).toEqual([
      'Book_Notes/index.html',
      'notes/index.html',
      'notes/sub_dir/index.html',
    ]);

    const notes = listings[1];
    expect(notes.entries.map(e => e.fileName)).toEqual(['A.md', 'B.md', 'pic.png']);
    expect(notes.subdirectories).toEqual([{ name: 'sub dir', href: '/notes/sub_dir/index.html' }]);
    expect(notes.backlinks.map(e => e.title)).toEqual(['C', 'A', 'Top']);

    const sub = listings[2];
    expect(sub.entries.map(e => e.title)).toEqual(['C']);
    expect(sub.subdirectories).toEqual([]);
    expect(sub.backlinks).toEqual([]);
  });

  it('should leave a displaced page out of the published tree', async () => {
    // Both directories sanitize to notes/sub_dir, so the later C replaces the earlier
    await writeTreeFile(vaultPath, 'notes/sub_dir/C.md', 'Second C');
    const { tree, index } = await buildFileTree(vaultPath);

    const published = collectEntities(publishedTree(tree, index))
      .map(e => path.relative(vaultPath, e.absolutePath).split(path.sep).join('/'));

    expect(published).toEqual([
      'Book Notes/D.md',
      'notes/A.md',
      'notes/B.md',
      'notes/pic.png',
      'notes/sub_dir/C.md',
      'Top.md',
    ]);
    expect(collectEntities(tree)).toHaveLength(7);
  });
});
