/**
 * Write history timestamps into front matter
 *
 * Pages whose dates come from version history get `created` and `updated`
 * added to their front matter, so later builds no longer need the history.
 */

import * as fs from 'fs';
import * as path from 'path';
import matter from 'gray-matter';
import {
  buildFileTree,
  buildLog,
  collectEntities,
  formatRfc3339,
  type HistorySource,
  type Page,
} from '@wikigarden/core';

export interface AnnotateOptions {
  ignore?: Iterable<string>;
  history?: HistorySource;
}

/**
 * Annotate every page under `sourceDir`, drafts included, whose timestamps
 * were taken from history. Existing front matter keys are kept.
 *
 * @returns Source-relative paths of the rewritten files, sorted
 */
export async function annotateTimestamps(sourceDir: string, options: AnnotateOptions = {}): Promise<string[]> {
  const { root, tree, drafts } = await buildFileTree(sourceDir, {
    ignore: options.ignore,
    useHistory: true,
    history: options.history,
  });

  const pages = collectEntities(tree).filter((e): e is Page => e.kind === 'page');
  const annotated: string[] = [];

  for (const page of [...pages, ...drafts]) {
    if (page.dates.source !== 'history') continue;

    const text = matter.stringify(page.source, {
      ...page.frontmatter,
      created: formatRfc3339(page.dates.created),
      updated: formatRfc3339(page.dates.modified),
    });
    await fs.promises.writeFile(page.absolutePath, text, 'utf-8');

    const relPath = path.relative(root, page.absolutePath).split(path.sep).join('/');
    buildLog('timestamps', `Annotated ${relPath}`);
    annotated.push(relPath);
  }

  return annotated.sort();
}
