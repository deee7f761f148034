/**
 * Timestamp resolution
 *
 * A page's (created, modified) pair comes from the first available source,
 * taken as a whole pair:
 *   1. front matter with both `created` and `updated`
 *   2. version-control history, when requested
 *   3. filesystem metadata (mtime, and ctime standing in for creation time)
 */

import * as fs from 'fs';
import * as path from 'path';
import { simpleGit } from 'simple-git';
import { z } from 'zod';
import { FrontMatterError } from './errors.js';
import { buildLog } from './log.js';
import type { FrontMatter, PageDates, Timestamps } from './types.js';

/** Front matter dates arrive as YAML timestamps (Date) or as strings */
const FrontMatterDateSchema = z.union([z.date(), z.string().min(1)]).pipe(z.coerce.date());

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

/** Oldest and newest revision times of one file */
export interface RevisionTimes {
  created: Date;
  modified: Date;
}

/** A version history that can be asked about one file */
export interface HistorySource {
  /** Returns null when the file has no recorded history */
  revisions(absolutePath: string): Promise<RevisionTimes | null>;
}

interface GitDateFields {
  authored: string;
  committed: string;
}

/**
 * History source backed by `git log`, run in the file's own directory so the
 * notes may live in a different repository than this tool.
 *
 * One subprocess per file: this dominates build time on large trees.
 */
export class GitHistory implements HistorySource {
  async revisions(absolutePath: string): Promise<RevisionTimes | null> {
    const git = simpleGit({ baseDir: path.dirname(absolutePath) });
    const log = await git.log<GitDateFields>({
      // simple-git adds --follow when a single file is given
      file: path.basename(absolutePath),
      format: { authored: '%aI', committed: '%cI' },
    });

    if (log.all.length === 0) {
      return null;
    }

    // Newest first: modified is the latest commit, created the first authorship
    const newest = log.all[0];
    const oldest = log.all[log.all.length - 1];
    return {
      created: new Date(oldest.authored),
      modified: new Date(newest.committed),
    };
  }
}

/** Options for resolving timestamps */
export interface TimestampOptions {
  /** Ask the history source before falling back to the filesystem */
  useHistory: boolean;
  /** Defaults to GitHistory */
  history?: HistorySource;
}

function parseFrontMatterDate(value: unknown, key: string, file: string): Date {
  const result = FrontMatterDateSchema.safeParse(value);
  if (!result.success) {
    throw new FrontMatterError(file, `"${key}" is not a date: ${String(value)}`);
  }
  return result.data;
}

/**
 * Resolve the (created, modified) pair for one file.
 *
 * Never fails for a file without history; other history failures propagate.
 */
export async function resolveTimestamps(
  frontmatter: FrontMatter,
  absolutePath: string,
  options: TimestampOptions
): Promise<Timestamps> {
  const { created, updated } = frontmatter;
  if (created !== undefined && created !== null && updated !== undefined && updated !== null) {
    return {
      created: parseFrontMatterDate(created, 'created', absolutePath),
      modified: parseFrontMatterDate(updated, 'updated', absolutePath),
      source: 'frontmatter',
    };
  }

  if (options.useHistory) {
    const history = options.history ?? new GitHistory();
    const revisions = await history.revisions(absolutePath);
    if (revisions) {
      return { ...revisions, source: 'history' };
    }
    buildLog('timestamps', `No history for ${absolutePath}, using filesystem times`);
  }

  const stats = await fs.promises.stat(absolutePath);
  return {
    created: stats.ctime,
    modified: stats.mtime,
    source: 'filesystem',
  };
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Human date in local time: "Oct 30, 2023"
 */
export function formatDisplayDate(date: Date): string {
  return `${MONTHS[date.getMonth()]} ${pad2(date.getDate())}, ${date.getFullYear()}`;
}

/**
 * RFC 3339 timestamp in local time with its UTC offset, second precision:
 * "2023-10-30T08:18:52-04:00"
 */
export function formatRfc3339(date: Date): string {
  const offsetMinutes = -date.getTimezoneOffset();
  const sign = offsetMinutes >= 0 ? '+' : '-';
  const abs = Math.abs(offsetMinutes);
  const offset = `${sign}${pad2(Math.floor(abs / 60))}:${pad2(abs % 60)}`;

  return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}` +
    `T${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}${offset}`;
}

/**
 * Attach display and interchange renderings to a timestamp pair
 */
export function withRenderings(timestamps: Timestamps): PageDates {
  return {
    ...timestamps,
    createdIso: formatRfc3339(timestamps.created),
    modifiedIso: formatRfc3339(timestamps.modified),
    createdDisplay: formatDisplayDate(timestamps.created),
    modifiedDisplay: formatDisplayDate(timestamps.modified),
  };
}
