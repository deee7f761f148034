/**
 * Front matter splitting
 *
 * A note may open with a YAML block between two lines of three dashes. The
 * block must parse to a mapping: anything else is malformed input and fails
 * the build.
 */

import matter from 'gray-matter';
import { z } from 'zod';
import { FrontMatterError } from './errors.js';
import type { FrontMatter } from './types.js';

const FrontMatterSchema = z.record(z.string(), z.unknown());

/** An opening dashes line, then a closing one; anything else is body text */
const FRONT_MATTER_BLOCK = /^---[ \t]*\r?\n(?:[\s\S]*?\r?\n)?---[ \t]*(?:\r?\n|$)/;

/** Result of splitting a note into front matter and Markdown body */
export interface SplitNote {
  frontmatter: FrontMatter;
  content: string;
}

/**
 * Split front matter from the rest of the document and parse it.
 *
 * @param raw - Full file contents
 * @param file - Path used in error messages
 */
export function splitFrontMatter(raw: string, file: string): SplitNote {
  // A note may open with a horizontal rule and never close it
  if (!FRONT_MATTER_BLOCK.test(raw)) {
    return { frontmatter: {}, content: raw };
  }

  let parsed: matter.GrayMatterFile<string>;
  try {
    // Options object disables gray-matter's content-keyed cache
    parsed = matter(raw, { excerpt: false });
  } catch (err) {
    throw new FrontMatterError(file, `could not parse front matter: ${err instanceof Error ? err.message : String(err)}`);
  }

  // An empty or comment-only block parses to null/undefined
  const data: unknown = parsed.data ?? {};
  const result = FrontMatterSchema.safeParse(data);
  if (!result.success) {
    const got = Array.isArray(data) ? 'a list' : typeof data;
    throw new FrontMatterError(file, `expected front matter to be a mapping, got ${got}`);
  }

  return {
    frontmatter: result.data,
    content: parsed.content,
  };
}

/**
 * Truthiness of a front matter value: empty strings, zero, empty lists and
 * empty mappings are false, like an unset key.
 */
export function isTruthy(value: unknown): boolean {
  if (Array.isArray(value)) return value.length > 0;
  if (value instanceof Date) return true;
  if (value !== null && typeof value === 'object') return Object.keys(value).length > 0;
  return Boolean(value);
}

/** A page whose front matter marks it as a draft produces no output */
export function isDraft(frontmatter: FrontMatter): boolean {
  return isTruthy(frontmatter.draft);
}
