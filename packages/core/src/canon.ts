/**
 * Path and title canonicalization
 *
 * Every page is indexed under a titlepath (sanitized directory + lower-cased
 * title); wikilink tokens go through canonicalPath() to land in the same
 * identity space.
 */

/** Characters allowed in output path segments */
const UNSAFE_PATH_CHARS = /[^A-Za-z0-9_.~-]/g;

const MARKDOWN_SUFFIX = /\.md$/;

/** Runs of non-word characters, collapsed to a dash in anchors */
const NON_WORD_RUN = /\W+/g;

/**
 * Canonical form of a title. ASCII-style lower-casing only.
 */
export function canonicalizeTitle(title: string): string {
  return title.toLowerCase();
}

/**
 * Replace every character outside [A-Za-z0-9_.~-] with an underscore
 */
export function sanitizePathSegment(segment: string): string {
  return segment.replace(UNSAFE_PATH_CHARS, '_');
}

/**
 * Sanitize each segment of a relative directory path, keeping the separators.
 * Backslashes are treated as separators.
 */
export function sanitizeDirectory(dir: string): string {
  if (!dir) return '';
  return dir
    .replace(/\\/g, '/')
    .split('/')
    .map(sanitizePathSegment)
    .join('/');
}

/**
 * Turn a relative path or wikilink token into titlepath form.
 *
 * For example "Data Analytics/Duckdb" becomes "Data_Analytics/duckdb".
 */
export function canonicalPath(relativePath: string): string {
  const slash = relativePath.lastIndexOf('/');
  if (slash === -1) {
    return canonicalizeTitle(relativePath);
  }
  const dir = relativePath.slice(0, slash);
  const leaf = relativePath.slice(slash + 1);
  if (!dir) {
    return canonicalizeTitle(leaf);
  }
  return `${sanitizeDirectory(dir)}/${canonicalizeTitle(leaf)}`;
}

/**
 * Output file name for a Markdown source file: "My Note.md" -> "My_Note.html"
 */
export function outputName(fileName: string): string {
  return sanitizePathSegment(fileName).replace(MARKDOWN_SUFFIX, '.html');
}

/**
 * Join a sanitized directory and a name ('' means the source root)
 */
export function joinLinkPath(dir: string, name: string): string {
  return dir ? `${dir}/${name}` : name;
}

/**
 * Heading slug used both for rendered heading ids and for [[Page#Anchor]] fragments
 */
export function slugifyAnchor(text: string): string {
  return text.trimEnd().replace(NON_WORD_RUN, '-').toLowerCase();
}
