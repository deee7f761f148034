/**
 * Wikilink token parsing
 *
 * Tokens are scanned from raw Markdown with a non-greedy [[...]] match. Code
 * spans are not skipped, so text like df[["a", "b"]] yields a token that
 * will simply fail to resolve.
 */

/** Matches [[...]] on one line, capturing the inside */
export const WIKILINK_PATTERN = /\[\[(.*?)\]\]/g;

/** Matches ![[...]] embeds */
export const EMBED_PATTERN = /!\[\[(.*?)\]\]/g;

/** A wikilink token split into its parts */
export interface Wikilink {
  target: string;   // page title, path/title, or attachment name
  alias?: string;   // display text after |
  anchor?: string;  // heading after #
}

/**
 * Parse the inside of [[...]]: "Path/Title#Anchor|Alias".
 *
 * The alias is everything after the first pipe; the anchor is taken from the
 * target part only.
 */
export function parseWikilink(raw: string): Wikilink {
  let target = raw;
  let alias: string | undefined;

  const pipe = target.indexOf('|');
  if (pipe !== -1) {
    alias = target.slice(pipe + 1).trim() || undefined;
    target = target.slice(0, pipe);
  }

  let anchor: string | undefined;
  const hash = target.indexOf('#');
  if (hash !== -1) {
    anchor = target.slice(hash + 1).trim() || undefined;
    target = target.slice(0, hash);
  }

  return { target: target.trim(), alias, anchor };
}

/**
 * Extract out-edge tokens from Markdown: every [[...]] span (embeds included),
 * with alias and anchor stripped. Empty targets such as [[#heading]] are dropped.
 */
export function extractLinkTokens(markdown: string): string[] {
  const tokens: string[] = [];
  for (const match of markdown.matchAll(WIKILINK_PATTERN)) {
    const { target } = parseWikilink(match[1]);
    if (target) {
      tokens.push(target);
    }
  }
  return tokens;
}
