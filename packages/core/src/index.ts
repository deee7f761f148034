/**
 * @wikigarden/core - content graph builder and wikilink resolver
 */

export * from './types.js';
export * from './errors.js';
export * from './html.js';
export * from './log.js';
export * from './canon.js';
export * from './frontmatter.js';
export * from './links.js';
export * from './timestamps.js';
export * from './contentIndex.js';
export * from './resolver.js';
export * from './backlinks.js';
export * from './substitute.js';
export * from './tree.js';
