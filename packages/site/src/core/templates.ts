/**
 * Page templates
 *
 * Template functions take typed data and return the output text; nothing in
 * a page template depends on the build time, so a reused page and a freshly
 * rendered one are byte-identical.
 */

import { escapeHtml, type DirectoryNode, type Entity, type Page } from '@wikigarden/core';
import { scriptJson } from './html.js';

/** Site-wide values every template can use */
export interface SiteMeta {
  title: string;
  url?: string;
}

/** One row of the search index */
export interface SearchEntry {
  title: string;
  contents: string;
  title_path: string;
  link_path: string;
}

/** Pages modified a given number of whole weeks ago (-1: within the last day) */
export interface DigestBucket {
  weeksAgo: number;
  pages: Page[];
}

/** Contents of one directory listing page */
export interface DirectoryListing {
  directory: DirectoryNode;
  outputPath: string;
  entries: Entity[];
  subdirectories: Array<{ name: string; href: string }>;
  backlinks: Entity[];
}

export interface TemplateData {
  'page.html': { site: SiteMeta; page: Page; backlinks: Entity[] };
  'index.html': { site: SiteMeta; recentlyUpdated: Page[]; tree: DirectoryNode };
  'search.html': { site: SiteMeta; entries: SearchEntry[] };
  'lastweek.html': { site: SiteMeta; buckets: DigestBucket[] };
  'directory.html': { site: SiteMeta; listing: DirectoryListing };
  'atom.xml': { site: SiteMeta; feedTitle: string; selfPath: string; posts: Page[]; updated: string };
}

export type TemplateName = keyof TemplateData;

export type TemplateRenderer = <K extends TemplateName>(name: K, data: TemplateData[K]) => string;

function href(entity: Entity): string {
  return `/${encodeURI(entity.linkPath)}`;
}

function layout(site: SiteMeta, title: string, body: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>${escapeHtml(title)}</title>
<link rel="stylesheet" href="/style.css">
<link rel="stylesheet" href="/highlight.css">
<link rel="alternate" type="application/atom+xml" href="/atom.xml" title="${escapeHtml(site.title)}">
</head>
<body>
<nav><a href="/index.html">${escapeHtml(site.title)}</a> · <a href="/search.html">search</a> · <a href="/lastweek.html">recent</a></nav>
${body}
</body>
</html>
`;
}

function linkList(entities: Entity[]): string {
  if (entities.length === 0) return '';
  const items = entities.map(e => `<li><a href="${href(e)}">${escapeHtml(e.title)}</a></li>`);
  return `<ul>\n${items.join('\n')}\n</ul>`;
}

function renderTree(node: DirectoryNode): string {
  const items = node.children.map(child => {
    if (child.kind === 'leaf') {
      return `<li><a href="${href(child.entity)}">${escapeHtml(child.entity.title)}</a></li>`;
    }
    return `<li><details><summary>${escapeHtml(child.name)}</summary>\n${renderTree(child)}\n</details></li>`;
  });
  return `<ul>\n${items.join('\n')}\n</ul>`;
}

function pageTemplate({ site, page, backlinks }: TemplateData['page.html']): string {
  const backlinkSection = backlinks.length > 0
    ? `<section class="backlinks">\n<h2>Links to this page</h2>\n${linkList(backlinks)}\n</section>\n`
    : '';
  return layout(site, page.title, `<article>
<h1>${escapeHtml(page.title)}</h1>
<p class="dates">Created <time datetime="${page.dates.createdIso}">${page.dates.createdDisplay}</time> · Updated <time datetime="${page.dates.modifiedIso}">${page.dates.modifiedDisplay}</time></p>
${page.html ?? ''}
</article>
${backlinkSection}`);
}

function indexTemplate({ site, recentlyUpdated, tree }: TemplateData['index.html']): string {
  const recent = recentlyUpdated.map(p =>
    `<li><a href="${href(p)}">${escapeHtml(p.title)}</a> <time datetime="${p.dates.modifiedIso}">${p.dates.modifiedDisplay}</time></li>`);
  return layout(site, site.title, `<h1>${escapeHtml(site.title)}</h1>
<h2>Recently updated</h2>
<ul>
${recent.join('\n')}
</ul>
<h2>All pages</h2>
${renderTree(tree)}
`);
}

function searchTemplate({ site, entries }: TemplateData['search.html']): string {
  return layout(site, `Search · ${site.title}`, `<h1>Search</h1>
<input type="search" id="q" autofocus>
<ul id="results"></ul>
<script>
const INDEX = ${scriptJson(entries)};
const q = document.getElementById('q');
const results = document.getElementById('results');
q.addEventListener('input', () => {
  const term = q.value.trim().toLowerCase();
  results.innerHTML = '';
  if (!term) return;
  for (const entry of INDEX) {
    if (entry.title.toLowerCase().includes(term) || entry.contents.toLowerCase().includes(term)) {
      const li = document.createElement('li');
      const a = document.createElement('a');
      a.href = '/' + entry.link_path;
      a.textContent = entry.title;
      li.appendChild(a);
      results.appendChild(li);
    }
  }
});
</script>
`);
}

function weekLabel(weeksAgo: number): string {
  if (weeksAgo < 0) return 'Today';
  if (weeksAgo === 0) return 'This week';
  if (weeksAgo === 1) return 'Last week';
  return `${weeksAgo} weeks ago`;
}

function lastweekTemplate({ site, buckets }: TemplateData['lastweek.html']): string {
  const sections = buckets.map(b => `<h2>${weekLabel(b.weeksAgo)}</h2>\n${linkList(b.pages)}`);
  return layout(site, `Recently updated · ${site.title}`, `<h1>Recently updated</h1>
${sections.join('\n')}
`);
}

function directoryTemplate({ site, listing }: TemplateData['directory.html']): string {
  const subdirs = listing.subdirectories.map(d => `<li><a href="${d.href}">${escapeHtml(d.name)}/</a></li>`);
  const backlinkSection = listing.backlinks.length > 0
    ? `<h2>Links into this folder</h2>\n${linkList(listing.backlinks)}\n`
    : '';
  return layout(site, listing.directory.name, `<h1>${escapeHtml(listing.directory.name)}</h1>
${subdirs.length > 0 ? `<ul class="folders">\n${subdirs.join('\n')}\n</ul>\n` : ''}${linkList(listing.entries)}
${backlinkSection}`);
}

function atomTemplate({ site, feedTitle, selfPath, posts, updated }: TemplateData['atom.xml']): string {
  const base = site.url ? site.url.replace(/\/$/, '') : '';
  const entries = posts.map(p => {
    const link = `${base}/${encodeURI(p.linkPath)}`;
    const id = base ? link : `urn:wikigarden:${encodeURI(p.titlepath)}`;
    return `  <entry>
    <title>${escapeHtml(p.title)}</title>
    <link href="${escapeHtml(link)}"/>
    <id>${escapeHtml(id)}</id>
    <published>${p.dates.createdIso}</published>
    <updated>${p.dates.modifiedIso}</updated>
    <content type="html">${p.escapedHtml ?? ''}</content>
  </entry>`;
  });
  const feedId = base ? `${base}/${selfPath}` : `urn:wikigarden:feed:${encodeURI(selfPath)}`;
  return `<?xml version="1.0" encoding="utf-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title>${escapeHtml(feedTitle)}</title>
  <link href="${escapeHtml(`${base}/${selfPath}`)}" rel="self"/>
  <id>${escapeHtml(feedId)}</id>
  <updated>${updated}</updated>
${entries.join('\n')}
</feed>
`;
}

const TEMPLATES: { [K in TemplateName]: (data: TemplateData[K]) => string } = {
  'page.html': pageTemplate,
  'index.html': indexTemplate,
  'search.html': searchTemplate,
  'lastweek.html': lastweekTemplate,
  'directory.html': directoryTemplate,
  'atom.xml': atomTemplate,
};

/**
 * Render a named template
 */
export function renderTemplate<K extends TemplateName>(name: K, data: TemplateData[K]): string {
  const template = TEMPLATES[name];
  return template(data);
}
