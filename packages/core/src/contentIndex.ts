/**
 * Content index - the entity arena plus the lookup tables link resolution uses
 *
 * Pages:       titlepath -> page, canonical title -> pages sharing that title
 * Attachments: linkPath -> attachment, file name -> attachments with that name
 *
 * Every entity is also addressable by its arena key, which is what backlink
 * sets store.
 */

import { buildLog } from './log.js';
import type { Attachment, Entity, Page } from './types.js';

export class ContentIndex {
  private readonly entities = new Map<string, Entity>();
  private readonly pagesByTitlepath = new Map<string, Page>();
  private readonly pagesByTitle = new Map<string, Page[]>();
  private readonly attachmentsByLinkPath = new Map<string, Attachment>();
  private readonly attachmentsByFile = new Map<string, Attachment[]>();

  /**
   * Index a page under its titlepath. A later page with the same titlepath
   * replaces the earlier one, which stays in the file tree but is no longer
   * indexed or linkable.
   *
   * @returns The page that was replaced, if any
   */
  addPage(page: Page): Page | undefined {
    const previous = this.pagesByTitlepath.get(page.titlepath);
    if (previous) {
      buildLog('walk', `Duplicate titlepath "${page.titlepath}": ${page.absolutePath} replaces ${previous.absolutePath}`, 'warn');
      const sameTitle = this.pagesByTitle.get(previous.canonTitle) ?? [];
      this.pagesByTitle.set(previous.canonTitle, sameTitle.filter(p => p !== previous));
    }

    this.pagesByTitlepath.set(page.titlepath, page);
    this.entities.set(page.key, page);

    const sameTitle = this.pagesByTitle.get(page.canonTitle);
    if (sameTitle) {
      sameTitle.push(page);
    } else {
      this.pagesByTitle.set(page.canonTitle, [page]);
    }

    return previous;
  }

  addAttachment(attachment: Attachment): void {
    this.attachmentsByLinkPath.set(attachment.linkPath, attachment);
    this.entities.set(attachment.key, attachment);

    const sameName = this.attachmentsByFile.get(attachment.fileName);
    if (sameName) {
      sameName.push(attachment);
    } else {
      this.attachmentsByFile.set(attachment.fileName, [attachment]);
    }
  }

  /** Look up any entity by arena key */
  get(key: string): Entity | undefined {
    return this.entities.get(key);
  }

  getPage(titlepath: string): Page | undefined {
    return this.pagesByTitlepath.get(titlepath);
  }

  /** Pages sharing a canonical title, in walk order */
  pagesWithTitle(canonTitle: string): readonly Page[] {
    return this.pagesByTitle.get(canonTitle) ?? [];
  }

  getAttachment(linkPath: string): Attachment | undefined {
    return this.attachmentsByLinkPath.get(linkPath);
  }

  /** Attachments with this exact file name, in walk order */
  attachmentsNamed(fileName: string): readonly Attachment[] {
    return this.attachmentsByFile.get(fileName) ?? [];
  }

  /** True if this page object is the one indexed under its titlepath */
  isIndexed(page: Page): boolean {
    return this.pagesByTitlepath.get(page.titlepath) === page;
  }

  /** Indexed pages in walk order */
  pages(): Page[] {
    return Array.from(this.pagesByTitlepath.values());
  }

  /** Attachments in walk order */
  attachments(): Attachment[] {
    return Array.from(this.attachmentsByLinkPath.values());
  }

  /** Entities that link to the given one */
  backlinksOf(entity: Entity): Entity[] {
    const sources: Entity[] = [];
    for (const key of entity.backlinks.keys()) {
      const source = this.entities.get(key);
      if (source) sources.push(source);
    }
    return sources;
  }

  get pageCount(): number {
    return this.pagesByTitlepath.size;
  }

  get attachmentCount(): number {
    return this.attachmentsByLinkPath.size;
  }
}
