import { randomUUID } from 'crypto';
import type { CatalogStore } from './catalog.js';
import { SourceNotFound } from './errors.js';
import { commitGate } from './write-gate.js';
import type { WriteGate } from './write-gate.js';
import type { Page, PendingRecord } from './types.js';

export interface FlushResult {
  pagesCreated: number;
  imagesCreated: number;
}

/**
 * Turns buffered crawl records into pages and images and commits them as one
 * batch. Records sharing a page URL become one page; page indices continue
 * after the source's current maximum, whatever provisional index the records
 * carry.
 */
export class CommitBatcher {
  constructor(
    private store: CatalogStore,
    private gate: WriteGate = commitGate
  ) {}

  /**
   * Empties `pending` once the commit lands. If the commit fails the batch is
   * taken back out of the store and `pending` is left untouched for a retry.
   */
  async flush(sourceId: string, pending: PendingRecord[]): Promise<FlushResult> {
    if (pending.length === 0) {
      return { pagesCreated: 0, imagesCreated: 0 };
    }

    const source = this.store.getSource(sourceId);
    if (!source) {
      throw new SourceNotFound(sourceId);
    }

    const result = await this.gate.runExclusive(async () => {
      const pages = this.buildPages(sourceId, pending);
      const created = { pagesCreated: pages.length, imagesCreated: pending.length };

      // Rolled back inside the section: a writer waiting on the gate must
      // never save a batch whose own commit failed.
      this.store.insertPages(sourceId, pages);
      source.pageCount += created.pagesCreated;
      source.imageCount += created.imagesCreated;
      try {
        await this.store.commit();
      } catch (error) {
        this.store.removePages(sourceId, new Set(pages.map((p) => p.id)));
        source.pageCount -= created.pagesCreated;
        source.imageCount -= created.imagesCreated;
        throw error;
      }
      return created;
    });

    pending.splice(0, pending.length);
    return result;
  }

  private buildPages(sourceId: string, pending: PendingRecord[]): Page[] {
    const fetchedAt = new Date().toISOString();
    let nextIndex = this.store.maxPageIndex(sourceId) + 1;
    const pagesByURL = new Map<string, Page>();

    for (const record of pending) {
      let page = pagesByURL.get(record.pageURL);
      if (!page) {
        page = {
          id: randomUUID(),
          sourceId,
          index: nextIndex++,
          title: record.title,
          url: record.pageURL,
          fetchedAt,
          images: []
        };
        pagesByURL.set(record.pageURL, page);
      }
      page.images.push({
        id: randomUUID(),
        pageId: page.id,
        index: page.images.length,
        url: record.imageURL,
        downloadPath: ''
      });
    }

    return [...pagesByURL.values()];
  }
}
