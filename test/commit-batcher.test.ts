import { describe, expect, it } from 'vitest';
import { CatalogStore } from '../src/catalog.js';
import type { CatalogDocument } from '../src/catalog.js';
import { CommitBatcher } from '../src/commit-batcher.js';
import { SourceNotFound } from '../src/errors.js';
import { WriteGate } from '../src/write-gate.js';
import type { PendingRecord } from '../src/types.js';
import { sourceInput } from './helpers/fixtures.js';

class FailingStore extends CatalogStore {
  protected async persist(_document: CatalogDocument): Promise<void> {
    throw new Error('disk full');
  }
}

class FailOnceStore extends CatalogStore {
  saved: CatalogDocument[] = [];
  private failed = false;

  protected async persist(document: CatalogDocument): Promise<void> {
    if (!this.failed) {
      this.failed = true;
      throw new Error('disk full');
    }
    this.saved.push(document);
  }
}

function records(): PendingRecord[] {
  return [
    { index: 5, title: 'One', pageURL: 'https://comic.test/1', imageURL: 'https://comic.test/1a.png' },
    { index: 6, title: 'One', pageURL: 'https://comic.test/1', imageURL: 'https://comic.test/1b.png' },
    { index: 7, title: 'Two', pageURL: 'https://comic.test/2', imageURL: 'https://comic.test/2.png' }
  ];
}

describe('CommitBatcher', () => {
  it('groups records by page URL and numbers pages after the current maximum', async () => {
    const store = new CatalogStore();
    const source = store.addSource(sourceInput());
    const batcher = new CommitBatcher(store, new WriteGate());
    const pending = records();

    await expect(batcher.flush(source.id, pending)).resolves.toEqual({ pagesCreated: 2, imagesCreated: 3 });

    const pages = store.pages(source.id);
    expect(pages.map((p) => [p.index, p.title, p.url])).toEqual([
      [1, 'One', 'https://comic.test/1'],
      [2, 'Two', 'https://comic.test/2']
    ]);
    expect(pages[0].images.map((i) => [i.index, i.url, i.downloadPath])).toEqual([
      [0, 'https://comic.test/1a.png', ''],
      [1, 'https://comic.test/1b.png', '']
    ]);
    expect(pages[0].images[0].pageId).toBe(pages[0].id);
    expect(pending).toHaveLength(0);
    expect(source.pageCount).toBe(2);
    expect(source.imageCount).toBe(3);
    expect(store.commits).toBe(1);
  });

  it('continues numbering across batches', async () => {
    const store = new CatalogStore();
    const source = store.addSource(sourceInput());
    const batcher = new CommitBatcher(store, new WriteGate());

    await batcher.flush(source.id, records());
    await batcher.flush(source.id, [
      { index: 1, title: '', pageURL: 'https://comic.test/3', imageURL: 'https://comic.test/3.png' }
    ]);

    expect(store.pages(source.id).map((p) => p.index)).toEqual([1, 2, 3]);
  });

  it('takes the batch back out when the commit fails', async () => {
    const store = new FailingStore();
    const source = store.addSource(sourceInput());
    const batcher = new CommitBatcher(store, new WriteGate());
    const pending = records();

    await expect(batcher.flush(source.id, pending)).rejects.toThrow('disk full');

    expect(store.pages(source.id)).toHaveLength(0);
    expect(source.pageCount).toBe(0);
    expect(source.imageCount).toBe(0);
    expect(pending).toHaveLength(3);
    expect(store.commits).toBe(0);
  });

  it('waits for a paused gate before touching the store', async () => {
    const store = new CatalogStore();
    const source = store.addSource(sourceInput());
    const gate = new WriteGate();
    gate.pause();

    const flushing = new CommitBatcher(store, gate).flush(source.id, records());
    await new Promise((resolve) => setTimeout(resolve, 10));
    expect(store.pages(source.id)).toHaveLength(0);

    gate.resume();
    await flushing;
    expect(store.pages(source.id)).toHaveLength(2);
  });

  it('rolls back before a waiting writer gets the gate', async () => {
    const store = new FailOnceStore();
    const source = store.addSource(sourceInput());
    const gate = new WriteGate();
    gate.pause();

    const flushing = new CommitBatcher(store, gate).flush(source.id, records());
    const otherCommit = gate.runExclusive(() => store.commit());
    gate.resume();

    await expect(flushing).rejects.toThrow('disk full');
    await otherCommit;
    expect(store.saved).toHaveLength(1);
    expect(store.saved[0].pages).toHaveLength(0);
    expect(store.saved[0].sources[0].pageCount).toBe(0);
    expect(gate.isPaused()).toBe(false);
  });

  it('does nothing for an empty batch', async () => {
    const store = new CatalogStore();
    const source = store.addSource(sourceInput());

    await expect(new CommitBatcher(store, new WriteGate()).flush(source.id, [])).resolves.toEqual({
      pagesCreated: 0,
      imagesCreated: 0
    });
    expect(store.commits).toBe(0);
  });

  it('rejects an unknown source', async () => {
    const store = new CatalogStore();
    await expect(new CommitBatcher(store, new WriteGate()).flush('missing', records())).rejects.toBeInstanceOf(
      SourceNotFound
    );
  });
});
