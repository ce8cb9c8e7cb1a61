import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { randomUUID } from 'crypto';
import type { CatalogStore } from '../../src/catalog.js';
import type { Page, Source, SourceInput } from '../../src/types.js';

export function sourceInput(overrides: Partial<SourceInput> = {}): SourceInput {
  return {
    name: 'Test Comic',
    author: 'A. Artist',
    descriptionText: 'A comic used in tests',
    url: 'https://comic.test/',
    firstPageURL: 'https://comic.test/1',
    selectorImage: 'img.page',
    selectorTitle: 'h1',
    selectorNext: 'a.next',
    ...overrides
  };
}

/** HTML for one comic page in the shape the default selectors expect. */
export function comicPage(title: string, images: string[], next?: string): string {
  const imgs = images.map((src) => `<img class="page" src="${src}">`).join('\n');
  const link = next ? `<a class="next" href="${next}">Next</a>` : '';
  return `<html><body><h1>${title}</h1>\n${imgs}\n${link}</body></html>`;
}

/** Inserts a page with undownloaded images, keeping the source counters in step. */
export function addPage(store: CatalogStore, source: Source, index: number, imageURLs: string[], title = ''): Page {
  const id = randomUUID();
  const page: Page = {
    id,
    sourceId: source.id,
    index,
    title,
    url: `https://comic.test/${index}`,
    fetchedAt: new Date(0).toISOString(),
    images: imageURLs.map((url, i) => ({ id: randomUUID(), pageId: id, index: i, url, downloadPath: '' }))
  };
  store.insertPages(source.id, [page]);
  source.pageCount += 1;
  source.imageCount += imageURLs.length;
  return page;
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'comic-archiver-test-'));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}
