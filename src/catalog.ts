import { promises as fs } from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import { isNodeError } from './utils/file-utils.js';
import type { Image, Page, Source, SourceInput } from './types.js';

export interface ImageEntry {
  page: Page;
  image: Image;
}

export interface ImageScan {
  downloaded: boolean;
  offset: number;
  limit: number;
}

type StoredSource = Omit<Source, 'coverImage'> & { coverImage?: string };

export interface CatalogDocument {
  version: 1;
  sources: StoredSource[];
  pages: Page[];
}

function byIndex(a: { index: number }, b: { index: number }): number {
  return a.index - b.index;
}

/**
 * In-memory record store for sources, pages and images. Entities are plain
 * mutable objects; {@link CatalogStore.commit} makes the current state
 * durable. Subclasses decide where a commit goes by overriding `persist`.
 */
export class CatalogStore {
  protected sources = new Map<string, Source>();
  protected pagesBySource = new Map<string, Page[]>();
  private commitCount = 0;

  get commits(): number {
    return this.commitCount;
  }

  addSource(input: SourceInput): Source {
    const source: Source = {
      id: randomUUID(),
      ...input,
      pageCount: 0,
      imageCount: 0,
      downloadedImageCount: 0
    };
    this.sources.set(source.id, source);
    this.pagesBySource.set(source.id, []);
    return source;
  }

  getSource(id: string): Source | undefined {
    return this.sources.get(id);
  }

  listSources(): Source[] {
    return [...this.sources.values()];
  }

  /** Looks a source up by id, then by name (exact, then case-insensitive). */
  findSource(ref: string): Source | undefined {
    const byId = this.sources.get(ref);
    if (byId) return byId;
    const all = this.listSources();
    return all.find((s) => s.name === ref) ?? all.find((s) => s.name.toLowerCase() === ref.toLowerCase());
  }

  /** Pages of a source ordered by index. */
  pages(sourceId: string): readonly Page[] {
    return this.pagesBySource.get(sourceId) ?? [];
  }

  lastPages(sourceId: string, count: number): Page[] {
    const pages = this.pages(sourceId);
    return pages.slice(Math.max(0, pages.length - count));
  }

  maxPageIndex(sourceId: string): number {
    const pages = this.pages(sourceId);
    return pages.length > 0 ? pages[pages.length - 1].index : 0;
  }

  insertPages(sourceId: string, pages: Page[]) {
    const existing = this.pagesBySource.get(sourceId) ?? [];
    const needsSort = pages.some((p) => existing.length > 0 && p.index <= existing[existing.length - 1].index);
    existing.push(...pages);
    if (needsSort) existing.sort(byIndex);
    this.pagesBySource.set(sourceId, existing);
  }

  removePages(sourceId: string, pageIds: ReadonlySet<string>) {
    const existing = this.pagesBySource.get(sourceId);
    if (!existing) return;
    this.pagesBySource.set(sourceId, existing.filter((p) => !pageIds.has(p.id)));
  }

  /** All images on pages whose index is at least `minPageIndex`. */
  imagesFrom(sourceId: string, minPageIndex: number): ImageEntry[] {
    const entries: ImageEntry[] = [];
    for (const page of this.pages(sourceId)) {
      if (page.index < minPageIndex) continue;
      for (const image of page.images) entries.push({ page, image });
    }
    return entries;
  }

  /**
   * One window of images filtered by download state, in reading order
   * (page index, then image index).
   */
  scanImages(sourceId: string, scan: ImageScan): ImageEntry[] {
    const window: ImageEntry[] = [];
    let skipped = 0;
    for (const page of this.pages(sourceId)) {
      for (const image of [...page.images].sort(byIndex)) {
        if ((image.downloadPath !== '') !== scan.downloaded) continue;
        if (skipped < scan.offset) {
          skipped++;
          continue;
        }
        window.push({ page, image });
        if (window.length >= scan.limit) return window;
      }
    }
    return window;
  }

  async commit(): Promise<void> {
    await this.persist(this.toDocument());
    this.commitCount++;
  }

  protected async persist(_document: CatalogDocument): Promise<void> {}

  toDocument(): CatalogDocument {
    const sources: StoredSource[] = this.listSources().map(({ coverImage, ...rest }) => ({
      ...rest,
      ...(coverImage ? { coverImage: coverImage.toString('base64') } : {})
    }));
    const pages = [...this.pagesBySource.values()].flat();
    return { version: 1, sources, pages };
  }

  protected load(document: CatalogDocument) {
    this.sources.clear();
    this.pagesBySource.clear();
    for (const { coverImage, ...rest } of document.sources) {
      this.sources.set(rest.id, {
        ...rest,
        ...(coverImage ? { coverImage: Buffer.from(coverImage, 'base64') } : {})
      });
      this.pagesBySource.set(rest.id, []);
    }
    for (const page of document.pages) {
      const list = this.pagesBySource.get(page.sourceId);
      if (list) list.push(page);
    }
    for (const list of this.pagesBySource.values()) list.sort(byIndex);
  }
}

function isCatalogDocument(value: unknown): value is CatalogDocument {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'version' in value &&
    value.version === 1 &&
    'sources' in value &&
    Array.isArray(value.sources) &&
    'pages' in value &&
    Array.isArray(value.pages)
  );
}

/** Catalog persisted as one JSON file, replaced atomically on every commit. */
export class JsonFileCatalogStore extends CatalogStore {
  constructor(readonly filePath: string) {
    super();
  }

  static async open(filePath: string): Promise<JsonFileCatalogStore> {
    const store = new JsonFileCatalogStore(filePath);
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') return store;
      throw error;
    }

    const parsed: unknown = JSON.parse(raw);
    if (!isCatalogDocument(parsed)) {
      throw new Error(`${filePath} is not a catalog file`);
    }
    store.load(parsed);
    return store;
  }

  protected async persist(document: CatalogDocument): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    await fs.writeFile(tempPath, JSON.stringify(document, null, 2), 'utf8');
    await fs.rename(tempPath, this.filePath);
  }
}
