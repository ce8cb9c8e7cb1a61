import type { CatalogStore } from './catalog.js';
import { CommitBatcher } from './commit-batcher.js';
import {
  InvalidBaseURL,
  MissingSelector,
  SourceNotFound,
  errorMessage,
  isCancellation,
  throwIfCancelled
} from './errors.js';
import { extractPage } from './extractor.js';
import type { ExtractedPage } from './extractor.js';
import { fetchBytes, fetchHTMLWithRetry } from './fetcher.js';
import type { HttpClient } from './http.js';
import { decodeDataUrl } from './utils/file-utils.js';
import { logger } from './utils/logger.js';
import { isDataUrl, parseAbsoluteUrl } from './utils/url-utils.js';
import { commitGate } from './write-gate.js';
import type { WriteGate } from './write-gate.js';
import { LIMITS, dedupKey } from './types.js';
import type { FetchState, Selectors, Source } from './types.js';

export interface CrawlOptions {
  maxPages?: number;
  signal?: AbortSignal;
}

export interface CrawlerOptions {
  http: HttpClient;
  store: CatalogStore;
  gate?: WriteGate;
  commitThreshold?: number;
  dedupWindowPages?: number;
  fetchAttempts?: number;
  retryBackoffMs?: number;
}

/**
 * Walks a source page by page along its "next" links, queueing every new
 * (page, image) pair and handing batches to the {@link CommitBatcher}.
 */
export class ComicCrawler {
  private http: HttpClient;
  private store: CatalogStore;
  private batcher: CommitBatcher;
  private commitThreshold: number;
  private dedupWindowPages: number;
  private fetchAttempts: number;
  private retryBackoffMs: number;

  constructor(options: CrawlerOptions) {
    this.http = options.http;
    this.store = options.store;
    this.batcher = new CommitBatcher(options.store, options.gate ?? commitGate);
    this.commitThreshold = options.commitThreshold ?? LIMITS.commitThreshold;
    this.dedupWindowPages = options.dedupWindowPages ?? LIMITS.dedupWindowPages;
    this.fetchAttempts = options.fetchAttempts ?? LIMITS.fetchAttempts;
    this.retryBackoffMs = options.retryBackoffMs ?? LIMITS.retryBackoffMs;
  }

  /**
   * Crawls from where the source left off. Resolves with the number of new
   * records queued by this run.
   */
  async crawl(sourceId: string, options: CrawlOptions = {}): Promise<number> {
    const source = this.store.getSource(sourceId);
    if (!source) {
      throw new SourceNotFound(sourceId);
    }
    if (!source.selectorImage.trim()) {
      throw new MissingSelector('image');
    }

    const state = this.initialState(source);
    const selectors: Selectors = {
      title: source.selectorTitle,
      image: source.selectorImage,
      next: source.selectorNext
    };

    logger.info(`Crawling ${source.name} from ${state.currentURL}`);

    try {
      for (;;) {
        throwIfCancelled(options.signal);
        const next = await this.step(source, selectors, state, options);
        if (!next) break;
        state.previousURL = state.currentURL;
        state.currentURL = next;
      }
    } finally {
      await this.finalFlush(source, state);
    }

    logger.success(`Added ${state.pagesAdded} entries to ${source.name}`);
    return state.pagesAdded;
  }

  private initialState(source: Source): FetchState {
    const tail = this.store.lastPages(source.id, 2);
    const last = tail.at(-1);
    const before = tail.length === 2 ? tail[0] : undefined;

    const start = last?.url ?? source.firstPageURL;
    const startURL = parseAbsoluteUrl(start);
    if (!startURL || (startURL.protocol !== 'http:' && startURL.protocol !== 'https:')) {
      throw new InvalidBaseURL(start);
    }

    let previousURL: string | undefined;
    if (last) {
      previousURL = before?.url ?? parseAbsoluteUrl(source.firstPageURL)?.href;
    }

    const maxIndex = this.store.maxPageIndex(source.id);
    const windowStart = Math.max(0, maxIndex - this.dedupWindowPages);
    const dedupKeys = new Set(
      this.store.imagesFrom(source.id, windowStart).map(({ page, image }) => dedupKey(page.url, image.url))
    );

    return {
      currentURL: startURL.href,
      previousURL,
      visited: new Set(),
      pending: [],
      dedupKeys,
      maxIndexSoFar: maxIndex,
      pagesAdded: 0,
      coverCaptured: false,
      sinceLastCommit: 0,
      initiallyEmpty: last === undefined
    };
  }

  /** Processes the current page; resolves with the next URL, or undefined to stop. */
  private async step(
    source: Source,
    selectors: Selectors,
    state: FetchState,
    options: CrawlOptions
  ): Promise<string | undefined> {
    const { maxPages, signal } = options;
    if (maxPages !== undefined && state.pagesAdded >= maxPages) return undefined;
    if (state.visited.has(state.currentURL)) return undefined;
    state.visited.add(state.currentURL);

    const html = await fetchHTMLWithRetry(this.http, state.currentURL, {
      referer: state.previousURL,
      signal,
      attempts: this.fetchAttempts,
      backoffMs: this.retryBackoffMs
    });
    const page = extractPage(html, state.currentURL, selectors);

    if (page.imageURLs.length === 0) {
      logger.info(`No images on ${state.currentURL}, stopping`);
      return undefined;
    }

    await this.maybeCaptureCover(source, page.imageURLs[0], state, signal);

    const reachedMax = this.queueRecords(page, state, maxPages);
    if (reachedMax || state.sinceLastCommit >= this.commitThreshold) {
      await this.flush(source, state);
    }
    if (reachedMax) {
      logger.info(`Reached limit of ${maxPages} new entries`);
      return undefined;
    }

    if (!page.nextURL || state.visited.has(page.nextURL)) return undefined;
    return page.nextURL;
  }

  /** Appends pending records for unseen images; true when the page cap was hit. */
  private queueRecords(page: ExtractedPage, state: FetchState, maxPages?: number): boolean {
    const remaining = maxPages === undefined ? undefined : maxPages - state.pagesAdded;
    let queued = 0;
    let reachedMax = false;

    for (const imageURL of page.imageURLs) {
      const key = dedupKey(state.currentURL, imageURL);
      if (state.dedupKeys.has(key)) continue;

      state.maxIndexSoFar += 1;
      state.pending.push({
        index: state.maxIndexSoFar,
        title: page.title ?? '',
        pageURL: state.currentURL,
        imageURL
      });
      state.dedupKeys.add(key);
      state.pagesAdded++;
      state.sinceLastCommit++;
      queued++;

      if (remaining !== undefined && queued >= remaining) {
        reachedMax = true;
        break;
      }
    }

    logger.debug(`${state.currentURL}: ${page.imageURLs.length} images, ${queued} new`);
    return reachedMax;
  }

  private async maybeCaptureCover(
    source: Source,
    imageURL: string,
    state: FetchState,
    signal?: AbortSignal
  ): Promise<void> {
    if (!state.initiallyEmpty || state.coverCaptured) return;

    try {
      const bytes = isDataUrl(imageURL)
        ? decodeDataUrl(imageURL)?.data
        : await fetchBytes(this.http, imageURL, { referer: state.currentURL, signal });
      if (!bytes) return;
      if (!source.coverImage) {
        source.coverImage = bytes;
      }
      state.coverCaptured = true;
    } catch (error) {
      if (!isCancellation(error)) {
        logger.debug(`Cover fetch failed for ${imageURL}: ${errorMessage(error)}`);
      }
    }
  }

  private async flush(source: Source, state: FetchState): Promise<void> {
    const { pagesCreated, imagesCreated } = await this.batcher.flush(source.id, state.pending);
    state.sinceLastCommit = 0;
    logger.debug(`Committed ${pagesCreated} pages / ${imagesCreated} images for ${source.name}`);
  }

  private async finalFlush(source: Source, state: FetchState): Promise<void> {
    if (state.pending.length === 0) return;
    try {
      await this.flush(source, state);
    } catch (error) {
      logger.warn(`Could not save ${state.pending.length} pending entries for ${source.name}: ${errorMessage(error)}`);
    }
  }
}
