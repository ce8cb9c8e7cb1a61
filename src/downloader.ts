import { promises as fs } from 'fs';
import path from 'path';
import PQueue from 'p-queue';
import type { CatalogStore, ImageEntry } from './catalog.js';
import { clampConcurrency } from './config.js';
import {
  Cancelled,
  NetworkError,
  SourceNotFound,
  errorMessage,
  isCancellation,
  throwIfCancelled
} from './errors.js';
import { isSuccess } from './http.js';
import type { HttpClient } from './http.js';
import {
  buildFileName,
  decodeDataUrl,
  fileExists,
  fileExtension,
  listFileNames,
  moveFile,
  removeIfExists,
  sourceFolderPath
} from './utils/file-utils.js';
import { logger } from './utils/logger.js';
import { isDataUrl, parseAbsoluteUrl, pathExtension } from './utils/url-utils.js';
import { commitGate } from './write-gate.js';
import type { WriteGate } from './write-gate.js';
import { LIMITS } from './types.js';
import type { DownloadResult, Image, Page, Source } from './types.js';

export interface DownloadOptions {
  overwrite?: boolean;
  maxConcurrent?: number;
  signal?: AbortSignal;
}

export interface DownloaderOptions {
  http: HttpClient;
  store: CatalogStore;
  gate?: WriteGate;
  saveEvery?: number;
  scanPageSize?: number;
}

export interface DownloadJob {
  page: Page;
  image: Image;
}

export interface DownloadSummary {
  queued: number;
  written: number;
  alreadyPresent: number;
  notWritten: number;
}

interface AssetContext {
  folder: string;
  overwrite: boolean;
  wantsCover: boolean;
  signal?: AbortSignal;
}

/** Shared between the owner loop and the workers of one run. */
interface RunState {
  halted: boolean;
  /** Jobs skipped or cut short by the abort signal. */
  interrupted: number;
}

type JobOutcome =
  | { kind: 'done'; result: DownloadResult }
  | { kind: 'skipped' }
  | { kind: 'fatal'; error: unknown };

/** Single-consumer mailbox carrying worker results back to the owner loop. */
class Inbox<T> {
  private items: T[] = [];
  private waiter: ((item: T) => void) | undefined;

  push(item: T) {
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter(item);
    } else {
      this.items.push(item);
    }
  }

  next(): Promise<T> {
    if (this.items.length > 0) {
      const [item] = this.items.splice(0, 1);
      return Promise.resolve(item);
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }
}

function byReadingOrder(a: DownloadJob, b: DownloadJob): number {
  if (a.page.index !== b.page.index) return a.page.index - b.page.index;
  return a.image.index - b.image.index;
}

function notWritten(image: Image): DownloadResult {
  return { imageId: image.id, finalPath: '', wroteNewFile: false };
}

/**
 * Downloads a source's images into `root/<source name>/`.
 *
 * Workers only produce {@link DownloadResult}s; the loop in
 * {@link Downloader.downloadSource} is the one place that writes them into the
 * catalog, saving every `saveEvery` new files and once at the end.
 */
export class Downloader {
  private http: HttpClient;
  private store: CatalogStore;
  private gate: WriteGate;
  private saveEvery: number;
  private scanPageSize: number;

  constructor(options: DownloaderOptions) {
    this.http = options.http;
    this.store = options.store;
    this.gate = options.gate ?? commitGate;
    this.saveEvery = Math.max(1, options.saveEvery ?? LIMITS.saveEveryWrites);
    this.scanPageSize = Math.max(1, options.scanPageSize ?? LIMITS.scanPageSize);
  }

  async downloadSource(sourceId: string, root: string, options: DownloadOptions = {}): Promise<DownloadSummary> {
    const source = this.store.getSource(sourceId);
    if (!source) {
      throw new SourceNotFound(sourceId);
    }

    const folder = sourceFolderPath(root, source.name);
    await fs.mkdir(folder, { recursive: true });

    const jobs = await this.buildWorkSet(source, folder);
    const summary: DownloadSummary = { queued: jobs.length, written: 0, alreadyPresent: 0, notWritten: 0 };
    const imagesById = new Map(jobs.map((job) => [job.image.id, job.image]));

    logger.info(`Queueing ${jobs.length} images of ${source.name} for download...`);

    const queue = new PQueue({ concurrency: clampConcurrency(options.maxConcurrent) });
    const inbox = new Inbox<JobOutcome>();
    const run: RunState = { halted: false, interrupted: 0 };

    const settled = jobs.map((job) =>
      queue.add(async () => {
        inbox.push(await this.runJob(job, source, folder, options, run));
      })
    );

    let fatal: unknown;
    const halt = (error: unknown) => {
      fatal ??= error;
      run.halted = true;
    };

    // Every outcome is received, even after a halt, so that files written by
    // in-flight jobs still end up in the catalog.
    for (let received = 0; received < jobs.length; received++) {
      const outcome = await inbox.next();
      if (outcome.kind === 'skipped') continue;
      if (outcome.kind === 'fatal') {
        halt(outcome.error);
        continue;
      }

      const { result } = outcome;
      await this.gate.waitIfPaused();
      this.applyResult(source, imagesById.get(result.imageId), result);
      if (result.wroteNewFile) {
        summary.written++;
        if (!run.halted && summary.written % this.saveEvery === 0) {
          await this.save().catch(halt);
        }
      } else if (result.finalPath) {
        summary.alreadyPresent++;
      } else {
        summary.notWritten++;
      }
    }

    await Promise.all(settled);
    try {
      await this.save();
    } catch (error) {
      if (fatal === undefined) throw error;
      logger.warn(`Final save of ${source.name} failed: ${errorMessage(error)}`);
    }

    if (fatal !== undefined) throw fatal;
    if (run.interrupted > 0) throw new Cancelled();

    logger.success(
      `${source.name}: ${summary.written} downloaded, ${summary.alreadyPresent} already present, ${summary.notWritten} failed`
    );
    return summary;
  }

  /**
   * Images that need a download: never downloaded, or recorded as downloaded
   * but no longer on disk. Missing files have their recorded path cleared.
   */
  async buildWorkSet(source: Source, folder: string): Promise<DownloadJob[]> {
    const work = new Map<string, DownloadJob>();

    for (const entry of this.scanAll(source.id, false)) {
      work.set(entry.image.id, entry);
    }

    const listing = await listFileNames(folder);
    const missing: ImageEntry[] = [];
    for (const entry of this.scanAll(source.id, true)) {
      const recorded = entry.image.downloadPath;
      const present = path.dirname(recorded) === folder
        ? listing.has(path.basename(recorded))
        : await fileExists(recorded);
      if (!present) missing.push(entry);
    }

    for (const entry of missing) {
      logger.debug(`Missing on disk: ${entry.image.downloadPath}`);
      entry.image.downloadPath = '';
      entry.image.downloadedAt = undefined;
      source.downloadedImageCount = Math.max(0, source.downloadedImageCount - 1);
      work.set(entry.image.id, entry);
    }

    return [...work.values()].sort(byReadingOrder);
  }

  private *scanAll(sourceId: string, downloaded: boolean): Generator<ImageEntry> {
    for (let offset = 0; ; offset += this.scanPageSize) {
      const window = this.store.scanImages(sourceId, { downloaded, offset, limit: this.scanPageSize });
      yield* window;
      if (window.length < this.scanPageSize) return;
    }
  }

  private async runJob(
    job: DownloadJob,
    source: Source,
    folder: string,
    options: DownloadOptions,
    run: RunState
  ): Promise<JobOutcome> {
    if (run.halted) {
      return { kind: 'skipped' };
    }
    if (options.signal?.aborted) {
      run.interrupted++;
      return { kind: 'skipped' };
    }

    try {
      const result = await this.downloadAsset(job, {
        folder,
        overwrite: options.overwrite ?? false,
        wantsCover: source.coverImage === undefined,
        signal: options.signal
      });
      return { kind: 'done', result };
    } catch (error) {
      if (error instanceof NetworkError) {
        return { kind: 'fatal', error };
      }
      if (isCancellation(error)) {
        run.interrupted++;
      } else {
        logger.debug(`Failed: ${job.image.url} - ${errorMessage(error)}`);
      }
      return { kind: 'done', result: notWritten(job.image) };
    }
  }

  private async downloadAsset(job: DownloadJob, ctx: AssetContext): Promise<DownloadResult> {
    const { page, image } = job;
    const targetFor = (ext: string) =>
      path.join(
        ctx.folder,
        buildFileName({
          pageIndex: page.index,
          imagesOnPage: page.images.length,
          subIndex: image.index + 1,
          title: page.title,
          ext
        })
      );

    if (isDataUrl(image.url)) {
      const decoded = decodeDataUrl(image.url);
      if (!decoded) return notWritten(image);

      const target = targetFor(fileExtension(decoded.mediaType, undefined, 'png'));
      if (!ctx.overwrite && (await fileExists(target))) {
        return { imageId: image.id, finalPath: target, wroteNewFile: false };
      }
      await fs.writeFile(target, decoded.data);
      logger.success(`Downloaded: ${path.basename(target)}`);
      return {
        imageId: image.id,
        finalPath: target,
        wroteNewFile: true,
        coverBytes: ctx.wantsCover ? decoded.data : undefined
      };
    }

    if (!parseAbsoluteUrl(image.url)) return notWritten(image);

    throwIfCancelled(ctx.signal);
    const download = await this.http.downloadToTemp(image.url, { referer: page.url, signal: ctx.signal });

    try {
      if (!isSuccess(download.status)) {
        logger.debug(`Failed to download (${download.status}): ${image.url}`);
        return notWritten(image);
      }

      const ext = fileExtension(download.headers['content-type'], pathExtension(image.url) || undefined, 'png');
      const target = targetFor(ext);

      if (await fileExists(target)) {
        if (!ctx.overwrite) {
          logger.debug(`Skipping (already exists): ${path.basename(target)}`);
          return { imageId: image.id, finalPath: target, wroteNewFile: false };
        }
        await fs.unlink(target);
      }

      await moveFile(download.tempPath, target);
      logger.success(`Downloaded: ${path.basename(target)}`);

      return {
        imageId: image.id,
        finalPath: target,
        wroteNewFile: true,
        coverBytes: ctx.wantsCover ? await fs.readFile(target) : undefined
      };
    } finally {
      await removeIfExists(download.tempPath);
    }
  }

  private applyResult(source: Source, image: Image | undefined, result: DownloadResult) {
    if (!image) return;
    if (result.finalPath) {
      if (!image.downloadPath) {
        source.downloadedImageCount++;
      }
      image.downloadPath = result.finalPath;
      if (result.wroteNewFile) {
        image.downloadedAt = new Date().toISOString();
      }
    }
    if (result.coverBytes && !source.coverImage) {
      source.coverImage = result.coverBytes;
    }
  }

  private async save(): Promise<void> {
    await this.gate.runExclusive(() => this.store.commit());
  }
}
