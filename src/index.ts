#!/usr/bin/env node

import { Command } from 'commander';
import { promises as fs } from 'fs';
import { JsonFileCatalogStore } from './catalog.js';
import { resolveConfig } from './config.js';
import type { RawOptions } from './config.js';
import { ComicCrawler } from './crawler.js';
import { Downloader } from './downloader.js';
import { errorMessage, isCancellation } from './errors.js';
import { NodeHttpClient } from './http.js';
import { Library } from './library.js';
import { logger } from './utils/logger.js';
import type { Config, SourceInput } from './types.js';

interface SourceOptions {
  name?: string;
  author?: string;
  description?: string;
  url?: string;
  firstPage?: string;
  selectorImage?: string;
  selectorTitle?: string;
  selectorNext?: string;
}

interface Context {
  config: Config;
  store: JsonFileCatalogStore;
  library: Library;
  crawler: ComicCrawler;
  downloader: Downloader;
}

const program = new Command();

program
  .name('comic-archiver')
  .description('Crawls paginated comics with CSS selectors and archives their images')
  .version('1.0.0')
  .option('--catalog <file>', 'Catalog file', 'comics.json')
  .option('-o, --output <dir>', 'Root folder for downloads', 'downloads')
  .option('--user-agent <ua>', 'User-Agent header sent with every request')
  .option('-v, --verbose', 'Verbose output', false);

function withSourceOptions(command: Command): Command {
  return command
    .option('--name <name>', 'Display name, also used as the download folder name')
    .option('--author <author>', 'Author')
    .option('--description <text>', 'Description')
    .option('--url <url>', 'Homepage URL')
    .option('--first-page <url>', 'URL of the first comic page')
    .option('--selector-image <css>', 'Selector matching the page images')
    .option('--selector-title <css>', 'Selector matching the page title')
    .option('--selector-next <css>', 'Selector matching the "next page" link');
}

withSourceOptions(program.command('add'))
  .description('Add a comic source')
  .action(addAction);

withSourceOptions(program.command('edit <source>'))
  .description('Change fields of a comic source')
  .action(editAction);

program
  .command('list')
  .description('List comic sources')
  .action(listAction);

program
  .command('crawl <source>')
  .description('Discover new pages of a comic')
  .option('--max-pages <n>', 'Stop after this many new entries')
  .action(crawlAction);

program
  .command('download <source>')
  .description('Download images that are missing on disk')
  .option('--overwrite', 'Replace files that already exist', false)
  .option('-c, --concurrency <n>', 'Parallel downloads (1-24)', '10')
  .action(downloadAction);

program
  .command('sync <source>')
  .description('Crawl and download at the same time, then download what the crawl found')
  .option('--max-pages <n>', 'Stop crawling after this many new entries')
  .option('--overwrite', 'Replace files that already exist', false)
  .option('-c, --concurrency <n>', 'Parallel downloads (1-24)', '10')
  .action(syncAction);

program
  .command('export <source> [file]')
  .description('Write the source profile as JSON (stdout when no file is given)')
  .action(exportAction);

program
  .command('import <file>')
  .description('Add a comic source from a profile JSON file')
  .action(importAction);

program
  .command('delete-files <source>')
  .description('Delete the download folder of a comic source')
  .action(deleteFilesAction);

await program.parseAsync();

async function openContext(command: Command): Promise<Context> {
  const config = resolveConfig(command.optsWithGlobals<RawOptions>());
  logger.setVerbose(config.verbose);

  const store = await JsonFileCatalogStore.open(config.catalogPath);
  const http = new NodeHttpClient({ userAgent: config.userAgent });
  return {
    config,
    store,
    library: new Library(store, config.outputDir),
    crawler: new ComicCrawler({ http, store }),
    downloader: new Downloader({ http, store })
  };
}

/** Runs an operation with Ctrl+C wired to its abort signal. */
async function run(command: Command, operation: (ctx: Context, signal: AbortSignal) => Promise<void>) {
  const controller = new AbortController();
  const onInterrupt = () => {
    logger.warn('Stopping...');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  try {
    const ctx = await openContext(command);
    await operation(ctx, controller.signal);
  } catch (error) {
    if (isCancellation(error)) {
      logger.warn('Cancelled');
    } else {
      logger.error(`Failed: ${errorMessage(error)}`);
      process.exitCode = 1;
    }
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}

function sourceChanges(options: SourceOptions): Partial<SourceInput> {
  const changes: Partial<SourceInput> = {};
  if (options.name !== undefined) changes.name = options.name;
  if (options.author !== undefined) changes.author = options.author;
  if (options.description !== undefined) changes.descriptionText = options.description;
  if (options.url !== undefined) changes.url = options.url;
  if (options.firstPage !== undefined) changes.firstPageURL = options.firstPage;
  if (options.selectorImage !== undefined) changes.selectorImage = options.selectorImage;
  if (options.selectorTitle !== undefined) changes.selectorTitle = options.selectorTitle;
  if (options.selectorNext !== undefined) changes.selectorNext = options.selectorNext;
  return changes;
}

async function addAction(options: SourceOptions, command: Command) {
  await run(command, async ({ library }) => {
    if (!options.name || !options.firstPage) {
      throw new Error('add needs at least --name and --first-page');
    }
    const source = await library.add({
      name: options.name,
      author: options.author ?? '',
      descriptionText: options.description ?? '',
      url: options.url ?? '',
      firstPageURL: options.firstPage,
      selectorImage: options.selectorImage ?? '',
      selectorTitle: options.selectorTitle ?? '',
      selectorNext: options.selectorNext ?? ''
    });
    logger.success(`Added ${source.name} (${source.id})`);
  });
}

async function editAction(ref: string, options: SourceOptions, command: Command) {
  await run(command, async ({ library }) => {
    const source = await library.edit(ref, sourceChanges(options));
    logger.success(`Updated ${source.name}`);
  });
}

async function listAction(_options: unknown, command: Command) {
  await run(command, async ({ library }) => {
    const sources = library.list();
    if (sources.length === 0) {
      logger.info('No sources yet. Add one with "comic-archiver add".');
      return;
    }
    for (const source of sources) {
      logger.info(
        `${source.name}  pages: ${source.pageCount}  images: ${source.imageCount}  ` +
          `downloaded: ${source.downloadedImageCount}  [${source.id}]`
      );
    }
  });
}

async function crawlAction(ref: string, _options: unknown, command: Command) {
  await run(command, async ({ config, library, crawler }, signal) => {
    const source = library.require(ref);
    await crawler.crawl(source.id, { maxPages: config.maxPages, signal });
  });
}

async function downloadAction(ref: string, _options: unknown, command: Command) {
  await run(command, async ({ config, library, downloader }, signal) => {
    const source = library.require(ref);
    await downloader.downloadSource(source.id, config.outputDir, {
      overwrite: config.overwrite,
      maxConcurrent: config.maxConcurrentDownloads,
      signal
    });
  });
}

async function syncAction(ref: string, _options: unknown, command: Command) {
  await run(command, async ({ config, library, crawler, downloader }, signal) => {
    const source = library.require(ref);
    const downloadOptions = {
      overwrite: config.overwrite,
      maxConcurrent: config.maxConcurrentDownloads,
      signal
    };

    const [crawled, downloaded] = await Promise.allSettled([
      crawler.crawl(source.id, { maxPages: config.maxPages, signal }),
      downloader.downloadSource(source.id, config.outputDir, downloadOptions)
    ]);
    for (const outcome of [crawled, downloaded]) {
      if (outcome.status === 'rejected') throw outcome.reason;
    }

    await downloader.downloadSource(source.id, config.outputDir, downloadOptions);
  });
}

async function exportAction(ref: string, file: string | undefined, _options: unknown, command: Command) {
  await run(command, async ({ library }) => {
    const json = library.exportProfile(ref);
    if (!file) {
      process.stdout.write(json);
      return;
    }
    await fs.writeFile(file, json, 'utf8');
    logger.success(`Exported profile to ${file}`);
  });
}

async function importAction(file: string, _options: unknown, command: Command) {
  await run(command, async ({ library }) => {
    const source = await library.importProfile(await fs.readFile(file, 'utf8'));
    logger.success(`Imported ${source.name} (${source.id})`);
  });
}

async function deleteFilesAction(ref: string, _options: unknown, command: Command) {
  await run(command, async ({ library }) => {
    const removed = await library.deleteDownloads(ref);
    if (removed) {
      logger.success(`Deleted downloads of ${ref}`);
    } else {
      logger.info(`No download folder for ${ref}`);
    }
  });
}
