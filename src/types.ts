export interface Config {
  catalogPath: string;
  outputDir: string;
  maxPages?: number;
  overwrite: boolean;
  maxConcurrentDownloads: number;
  userAgent: string;
  verbose: boolean;
}

export interface Selectors {
  title: string;
  image: string;
  next: string;
}

export interface Source {
  id: string;
  name: string;
  author: string;
  descriptionText: string;
  url: string;
  firstPageURL: string;
  selectorImage: string;
  selectorTitle: string;
  selectorNext: string;
  coverImage?: Buffer;
  pageCount: number;
  imageCount: number;
  downloadedImageCount: number;
}

/** User-editable fields of a {@link Source}. */
export type SourceInput = Pick<
  Source,
  | 'name'
  | 'author'
  | 'descriptionText'
  | 'url'
  | 'firstPageURL'
  | 'selectorImage'
  | 'selectorTitle'
  | 'selectorNext'
>;

export interface Page {
  id: string;
  sourceId: string;
  index: number;
  title: string;
  url: string;
  fetchedAt: string;
  images: Image[];
}

export interface Image {
  id: string;
  pageId: string;
  index: number;
  url: string;
  downloadPath: string;
  downloadedAt?: string;
}

export interface PendingRecord {
  index: number;
  title: string;
  pageURL: string;
  imageURL: string;
}

export interface FetchState {
  currentURL: string;
  previousURL?: string;
  visited: Set<string>;
  pending: PendingRecord[];
  dedupKeys: Set<string>;
  maxIndexSoFar: number;
  pagesAdded: number;
  coverCaptured: boolean;
  sinceLastCommit: number;
  initiallyEmpty: boolean;
}

export interface DownloadResult {
  imageId: string;
  finalPath: string;
  wroteNewFile: boolean;
  coverBytes?: Buffer;
}

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 ' +
  '(KHTML, like Gecko) Version/15.1 Safari/605.1.15';

export const LIMITS = {
  commitThreshold: 100,
  dedupWindowPages: 200,
  saveEveryWrites: 50,
  scanPageSize: 1000,
  fetchAttempts: 3,
  retryBackoffMs: 200,
  hostIntervalMs: 250,
  defaultConcurrency: 10,
  minConcurrency: 1,
  maxConcurrency: 24
} as const;

export function dedupKey(pageURL: string, imageURL: string): string {
  return `${pageURL}|${imageURL}`;
}
