import path from 'path';
import { DEFAULT_USER_AGENT, LIMITS } from './types.js';
import type { Config } from './types.js';

export type RawOptions = {
  catalog?: string;
  output?: string;
  maxPages?: string;
  overwrite?: boolean;
  concurrency?: string;
  userAgent?: string;
  verbose?: boolean;
};

export function clampConcurrency(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value)) return LIMITS.defaultConcurrency;
  return Math.min(LIMITS.maxConcurrency, Math.max(LIMITS.minConcurrency, Math.trunc(value)));
}

function parseOptionalInt(value: string | undefined, name: string): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new Error(`--${name} expects an integer, got "${value}"`);
  }
  return parsed;
}

export function resolveConfig(options: RawOptions): Config {
  const maxPages = parseOptionalInt(options.maxPages, 'max-pages');
  if (maxPages !== undefined && maxPages < 1) {
    throw new Error('--max-pages must be at least 1');
  }

  return {
    catalogPath: path.resolve(options.catalog ?? 'comics.json'),
    outputDir: path.resolve(options.output ?? 'downloads'),
    maxPages,
    overwrite: options.overwrite ?? false,
    maxConcurrentDownloads: clampConcurrency(parseOptionalInt(options.concurrency, 'concurrency')),
    userAgent: options.userAgent?.trim() || DEFAULT_USER_AGENT,
    verbose: options.verbose ?? false
  };
}
