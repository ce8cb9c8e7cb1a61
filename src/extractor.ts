import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { logger } from './utils/logger.js';
import { resolveUrl } from './utils/url-utils.js';
import type { Selectors } from './types.js';

export interface SrcsetCandidate {
  url: string;
  width: number;
}

export interface ExtractedPage {
  title?: string;
  imageURLs: string[];
  nextURL?: string;
}

export function loadDocument(html: string): CheerioAPI {
  return cheerio.load(html);
}

function select($: CheerioAPI, selector: string) {
  if (!selector.trim()) return null;
  try {
    return $(selector);
  } catch (error) {
    logger.debug(`Invalid selector "${selector}": ${error}`);
    return null;
  }
}

/**
 * Splits a `srcset` value into candidates. A descriptor that is not a plain
 * `<digits>w` width counts as width 0.
 */
export function parseSrcset(srcset: string): SrcsetCandidate[] {
  const candidates: SrcsetCandidate[] = [];
  for (const item of srcset.split(',')) {
    const parts = item.trim().split(' ').filter(Boolean);
    if (parts.length === 0) continue;
    const last = parts[parts.length - 1];
    const width = /^\d+w$/.test(last) ? parseInt(last.slice(0, -1), 10) : 0;
    candidates.push({ url: parts[0], width });
  }
  return candidates;
}

function widestCandidate(srcset: string): string | undefined {
  let best: SrcsetCandidate | undefined;
  for (const candidate of parseSrcset(srcset)) {
    if (!best || candidate.width > best.width) {
      best = candidate;
    }
  }
  return best?.url;
}

export function extractTitle($: CheerioAPI, selector: string): string | undefined {
  const match = select($, selector);
  if (!match || match.length === 0) return undefined;
  const text = match.first().text().replace(/\s+/g, ' ').trim();
  return text || undefined;
}

export function extractImageURLs($: CheerioAPI, selector: string, baseURL: string): string[] {
  const matches = select($, selector);
  if (!matches) return [];

  const seen = new Set<string>();
  const urls: string[] = [];

  for (const element of matches.toArray()) {
    const el = $(element);
    const srcset = el.attr('srcset');
    const candidate =
      (srcset ? widestCandidate(srcset) : undefined) || el.attr('src') || el.attr('data-src');
    if (!candidate) continue;

    const absolute = resolveUrl(candidate, baseURL);
    if (!absolute || seen.has(absolute)) continue;
    seen.add(absolute);
    urls.push(absolute);
  }

  return urls;
}

export function extractNextLink($: CheerioAPI, selector: string, baseURL: string): string | undefined {
  const match = select($, selector);
  if (!match || match.length === 0) return undefined;
  const href = match.first().attr('href');
  if (!href) return undefined;
  return resolveUrl(href, baseURL) ?? undefined;
}

export function extractPage(html: string, baseURL: string, selectors: Selectors): ExtractedPage {
  const $ = loadDocument(html);
  return {
    title: extractTitle($, selectors.title),
    imageURLs: extractImageURLs($, selectors.image, baseURL),
    nextURL: extractNextLink($, selectors.next, baseURL)
  };
}
