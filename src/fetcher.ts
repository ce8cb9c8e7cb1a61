import iconv from 'iconv-lite';
import { setTimeout as sleep } from 'timers/promises';
import { TextDecoder } from 'util';
import { BadStatus, Cancelled, ParseError, isCancellation, throwIfCancelled } from './errors.js';
import { isSuccess } from './http.js';
import type { HttpClient } from './http.js';
import { logger } from './utils/logger.js';
import { LIMITS } from './types.js';

export interface FetchOptions {
  referer?: string;
  signal?: AbortSignal;
}

export interface RetryOptions extends FetchOptions {
  attempts?: number;
  backoffMs?: number;
}

const UTF8_NAMES = new Set(['utf-8', 'utf8']);
const META_CHARSET = /<meta[^>]+charset\s*=\s*["']?\s*([\w.:-]+)/i;

function charsetFromContentType(contentType: string | undefined): string | undefined {
  const match = contentType?.match(/charset\s*=\s*["']?([^;"'\s]+)/i);
  return match?.[1].toLowerCase();
}

function decodeUtf8Strict(body: Buffer): string | undefined {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(body);
  } catch {
    return undefined;
  }
}

function decodeWith(body: Buffer, charset: string): string | undefined {
  const name = charset.toLowerCase();
  if (UTF8_NAMES.has(name)) return decodeUtf8Strict(body);
  if (!iconv.encodingExists(name)) return undefined;
  return iconv.decode(body, name);
}

function sniffCharset(body: Buffer): string | undefined {
  if (body.length >= 2) {
    if (body[0] === 0xff && body[1] === 0xfe) return 'utf-16le';
    if (body[0] === 0xfe && body[1] === 0xff) return 'utf-16be';
  }
  const head = body.subarray(0, 1024).toString('latin1');
  return head.match(META_CHARSET)?.[1].toLowerCase();
}

function isAscii(body: Buffer): boolean {
  return body.every((byte) => byte < 0x80);
}

/**
 * Decodes an HTML body: declared charset, strict UTF-8, sniffed charset
 * (byte-order mark or `<meta>` declaration), then Mac Roman and ASCII.
 */
export function decodeHtml(body: Buffer, contentType?: string): string {
  const declared = charsetFromContentType(contentType);
  if (declared) {
    const text = decodeWith(body, declared);
    if (text !== undefined) return text;
  }

  const utf8 = decodeUtf8Strict(body);
  if (utf8 !== undefined) return utf8;

  const sniffed = sniffCharset(body);
  if (sniffed) {
    const text = decodeWith(body, sniffed);
    if (text !== undefined) return text;
  }

  if (iconv.encodingExists('macintosh')) return iconv.decode(body, 'macintosh');
  if (isAscii(body)) return body.toString('ascii');

  throw new ParseError(`Could not decode ${body.length} bytes of HTML`);
}

export async function delay(ms: number, signal?: AbortSignal): Promise<void> {
  try {
    await sleep(ms, undefined, { signal });
  } catch (error) {
    if (isCancellation(error)) throw new Cancelled();
    throw error;
  }
}

export async function fetchHTML(http: HttpClient, url: string, options: FetchOptions = {}): Promise<string> {
  throwIfCancelled(options.signal);
  const response = await http.get(url, options);
  if (!isSuccess(response.status)) {
    throw new BadStatus(response.status);
  }
  return decodeHtml(response.body, response.headers['content-type']);
}

/**
 * {@link fetchHTML} with linear backoff (`backoffMs × attempt`). Cancellation
 * is never retried.
 */
export async function fetchHTMLWithRetry(
  http: HttpClient,
  url: string,
  options: RetryOptions = {}
): Promise<string> {
  const attempts = Math.max(1, options.attempts ?? LIMITS.fetchAttempts);
  const backoffMs = options.backoffMs ?? LIMITS.retryBackoffMs;
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fetchHTML(http, url, options);
    } catch (error) {
      if (isCancellation(error)) throw error;
      lastError = error;
      if (attempt < attempts) {
        logger.debug(`Attempt ${attempt}/${attempts} for ${url} failed: ${error}`);
        await delay(backoffMs * attempt, options.signal);
      }
    }
  }

  throw lastError;
}

export async function fetchBytes(http: HttpClient, url: string, options: FetchOptions = {}): Promise<Buffer> {
  throwIfCancelled(options.signal);
  const response = await http.get(url, options);
  if (!isSuccess(response.status)) {
    throw new BadStatus(response.status);
  }
  return response.body;
}
