import { createWriteStream } from 'fs';
import http from 'http';
import https from 'https';
import type { IncomingHttpHeaders, IncomingMessage } from 'http';
import os from 'os';
import path from 'path';
import { randomUUID } from 'crypto';
import { pipeline } from 'stream/promises';
import { setTimeout as sleep } from 'timers/promises';
import { ArchiverError, Cancelled, NetworkError, isCancellation } from './errors.js';
import { removeIfExists } from './utils/file-utils.js';
import { getHost } from './utils/url-utils.js';
import { DEFAULT_USER_AGENT, LIMITS } from './types.js';

export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
}

export interface HttpGetResponse extends HttpResponse {
  body: Buffer;
}

export interface HttpDownload extends HttpResponse {
  tempPath: string;
}

export interface RequestOptions {
  referer?: string;
  signal?: AbortSignal;
}

/**
 * Transport used by the crawler and downloader. Non-2xx statuses are returned,
 * not thrown; transport failures reject with `NetworkError`, aborts with `Cancelled`.
 */
export interface HttpClient {
  get(url: string, options?: RequestOptions): Promise<HttpGetResponse>;
  head(url: string, options?: RequestOptions): Promise<HttpResponse>;
  downloadToTemp(url: string, options?: RequestOptions): Promise<HttpDownload>;
}

export function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Spaces out requests to the same host. Each caller reserves the next free
 * slot before sleeping, so concurrent callers queue up rather than bunch.
 */
export class HostRateLimiter {
  private nextSlot = new Map<string, number>();

  constructor(private minIntervalMs: number = LIMITS.hostIntervalMs) {}

  async acquire(url: string, signal?: AbortSignal): Promise<void> {
    const host = getHost(url);
    if (!host || this.minIntervalMs <= 0) return;

    const now = Date.now();
    const slot = Math.max(now, this.nextSlot.get(host) ?? 0);
    this.nextSlot.set(host, slot + this.minIntervalMs);

    if (slot > now) {
      await sleep(slot - now, undefined, { signal });
    }
  }
}

export interface NodeHttpClientOptions {
  userAgent?: string;
  timeoutMs?: number;
  maxRedirects?: number;
  rateLimiter?: HostRateLimiter;
}

export class NodeHttpClient implements HttpClient {
  private userAgent: string;
  private timeoutMs: number;
  private maxRedirects: number;
  private rateLimiter: HostRateLimiter;

  constructor(options: NodeHttpClientOptions = {}) {
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.maxRedirects = options.maxRedirects ?? 5;
    this.rateLimiter = options.rateLimiter ?? new HostRateLimiter();
  }

  async get(url: string, options: RequestOptions = {}): Promise<HttpGetResponse> {
    try {
      const response = await this.open('GET', url, options);
      const chunks: Buffer[] = [];
      for await (const chunk of response) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
      }
      return {
        status: response.statusCode ?? 0,
        headers: flattenHeaders(response.headers),
        body: Buffer.concat(chunks)
      };
    } catch (error) {
      throw mapTransportError(error, options.signal);
    }
  }

  async head(url: string, options: RequestOptions = {}): Promise<HttpResponse> {
    try {
      const response = await this.open('HEAD', url, options);
      response.resume();
      return {
        status: response.statusCode ?? 0,
        headers: flattenHeaders(response.headers)
      };
    } catch (error) {
      throw mapTransportError(error, options.signal);
    }
  }

  async downloadToTemp(url: string, options: RequestOptions = {}): Promise<HttpDownload> {
    const tempPath = path.join(os.tmpdir(), `comic-archiver-${randomUUID()}`);
    try {
      const response = await this.open('GET', url, options);
      await pipeline(response, createWriteStream(tempPath));
      return {
        status: response.statusCode ?? 0,
        headers: flattenHeaders(response.headers),
        tempPath
      };
    } catch (error) {
      await removeIfExists(tempPath);
      throw mapTransportError(error, options.signal);
    }
  }

  private async open(
    method: 'GET' | 'HEAD',
    url: string,
    options: RequestOptions,
    redirects = 0
  ): Promise<IncomingMessage> {
    await this.rateLimiter.acquire(url, options.signal);

    const response = await new Promise<IncomingMessage>((resolve, reject) => {
      const headers: Record<string, string> = { 'User-Agent': this.userAgent };
      if (options.referer) {
        headers.Referer = options.referer;
      }
      const requestOptions: https.RequestOptions = {
        method,
        headers,
        signal: options.signal,
        timeout: this.timeoutMs
      };

      const request = new URL(url).protocol === 'https:'
        ? https.request(url, requestOptions, resolve)
        : http.request(url, requestOptions, resolve);

      request.on('error', reject);
      request.on('timeout', () => {
        request.destroy(new Error(`Request timed out after ${this.timeoutMs}ms: ${url}`));
      });
      request.end();
    });

    const status = response.statusCode ?? 0;
    const location = response.headers.location;
    if (status >= 300 && status < 400 && location && redirects < this.maxRedirects) {
      response.resume();
      const redirectUrl = new URL(location, url).href;
      return this.open(method, redirectUrl, options, redirects + 1);
    }

    return response;
  }
}

function flattenHeaders(headers: IncomingHttpHeaders): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    flat[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
  }
  return flat;
}

function mapTransportError(error: unknown, signal?: AbortSignal): ArchiverError {
  if (signal?.aborted || isCancellation(error)) return new Cancelled();
  if (error instanceof ArchiverError) return error;
  return new NetworkError(error);
}
