import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { randomUUID } from 'crypto';
import { setTimeout as sleep } from 'timers/promises';
import { Cancelled, isCancellation } from '../../src/errors.js';
import type {
  HttpClient,
  HttpDownload,
  HttpGetResponse,
  HttpResponse,
  RequestOptions
} from '../../src/http.js';

export interface FakeRoute {
  status?: number;
  body?: string | Buffer;
  contentType?: string;
  delayMs?: number;
  error?: Error;
}

export interface RecordedRequest {
  method: 'GET' | 'HEAD' | 'DOWNLOAD';
  url: string;
  referer?: string;
}

/**
 * In-process {@link HttpClient}. Each URL answers with its queued routes in
 * turn, repeating the last one; unknown URLs answer 404.
 */
export class FakeHttpClient implements HttpClient {
  readonly requests: RecordedRequest[] = [];
  readonly tempFiles: string[] = [];
  inFlight = 0;
  maxInFlight = 0;
  private routes = new Map<string, FakeRoute[]>();

  route(url: string, ...responses: FakeRoute[]): this {
    this.routes.set(url, responses);
    return this;
  }

  html(url: string, body: string): this {
    return this.route(url, { body, contentType: 'text/html; charset=utf-8' });
  }

  requestsFor(url: string): RecordedRequest[] {
    return this.requests.filter((request) => request.url === url);
  }

  async get(url: string, options: RequestOptions = {}): Promise<HttpGetResponse> {
    const route = await this.respond('GET', url, options);
    return { ...this.responseOf(route), body: bodyOf(route) };
  }

  async head(url: string, options: RequestOptions = {}): Promise<HttpResponse> {
    return this.responseOf(await this.respond('HEAD', url, options));
  }

  async downloadToTemp(url: string, options: RequestOptions = {}): Promise<HttpDownload> {
    const route = await this.respond('DOWNLOAD', url, options);
    const tempPath = path.join(os.tmpdir(), `fake-download-${randomUUID()}`);
    await fs.writeFile(tempPath, bodyOf(route));
    this.tempFiles.push(tempPath);
    return { ...this.responseOf(route), tempPath };
  }

  private async respond(method: RecordedRequest['method'], url: string, options: RequestOptions): Promise<FakeRoute> {
    this.requests.push({ method, url, referer: options.referer });
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      const route = this.nextRoute(url);
      if (route.delayMs) {
        await sleep(route.delayMs, undefined, { signal: options.signal }).catch((error: unknown) => {
          throw isCancellation(error) ? new Cancelled() : error;
        });
      }
      if (route.error) throw route.error;
      return route;
    } finally {
      this.inFlight--;
    }
  }

  private nextRoute(url: string): FakeRoute {
    const queue = this.routes.get(url);
    if (!queue || queue.length === 0) return { status: 404, body: 'not found' };
    return queue.length > 1 ? (queue.shift() ?? { status: 404 }) : queue[0];
  }

  private responseOf(route: FakeRoute): HttpResponse {
    const headers: Record<string, string> = {};
    if (route.contentType) headers['content-type'] = route.contentType;
    return { status: route.status ?? 200, headers };
  }
}

function bodyOf(route: FakeRoute): Buffer {
  if (route.body === undefined) return Buffer.alloc(0);
  return Buffer.isBuffer(route.body) ? route.body : Buffer.from(route.body, 'utf8');
}
