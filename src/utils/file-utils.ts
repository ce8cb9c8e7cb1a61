import { promises as fs } from 'fs';
import path from 'path';
import { InvalidSourceName } from '../errors.js';

const ILLEGAL_FILENAME_CHARS = /[/\\?%*|"<>:]/g;

const EXTENSIONS_BY_MIME: Record<string, string> = {
  'image/jpeg': 'jpeg',
  'image/jpg': 'jpeg',
  'image/pjpeg': 'jpeg',
  'image/png': 'png',
  'image/apng': 'apng',
  'image/gif': 'gif',
  'image/webp': 'webp',
  'image/avif': 'avif',
  'image/svg+xml': 'svg',
  'image/bmp': 'bmp',
  'image/x-ms-bmp': 'bmp',
  'image/tiff': 'tiff',
  'image/x-icon': 'ico',
  'image/vnd.microsoft.icon': 'ico',
  'image/heic': 'heic',
  'image/heif': 'heif',
  'image/jxl': 'jxl',
  'text/html': 'html',
  'text/plain': 'txt',
  'application/pdf': 'pdf'
};

export function sanitizeFilename(filename: string): string {
  return filename.replace(ILLEGAL_FILENAME_CHARS, '').trim();
}

/**
 * Download folder of a source: one directory per source, named after it.
 * Throws {@link InvalidSourceName} when the name would not yield a folder
 * strictly inside `root`.
 */
export function sourceFolderPath(root: string, sourceName: string): string {
  const folder = sanitizeFilename(sourceName);
  if (folder === '' || folder === '.' || folder === '..') {
    throw new InvalidSourceName(sourceName);
  }
  return path.join(root, folder);
}

/**
 * Preferred extension for a download: the Content-Type's, then the URL's, then `fallback`.
 */
export function fileExtension(
  contentType: string | undefined,
  urlExtension: string | undefined,
  fallback: string
): string {
  if (contentType) {
    const mime = contentType.split(';')[0].trim().toLowerCase();
    const ext = EXTENSIONS_BY_MIME[mime];
    if (ext) return ext;
  }
  if (urlExtension) return urlExtension;
  return fallback;
}

export interface DecodedDataUrl {
  mediaType: string;
  data: Buffer;
}

/**
 * Decodes `data:[<mediatype>][;base64],<data>`. Returns null when the URL is malformed.
 */
export function decodeDataUrl(url: string): DecodedDataUrl | null {
  if (!url.startsWith('data:')) return null;
  const comma = url.indexOf(',');
  if (comma < 0) return null;

  const meta = url.slice('data:'.length, comma);
  const payload = url.slice(comma + 1);
  const mediaType = meta.split(';')[0];

  if (meta.includes(';base64')) {
    const compact = payload.replace(/\s+/g, '');
    if (!/^[A-Za-z0-9+/]*={0,2}$/.test(compact) || compact.length % 4 === 1) return null;
    return { mediaType, data: Buffer.from(compact, 'base64') };
  }

  try {
    return { mediaType, data: Buffer.from(decodeURIComponent(payload), 'utf8') };
  } catch {
    return null;
  }
}

export interface FileNameParts {
  pageIndex: number;
  imagesOnPage: number;
  subIndex: number;
  title: string;
  ext: string;
}

export function formatPageIndex(index: number): string {
  return String(index).padStart(5, '0');
}

/** `00007-2 Title.png`; the `-N` part only appears when the page has several images. */
export function buildFileName(parts: FileNameParts): string {
  let name = formatPageIndex(parts.pageIndex);
  if (parts.imagesOnPage > 1) {
    name += `-${Math.max(1, parts.subIndex)}`;
  }
  const title = sanitizeFilename(parts.title);
  if (title) {
    name += ` ${title}`;
  }
  return `${name}.${parts.ext}`;
}

export async function fileExists(filepath: string): Promise<boolean> {
  try {
    await fs.access(filepath);
    return true;
  } catch {
    return false;
  }
}

/** Names of the entries in `dir`, or an empty set when it does not exist. */
export async function listFileNames(dir: string): Promise<Set<string>> {
  try {
    return new Set(await fs.readdir(dir));
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      return new Set();
    }
    throw error;
  }
}

/** Renames `from` to `to`, copying instead when they sit on different devices. */
export async function moveFile(from: string, to: string): Promise<void> {
  try {
    await fs.rename(from, to);
  } catch (error) {
    if (!isNodeError(error) || error.code !== 'EXDEV') throw error;
    await fs.copyFile(from, to);
    await fs.unlink(from);
  }
}

/** Deletes a file; a file that is already gone is not an error. */
export async function removeIfExists(filepath: string): Promise<void> {
  try {
    await fs.unlink(filepath);
  } catch (error) {
    if (!isNodeError(error) || error.code !== 'ENOENT') throw error;
  }
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
