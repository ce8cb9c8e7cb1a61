import path from 'path';

/**
 * Resolves `href` against `base`. Returns null for blank or unparseable input.
 */
export function resolveUrl(href: string, base: string): string | null {
  const trimmed = href.trim();
  if (!trimmed) return null;
  try {
    return new URL(trimmed, base).href;
  } catch {
    return null;
  }
}

export function parseAbsoluteUrl(value: string): URL | null {
  const trimmed = value.trim();
  if (!trimmed) return null;
  try {
    return new URL(trimmed);
  } catch {
    return null;
  }
}

export function getHost(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return '';
  }
}

/** Extension of the URL's last path segment, lowercased and without the dot. */
export function pathExtension(url: string): string {
  try {
    const { pathname } = new URL(url);
    return path.posix.extname(decodeURIComponent(pathname)).slice(1).toLowerCase();
  } catch {
    return '';
  }
}

export function isDataUrl(url: string): boolean {
  return url.startsWith('data:');
}
