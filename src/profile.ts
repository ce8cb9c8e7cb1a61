import { ProfileValidationError } from './errors.js';
import type { Source, SourceInput } from './types.js';

export const PROFILE_VERSION = 1;

const STRING_KEYS = [
  'name',
  'author',
  'descriptionText',
  'url',
  'firstPageURL',
  'selectorImage',
  'selectorTitle',
  'selectorNext'
] as const;

/** Shareable description of a source: everything but its crawl state. */
export interface ComicProfile extends SourceInput {
  version: number;
}

export function profileFromSource(source: Source): ComicProfile {
  return {
    version: PROFILE_VERSION,
    name: source.name,
    author: source.author,
    descriptionText: source.descriptionText,
    url: source.url,
    firstPageURL: source.firstPageURL,
    selectorImage: source.selectorImage,
    selectorTitle: source.selectorTitle,
    selectorNext: source.selectorNext
  };
}

/** Pretty-printed JSON with keys in sorted order. */
export function serializeProfile(profile: ComicProfile): string {
  const sorted: Record<string, string | number> = {};
  for (const key of Object.keys(profile).sort()) {
    if (key === 'version') {
      sorted[key] = profile.version;
    } else if (isStringKey(key)) {
      sorted[key] = profile[key];
    }
  }
  return JSON.stringify(sorted, null, 2) + '\n';
}

function isStringKey(key: string): key is (typeof STRING_KEYS)[number] {
  return STRING_KEYS.some((known) => known === key);
}

export function parseProfile(text: string): ComicProfile {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ProfileValidationError(`Profile is not valid JSON: ${error}`);
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ProfileValidationError('Profile must be a JSON object');
  }
  const record = new Map<string, unknown>(Object.entries(parsed));

  const missing = ['version', ...STRING_KEYS].filter((key) => !record.has(key));
  if (missing.length > 0) {
    throw new ProfileValidationError(`Profile is missing required keys: ${missing.join(', ')}`);
  }

  const version = record.get('version');
  if (typeof version !== 'number' || !Number.isInteger(version)) {
    throw new ProfileValidationError('Profile "version" must be an integer');
  }

  const fields: Partial<SourceInput> = {};
  for (const key of STRING_KEYS) {
    const value = record.get(key);
    if (typeof value !== 'string') {
      throw new ProfileValidationError(`Profile "${key}" must be a string`);
    }
    fields[key] = value;
  }

  return {
    version,
    name: fields.name ?? '',
    author: fields.author ?? '',
    descriptionText: fields.descriptionText ?? '',
    url: fields.url ?? '',
    firstPageURL: fields.firstPageURL ?? '',
    selectorImage: fields.selectorImage ?? '',
    selectorTitle: fields.selectorTitle ?? '',
    selectorNext: fields.selectorNext ?? ''
  };
}

export function sourceInputFromProfile(profile: ComicProfile): SourceInput {
  const { version: _version, ...input } = profile;
  return input;
}
