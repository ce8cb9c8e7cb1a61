import { describe, expect, it } from 'vitest';
import { ProfileValidationError } from '../src/errors.js';
import {
  PROFILE_VERSION,
  parseProfile,
  profileFromSource,
  serializeProfile,
  sourceInputFromProfile
} from '../src/profile.js';
import { CatalogStore } from '../src/catalog.js';
import { sourceInput } from './helpers/fixtures.js';

describe('profiles', () => {
  const source = new CatalogStore().addSource(sourceInput());
  const profile = profileFromSource(source);

  it('serializes with sorted keys and a trailing newline', () => {
    const text = serializeProfile(profile);

    expect(Object.keys(JSON.parse(text))).toEqual([
      'author',
      'descriptionText',
      'firstPageURL',
      'name',
      'selectorImage',
      'selectorNext',
      'selectorTitle',
      'url',
      'version'
    ]);
    expect(text.endsWith('}\n')).toBe(true);
    expect(text).toContain('\n  "version": 1\n');
  });

  it('parses what it serializes', () => {
    expect(parseProfile(serializeProfile(profile))).toEqual(profile);
  });

  it('drops the version when turned back into source fields', () => {
    expect(sourceInputFromProfile(profile)).toEqual(sourceInput());
    expect(profile.version).toBe(PROFILE_VERSION);
  });

  it('lists every missing key', () => {
    expect(() => parseProfile('{"version":1,"name":"x"}')).toThrow(
      'Profile is missing required keys: author, descriptionText, url, firstPageURL, selectorImage, selectorTitle, selectorNext'
    );
  });

  it('rejects input that is not a JSON object', () => {
    expect(() => parseProfile('not json')).toThrow(ProfileValidationError);
    expect(() => parseProfile('[1, 2]')).toThrow('Profile must be a JSON object');
  });

  it('checks field types', () => {
    const withVersion = { ...profile, version: '1' };
    expect(() => parseProfile(JSON.stringify(withVersion))).toThrow('Profile "version" must be an integer');

    const withName = { ...profile, name: 5 };
    expect(() => parseProfile(JSON.stringify(withName))).toThrow('Profile "name" must be a string');
  });
});
