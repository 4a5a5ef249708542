import { describe, it, expect } from 'vitest';
import { normalizeConfig } from './normalizer.js';
import { assertConfigValid, validateConfig } from './validator.js';

describe('config validator', () => {
  it('accepts a normalized default config', () => {
    expect(() => assertConfigValid(normalizeConfig({}))).not.toThrow();
  });

  it('rejects catalogBase with shell metacharacters', () => {
    const config = normalizeConfig({ catalogBase: 'translations;rm -rf' });
    expect(() => assertConfigValid(config)).toThrow(/catalogBase/);
  });

  it('rejects option-like ranges and out-of-bounds commit caps', () => {
    const config = { ...normalizeConfig({}), commitRange: '--all', maxCommits: 500 };
    expect(validateConfig(config)).toEqual([
      { field: 'commitRange', message: 'must not start with "-"' },
      { field: 'maxCommits', message: 'must be between 1 and 200' },
    ]);
  });

  it('rejects unsafe locale codes and a default locale outside the list', () => {
    const config = normalizeConfig({ locales: ['zh CN', 'ja_JP'], defaultLocale: 'de' });
    const fields = validateConfig(config).map((issue) => issue.field);
    expect(fields).toEqual(['locales[0]', 'defaultLocale']);
  });

  it('lists every issue in one error', () => {
    const config = { ...normalizeConfig({}), maxCommits: 0, repoPath: '' };
    expect(() => assertConfigValid(config)).toThrow(
      'Invalid linguamerge configuration:\n• repoPath: must not be empty\n• maxCommits: must be between 1 and 200'
    );
  });
});
