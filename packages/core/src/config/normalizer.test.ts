import { describe, it, expect } from 'vitest';
import { ensureStringArray, normalizeConfig } from './normalizer.js';

describe('normalizeConfig', () => {
  it('fills every field from defaults', () => {
    expect(normalizeConfig({})).toEqual({
      version: 1,
      repoPath: '.',
      commitRange: 'HEAD~10..HEAD',
      include: ['*.cpp', '*.h', '*.ui', '*.qml'],
      maxCommits: 200,
      scopeStoplist: ['std', 'Qt', 'QtPrivate', 'Ui', 'detail', 'internal', 'boost'],
      catalogBase: 'translations/app',
      catalogExtension: '.ts',
      locales: ['zh_CN', 'zh_HK', 'zh_TW'],
      defaultLocale: 'zh_CN',
    });
  });

  it('coerces loose values', () => {
    const config = normalizeConfig({
      locales: 'ja_JP, ko_KR, ja_JP',
      catalogExtension: 'ts',
      maxCommits: 50.7,
      commitRange: '',
    });

    expect(config.locales).toEqual(['ja_JP', 'ko_KR']);
    expect(config.defaultLocale).toBe('ja_JP');
    expect(config.catalogExtension).toBe('.ts');
    expect(config.maxCommits).toBe(50);
    expect(config.commitRange).toBe('');
  });

  it('drops blank and non-string list items', () => {
    expect(ensureStringArray(['*.cpp', ' ', 3, ' *.h '])).toEqual(['*.cpp', '*.h']);
  });
});
