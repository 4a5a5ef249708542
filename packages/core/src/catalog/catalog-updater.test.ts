import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CatalogUpdater, createEmptyCatalog, languageFromPath, reconcileText } from './catalog-updater.js';
import { CatalogWriteError } from '../errors.js';

const DIALOG_CATALOG = [
  '<?xml version="1.0" encoding="utf-8"?>',
  '<!DOCTYPE TS>',
  '<TS version="2.1" language="zh_CN">',
  '<context>',
  '    <name>Dialog</name>',
  '    <message>',
  '        <source>Cancel</source>',
  '        <translation type="unfinished"></translation>',
  '    </message>',
  '</context>',
  '</TS>',
  '',
].join('\n');

let tempDir: string;
let catalogPath: string;

describe('CatalogUpdater', () => {
  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'catalog-updater-'));
    catalogPath = path.join(tempDir, 'app_zh_CN.ts');
    await fs.writeFile(catalogPath, DIALOG_CATALOG, 'utf8');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    if (tempDir) {
      await fs.rm(tempDir, { recursive: true, force: true });
    }
  });

  it('fills an unfinished translation and drops the marker', async () => {
    const updater = new CatalogUpdater();
    const summary = await updater.apply([catalogPath], [{ context: 'Dialog', source: 'Cancel', translation: '取消' }]);

    expect(summary.files[0].modified).toBe(1);
    expect(summary.files[0].outcomes.replaced).toBe(1);
    expect(summary.files[0].written).toBe(true);

    const contents = await fs.readFile(catalogPath, 'utf8');
    expect(contents).toBe(
      DIALOG_CATALOG.replace('<translation type="unfinished"></translation>', '<translation>取消</translation>')
    );
  });

  it('leaves the file untouched when the same update is applied twice', async () => {
    const updater = new CatalogUpdater();
    const update = { context: 'Dialog', source: 'Cancel', translation: '取消' };
    await updater.apply([catalogPath], [update]);
    const afterFirst = await fs.readFile(catalogPath, 'utf8');

    const summary = await updater.apply([catalogPath], [update]);

    expect(summary.files[0].modified).toBe(0);
    expect(summary.files[0].outcomes.unchanged).toBe(1);
    expect(summary.files[0].written).toBe(false);
    expect(await fs.readFile(catalogPath, 'utf8')).toBe(afterFirst);
  });

  it('appends a new entry at the end of its context', async () => {
    const updater = new CatalogUpdater();
    const summary = await updater.apply([catalogPath], [{ context: 'Dialog', source: 'Save As', translation: '另存为' }]);

    expect(summary.files[0].modified).toBe(1);
    expect(summary.files[0].outcomes.inserted).toBe(1);
    expect(await fs.readFile(catalogPath, 'utf8')).toBe(
      [
        '<?xml version="1.0" encoding="utf-8"?>',
        '<!DOCTYPE TS>',
        '<TS version="2.1" language="zh_CN">',
        '<context>',
        '    <name>Dialog</name>',
        '    <message>',
        '        <source>Cancel</source>',
        '        <translation type="unfinished"></translation>',
        '    </message>',
        '    <message>',
        '        <source>Save As</source>',
        '        <translation>另存为</translation>',
        '    </message>',
        '</context>',
        '</TS>',
        '',
      ].join('\n')
    );
  });

  it('reports a failed match when the context does not exist', async () => {
    const updater = new CatalogUpdater();
    const summary = await updater.apply([catalogPath], [{ context: 'Missing', source: 'X', translation: 'Y' }]);

    expect(summary.files[0].modified).toBe(0);
    expect(summary.files[0].written).toBe(false);
    expect(summary.failedMatches).toHaveLength(1);
    expect(summary.failedMatches[0]).toMatchObject({ context: 'Missing', source: 'X', file: catalogPath });
    expect(updater.lastFailedMatches).toEqual(summary.failedMatches);
    expect(await fs.readFile(catalogPath, 'utf8')).toBe(DIALOG_CATALOG);
  });

  it('matches context names exactly', async () => {
    const updater = new CatalogUpdater();
    const summary = await updater.apply([catalogPath], [{ context: 'dialog', source: 'Cancel', translation: '取消' }]);

    expect(summary.files[0].outcomes.failed).toBe(1);
    expect(summary.failedMatches[0].context).toBe('dialog');
  });

  it('replaces the failed matches on every apply', async () => {
    const updater = new CatalogUpdater();
    await updater.apply([catalogPath], [{ context: 'Missing', source: 'X', translation: 'Y' }]);
    await updater.apply([catalogPath], [{ context: 'Dialog', source: 'Cancel', translation: '取消' }]);

    expect(updater.lastFailedMatches).toEqual([]);
  });

  it('creates a catalog that does not exist yet', async () => {
    const newPath = path.join(tempDir, 'app_zh_HK.ts');
    const updater = new CatalogUpdater();
    const summary = await updater.apply([newPath], [{ context: 'Dialog', source: 'OK', translation: '確定' }]);

    expect(summary.files[0]).toMatchObject({ created: true, modified: 1, written: true });
    expect(await fs.readFile(newPath, 'utf8')).toBe(
      [
        '<?xml version="1.0" encoding="utf-8"?>',
        '<!DOCTYPE TS>',
        '<TS version="2.1" language="zh_HK">',
        '<context>',
        '    <name>Dialog</name>',
        '    <message>',
        '        <source>OK</source>',
        '        <translation>確定</translation>',
        '    </message>',
        '</context>',
        '</TS>',
        '',
      ].join('\n')
    );
  });

  it('returns a diff without writing in dry-run mode', async () => {
    const updater = new CatalogUpdater();
    const summary = await updater.apply([catalogPath], [{ context: 'Dialog', source: 'Cancel', translation: '取消' }], {
      dryRun: true,
    });

    expect(summary.dryRun).toBe(true);
    expect(summary.files[0].written).toBe(false);
    expect(summary.files[0].diff).toContain('-        <translation type="unfinished"></translation>');
    expect(summary.files[0].diff).toContain('+        <translation>取消</translation>');
    expect(await fs.readFile(catalogPath, 'utf8')).toBe(DIALOG_CATALOG);
  });

  it('inserts a repeated new key once and leaves the file alone when re-applied', async () => {
    const updater = new CatalogUpdater();
    const updates = [
      { context: 'Dialog', source: 'Save As', translation: '另存为' },
      { context: 'Dialog', source: 'Save As', translation: '另存为' },
    ];

    const first = await updater.apply([catalogPath], updates);
    const afterFirst = await fs.readFile(catalogPath, 'utf8');

    expect(first.files[0].outcomes).toMatchObject({ inserted: 1, unchanged: 1 });
    expect(afterFirst.split('<source>Save As</source>')).toHaveLength(2);

    const second = await updater.apply([catalogPath], updates);

    expect(second.files[0].outcomes).toMatchObject({ inserted: 0, unchanged: 2 });
    expect(second.files[0].written).toBe(false);
    expect(await fs.readFile(catalogPath, 'utf8')).toBe(afterFirst);
  });

  it('keeps the original file and cleans up when the write fails', async () => {
    vi.spyOn(fs, 'rename').mockRejectedValueOnce(new Error('disk full'));
    const updater = new CatalogUpdater();

    await expect(
      updater.apply([catalogPath], [{ context: 'Dialog', source: 'Cancel', translation: '取消' }])
    ).rejects.toBeInstanceOf(CatalogWriteError);

    expect(await fs.readFile(catalogPath, 'utf8')).toBe(DIALOG_CATALOG);
    const leftovers = (await fs.readdir(tempDir)).filter((name) => name.endsWith('.tmp'));
    expect(leftovers).toHaveLength(0);
  });
});

describe('reconcileText', () => {
  it('never blanks an existing translation with an empty request', () => {
    const text = DIALOG_CATALOG.replace('<translation type="unfinished"></translation>', '<translation>取消</translation>');
    const step = reconcileText(text, { context: 'Dialog', source: 'Cancel', translation: '' });

    expect(step.outcome).toBe('unchanged');
    expect(step.text).toBe(text);
  });

  it('skips empty requests for missing contexts and incomplete keys', () => {
    expect(reconcileText(DIALOG_CATALOG, { context: 'Missing', source: 'X', translation: '' }).outcome).toBe('skipped');
    expect(reconcileText(DIALOG_CATALOG, { context: '', source: 'X', translation: 'Y' }).outcome).toBe('skipped');
    expect(reconcileText(DIALOG_CATALOG, { context: 'Dialog', source: '', translation: 'Y' }).outcome).toBe('skipped');
  });

  it('inserts an unfinished entry for an empty request on a new source', () => {
    const step = reconcileText(DIALOG_CATALOG, { context: 'Dialog', source: 'Apply', translation: '' });

    expect(step.outcome).toBe('inserted');
    expect(step.text).toContain(
      '    <message>\n        <source>Apply</source>\n        <translation type="unfinished"></translation>\n    </message>\n</context>'
    );
  });

  it('counts a comment-only change as a replacement', () => {
    const text = DIALOG_CATALOG.replace('<translation type="unfinished"></translation>', '<translation>取消</translation>');
    const step = reconcileText(text, { context: 'Dialog', source: 'Cancel', translation: '取消', comment: 'button' });

    expect(step.outcome).toBe('replaced');
    expect(step.text).toContain(
      '        <source>Cancel</source>\n        <comment>button</comment>\n        <translation>取消</translation>'
    );
  });

  it('escapes markup in translations', () => {
    const step = reconcileText(DIALOG_CATALOG, { context: 'Dialog', source: 'Cancel', translation: 'A & <B>' });

    expect(step.text).toContain('<translation>A &amp; &lt;B&gt;</translation>');
  });

  it('writes every numerus form of a plural entry', () => {
    const text = [
      '<TS version="2.1">',
      '<context>',
      '    <name>Status</name>',
      '    <message numerus="yes">',
      '        <source>%n file(s)</source>',
      '        <translation type="unfinished">',
      '            <numerusform></numerusform>',
      '        </translation>',
      '    </message>',
      '</context>',
      '</TS>',
    ].join('\n');

    const step = reconcileText(text, { context: 'Status', source: '%n file(s)', translation: '%n 个文件' });

    expect(step.outcome).toBe('replaced');
    expect(step.text).toContain(
      '        <translation>\n            <numerusform>%n 个文件</numerusform>\n        </translation>'
    );
  });

  it('updates every duplicate of a key and counts the request once', () => {
    const text = [
      '<TS version="2.1">',
      '<context>',
      '    <name>Dialog</name>',
      '    <message>',
      '        <source>Close</source>',
      '        <translation>关</translation>',
      '    </message>',
      '    <message>',
      '        <source>Close</source>',
      '        <translation type="unfinished"></translation>',
      '    </message>',
      '</context>',
      '</TS>',
    ].join('\n');

    const step = reconcileText(text, { context: 'Dialog', source: 'Close', translation: '关闭' });

    expect(step.outcome).toBe('replaced');
    expect(step.text.split('<translation>关闭</translation>')).toHaveLength(3);
  });

  describe('entries disambiguated by comment', () => {
    const text = [
      '<TS version="2.1">',
      '<context>',
      '    <name>Dialog</name>',
      '    <message>',
      '        <source>Open</source>',
      '        <comment>verb</comment>',
      '        <translation type="unfinished"></translation>',
      '    </message>',
      '    <message>',
      '        <source>Open</source>',
      '        <comment>adjective</comment>',
      '        <translation>已打开</translation>',
      '    </message>',
      '</context>',
      '</TS>',
    ].join('\n');

    it('updates only the entry carrying the requested comment', () => {
      const step = reconcileText(text, { context: 'Dialog', source: 'Open', translation: '打开', comment: 'verb' });

      expect(step.outcome).toBe('replaced');
      expect(step.text).toBe(
        text.replace('<translation type="unfinished"></translation>', '<translation>打开</translation>')
      );
    });

    it('adds a new entry for a comment no sibling carries', () => {
      const step = reconcileText(text, { context: 'Dialog', source: 'Open', translation: '打开', comment: 'menu' });

      expect(step.outcome).toBe('inserted');
      expect(step.text).toContain('<comment>adjective</comment>\n        <translation>已打开</translation>');
      expect(step.text).toContain(
        '    <message>\n        <source>Open</source>\n        <comment>menu</comment>\n        <translation>打开</translation>\n    </message>\n</context>'
      );
    });
  });
});

describe('catalog helpers', () => {
  it('reads the locale from the file name', () => {
    expect(languageFromPath('translations/app_zh_TW.ts')).toBe('zh_TW');
    expect(languageFromPath('translations/app_de.ts')).toBe('de');
    expect(languageFromPath('translations/app.ts')).toBeUndefined();
  });

  it('synthesizes an empty document', () => {
    expect(createEmptyCatalog()).toBe('<?xml version="1.0" encoding="utf-8"?>\n<!DOCTYPE TS>\n<TS version="2.1">\n</TS>\n');
  });
});
