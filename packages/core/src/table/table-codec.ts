/**
 * Markdown table export/import for human or LLM translation.
 *
 * Export escapes `|` and flattens line breaks to spaces; import reverses only
 * the pipe escape and removes only the single space of padding around each
 * cell, so leading and trailing whitespace in a source survives the round
 * trip. Rows that do not have the expected shape are skipped.
 */

import type { UpdateRequest } from '../catalog/types.js';

export interface LocaleDefinition {
  code: string;
  label: string;
}

/** Rows to export; only the fields the table shows. */
export interface TableEntry {
  context: string;
  source: string;
  comment?: string;
  translation?: string;
}

export interface TableExportOptions {
  /** Write existing translations into the translation cells. */
  prefill?: boolean;
}

export interface SingleLocaleExportOptions extends TableExportOptions {
  /** Language name shown in the translation column header. */
  targetLanguage?: string;
}

export const SUPPORTED_LOCALES: LocaleDefinition[] = [
  { code: 'zh_CN', label: 'Simplified Chinese' },
  { code: 'zh_HK', label: 'Traditional Chinese, Hong Kong' },
  { code: 'zh_TW', label: 'Traditional Chinese, Taiwan' },
];

const SINGLE_LOCALE_COLUMNS = 5;
const FIXED_COLUMNS = 4;

export function escapeCell(value: string | undefined): string {
  if (!value) {
    return '';
  }
  return value.replace(/\|/g, '\\|').replace(/\r?\n|\r/g, ' ');
}

export function unescapeCell(value: string): string {
  return value.replace(/\\\|/g, '|');
}

function renderRow(cells: string[]): string {
  return `| ${cells.join(' | ')} |`;
}

function renderSeparator(columns: number): string {
  return `|${Array.from({ length: columns }, () => '------').join('|')}|`;
}

export function renderTable(entries: TableEntry[], options: SingleLocaleExportOptions = {}): string {
  const language = options.targetLanguage ?? 'Chinese';
  const lines = [
    renderRow(['#', 'Context', 'Source', `${language} Translation`, 'Comment']),
    renderSeparator(SINGLE_LOCALE_COLUMNS),
  ];

  entries.forEach((entry, index) => {
    lines.push(
      renderRow([
        String(index + 1),
        escapeCell(entry.context),
        escapeCell(entry.source),
        options.prefill ? escapeCell(entry.translation) : '',
        escapeCell(entry.comment),
      ])
    );
  });

  return `${lines.join('\n')}\n`;
}

/**
 * One translation column per locale. With `prefill`, only the entry's own
 * translation is available, so it lands in the first locale column.
 */
export function renderMultiLocaleTable(
  entries: TableEntry[],
  locales: LocaleDefinition[] = SUPPORTED_LOCALES,
  options: TableExportOptions = {}
): string {
  const lines = [
    renderRow([
      '#',
      'Context',
      'Source',
      ...locales.map((locale) => `${locale.label} (${locale.code})`),
      'Comment',
    ]),
    renderSeparator(FIXED_COLUMNS + locales.length),
  ];

  entries.forEach((entry, index) => {
    const translations = locales.map((_, column) =>
      options.prefill && column === 0 ? escapeCell(entry.translation) : ''
    );
    lines.push(
      renderRow([
        String(index + 1),
        escapeCell(entry.context),
        escapeCell(entry.source),
        ...translations,
        escapeCell(entry.comment),
      ])
    );
  });

  return `${lines.join('\n')}\n`;
}

export function renderJson(entries: TableEntry[]): string {
  const data = entries.map((entry) => ({
    context: entry.context,
    source: entry.source,
    translation: '',
    comment: entry.comment ?? '',
  }));
  return JSON.stringify(data, null, 2);
}

function stripPadding(cell: string): string {
  return cell.replace(/^ /, '').replace(/ $/, '');
}

/**
 * Split a table line into unescaped cells, or undefined when the line is not
 * a `| … |` row.
 */
export function parseRow(line: string): string[] | undefined {
  const trimmed = line.trim();
  if (!trimmed.startsWith('|')) {
    return undefined;
  }

  const parts = trimmed.split(/(?<!\\)\|/);
  // Leading pipe yields an empty first part; a closing pipe an empty last one.
  const cells = parts.slice(1);
  if (cells.length && cells[cells.length - 1].trim() === '') {
    cells.pop();
  }
  return cells.map((cell) => unescapeCell(stripPadding(cell)));
}

function dataRows(table: string): string[][] {
  const rows = table
    .split(/\r?\n/)
    .map((line) => parseRow(line))
    .filter((row): row is string[] => row !== undefined);
  return rows.slice(2);
}

export function parseTable(table: string): UpdateRequest[] {
  const updates: UpdateRequest[] = [];

  for (const cells of dataRows(table)) {
    if (cells.length !== SINGLE_LOCALE_COLUMNS) {
      continue;
    }
    const [, context, source, translation, comment] = cells;
    if (!translation.trim()) {
      continue;
    }
    updates.push({ context, source, translation, comment });
  }

  return updates;
}

export function parseMultiLocaleTable(
  table: string,
  locales: LocaleDefinition[] = SUPPORTED_LOCALES
): Record<string, UpdateRequest[]> {
  const result: Record<string, UpdateRequest[]> = {};
  for (const locale of locales) {
    result[locale.code] = [];
  }

  for (const cells of dataRows(table)) {
    if (cells.length !== FIXED_COLUMNS + locales.length) {
      continue;
    }
    const context = cells[1];
    const source = cells[2];
    const comment = cells[cells.length - 1];

    locales.forEach((locale, column) => {
      const translation = cells[3 + column];
      if (translation.trim()) {
        result[locale.code].push({ context, source, translation, comment });
      }
    });
  }

  return result;
}
