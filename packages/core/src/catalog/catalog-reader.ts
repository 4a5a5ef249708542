/**
 * Read-only view of Qt Linguist catalogs.
 *
 * Unlike the updater this goes through a real XML parser, so a malformed file
 * is reported instead of being read approximately.
 */

import fs from 'fs/promises';
import { XMLParser } from 'fast-xml-parser';
import { CatalogNotFoundError, CatalogParseError, isErrnoException } from '../errors.js';
import type { CatalogSummary, TranslationEntry } from './types.js';

export interface ParsedContext {
  name: string;
  entries: TranslationEntry[];
}

export interface ParsedCatalog {
  language?: string;
  contexts: ParsedContext[];
}

type XmlNode = Record<string, unknown>;

const ARRAY_TAGS = new Set(['context', 'message', 'numerusform']);

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  trimValues: false,
  parseTagValue: false,
  parseAttributeValue: false,
  processEntities: true,
  htmlEntities: true,
  isArray: (tagName: string) => ARRAY_TAGS.has(tagName),
});

export function parseCatalogContent(content: string, label = '<catalog>'): ParsedCatalog {
  let document: unknown;
  try {
    document = parser.parse(content, true);
  } catch (error) {
    throw new CatalogParseError(label, error instanceof Error ? error.message : String(error));
  }

  const root = isNode(document) ? document.TS : undefined;
  if (!isNode(root)) {
    throw new CatalogParseError(label, 'missing <TS> root element');
  }

  const contexts: ParsedContext[] = [];
  for (const contextNode of asArray(root.context)) {
    if (!isNode(contextNode)) {
      continue;
    }
    const name = textOf(contextNode.name);
    if (name === undefined) {
      continue;
    }

    const entries: TranslationEntry[] = [];
    for (const messageNode of asArray(contextNode.message)) {
      const entry = isNode(messageNode) ? toEntry(name, messageNode) : undefined;
      if (entry) {
        entries.push(entry);
      }
    }
    contexts.push({ name, entries });
  }

  const language = root['@_language'];
  return { language: typeof language === 'string' ? language : undefined, contexts };
}

export async function loadCatalog(filePath: string): Promise<ParsedCatalog> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new CatalogNotFoundError(filePath);
    }
    throw error;
  }
  return parseCatalogContent(content, filePath);
}

/** Every entry of the catalog, in document order. */
export async function readCatalog(filePath: string): Promise<TranslationEntry[]> {
  const catalog = await loadCatalog(filePath);
  return catalog.contexts.flatMap((context) => context.entries);
}

export async function listContexts(filePath: string): Promise<string[]> {
  const catalog = await loadCatalog(filePath);
  return catalog.contexts.map((context) => context.name).filter((name) => name.length > 0);
}

export async function findEntry(
  filePath: string,
  context: string,
  source: string
): Promise<TranslationEntry | undefined> {
  const entries = await readCatalog(filePath);
  return entries.find((entry) => entry.context === context && entry.source === source);
}

export function findUntranslated(entries: TranslationEntry[]): TranslationEntry[] {
  return entries.filter((entry) => !entry.translated);
}

export function summarizeEntries(entries: TranslationEntry[]): CatalogSummary {
  const translated = entries.filter((entry) => entry.translated).length;
  return { total: entries.length, translated, untranslated: entries.length - translated };
}

function toEntry(context: string, message: XmlNode): TranslationEntry | undefined {
  const source = textOf(message.source);
  if (!source) {
    return undefined;
  }

  const translationNode = message.translation;
  const translation = translationText(translationNode);
  const unfinished = isNode(translationNode) && translationNode['@_type'] === 'unfinished';

  return {
    context,
    source,
    translation,
    comment: textOf(message.comment) ?? '',
    translated: translationNode !== undefined && !unfinished && translation.trim() !== '',
  };
}

function translationText(node: unknown): string {
  if (isNode(node) && node.numerusform !== undefined) {
    return asArray(node.numerusform)
      .map((form) => textOf(form) ?? '')
      .filter((form) => form.trim())
      .join('\n');
  }
  return textOf(node) ?? '';
}

function textOf(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (isNode(value)) {
    const text = value['#text'];
    return typeof text === 'string' ? text : text === undefined ? '' : String(text);
  }
  return undefined;
}

function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asArray(value: unknown): unknown[] {
  if (value === undefined) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}
