/**
 * Offset index over the raw text of a Qt Linguist catalog.
 *
 * The reconciliation engine edits catalogs as text so that everything it does
 * not touch keeps its exact bytes. This module finds where things are; it never
 * rewrites anything itself.
 */

import { unescapeXml } from './xml.js';

export interface NumerusFormSpan {
  innerStart: number;
  innerEnd: number;
  text: string;
}

export interface TranslationSpan {
  start: number;
  end: number;
  /** Attribute text between the tag name and `>` or `/>`, leading space included. */
  attributes: string;
  selfClosing: boolean;
  innerStart: number;
  innerEnd: number;
  /** Decoded payload; numerus forms joined with a newline. */
  text: string;
  unfinished: boolean;
  numerusForms: NumerusFormSpan[];
}

export interface CommentSpan {
  innerStart: number;
  innerEnd: number;
  text: string;
}

export interface MessageSpan {
  start: number;
  end: number;
  /** Offset of `</message>`. */
  closeTagStart: number;
  source: string;
  /** Offset just past `</source>`. */
  sourceEnd: number;
  /** Indentation of the `<source>` line, empty when the message sits on one line. */
  childIndent: string;
  multiline: boolean;
  comment?: CommentSpan;
  translation?: TranslationSpan;
}

export interface ContextSpan {
  start: number;
  end: number;
  /** Offset of `</context>`. */
  closeTagStart: number;
  name: string;
  /** Indentation of the `<name>` line. */
  nameIndent: string;
  messages: MessageSpan[];
}

export interface CatalogLayout {
  contexts: ContextSpan[];
  /** Offset of `</TS>`, when present. */
  rootCloseStart?: number;
  newline: string;
}

const CONTEXT_PATTERN = /<context\b[^>]*>([\s\S]*?)<\/context>/g;
const NAME_PATTERN = /<name>([\s\S]*?)<\/name>/;
const MESSAGE_PATTERN = /<message\b[^>]*>([\s\S]*?)<\/message>/g;
const SOURCE_PATTERN = /<source>([\s\S]*?)<\/source>/;
const COMMENT_PATTERN = /<comment>([\s\S]*?)<\/comment>/;
const TRANSLATION_PATTERN = /<translation\b([^>]*?)(?:\/>|>([\s\S]*?)<\/translation>)/;
const NUMERUS_PATTERN = /<numerusform\b[^>]*>([\s\S]*?)<\/numerusform>/g;
const UNFINISHED_PATTERN = /\btype\s*=\s*(["'])unfinished\1/;

export function indexCatalog(text: string): CatalogLayout {
  const contexts: ContextSpan[] = [];

  for (const match of text.matchAll(CONTEXT_PATTERN)) {
    const start = match.index ?? 0;
    const end = start + match[0].length;
    const body = match[1];
    const bodyStart = end - '</context>'.length - body.length;
    const nameMatch = NAME_PATTERN.exec(body);
    if (!nameMatch) {
      continue;
    }

    const nameStart = bodyStart + (nameMatch.index ?? 0);
    contexts.push({
      start,
      end,
      closeTagStart: end - '</context>'.length,
      name: unescapeXml(nameMatch[1]),
      nameIndent: lineIndentAt(text, nameStart),
      messages: indexMessages(text, body, bodyStart),
    });
  }

  const rootClose = text.lastIndexOf('</TS>');

  return {
    contexts,
    rootCloseStart: rootClose >= 0 ? rootClose : undefined,
    newline: text.includes('\r\n') ? '\r\n' : '\n',
  };
}

function indexMessages(text: string, body: string, bodyStart: number): MessageSpan[] {
  const messages: MessageSpan[] = [];

  for (const match of body.matchAll(MESSAGE_PATTERN)) {
    const start = bodyStart + (match.index ?? 0);
    const end = start + match[0].length;
    const inner = match[1];
    const innerStart = end - '</message>'.length - inner.length;

    const sourceMatch = SOURCE_PATTERN.exec(inner);
    if (!sourceMatch) {
      continue;
    }
    const sourceStart = innerStart + (sourceMatch.index ?? 0);

    const message: MessageSpan = {
      start,
      end,
      closeTagStart: end - '</message>'.length,
      source: unescapeXml(sourceMatch[1]),
      sourceEnd: sourceStart + sourceMatch[0].length,
      childIndent: lineIndentAt(text, sourceStart),
      multiline: match[0].includes('\n'),
    };

    const commentMatch = COMMENT_PATTERN.exec(inner);
    if (commentMatch) {
      const commentInnerStart = innerStart + (commentMatch.index ?? 0) + '<comment>'.length;
      message.comment = {
        innerStart: commentInnerStart,
        innerEnd: commentInnerStart + commentMatch[1].length,
        text: unescapeXml(commentMatch[1]),
      };
    }

    const translationMatch = TRANSLATION_PATTERN.exec(inner);
    if (translationMatch) {
      message.translation = indexTranslation(translationMatch, innerStart);
    }

    messages.push(message);
  }

  return messages;
}

function indexTranslation(match: RegExpExecArray, base: number): TranslationSpan {
  const start = base + match.index;
  const end = start + match[0].length;
  const attributes = match[1];
  const payload = match[2];

  if (payload === undefined) {
    return {
      start,
      end,
      attributes,
      selfClosing: true,
      innerStart: end,
      innerEnd: end,
      text: '',
      unfinished: UNFINISHED_PATTERN.test(attributes),
      numerusForms: [],
    };
  }

  const innerStart = start + '<translation'.length + attributes.length + 1;
  const numerusForms: NumerusFormSpan[] = [];
  for (const form of payload.matchAll(NUMERUS_PATTERN)) {
    const formStart = innerStart + (form.index ?? 0);
    const formInnerStart = formStart + form[0].length - '</numerusform>'.length - form[1].length;
    numerusForms.push({
      innerStart: formInnerStart,
      innerEnd: formInnerStart + form[1].length,
      text: unescapeXml(form[1]),
    });
  }

  return {
    start,
    end,
    attributes,
    selfClosing: false,
    innerStart,
    innerEnd: innerStart + payload.length,
    text: numerusForms.length
      ? numerusForms.map((form) => form.text).filter((value) => value.trim()).join('\n')
      : unescapeXml(payload),
    unfinished: UNFINISHED_PATTERN.test(attributes),
    numerusForms,
  };
}

/**
 * Whitespace between the start of the line holding `offset` and `offset`,
 * or '' when anything else precedes it on that line.
 */
export function lineIndentAt(text: string, offset: number): string {
  const lineStart = text.lastIndexOf('\n', offset - 1) + 1;
  const prefix = text.slice(lineStart, offset);
  return /^[ \t]*$/.test(prefix) ? prefix : '';
}

/** Start of the line holding `offset` when only whitespace precedes it there. */
export function ownLineStart(text: string, offset: number): number | undefined {
  const lineStart = text.lastIndexOf('\n', offset - 1) + 1;
  return /^[ \t]*$/.test(text.slice(lineStart, offset)) ? lineStart : undefined;
}

export function stripUnfinished(attributes: string): string {
  return attributes.replace(/\s+type\s*=\s*(["'])unfinished\1/, '');
}
