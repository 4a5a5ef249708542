import fs from 'fs/promises';
import path from 'path';
import { createPatch } from 'diff';
import { isErrnoException } from '../errors.js';
import { writeFileAtomic } from './atomic-write.js';
import {
  indexCatalog,
  lineIndentAt,
  ownLineStart,
  stripUnfinished,
  type CatalogLayout,
  type ContextSpan,
  type MessageSpan,
} from './catalog-layout.js';
import {
  emptyOutcomeCounts,
  type CatalogFileResult,
  type CatalogUpdateSummary,
  type FailedMatch,
  type UpdateOutcome,
  type UpdateRequest,
} from './types.js';
import { escapeXml } from './xml.js';

export interface CatalogUpdateOptions {
  /** Compute results and diffs without writing. */
  dryRun?: boolean;
}

export interface ReconcileOptions {
  /** Create missing context groups instead of failing (brand-new catalogs). */
  createContexts?: boolean;
}

export interface ReconcileStep {
  outcome: UpdateOutcome;
  text: string;
  reason?: string;
}

interface TextEdit {
  start: number;
  end: number;
  replacement: string;
}

const DEFAULT_INDENT = '    ';

/**
 * Applies translation updates to Qt Linguist catalogs.
 *
 * Every request is resolved against the current in-memory text of one
 * document; the document is written at most once, and only when some request
 * replaced or inserted something.
 */
export class CatalogUpdater {
  private failed: FailedMatch[] = [];

  /** Failed matches of the most recent `apply` call. */
  public get lastFailedMatches(): FailedMatch[] {
    return [...this.failed];
  }

  public async apply(
    files: string[],
    updates: UpdateRequest[],
    options: CatalogUpdateOptions = {}
  ): Promise<CatalogUpdateSummary> {
    const dryRun = options.dryRun ?? false;
    this.failed = [];
    const results: CatalogFileResult[] = [];

    for (const file of files) {
      results.push(await this.applyToFile(file, updates, dryRun));
    }

    return { dryRun, files: results, failedMatches: [...this.failed] };
  }

  private async applyToFile(
    filePath: string,
    updates: UpdateRequest[],
    dryRun: boolean
  ): Promise<CatalogFileResult> {
    const original = await readOptional(filePath);
    const created = original === undefined;
    let text = original ?? createEmptyCatalog(languageFromPath(filePath));
    const outcomes = emptyOutcomeCounts();

    for (const update of updates) {
      const step = reconcileText(text, update, { createContexts: created });
      outcomes[step.outcome] += 1;
      text = step.text;

      if (step.outcome === 'failed') {
        this.failed.push({
          context: update.context,
          source: update.source,
          reason: step.reason ?? 'No matching context',
          file: filePath,
        });
      }
    }

    const modified = outcomes.replaced + outcomes.inserted;
    const changed = modified > 0 && text !== original;
    const result: CatalogFileResult = {
      path: filePath,
      modified,
      created,
      written: false,
      outcomes,
    };

    if (dryRun) {
      if (changed) {
        result.diff = createPatch(path.basename(filePath), original ?? '', text);
      }
      return result;
    }

    if (changed) {
      await writeFileAtomic(filePath, text);
      result.written = true;
    }

    return result;
  }
}

/**
 * Resolve one request against catalog text and return the (possibly) edited
 * text with the outcome.
 */
export function reconcileText(
  text: string,
  request: UpdateRequest,
  options: ReconcileOptions = {}
): ReconcileStep {
  const context = request.context ?? '';
  const source = request.source ?? '';
  const translation = request.translation ?? '';
  const comment = request.comment ?? '';
  const hasTranslation = translation.trim().length > 0;

  if (!context || !source) {
    return { outcome: 'skipped', text };
  }

  let current = text;
  let layout = indexCatalog(current);
  let groups = layout.contexts.filter((group) => group.name === context);

  if (!groups.length) {
    if (options.createContexts) {
      current = appendContext(current, layout, context);
      layout = indexCatalog(current);
      groups = layout.contexts.filter((group) => group.name === context);
    } else if (!hasTranslation) {
      return { outcome: 'skipped', text };
    } else {
      return {
        outcome: 'failed',
        text,
        reason: `Context "${context}" does not exist in this catalog (context names must match exactly)`,
      };
    }
  }

  const matches = groups.flatMap((group) => group.messages.filter((message) => message.source === source));
  const targets = selectTargets(matches, comment);

  if (!targets.length) {
    return {
      outcome: 'inserted',
      text: insertMessage(current, groups[0], layout.newline, { source, translation, comment }),
    };
  }

  if (!hasTranslation) {
    return { outcome: 'unchanged', text };
  }

  const edits = targets.flatMap((message) => planMessageEdits(current, message, layout.newline, translation, comment));
  if (!edits.length) {
    return { outcome: 'unchanged', text };
  }

  return { outcome: 'replaced', text: applyEdits(current, edits) };
}

/**
 * Narrow same-source entries to the ones a request addresses. A comment on the
 * request picks the entries carrying that comment, then the uncommented ones;
 * entries disambiguated by another comment are never rewritten.
 */
function selectTargets(matches: MessageSpan[], comment: string): MessageSpan[] {
  const wanted = comment.trim();
  if (!wanted || matches.length < 2) {
    return matches;
  }

  const commentOf = (message: MessageSpan) => message.comment?.text.trim() ?? '';
  const exact = matches.filter((message) => commentOf(message) === wanted);
  return exact.length ? exact : matches.filter((message) => !commentOf(message));
}

function planMessageEdits(
  text: string,
  message: MessageSpan,
  newline: string,
  translation: string,
  comment: string
): TextEdit[] {
  const edits: TextEdit[] = [];
  const wanted = translation.trim();
  const payload = escapeXml(translation);
  const existing = message.translation;

  if (!existing) {
    edits.push(insertChild(text, message, newline, `<translation>${payload}</translation>`, message.closeTagStart));
  } else if (existing.numerusForms.length) {
    const stale = existing.numerusForms.filter((form) => form.text.trim() !== wanted);
    if (stale.length) {
      for (const form of stale) {
        edits.push({ start: form.innerStart, end: form.innerEnd, replacement: payload });
      }
      if (existing.unfinished) {
        const openEnd = existing.start + '<translation'.length + existing.attributes.length;
        edits.push({
          start: existing.start,
          end: openEnd,
          replacement: `<translation${stripUnfinished(existing.attributes)}`,
        });
      }
    }
  } else if (existing.text.trim() !== wanted) {
    edits.push({
      start: existing.start,
      end: existing.end,
      replacement: `<translation${stripUnfinished(existing.attributes)}>${payload}</translation>`,
    });
  }

  const wantedComment = comment.trim();
  if (wantedComment && wantedComment !== (message.comment?.text.trim() ?? '')) {
    if (message.comment) {
      edits.push({
        start: message.comment.innerStart,
        end: message.comment.innerEnd,
        replacement: escapeXml(wantedComment),
      });
    } else {
      edits.push(insertChild(text, message, newline, `<comment>${escapeXml(wantedComment)}</comment>`, message.sourceEnd, true));
    }
  }

  return edits;
}

/**
 * Build an edit inserting `element` as a child of `message`, either on its own
 * line (multi-line messages) or inline.
 */
function insertChild(
  text: string,
  message: MessageSpan,
  newline: string,
  element: string,
  at: number,
  afterSibling = false
): TextEdit {
  if (!message.multiline) {
    return { start: at, end: at, replacement: element };
  }

  const indent = message.childIndent || `${lineIndentAt(text, message.start)}${DEFAULT_INDENT}`;
  if (afterSibling) {
    return { start: at, end: at, replacement: `${newline}${indent}${element}` };
  }

  const lineStart = ownLineStart(text, at);
  if (lineStart !== undefined) {
    return { start: lineStart, end: lineStart, replacement: `${indent}${element}${newline}` };
  }
  return { start: at, end: at, replacement: `${newline}${indent}${element}${newline}` };
}

function insertMessage(
  text: string,
  group: ContextSpan,
  newline: string,
  entry: { source: string; translation: string; comment: string }
): string {
  const sibling = group.messages[0];
  const messageIndent = sibling ? lineIndentAt(text, sibling.start) : group.nameIndent || DEFAULT_INDENT;
  const childIndent =
    sibling && sibling.multiline && sibling.childIndent ? sibling.childIndent : `${messageIndent}${DEFAULT_INDENT}`;

  const lines = [`${messageIndent}<message>`, `${childIndent}<source>${escapeXml(entry.source)}</source>`];
  if (entry.comment.trim()) {
    lines.push(`${childIndent}<comment>${escapeXml(entry.comment.trim())}</comment>`);
  }
  lines.push(
    entry.translation.trim()
      ? `${childIndent}<translation>${escapeXml(entry.translation)}</translation>`
      : `${childIndent}<translation type="unfinished"></translation>`
  );
  lines.push(`${messageIndent}</message>`);

  return insertBlock(text, group.closeTagStart, lines, newline);
}

function appendContext(text: string, layout: CatalogLayout, name: string): string {
  const firstContext = layout.contexts[0];
  const indent = firstContext ? lineIndentAt(text, firstContext.start) : '';
  const lines = [`${indent}<context>`, `${indent}${DEFAULT_INDENT}<name>${escapeXml(name)}</name>`, `${indent}</context>`];
  return insertBlock(text, layout.rootCloseStart ?? text.length, lines, layout.newline);
}

/** Insert whole lines just before the closing tag found at `closeTagStart`. */
function insertBlock(text: string, closeTagStart: number, lines: string[], newline: string): string {
  const block = lines.join(newline);
  const lineStart = ownLineStart(text, closeTagStart);
  if (lineStart !== undefined) {
    return `${text.slice(0, lineStart)}${block}${newline}${text.slice(lineStart)}`;
  }
  return `${text.slice(0, closeTagStart)}${newline}${block}${newline}${text.slice(closeTagStart)}`;
}

function applyEdits(text: string, edits: TextEdit[]): string {
  const ordered = [...edits].sort((a, b) => b.start - a.start || b.end - a.end);
  let result = text;
  for (const edit of ordered) {
    result = `${result.slice(0, edit.start)}${edit.replacement}${result.slice(edit.end)}`;
  }
  return result;
}

export function createEmptyCatalog(language?: string): string {
  const languageAttribute = language ? ` language="${language}"` : '';
  return [
    '<?xml version="1.0" encoding="utf-8"?>',
    '<!DOCTYPE TS>',
    `<TS version="2.1"${languageAttribute}>`,
    '</TS>',
    '',
  ].join('\n');
}

/** `app_zh_CN.ts` -> `zh_CN`; undefined when the file name carries no locale suffix. */
export function languageFromPath(filePath: string): string | undefined {
  const stem = path.basename(filePath, path.extname(filePath));
  const match = /_([a-z]{2,3}(?:_(?:[A-Z]{2}|[A-Z][a-z]{3}))?)$/.exec(stem);
  return match?.[1];
}

async function readOptional(filePath: string): Promise<string | undefined> {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
}
