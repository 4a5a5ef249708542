/**
 * Shared catalog data shapes.
 */

export interface TranslationEntry {
  context: string;
  source: string;
  translation: string;
  comment: string;
  /** Derived: payload present, not marked unfinished, non-empty after trimming. */
  translated: boolean;
}

export interface UpdateRequest {
  context: string;
  source: string;
  translation: string;
  comment?: string;
}

export interface FailedMatch {
  context: string;
  source: string;
  reason: string;
  file: string;
}

export type UpdateOutcome = 'replaced' | 'inserted' | 'unchanged' | 'failed' | 'skipped';

export type OutcomeCounts = Record<UpdateOutcome, number>;

export interface CatalogFileResult {
  path: string;
  /** REPLACED + INSERTED */
  modified: number;
  /** The file did not exist and was synthesized. */
  created: boolean;
  written: boolean;
  outcomes: OutcomeCounts;
  /** Unified diff of the planned change, only in dry-run mode. */
  diff?: string;
}

export interface CatalogUpdateSummary {
  dryRun: boolean;
  files: CatalogFileResult[];
  failedMatches: FailedMatch[];
}

export interface CatalogSummary {
  total: number;
  translated: number;
  untranslated: number;
}

export const emptyOutcomeCounts = (): OutcomeCounts => ({
  replaced: 0,
  inserted: 0,
  unchanged: 0,
  failed: 0,
  skipped: 0,
});
