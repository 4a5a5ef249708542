import { parsePatch, type ParsedDiff } from 'diff';
import micromatch from 'micromatch';
import { DEFAULT_INCLUDE, MAX_COMMITS } from '../config/defaults.js';
import { matchCalls } from './call-patterns.js';
import { ContextCache, ContextResolver } from './context-resolver.js';
import type { RevisionSource } from './revision-source.js';

export interface Candidate {
  context: string;
  source: string;
  comment: string;
  file: string;
  /** Trimmed text of the added line. */
  line: string;
  lineNumber?: number;
}

export interface ExtractionOptions {
  /** Revision range as git understands it; empty means HEAD. */
  range: string;
  /** Glob patterns; patterns without a slash match the file's base name. */
  include?: string[];
  maxCommits?: number;
  scopeStoplist?: string[];
}

export interface ExtractionSummary {
  candidates: Candidate[];
  commitsScanned: number;
  filesMatched: number;
  warnings: string[];
  /** True when the commit cap was reached. */
  truncated: boolean;
}

/**
 * Collects translatable strings added by the commits in a range.
 */
export class CandidateExtractor {
  constructor(private readonly revisions: RevisionSource) {}

  public async collect(options: ExtractionOptions): Promise<ExtractionSummary> {
    const maxCommits = Math.min(Math.max(options.maxCommits ?? MAX_COMMITS, 1), MAX_COMMITS);
    const include = options.include?.length ? options.include : DEFAULT_INCLUDE;
    const commits = await this.revisions.listCommits(options.range, maxCommits);

    const tip = commits[0]?.hash;
    const resolver = new ContextResolver(
      {
        readFile: (filePath) => (tip ? this.revisions.readFile(tip, filePath) : Promise.resolve(undefined)),
        scopeStoplist: options.scopeStoplist,
      },
      new ContextCache()
    );

    const candidates: Candidate[] = [];
    const seen = new Set<string>();
    const files = new Set<string>();
    const warnings: string[] = [];

    for (const commit of commits) {
      let patches: ParsedDiff[];
      try {
        patches = parsePatch(await this.revisions.readDiff(commit));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        warnings.push(`Skipped commit ${commit.hash.slice(0, 12)}: ${message}`);
        continue;
      }

      for (const patch of patches) {
        const filePath = targetPath(patch);
        if (!filePath || !micromatch.isMatch(filePath, include, { basename: true, dot: true })) {
          continue;
        }
        files.add(filePath);

        for (const hunk of patch.hunks) {
          let lineNumber = hunk.newStart;
          for (const raw of hunk.lines) {
            if (raw.startsWith('+')) {
              for (const candidate of await this.extractLine(raw.slice(1), filePath, lineNumber, resolver)) {
                const key = JSON.stringify([candidate.context, candidate.source]);
                if (!seen.has(key)) {
                  seen.add(key);
                  candidates.push(candidate);
                }
              }
              lineNumber += 1;
            } else if (raw.startsWith(' ')) {
              lineNumber += 1;
            }
          }
        }
      }
    }

    return {
      candidates,
      commitsScanned: commits.length,
      filesMatched: files.size,
      warnings,
      truncated: commits.length >= maxCommits,
    };
  }

  private async extractLine(
    text: string,
    file: string,
    lineNumber: number,
    resolver: ContextResolver
  ): Promise<Candidate[]> {
    const found: Candidate[] = [];
    for (const call of matchCalls(text)) {
      if (!call.source) {
        continue;
      }
      found.push({
        context: call.context || (await resolver.resolve(file)),
        source: call.source,
        comment: call.comment,
        file,
        line: text.trim(),
        lineNumber,
      });
    }
    return found;
  }
}

/** New-side path without git's `b/` prefix; undefined for deletions. */
function targetPath(patch: ParsedDiff): string | undefined {
  const name = patch.newFileName;
  if (!name || name === '/dev/null') {
    return undefined;
  }
  return name.replace(/^b\//, '');
}
