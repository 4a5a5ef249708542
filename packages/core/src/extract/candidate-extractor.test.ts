import { describe, expect, it } from 'vitest';
import { CandidateExtractor } from './candidate-extractor.js';
import type { CommitRef, RevisionSource } from './revision-source.js';

class MemoryRevisionSource implements RevisionSource {
  public readonly reads: Array<{ revision: string; filePath: string }> = [];

  constructor(
    private readonly commits: CommitRef[],
    private readonly diffs: Record<string, string>,
    private readonly files: Record<string, string> = {}
  ) {}

  async listCommits(_range: string, maxCount: number): Promise<CommitRef[]> {
    return this.commits.slice(0, maxCount);
  }

  async readDiff(commit: CommitRef): Promise<string> {
    const diff = this.diffs[commit.hash];
    if (diff === undefined) {
      throw new Error(`bad object ${commit.hash}`);
    }
    return diff;
  }

  async readFile(revision: string, filePath: string): Promise<string | undefined> {
    this.reads.push({ revision, filePath });
    return this.files[filePath];
  }
}

const diff = (...lines: string[]) => `${lines.join('\n')}\n`;

describe('CandidateExtractor', () => {
  it('uses the file base name when no type or scope can be found', async () => {
    const source = new MemoryRevisionSource([{ hash: 'c1', parents: ['c0'] }], {
      c1: diff(
        'diff --git a/src/main.cpp b/src/main.cpp',
        'index 1111111..2222222 100644',
        '--- a/src/main.cpp',
        '+++ b/src/main.cpp',
        '@@ -10,0 +11,2 @@ int main()',
        '+    label->setText(tr("Hello"));',
        '+    return 0;'
      ),
    });

    const summary = await new CandidateExtractor(source).collect({ range: 'c0..c1' });

    expect(summary.candidates).toEqual([
      {
        context: 'main',
        source: 'Hello',
        comment: '',
        file: 'src/main.cpp',
        line: 'label->setText(tr("Hello"));',
        lineNumber: 11,
      },
    ]);
    expect(summary).toMatchObject({ commitsScanned: 1, filesMatched: 1, warnings: [], truncated: false });
  });

  it('filters files, dedupes keys and resolves contexts at the newest commit', async () => {
    const source = new MemoryRevisionSource(
      [
        { hash: 'c2', parents: ['c1'] },
        { hash: 'c1', parents: [] },
      ],
      {
        c2: diff(
          'diff --git a/src/dialog.cpp b/src/dialog.cpp',
          '--- a/src/dialog.cpp',
          '+++ b/src/dialog.cpp',
          '@@ -3 +3 @@',
          '-    button->setText("Cancel");',
          '+    button->setText(tr("Cancel"));',
          'diff --git a/README.md b/README.md',
          '--- a/README.md',
          '+++ b/README.md',
          '@@ -1,0 +2 @@',
          '+Call tr("Ignored") in code.'
        ),
        c1: diff(
          'diff --git a/src/dialog.cpp b/src/dialog.cpp',
          'new file mode 100644',
          '--- /dev/null',
          '+++ b/src/dialog.cpp',
          '@@ -0,0 +1,2 @@',
          '+    cancel->setText(tr("Cancel"));',
          '+    static const char *quit = QT_TRANSLATE_NOOP("Menu", "Quit");'
        ),
      },
      { 'src/dialog.h': 'class Dialog : public QDialog\n{\n    Q_OBJECT\n};\n' }
    );

    const summary = await new CandidateExtractor(source).collect({ range: 'c1^..c2', include: ['*.cpp', '*.h'] });

    expect(summary.candidates.map(({ context, source: text, lineNumber }) => ({ context, text, lineNumber }))).toEqual([
      { context: 'Dialog', text: 'Cancel', lineNumber: 3 },
      { context: 'Menu', text: 'Quit', lineNumber: 2 },
    ]);
    expect(summary.commitsScanned).toBe(2);
    expect(summary.filesMatched).toBe(1);
    expect(source.reads[0]).toEqual({ revision: 'c2', filePath: 'src/dialog.h' });
  });

  it('ignores deleted files', async () => {
    const source = new MemoryRevisionSource([{ hash: 'c1', parents: ['c0'] }], {
      c1: diff(
        'diff --git a/src/old.cpp b/src/old.cpp',
        'deleted file mode 100644',
        '--- a/src/old.cpp',
        '+++ /dev/null',
        '@@ -1 +0,0 @@',
        '-tr("Gone")'
      ),
    });

    const summary = await new CandidateExtractor(source).collect({ range: '' });

    expect(summary.candidates).toEqual([]);
    expect(summary.filesMatched).toBe(0);
  });

  it('records unreadable commits as warnings and flags a truncated walk', async () => {
    const source = new MemoryRevisionSource(
      [
        { hash: 'missing', parents: ['c1'] },
        { hash: 'c1', parents: [] },
      ],
      {}
    );

    const summary = await new CandidateExtractor(source).collect({ range: 'HEAD~5..HEAD', maxCommits: 1 });

    expect(summary.warnings).toEqual(['Skipped commit missing: bad object missing']);
    expect(summary.commitsScanned).toBe(1);
    expect(summary.truncated).toBe(true);
  });
});
