import { spawn } from 'child_process';
import { GitCommandError, RevisionRangeError } from '../errors.js';
import type { CommitRef, RevisionSource } from './revision-source.js';

const DIFF_FLAGS = ['--no-color', '--no-ext-diff', '--unified=0'];

/**
 * Run git in `cwd` and resolve with its raw stdout.
 */
export function runGit(args: string[], cwd: string): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const child = spawn('git', args, { cwd, stdio: ['ignore', 'pipe', 'pipe'] });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));
    child.on('error', reject);
    child.on('close', (code) => {
      if (code === 0) {
        resolve(Buffer.concat(stdout));
      } else {
        reject(new GitCommandError(args, code, Buffer.concat(stderr).toString('utf8')));
      }
    });
  });
}

export class GitRevisionSource implements RevisionSource {
  constructor(private readonly repoPath: string) {}

  public async listCommits(range: string, maxCount: number): Promise<CommitRef[]> {
    const revisions = range.trim() || 'HEAD';
    if (revisions.startsWith('-')) {
      throw new RevisionRangeError(revisions, 'a range must not start with "-"');
    }
    let output: Buffer;
    try {
      output = await runGit(['rev-list', '--parents', `--max-count=${maxCount}`, revisions, '--'], this.repoPath);
    } catch (error) {
      if (error instanceof GitCommandError) {
        throw new RevisionRangeError(revisions, error.stderr.trim() || error.message);
      }
      throw error;
    }

    return output
      .toString('utf8')
      .split('\n')
      .map((line) => line.trim())
      .filter(Boolean)
      .map((line) => {
        const [hash, ...parents] = line.split(/\s+/);
        return { hash, parents };
      });
  }

  public async readDiff(commit: CommitRef): Promise<string> {
    const [firstParent] = commit.parents;
    const args = firstParent
      ? ['diff', ...DIFF_FLAGS, firstParent, commit.hash]
      : ['diff-tree', '--root', '-r', '-p', '--no-commit-id', ...DIFF_FLAGS, commit.hash];
    // Buffer#toString substitutes U+FFFD for invalid UTF-8.
    return (await runGit(args, this.repoPath)).toString('utf8');
  }

  public async readFile(revision: string, filePath: string): Promise<string | undefined> {
    try {
      return (await runGit(['show', `${revision}:${filePath}`], this.repoPath)).toString('utf8');
    } catch (error) {
      if (error instanceof GitCommandError) {
        return undefined;
      }
      throw error;
    }
  }
}
