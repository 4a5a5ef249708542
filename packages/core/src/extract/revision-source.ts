export interface CommitRef {
  hash: string;
  /** Parent hashes, first parent first; empty for a root commit. */
  parents: string[];
}

/**
 * Read-only access to a versioned source tree.
 */
export interface RevisionSource {
  /** Commits in `range`, newest first, at most `maxCount`. An empty range means HEAD. */
  listCommits(range: string, maxCount: number): Promise<CommitRef[]>;
  /** Unified diff of `commit` against its first parent, or against the empty tree for a root commit. */
  readDiff(commit: CommitRef): Promise<string>;
  /** File content at `revision`, or undefined when it cannot be read. */
  readFile(revision: string, filePath: string): Promise<string | undefined>;
}
