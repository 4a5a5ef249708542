export type LinguamergeErrorKind = 'not-found' | 'unmatched' | 'malformed' | 'write-failed' | 'git';

export class LinguamergeError extends Error {
  constructor(message: string, public readonly kind: LinguamergeErrorKind, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LinguamergeError';
  }
}

export class CatalogNotFoundError extends LinguamergeError {
  constructor(public readonly filePath: string) {
    super(`Catalog file not found: ${filePath}`, 'not-found');
    this.name = 'CatalogNotFoundError';
  }
}

export class CatalogParseError extends LinguamergeError {
  constructor(public readonly filePath: string, detail: string) {
    super(`Unable to parse catalog ${filePath}: ${detail}`, 'malformed');
    this.name = 'CatalogParseError';
  }
}

export class CatalogWriteError extends LinguamergeError {
  constructor(public readonly filePath: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to write ${filePath}: ${detail}`, 'write-failed', { cause });
    this.name = 'CatalogWriteError';
  }
}

export class RevisionRangeError extends LinguamergeError {
  constructor(public readonly range: string, detail: string) {
    super(`Invalid revision range "${range}": ${detail}`, 'not-found');
    this.name = 'RevisionRangeError';
  }
}

export class GitCommandError extends LinguamergeError {
  constructor(public readonly args: string[], public readonly exitCode: number | null, public readonly stderr: string) {
    super(`git ${args.join(' ')} exited with code ${exitCode ?? 'unknown'}: ${stderr.trim()}`, 'git');
    this.name = 'GitCommandError';
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
