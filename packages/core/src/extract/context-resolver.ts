import path from 'path';
import { DEFAULT_SCOPE_STOPLIST } from '../config/defaults.js';

/** Reads a repository-relative file; undefined when it does not exist. */
export type FileReader = (filePath: string) => Promise<string | undefined>;

/** One way of answering a question; undefined hands over to the next one. */
export type Strategy<T> = () => Promise<T | undefined>;

export interface ContextResolverOptions {
  readFile: FileReader;
  scopeStoplist?: string[];
}

interface SourceDocument {
  path: string;
  content: string;
}

const IMPLEMENTATION_EXTENSIONS = ['.cpp', '.cc', '.cxx', '.c++', '.mm'];
const DECLARATION_EXTENSIONS = ['.h', '.hpp', '.hh', '.hxx'];

const CLASS_PATTERN =
  /(?<!\benum\s+)\b(?:class|struct)\s+(?:[A-Z][A-Z0-9_]*\s+)?([A-Za-z_]\w*)\s*(?:final\s*)?(?::[^;{]*)?\{/g;
const TR_MARKER_PATTERN = /\b(?:Q_OBJECT|Q_GADGET|Q_DECLARE_TR_FUNCTIONS)\b/;
const NAMESPACE_PATTERN = /\bnamespace\s+([A-Za-z_][\w:]*)\s*\{/g;
const INCLUDE_PATTERN = /^[ \t]*#[ \t]*include[ \t]*"([^"]+)"/gm;
const INCLUDE_HINT_PATTERN = /namespace|scope|global|config|defs|export|(?:^|[_-])ns(?:$|[_-])/i;

/**
 * Resolved context labels for one extraction run, keyed by file path.
 */
export class ContextCache {
  private readonly labels = new Map<string, string>();

  public get(filePath: string): string | undefined {
    return this.labels.get(filePath);
  }

  public set(filePath: string, label: string): void {
    this.labels.set(filePath, label);
  }

  public get size(): number {
    return this.labels.size;
  }

  public clear(): void {
    this.labels.clear();
  }
}

export async function firstResolved<T>(strategies: Strategy<T>[]): Promise<T | undefined> {
  for (const strategy of strategies) {
    const value = await strategy();
    if (value !== undefined) {
      return value;
    }
  }
  return undefined;
}

/**
 * Derives a translation context label (`Scope::Type`, `Type` or the file's
 * base name) for calls that do not name one.
 */
export class ContextResolver {
  private readonly stoplist: Set<string>;

  constructor(
    private readonly options: ContextResolverOptions,
    private readonly cache: ContextCache = new ContextCache()
  ) {
    this.stoplist = new Set(options.scopeStoplist ?? DEFAULT_SCOPE_STOPLIST);
  }

  public async resolve(filePath: string): Promise<string> {
    const cached = this.cache.get(filePath);
    if (cached !== undefined) {
      return cached;
    }

    let label: string;
    try {
      label = (await this.resolveLabel(filePath)) ?? baseName(filePath);
    } catch {
      label = baseName(filePath);
    }

    this.cache.set(filePath, label);
    return label;
  }

  private async resolveLabel(filePath: string): Promise<string | undefined> {
    const found = await firstResolved(
      this.documentStrategies(filePath).map((load) => async () => {
        const document = await load();
        const typeName = document ? findTypeName(document.content) : undefined;
        return document && typeName ? { document, typeName } : undefined;
      })
    );
    if (!found) {
      return undefined;
    }

    const scope = await this.resolveScope(found.document);
    return scope ? `${scope}::${found.typeName}` : found.typeName;
  }

  private documentStrategies(filePath: string): Strategy<SourceDocument>[] {
    const extension = path.posix.extname(filePath).toLowerCase();
    const strategies: Strategy<SourceDocument>[] = [];

    if (IMPLEMENTATION_EXTENSIONS.includes(extension)) {
      const stem = filePath.slice(0, filePath.length - extension.length);
      for (const declaration of DECLARATION_EXTENSIONS) {
        strategies.push(() => this.load(`${stem}${declaration}`));
      }
    }
    strategies.push(() => this.load(filePath));

    return strategies;
  }

  private async resolveScope(document: SourceDocument): Promise<string | undefined> {
    const chain: string[] = [];
    for (const match of stripComments(document.content).matchAll(NAMESPACE_PATTERN)) {
      for (const segment of match[1].split('::')) {
        if (segment && !this.stoplist.has(segment)) {
          chain.push(segment);
        }
      }
    }
    if (!chain.length) {
      return undefined;
    }

    const resolved: string[] = [];
    for (const segment of chain.slice(-2)) {
      resolved.push(await this.resolveSegment(segment, document));
    }
    return resolved.join('::');
  }

  private async resolveSegment(token: string, document: SourceDocument): Promise<string> {
    if (!isMacroLike(token)) {
      return token;
    }

    const value = await firstResolved<string>([
      async () => findDefine(document.content, token),
      () => this.defineFromIncludes(token, document),
    ]);
    return value ?? token;
  }

  private async defineFromIncludes(token: string, document: SourceDocument): Promise<string | undefined> {
    const includes = [...document.content.matchAll(INCLUDE_PATTERN)]
      .map((match) => match[1])
      .filter((include) => INCLUDE_HINT_PATTERN.test(path.posix.basename(include, path.posix.extname(include))));

    return firstResolved(
      includes.flatMap((include) =>
        [path.posix.join(path.posix.dirname(document.path), include), path.posix.normalize(include)].map(
          (candidate) => async () => {
            const loaded = await this.load(candidate);
            return loaded ? findDefine(loaded.content, token) : undefined;
          }
        )
      )
    );
  }

  private async load(filePath: string): Promise<SourceDocument | undefined> {
    try {
      const content = await this.options.readFile(filePath);
      return content === undefined ? undefined : { path: filePath, content };
    } catch {
      return undefined;
    }
  }
}

/**
 * With a Q_OBJECT-style marker, the last class opened before it; otherwise the
 * first class with a body.
 */
export function findTypeName(content: string): string | undefined {
  const code = stripComments(content);
  const classes = [...code.matchAll(CLASS_PATTERN)];
  if (!classes.length) {
    return undefined;
  }

  const marker = TR_MARKER_PATTERN.exec(code);
  if (marker) {
    const before = classes.filter((match) => (match.index ?? 0) < marker.index);
    if (before.length) {
      return before[before.length - 1][1];
    }
  }
  return classes[0][1];
}

export function isMacroLike(token: string): boolean {
  return /^[A-Z0-9_]+$/.test(token) || token.includes('_');
}

function findDefine(content: string, token: string): string | undefined {
  const pattern = new RegExp(`^[ \\t]*#[ \\t]*define[ \\t]+${escapeRegExp(token)}[ \\t]+([A-Za-z_][\\w:]*)[ \\t]*$`, 'm');
  return pattern.exec(content)?.[1];
}

function stripComments(content: string): string {
  return content.replace(/\/\*[\s\S]*?\*\//g, ' ').replace(/(^|[ \t])\/\/.*$/gm, '$1');
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function baseName(filePath: string): string {
  return path.posix.basename(filePath, path.posix.extname(filePath));
}
