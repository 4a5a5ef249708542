/**
 * Recognizers for Qt translation calls in a single line of C++ or QML.
 *
 * Patterns are tried in priority order; a later pattern never reports a call
 * whose text overlaps one an earlier pattern already claimed.
 */

export interface CallMatch {
  /** Explicit context from translate()/QT_TRANSLATE_NOOP forms. */
  context?: string;
  source: string;
  comment: string;
  start: number;
  end: number;
}

export interface CallPattern {
  name: string;
  regex: RegExp;
  read(match: RegExpExecArray): Omit<CallMatch, 'start' | 'end'>;
}

const STRING = String.raw`(?:"(?:[^"\\]|\\.)*"|'(?:[^'\\]|\\.)*')`;
const DISAMBIGUATION = String.raw`(?:${STRING}|nullptr|NULL|0)`;
// Plural count: any expression without quotes or commas, one level of nested parens.
const COUNT = String.raw`(?:[^(),"']|\([^()]*\))+`;
const TRANSLATE = String.raw`\b(?:(?:QCoreApplication|QApplication|QGuiApplication)::|qApp->)?(?:translate|qsTranslate)`;
const TR = String.raw`\b(?:tr|qsTr)`;

const open = (callee: string) => String.raw`${callee}\s*\(\s*`;
const comma = String.raw`\s*,\s*`;
const close = String.raw`\s*\)`;

function pattern(name: string, source: string, read: CallPattern['read']): CallPattern {
  return { name, regex: new RegExp(source, 'g'), read };
}

export const CALL_PATTERNS: CallPattern[] = [
  pattern(
    'translate-plural',
    `${open(TRANSLATE)}(${STRING})${comma}(${STRING})${comma}(${DISAMBIGUATION})${comma}${COUNT}\\)`,
    (m) => ({ context: unquote(m[1]), source: unquote(m[2]), comment: disambiguation(m[3]) })
  ),
  pattern(
    'translate-comment',
    `${open(`(?:${TRANSLATE}|\\bQT_TRANSLATE_NOOP3)`)}(${STRING})${comma}(${STRING})${comma}(${DISAMBIGUATION})${close}`,
    (m) => ({ context: unquote(m[1]), source: unquote(m[2]), comment: disambiguation(m[3]) })
  ),
  pattern(
    'translate',
    `${open(`(?:${TRANSLATE}|\\bQT_TRANSLATE_NOOP)`)}(${STRING})${comma}(${STRING})${close}`,
    (m) => ({ context: unquote(m[1]), source: unquote(m[2]), comment: '' })
  ),
  pattern(
    'tr-comment-plural',
    `${open(TR)}(${STRING})${comma}(${DISAMBIGUATION})${comma}${COUNT}\\)`,
    (m) => ({ source: unquote(m[1]), comment: disambiguation(m[2]) })
  ),
  pattern('tr-comment', `${open(TR)}(${STRING})${comma}(${DISAMBIGUATION})${close}`, (m) => ({
    source: unquote(m[1]),
    comment: disambiguation(m[2]),
  })),
  pattern('tr-plural', `${open(TR)}(${STRING})${comma}${COUNT}\\)`, (m) => ({
    source: unquote(m[1]),
    comment: '',
  })),
  pattern('tr', `${open(`(?:${TR}|\\bQT_TR_NOOP|\\bQT_TR_N_NOOP)`)}(${STRING})${close}`, (m) => ({
    source: unquote(m[1]),
    comment: '',
  })),
];

/**
 * Every translation call on `line`, ordered by position.
 */
export function matchCalls(line: string, patterns: CallPattern[] = CALL_PATTERNS): CallMatch[] {
  const claimed: CallMatch[] = [];

  for (const { regex, read } of patterns) {
    regex.lastIndex = 0;
    let match: RegExpExecArray | null;
    while ((match = regex.exec(line)) !== null) {
      const start = match.index;
      const end = start + match[0].length;
      if (claimed.some((other) => start < other.end && other.start < end)) {
        continue;
      }
      claimed.push({ ...read(match), start, end });
    }
  }

  return claimed.sort((a, b) => a.start - b.start);
}

/** Strip the quotes of a string literal and decode its escapes. */
export function unquote(literal: string): string {
  return literal.slice(1, -1).replace(/\\(.)/g, (_, char: string) => {
    switch (char) {
      case 'n':
        return '\n';
      case 't':
        return '\t';
      case 'r':
        return '\r';
      default:
        return char;
    }
  });
}

function disambiguation(token: string): string {
  return token.startsWith('"') || token.startsWith("'") ? unquote(token) : '';
}
