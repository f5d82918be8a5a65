/**
 * Lexical helpers shared by the text-based adapters.
 */
import type { RawReference } from '../core/model/types.js';

export interface LexicalSyntax {
  /** Line comment markers, e.g. ['//'] or ["'"] */
  lineComments: readonly string[];
  /** Block comment delimiters */
  blockComment?: readonly [string, string];
  /** String/char literal delimiters */
  quotes: readonly string[];
  /** Backslash escapes inside literals (C, C#); VB doubles the quote instead */
  backslashEscapes: boolean;
  /** Prefix that opens a verbatim literal with doubled-quote escapes (C# @"...") */
  verbatimPrefix?: string;
}

export interface MaskedSource {
  /** Comments blanked, literals kept */
  withoutComments: string;
  /** Comments and literal contents blanked */
  code: string;
  /** Line where an unterminated block comment opens */
  unterminatedBlockLine: number | null;
}

export const C_LIKE_SYNTAX: LexicalSyntax = {
  lineComments: ['//'],
  blockComment: ['/*', '*/'],
  quotes: ['"', "'"],
  backslashEscapes: true,
};

/**
 * Blank out comments (and, in `code`, literal contents) while keeping every
 * newline, so offsets and line numbers stay valid.
 */
export function maskSource(text: string, syntax: LexicalSyntax): MaskedSource {
  let withoutComments = '';
  let code = '';
  let line = 1;
  let unterminatedBlockLine: number | null = null;
  let i = 0;

  const blank = (ch: string): string => (ch === '\n' || ch === '\r' ? ch : ' ');
  const emit = (kept: string, masked: string): void => {
    withoutComments += kept;
    code += masked;
    if (kept === '\n') line++;
  };

  while (i < text.length) {
    const ch = text.charAt(i);
    const block = syntax.blockComment;

    if (block && text.startsWith(block[0], i)) {
      const startLine = line;
      const end = text.indexOf(block[1], i + block[0].length);
      const stop = end === -1 ? text.length : end + block[1].length;
      for (let j = i; j < stop; j++) {
        const b = blank(text.charAt(j));
        emit(b, b);
      }
      if (end === -1) unterminatedBlockLine = startLine;
      i = stop;
      continue;
    }

    if (syntax.lineComments.some((marker) => text.startsWith(marker, i))) {
      while (i < text.length && text.charAt(i) !== '\n') {
        emit(' ', ' ');
        i++;
      }
      continue;
    }

    const verbatim =
      syntax.verbatimPrefix !== undefined &&
      text.startsWith(syntax.verbatimPrefix, i) &&
      syntax.quotes.includes(text.charAt(i + syntax.verbatimPrefix.length));

    if (verbatim || syntax.quotes.includes(ch)) {
      const prefixLength = verbatim && syntax.verbatimPrefix ? syntax.verbatimPrefix.length : 0;
      const quote = text.charAt(i + prefixLength);
      const escapes = syntax.backslashEscapes && !verbatim;
      const opening = text.slice(i, i + prefixLength + 1);
      withoutComments += opening;
      code += opening;
      i += prefixLength + 1;

      while (i < text.length) {
        const c = text.charAt(i);
        if (escapes && c === '\\' && i + 1 < text.length) {
          const next = text.charAt(i + 1);
          emit(c, ' ');
          emit(next, blank(next));
          i += 2;
          continue;
        }
        if (c === quote) {
          if (!escapes && text.charAt(i + 1) === quote) {
            emit(c, ' ');
            emit(c, ' ');
            i += 2;
            continue;
          }
          emit(c, c);
          i++;
          break;
        }
        // Only verbatim literals span lines
        if (c === '\n' && !verbatim) break;
        emit(c, blank(c));
        i++;
      }
      continue;
    }

    emit(ch, ch);
    i++;
  }

  return { withoutComments, code, unterminatedBlockLine };
}

/**
 * 1-based line number of an offset.
 */
export function lineAt(text: string, offset: number): number {
  return new LineIndex(text).lineOf(offset);
}

/**
 * Line start offsets of a text, for repeated offset-to-line lookups.
 */
export class LineIndex {
  private readonly starts: number[] = [0];

  constructor(text: string) {
    let next = text.indexOf('\n');
    while (next !== -1) {
      this.starts.push(next + 1);
      next = text.indexOf('\n', next + 1);
    }
  }

  /** 1-based line containing `offset` */
  lineOf(offset: number): number {
    let low = 0;
    let high = this.starts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if ((this.starts[mid] ?? 0) <= offset) low = mid;
      else high = mid - 1;
    }
    return low + 1;
  }
}

export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

/**
 * Non-blank lines of masked code, optionally skipping lines that match `skip`.
 */
export function countCodeLines(code: string, skip?: RegExp): number {
  return splitLines(code).filter((l) => l.trim() !== '' && !(skip && skip.test(l))).length;
}

export function countMatches(code: string, pattern: RegExp): number {
  const flags = pattern.flags.includes('g') ? pattern.flags : `${pattern.flags}g`;
  return Array.from(code.matchAll(new RegExp(pattern.source, flags))).length;
}

/**
 * Words that make a conditional domain-meaningful.
 */
export const DOMAIN_WORDS = [
  'mode',
  'state',
  'status',
  'level',
  'type',
  'flag',
  'enable',
  'disable',
  'active',
  'threshold',
] as const;

export const DOMAIN_WORD_PATTERN = new RegExp(`\\b(?:${DOMAIN_WORDS.join('|')})\\b`, 'i');

/**
 * Count lines where a conditional keyword is followed by a domain word.
 * Each line is searched once for the keyword and once after it.
 */
export function countDomainConditionals(code: string, keywords: readonly string[]): number {
  const keyword = new RegExp(`\\b(?:${keywords.join('|')})\\b`, 'i');
  let count = 0;
  for (const line of splitLines(code)) {
    const match = keyword.exec(line);
    if (match && DOMAIN_WORD_PATTERN.test(line.slice(match.index + match[0].length))) count++;
  }
  return count;
}

/**
 * Count call sites: an identifier followed by '(' whose preceding token is
 * punctuation or a statement keyword. A preceding identifier means a
 * declaration (`void run(void)`), which is not a call.
 */
export function countCalls(
  code: string,
  keywords: ReadonlySet<string>,
  options: { caseInsensitive?: boolean; lineStatements?: boolean } = {}
): number {
  const callee = /\b([A-Za-z_]\w*)\s*\(/g;
  const callPreceders = /[=(),;{}!&|+\-/?:<>[%^~.]$/;
  const statementWords = /\b(?:return|else|await|new|throw|yield|Call|Then|Return|Not|And|Or|New)$/;
  let count = 0;

  for (const match of code.matchAll(callee)) {
    const name = match[1] ?? '';
    const normalized = options.caseInsensitive ? name.toLowerCase() : name;
    if (keywords.has(normalized)) continue;

    const offset = match.index ?? 0;
    if (options.lineStatements && startsLine(code, offset)) {
      count++;
      continue;
    }
    const before = precedingText(code, offset);
    if (before === '' || callPreceders.test(before) || statementWords.test(before)) {
      count++;
    }
  }
  return count;
}

function startsLine(code: string, offset: number): boolean {
  let i = offset;
  while (i > 0 && (code.charAt(i - 1) === ' ' || code.charAt(i - 1) === '\t')) i--;
  return i === 0 || code.charAt(i - 1) === '\n';
}

/**
 * Up to ten characters before `offset`, trailing whitespace removed.
 */
function precedingText(code: string, offset: number): string {
  let end = offset;
  while (end > 0 && /\s/.test(code.charAt(end - 1))) end--;
  return code.slice(Math.max(0, end - 10), end);
}

/**
 * Identifiers carrying an architecture role prefix, first occurrence each.
 */
export function findPrefixedIdentifiers(
  code: string,
  exclude: ReadonlySet<string>
): Array<{ name: string; line: number }> {
  const pattern = /\b((?:ida|prx|poi|cfg|db|stm|svc|mdw|hal|bsp)_\w+)/gi;
  const lines = new LineIndex(code);
  const seen = new Set<string>();
  const found: Array<{ name: string; line: number }> = [];

  for (const match of code.matchAll(pattern)) {
    const name = match[1] ?? '';
    const key = name.toLowerCase();
    if (seen.has(key) || exclude.has(key)) continue;
    seen.add(key);
    found.push({ name, line: lines.lineOf(match.index ?? 0) });
  }
  return found;
}

/**
 * Member accesses on a prefixed non-feature identifier that are not calls:
 * `hal_uart.regs`, `cfg_limits->max`.
 */
export function countExternalFieldAccess(code: string): number {
  const pattern = /\b(?:svc|mdw|hal|bsp|cfg|db|stm)_\w*\s*(?:->|\.)\s*[A-Za-z_]\w*\b(?!\s*\()/gi;
  return countMatches(code, pattern);
}

// UI, threading and OS calls that .NET code reaches without a using directive
const PLATFORM_CALLS: ReadonlyArray<{ api: string; pattern: RegExp }> = [
  { api: 'MessageBox.Show', pattern: /\bMessageBox\.Show\s*\(/g },
  { api: 'Control.Invoke', pattern: /\.Invoke\s*\(/g },
  { api: 'Control.BeginInvoke', pattern: /\.BeginInvoke\s*\(/g },
  { api: 'Thread.Sleep', pattern: /\bThread\.Sleep\s*\(/g },
  { api: 'Process.Start', pattern: /\bProcess\.Start\s*\(/g },
];

/**
 * Call sites of watched platform APIs, one per API and line, in line order.
 */
export function findPlatformCalls(code: string): RawReference[] {
  const lines = new LineIndex(code);
  const seen = new Set<string>();
  const calls: RawReference[] = [];

  for (const { api, pattern } of PLATFORM_CALLS) {
    for (const match of code.matchAll(pattern)) {
      const line = lines.lineOf(match.index ?? 0);
      const key = `${api}@${line}`;
      if (seen.has(key)) continue;
      seen.add(key);
      calls.push({ specifier: api, line, kind: 'call' });
    }
  }
  return calls.sort((a, b) => a.line - b.line);
}
