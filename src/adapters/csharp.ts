/**
 * C# adapter.
 *
 * `using` directives become namespace references. Identifiers carrying a role
 * prefix (`prx_Alpha`, `hal_Uart`) become identifier references; they count
 * as class references only when a file of the same name exists. Calls to
 * watched platform APIs (`MessageBox.Show`, `Thread.Sleep`) become call
 * references.
 */
import { posix } from 'node:path';
import { moduleName } from '../core/model/classifier.js';
import type { RawReference } from '../core/model/types.js';
import { failedExtraction, type ExtractionContext, type ExtractionResult, type SyntaxAdapter } from './types.js';
import {
  C_LIKE_SYNTAX,
  countCalls,
  countCodeLines,
  countDomainConditionals,
  countExternalFieldAccess,
  countMatches,
  findPlatformCalls,
  findPrefixedIdentifiers,
  lineAt,
  maskSource,
  splitLines,
  type LexicalSyntax,
} from './text.js';

const CSHARP_SYNTAX: LexicalSyntax = { ...C_LIKE_SYNTAX, verbatimPrefix: '@' };

const USING_PATTERN =
  /^\s*(?:global\s+)?using\s+(?:static\s+)?(?:[A-Za-z_]\w*\s*=\s*)?([A-Za-z_][\w.]*)\s*;/;

const NON_CALL_WORDS = new Set([
  'if', 'for', 'foreach', 'while', 'switch', 'catch', 'using', 'lock', 'return',
  'nameof', 'typeof', 'sizeof', 'default', 'checked', 'unchecked', 'fixed', 'when',
]);

export class CSharpAdapter implements SyntaxAdapter {
  readonly dialect = 'csharp';
  readonly extensions = ['.cs'];

  extract(text: string, context: ExtractionContext): ExtractionResult {
    const nul = text.indexOf('\u0000');
    if (nul !== -1) {
      return failedExtraction({ reason: 'malformed', message: 'binary content (NUL byte)', line: lineAt(text, nul) });
    }

    const masked = maskSource(text, CSHARP_SYNTAX);
    if (masked.unterminatedBlockLine !== null) {
      return failedExtraction({
        reason: 'malformed',
        message: 'unterminated block comment',
        line: masked.unterminatedBlockLine,
      });
    }

    const opened = countMatches(masked.code, /\{/);
    const closed = countMatches(masked.code, /\}/);
    if (opened !== closed) {
      return failedExtraction({
        reason: 'malformed',
        message: `unbalanced braces (${opened} opening, ${closed} closing)`,
      });
    }

    const references: RawReference[] = [];
    const codeLines = splitLines(masked.code).map((line, index) => {
      const match = USING_PATTERN.exec(line);
      if (!match) return line;
      references.push({ specifier: match[1] ?? '', line: index + 1, kind: 'namespace' });
      return '';
    });
    const code = codeLines.join('\n');

    const ownName = moduleName(posix.basename(context.filePath));
    for (const identifier of findPrefixedIdentifiers(code, new Set([ownName]))) {
      references.push({ specifier: identifier.name, line: identifier.line, kind: 'identifier' });
    }
    for (const call of findPlatformCalls(code)) references.push(call);

    return {
      references,
      signals: {
        codeLines: countCodeLines(code),
        branchCount: countMatches(code, /\b(?:if|case)\b/) + countMatches(code, /\s\?\s/),
        callCount: countCalls(code, NON_CALL_WORDS),
        domainConditionals: countDomainConditionals(code, ['if', 'switch', 'case']),
        externalFieldAccess: countExternalFieldAccess(code),
        declarationOnly: false,
      },
    };
  }

  dispose(): void {
    // Stateless
  }
}
