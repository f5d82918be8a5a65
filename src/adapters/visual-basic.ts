/**
 * Visual Basic .NET adapter: `Imports` directives, role-prefixed identifiers
 * and watched platform calls.
 */
import { posix } from 'node:path';
import { moduleName } from '../core/model/classifier.js';
import type { RawReference } from '../core/model/types.js';
import { failedExtraction, type ExtractionContext, type ExtractionResult, type SyntaxAdapter } from './types.js';
import {
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

const VB_SYNTAX: LexicalSyntax = {
  lineComments: ["'"],
  quotes: ['"'],
  backslashEscapes: false,
};

const IMPORTS_PATTERN = /^\s*Imports\s+(?:[A-Za-z_]\w*\s*=\s*)?([A-Za-z_][\w.]*)/i;

// Compared lowercase
const NON_CALL_WORDS = new Set([
  'if', 'elseif', 'while', 'for', 'select', 'case', 'return', 'not', 'and', 'or',
  'andalso', 'orelse', 'ctype', 'directcast', 'trycast', 'gettype', 'iif', 'sub', 'function',
]);

export class VisualBasicAdapter implements SyntaxAdapter {
  readonly dialect = 'visual-basic';
  readonly extensions = ['.vb'];

  extract(text: string, context: ExtractionContext): ExtractionResult {
    const nul = text.indexOf('\u0000');
    if (nul !== -1) {
      return failedExtraction({ reason: 'malformed', message: 'binary content (NUL byte)', line: lineAt(text, nul) });
    }

    const masked = maskSource(text, VB_SYNTAX);
    const references: RawReference[] = [];
    const code = splitLines(masked.code)
      .map((line, index) => {
        const match = IMPORTS_PATTERN.exec(line);
        if (!match) return line;
        references.push({ specifier: match[1] ?? '', line: index + 1, kind: 'namespace' });
        return '';
      })
      .join('\n');

    const ownName = moduleName(posix.basename(context.filePath));
    for (const identifier of findPrefixedIdentifiers(code, new Set([ownName]))) {
      references.push({ specifier: identifier.name, line: identifier.line, kind: 'identifier' });
    }
    for (const call of findPlatformCalls(code)) references.push(call);

    return {
      references,
      signals: {
        codeLines: countCodeLines(code),
        branchCount:
          countMatches(code, /^\s*(?:If|ElseIf)\b/im) +
          countMatches(code, /^\s*Case\b/im) +
          countMatches(code, /\bIIf\s*\(/i),
        callCount: countCalls(code, NON_CALL_WORDS, { caseInsensitive: true, lineStatements: true }),
        domainConditionals: countDomainConditionals(code, ['If', 'ElseIf', 'Select', 'Case']),
        externalFieldAccess: countExternalFieldAccess(code),
        declarationOnly: false,
      },
    };
  }

  dispose(): void {
    // Stateless
  }
}
