/**
 * C/C++ adapter: #include directives plus text-level signals.
 */
import type { RawReference } from '../core/model/types.js';
import { failedExtraction, type ExtractionContext, type ExtractionResult, type SyntaxAdapter } from './types.js';
import {
  C_LIKE_SYNTAX,
  countCalls,
  countCodeLines,
  countDomainConditionals,
  countExternalFieldAccess,
  countMatches,
  lineAt,
  maskSource,
  splitLines,
} from './text.js';

const INCLUDE_PATTERN = /^\s*#\s*include\s*([<"])([^">]+)[">]/;
const PREPROCESSOR_LINE = /^\s*#.*$/gm;

const DECLARATION_EXTENSIONS = new Set(['.h', '.hh', '.hpp', '.hxx']);

const NON_CALL_WORDS = new Set([
  'if', 'for', 'while', 'switch', 'return', 'sizeof', 'alignof', '_Alignof',
  'defined', 'typeof', 'decltype', 'catch', 'static_assert', '__attribute__',
  'void', 'int', 'char', 'short', 'long', 'float', 'double', 'unsigned', 'signed',
]);

export class CFamilyAdapter implements SyntaxAdapter {
  readonly dialect = 'c-family';
  readonly extensions = ['.c', '.h', '.cc', '.hh', '.cpp', '.hpp', '.cxx', '.hxx'];

  extract(text: string, context: ExtractionContext): ExtractionResult {
    const nul = text.indexOf('\u0000');
    if (nul !== -1) {
      return failedExtraction({
        reason: 'malformed',
        message: 'binary content (NUL byte)',
        line: lineAt(text, nul),
      });
    }

    const masked = maskSource(text, C_LIKE_SYNTAX);
    if (masked.unterminatedBlockLine !== null) {
      return failedExtraction({
        reason: 'malformed',
        message: 'unterminated block comment',
        line: masked.unterminatedBlockLine,
      });
    }

    const references: RawReference[] = [];
    splitLines(masked.withoutComments).forEach((line, index) => {
      const match = INCLUDE_PATTERN.exec(line);
      if (match) {
        references.push({
          specifier: (match[2] ?? '').trim(),
          line: index + 1,
          kind: match[1] === '<' ? 'system' : 'local',
        });
      }
    });

    // Preprocessor conditionals are not program branches
    const code = masked.code.replace(PREPROCESSOR_LINE, '');

    return {
      references,
      signals: {
        codeLines: countCodeLines(code),
        branchCount: countMatches(code, /\b(?:if|case)\b/) + countMatches(code, /\?/),
        callCount: countCalls(code, NON_CALL_WORDS),
        domainConditionals: countDomainConditionals(code, ['if', 'switch', 'case']),
        externalFieldAccess: countExternalFieldAccess(code),
        declarationOnly: DECLARATION_EXTENSIONS.has(context.extension),
      },
    };
  }

  dispose(): void {
    // Stateless
  }
}
