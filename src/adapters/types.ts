/**
 * Syntax adapter contract. An adapter turns one file's text into the
 * references it declares and its structural signals.
 */
import type { ParseFailure, RawReference, StructuralSignals } from '../core/model/types.js';

export interface ExtractionContext {
  /** POSIX path relative to the code root */
  filePath: string;
  /** Lowercase extension including the dot */
  extension: string;
}

export interface ExtractionResult {
  references: RawReference[];
  signals: StructuralSignals;
  parseFailure?: ParseFailure;
}

export interface SyntaxAdapter {
  readonly dialect: string;
  readonly extensions: readonly string[];

  /**
   * Extract references and signals. Malformed input is reported through
   * `parseFailure`; throwing is treated as an adapter crash.
   */
  extract(text: string, context: ExtractionContext): ExtractionResult;

  dispose(): void;
}

export const EMPTY_SIGNALS: Readonly<StructuralSignals> = Object.freeze({
  codeLines: 0,
  branchCount: 0,
  callCount: 0,
  domainConditionals: 0,
  externalFieldAccess: 0,
  declarationOnly: false,
});

/**
 * Result for a file that could not be read or parsed: no references, so
 * no edges, and the failure is surfaced as a finding.
 */
export function failedExtraction(failure: ParseFailure): ExtractionResult {
  return { references: [], signals: { ...EMPTY_SIGNALS }, parseFailure: failure };
}
