/**
 * Adapter boundary: enforces per-file budgets and turns every failure into
 * a parse failure, so one bad file never stops a scan.
 *
 * Extraction is synchronous, so the time budget is enforced by running the
 * adapter under a vm watchdog that interrupts it once the budget is spent.
 */
import { Script, createContext } from 'node:vm';
import type { ParseFailureReason } from '../core/model/types.js';
import { AdapterError, ErrorCodes, errorMessage } from '../utils/errors.js';
import { fileSize, readFile } from '../utils/file-system.js';
import { logger } from '../utils/logger.js';
import { withTimeout } from '../utils/concurrency.js';
import { failedExtraction, type ExtractionContext, type ExtractionResult, type SyntaxAdapter } from './types.js';

export interface AdapterBudget {
  /** Files larger than this are not read */
  maxFileBytes: number;
  /** Wall-clock budget for reading, and separately for extracting, one file; at least 1 */
  timeoutMs: number;
  /** Extraction attempts when the adapter throws */
  maxAttempts: number;
}

export const DEFAULT_ADAPTER_BUDGET: Readonly<AdapterBudget> = Object.freeze({
  maxFileBytes: 2 * 1024 * 1024,
  timeoutMs: 5000,
  maxAttempts: 2,
});

const REASON_BY_CODE = new Map<string, ParseFailureReason>([
  [ErrorCodes.READ_FAILED, 'read-error'],
  [ErrorCodes.FILE_TOO_LARGE, 'too-large'],
  [ErrorCodes.TIME_BUDGET_EXCEEDED, 'timeout'],
  [ErrorCodes.ADAPTER_CRASHED, 'adapter-crash'],
]);

/**
 * Read a file and run the adapter on it within the budget.
 * Never rejects.
 */
export async function runAdapter(
  adapter: SyntaxAdapter,
  absolutePath: string,
  context: ExtractionContext,
  budget: AdapterBudget = DEFAULT_ADAPTER_BUDGET
): Promise<ExtractionResult> {
  try {
    const text = await readWithinBudget(absolutePath, context.filePath, budget);
    return extractWithinBudget(adapter, text, context, budget);
  } catch (error) {
    return toFailedExtraction(error);
  }
}

/**
 * Run the adapter on already-read text, retrying when it throws.
 * An extraction that outlives the time budget is interrupted and not retried.
 */
export function extractWithinBudget(
  adapter: SyntaxAdapter,
  text: string,
  context: ExtractionContext,
  budget: AdapterBudget = DEFAULT_ADAPTER_BUDGET
): ExtractionResult {
  const attempts = Math.max(1, budget.maxAttempts);
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return runInterruptible(() => adapter.extract(text, context), budget.timeoutMs);
    } catch (error) {
      if (error instanceof AdapterError) return toFailedExtraction(error);
      lastError = error;
      logger.debug(`${adapter.dialect} adapter threw on ${context.filePath} (attempt ${attempt}/${attempts})`, {
        error: errorMessage(error),
      });
    }
  }

  return toFailedExtraction(
    new AdapterError(
      ErrorCodes.ADAPTER_CRASHED,
      `${adapter.dialect} adapter failed after ${attempts} attempt(s): ${errorMessage(lastError)}`
    )
  );
}

const INVOKE = new Script('invoke()');

/**
 * Call `fn` and interrupt it after `timeoutMs`. The watchdog terminates
 * whatever JavaScript runs under the script, including host functions.
 */
function runInterruptible<T>(fn: () => T, timeoutMs: number): T {
  const results: T[] = [];
  const sandbox = createContext({
    invoke: (): void => {
      results.push(fn());
    },
  });
  const limit = Math.max(1, Math.ceil(timeoutMs));

  try {
    INVOKE.runInContext(sandbox, { timeout: limit });
  } catch (error) {
    if (isScriptTimeout(error)) {
      throw new AdapterError(ErrorCodes.TIME_BUDGET_EXCEEDED, `extraction interrupted after ${limit}ms`);
    }
    throw error;
  }

  if (results.length === 0) {
    throw new Error('extraction returned no result');
  }
  return results[0];
}

function isScriptTimeout(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ERR_SCRIPT_EXECUTION_TIMEOUT';
}

async function readWithinBudget(absolutePath: string, relPath: string, budget: AdapterBudget): Promise<string> {
  let size: number;
  try {
    size = await fileSize(absolutePath);
  } catch (error) {
    throw new AdapterError(ErrorCodes.READ_FAILED, `cannot stat ${relPath}: ${errorMessage(error)}`);
  }

  if (size > budget.maxFileBytes) {
    throw new AdapterError(
      ErrorCodes.FILE_TOO_LARGE,
      `file is ${size} bytes (budget ${budget.maxFileBytes} bytes)`
    );
  }

  try {
    return await withTimeout(
      readFile(absolutePath),
      budget.timeoutMs,
      () => new AdapterError(ErrorCodes.TIME_BUDGET_EXCEEDED, `reading took longer than ${budget.timeoutMs}ms`)
    );
  } catch (error) {
    if (error instanceof AdapterError) throw error;
    throw new AdapterError(ErrorCodes.READ_FAILED, `cannot read ${relPath}: ${errorMessage(error)}`);
  }
}

function toFailedExtraction(error: unknown): ExtractionResult {
  if (error instanceof AdapterError) {
    return failedExtraction({
      reason: REASON_BY_CODE.get(error.code) ?? 'adapter-crash',
      message: error.message,
    });
  }
  return failedExtraction({ reason: 'adapter-crash', message: errorMessage(error) });
}
