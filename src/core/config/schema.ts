/**
 * Configuration schema for `.layergate/config.yaml`.
 *
 * Every object is strict: an unknown key (a profile, a severity override)
 * is rejected rather than ignored.
 */
import { z } from 'zod';
import { DEFAULT_ADAPTER_BUDGET } from '../../adapters/boundary.js';

/**
 * Optional object field that still gets its inner defaults.
 * Both undefined and null are treated as missing.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

export const DEFAULT_EXCLUDE = ['**/build/**', '**/.git/**', '**/node_modules/**'];

/** File scanning configuration. */
export const ScanSchema = z
  .object({
    /** Glob patterns, relative to each code root, removed from the scan */
    exclude: z.array(z.string()).default(DEFAULT_EXCLUDE),
  })
  .strict();

/** Per-file budgets and parallelism. */
export const EngineSchema = z
  .object({
    /** Files processed in parallel (default: 75% of CPUs, min 2, max 16) */
    concurrency: z.number().int().min(1).max(64).optional(),
    file_timeout_ms: z.number().int().positive().default(DEFAULT_ADAPTER_BUDGET.timeoutMs),
    max_file_bytes: z.number().int().positive().default(DEFAULT_ADAPTER_BUDGET.maxFileBytes),
    max_attempts: z.number().int().min(1).max(10).default(DEFAULT_ADAPTER_BUDGET.maxAttempts),
  })
  .strict();

export const ConfigSchema = z
  .object({
    version: z.string().default('1.0'),
    /** Relative to the repository root */
    code_roots: z.array(z.string().min(1)).default([]),
    docs_root: z.string().min(1).optional(),
    report_path: z.string().min(1).default('.layergate-report.json'),
    scan: withDefaults(ScanSchema),
    engine: withDefaults(EngineSchema),
  })
  .strict();

export type Config = z.infer<typeof ConfigSchema>;
export type ScanConfig = z.infer<typeof ScanSchema>;
export type EngineConfig = z.infer<typeof EngineSchema>;
