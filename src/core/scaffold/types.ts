/**
 * Scaffold type definitions.
 */

export interface ScaffoldOptions {
  /** Feature folder names; entries may be comma lists */
  features?: string[];
}

export interface ScaffoldResult {
  /** Absolute code root */
  root: string;
  /** Layout directories, relative to the root */
  directories: string[];
  /** Files written by this run (existing files are left alone) */
  created: string[];
  /** Normalized feature names */
  features: string[];
}
