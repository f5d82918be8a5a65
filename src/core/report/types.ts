/**
 * Report and artifact shapes. Fields are only ever added, never renamed.
 */
import type { FinalStageStatus } from '../gate/stage.js';
import type { EngineFault, Finding } from '../rules/types.js';

export interface StageReportEntry {
  name: string;
  status: FinalStageStatus;
  exitCode: number;
  note: string;
  /** Artifact path relative to the repository root, null when skipped */
  outputPath: string | null;
  errorCount: number;
  advisoryCount: number;
  faults: EngineFault[];
}

export interface GateReport {
  generatedAtUtc: string;
  catalogVersion: string;
  rootPath: string;
  stages: StageReportEntry[];
  gatePassed: boolean;
}

/**
 * Per-stage artifact with the full finding list.
 */
export interface StageArtifact {
  generatedAtUtc: string;
  catalogVersion: string;
  rootPath: string;
  stage: string;
  status: FinalStageStatus;
  errorsCount: number;
  advisoryCount: number;
  findings: Finding[];
  faults: EngineFault[];
}
