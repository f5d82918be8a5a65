/**
 * Report emitter: deterministic JSON for the gate report and stage
 * artifacts, plus the process exit code.
 */
import { dirname, join, posix } from 'node:path';
import type { GateRun } from '../gate/orchestrator.js';
import type { StageResult } from '../gate/stage.js';
import { RULE_CATALOG_VERSION } from '../rules/catalog.js';
import type { EngineFault, Finding } from '../rules/types.js';
import { relativePosix, toPosixPath, writeFile } from '../../utils/file-system.js';
import type { GateReport, StageArtifact, StageReportEntry } from './types.js';

export const ExitCodes = {
  PASS: 0,
  VIOLATIONS: 1,
  ENGINE_FAULT: 2,
  CONFIGURATION_ERROR: 3,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

export const DEFAULT_REPORT_PATH = '.layergate-report.json';

/**
 * Exit code for a completed run. Faults outrank violations.
 */
export function exitCodeFor(run: GateRun): ExitCode {
  if (run.faulted) return ExitCodes.ENGINE_FAULT;
  return run.gatePassed ? ExitCodes.PASS : ExitCodes.VIOLATIONS;
}

/**
 * Two-space JSON with a trailing newline.
 */
export function serializeReport(value: GateReport | StageArtifact): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}

export function artifactFileName(stageName: string): string {
  const slug = stageName
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return `layergate-${slug}.json`;
}

// Objects are rebuilt field by field so key order never depends on the producer
function orderedFinding(f: Finding): Finding {
  return { ruleId: f.ruleId, severity: f.severity, file: f.file, line: f.line, message: f.message };
}

function orderedFault(f: EngineFault): EngineFault {
  return { ruleId: f.ruleId, file: f.file, message: f.message };
}

export interface EmitterOptions {
  /** Absolute path of the gate report */
  reportPath: string;
  /** Source of the generation timestamp */
  clock?: () => Date;
}

export interface EmitResult {
  report: GateReport;
  reportPath: string;
  artifactPaths: string[];
}

export class ReportEmitter {
  private readonly reportPath: string;
  private readonly clock: () => Date;

  constructor(options: EmitterOptions) {
    this.reportPath = options.reportPath;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Artifact location for each non-skipped stage, relative to the repository
   * root. Stage names that slug to the same file get `-2`, `-3`... in run order.
   */
  artifactPaths(run: GateRun): Map<string, string> {
    const paths = new Map<string, string>();
    const taken = new Set<string>();

    for (const stage of run.stages) {
      if (stage.status === 'skipped') continue;
      const base = artifactFileName(stage.name).slice(0, -'.json'.length);
      let fileName = `${base}.json`;
      for (let n = 2; taken.has(fileName); n++) {
        fileName = `${base}-${n}.json`;
      }
      taken.add(fileName);
      paths.set(stage.name, relativePosix(run.repoRoot, join(dirname(this.reportPath), fileName)));
    }
    return paths;
  }

  buildReport(run: GateRun, generatedAtUtc = this.clock().toISOString()): GateReport {
    const paths = this.artifactPaths(run);
    const stages: StageReportEntry[] = run.stages.map((stage) => ({
      name: stage.name,
      status: stage.status,
      exitCode: stage.exitCode,
      note: stage.note,
      outputPath: paths.get(stage.name) ?? null,
      errorCount: stage.errorCount,
      advisoryCount: stage.advisoryCount,
      faults: stage.faults.map(orderedFault),
    }));

    return {
      generatedAtUtc,
      catalogVersion: RULE_CATALOG_VERSION,
      rootPath: toPosixPath(run.repoRoot),
      stages,
      gatePassed: run.gatePassed,
    };
  }

  buildArtifact(run: GateRun, stage: StageResult, generatedAtUtc = this.clock().toISOString()): StageArtifact {
    return {
      generatedAtUtc,
      catalogVersion: RULE_CATALOG_VERSION,
      rootPath: toPosixPath(run.repoRoot),
      stage: stage.name,
      status: stage.status,
      errorsCount: stage.errorCount,
      advisoryCount: stage.advisoryCount,
      findings: stage.findings.map(orderedFinding),
      faults: stage.faults.map(orderedFault),
    };
  }

  /**
   * Write every stage artifact, then the report. One timestamp covers the run.
   */
  async write(run: GateRun): Promise<EmitResult> {
    const generatedAtUtc = this.clock().toISOString();
    const artifactPaths: string[] = [];
    const paths = this.artifactPaths(run);

    for (const stage of run.stages) {
      const relPath = paths.get(stage.name);
      if (relPath === undefined) continue;
      const artifact = this.buildArtifact(run, stage, generatedAtUtc);
      await writeFile(join(run.repoRoot, ...relPath.split(posix.sep)), serializeReport(artifact));
      artifactPaths.push(relPath);
    }

    const report = this.buildReport(run, generatedAtUtc);
    await writeFile(this.reportPath, serializeReport(report));
    return { report, reportPath: this.reportPath, artifactPaths };
  }
}
