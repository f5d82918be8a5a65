import type { GateRun } from '../../core/gate/orchestrator.js';
import type { RuleDescriptor } from '../../core/rules/types.js';
import type { IFormatter } from './types.js';

/**
 * JSON output formatter for machine consumption.
 */
export class JsonFormatter implements IFormatter {
  formatRun(run: GateRun): string {
    return JSON.stringify(
      {
        gatePassed: run.gatePassed,
        faulted: run.faulted,
        stages: run.stages.map((stage) => ({
          name: stage.name,
          status: stage.status,
          exitCode: stage.exitCode,
          note: stage.note,
          errorCount: stage.errorCount,
          advisoryCount: stage.advisoryCount,
          findings: stage.findings,
          faults: stage.faults,
        })),
      },
      null,
      2
    );
  }

  formatRules(rules: readonly RuleDescriptor[]): string {
    return JSON.stringify(
      rules.map((rule) => ({
        id: rule.id,
        family: rule.family,
        severity: rule.severity,
        description: rule.description,
      })),
      null,
      2
    );
  }
}
