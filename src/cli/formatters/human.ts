import chalk from 'chalk';
import type { GateRun } from '../../core/gate/orchestrator.js';
import type { FinalStageStatus, StageResult } from '../../core/gate/stage.js';
import type { Finding, RuleDescriptor } from '../../core/rules/types.js';
import type { FormatOptions, IFormatter } from './types.js';

type Color = 'red' | 'green' | 'yellow' | 'dim' | 'bold';

const STATUS_COLORS: Record<FinalStageStatus, Color> = {
  pass: 'green',
  fail: 'red',
  errored: 'red',
  skipped: 'dim',
};

/**
 * Human-readable output formatter.
 */
export class HumanFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      colors: options.colors ?? true,
      verbose: options.verbose ?? false,
    };
  }

  formatRun(run: GateRun): string {
    const lines: string[] = [];

    for (const stage of run.stages) {
      lines.push(...this.formatStage(stage));
    }

    if (lines.length > 0) lines.push('');
    lines.push(this.formatVerdict(run));
    return lines.join('\n');
  }

  formatRules(rules: readonly RuleDescriptor[]): string {
    const width = Math.max(0, ...rules.map((r) => r.id.length));
    return rules
      .map((rule) => {
        const severity = this.colorize(rule.severity.padEnd(8), rule.severity === 'error' ? 'red' : 'yellow');
        return `${rule.id.padEnd(width)}  ${severity}  ${rule.description}`;
      })
      .join('\n');
  }

  private formatStage(stage: StageResult): string[] {
    if (stage.status === 'pass' && stage.advisoryCount === 0 && !this.options.verbose) {
      return [`${this.statusLabel(stage.status)} ${stage.name}`];
    }

    const counts = stage.status === 'skipped' ? '' : ` (${stage.errorCount} error(s), ${stage.advisoryCount} advisory)`;
    const lines = [`${this.statusLabel(stage.status)} ${stage.name}${counts}`];

    if (stage.note && (this.options.verbose || stage.status === 'skipped')) {
      lines.push(`   ${this.colorize(stage.note, 'dim')}`);
    }
    for (const finding of stage.findings) {
      lines.push(this.formatFinding(finding));
    }
    for (const fault of stage.faults) {
      const where = [fault.ruleId, fault.file].filter((part) => part !== null).join(' @ ');
      lines.push(`   ${this.colorize('FAULT', 'red')} ${where ? `${where}: ` : ''}${fault.message}`);
    }
    return lines;
  }

  private formatFinding(finding: Finding): string {
    const location = finding.line === null ? finding.file : `${finding.file}:${finding.line}`;
    const severity =
      finding.severity === 'error' ? this.colorize('error', 'red') : this.colorize('advisory', 'yellow');
    return `   ${severity} ${location} [${finding.ruleId}] ${finding.message}`;
  }

  private formatVerdict(run: GateRun): string {
    if (run.faulted) return this.colorize('Gate FAULTED: an internal engine fault occurred', 'red');
    return run.gatePassed ? this.colorize('Gate PASSED', 'green') : this.colorize('Gate FAILED', 'red');
  }

  private statusLabel(status: FinalStageStatus): string {
    return this.colorize(`[${status.toUpperCase()}]`, STATUS_COLORS[status]);
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.colors) return text;
    switch (color) {
      case 'red':
        return chalk.red(text);
      case 'green':
        return chalk.green(text);
      case 'yellow':
        return chalk.yellow(text);
      case 'dim':
        return chalk.dim(text);
      case 'bold':
        return chalk.bold(text);
    }
  }
}
