/**
 * Stage state machine: pending -> running -> {pass, fail, errored}, or
 * pending -> skipped.
 */
import { EngineFaultError, ErrorCodes, errorMessage } from '../../utils/errors.js';
import type { EngineFault, Finding } from '../rules/types.js';

export type StageStatus = 'pending' | 'running' | 'pass' | 'fail' | 'errored' | 'skipped';
export type FinalStageStatus = Exclude<StageStatus, 'pending' | 'running'>;

const TRANSITIONS: Readonly<Record<StageStatus, readonly StageStatus[]>> = {
  pending: ['running', 'skipped'],
  running: ['pass', 'fail', 'errored'],
  pass: [],
  fail: [],
  errored: [],
  skipped: [],
};

export const STAGE_EXIT_CODES: Readonly<Record<FinalStageStatus, number>> = {
  pass: 0,
  fail: 1,
  errored: 2,
  skipped: 0,
};

export interface StageResult {
  name: string;
  status: FinalStageStatus;
  exitCode: number;
  note: string;
  findings: Finding[];
  faults: EngineFault[];
  errorCount: number;
  advisoryCount: number;
}

/**
 * What a stage's work produces.
 */
export interface StageOutput {
  findings: Finding[];
  faults: EngineFault[];
  note: string;
}

export class Stage {
  private status: StageStatus = 'pending';

  constructor(readonly name: string) {}

  get current(): StageStatus {
    return this.status;
  }

  transition(to: StageStatus): void {
    if (!TRANSITIONS[this.status].includes(to)) {
      throw new EngineFaultError(
        ErrorCodes.STAGE_TRANSITION,
        `Stage '${this.name}' cannot move from ${this.status} to ${to}`
      );
    }
    this.status = to;
  }

  skip(note: string): StageResult {
    this.transition('skipped');
    return this.result('skipped', { findings: [], faults: [], note });
  }

  /**
   * Run the stage's work. A throw marks the stage errored with a fault;
   * it never propagates.
   */
  async run(work: () => Promise<StageOutput>): Promise<StageResult> {
    this.transition('running');

    let output: StageOutput;
    try {
      output = await work();
    } catch (error) {
      const fault: EngineFault = { ruleId: null, file: null, message: errorMessage(error) };
      this.transition('errored');
      return this.result('errored', { findings: [], faults: [fault], note: 'internal fault' });
    }

    const hasErrors = output.findings.some((f) => f.severity === 'error');
    const status: FinalStageStatus = output.faults.length > 0 ? 'errored' : hasErrors ? 'fail' : 'pass';
    this.transition(status);
    return this.result(status, output);
  }

  private result(status: FinalStageStatus, output: StageOutput): StageResult {
    return {
      name: this.name,
      status,
      exitCode: STAGE_EXIT_CODES[status],
      note: output.note,
      findings: output.findings,
      faults: output.faults,
      errorCount: output.findings.filter((f) => f.severity === 'error').length,
      advisoryCount: output.findings.filter((f) => f.severity === 'advisory').length,
    };
  }
}
