/**
 * Stage orchestrator: plans the documentation stage and one code stage per
 * dialect, runs them concurrently and aggregates the verdict.
 */
import { compareStrings } from '../../utils/compare.js';
import { ConfigurationError, ErrorCodes } from '../../utils/errors.js';
import { isDirectory, relativePosix } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { checkDocs } from '../docs/hygiene.js';
import type { SourceModelBuilder } from '../model/builder.js';
import { SOURCE_EMPTY_RULE } from '../rules/catalog.js';
import { RuleEngine } from '../rules/engine.js';
import { Stage, type StageOutput, type StageResult } from './stage.js';

export interface GateInput {
  /** Absolute repository root; report paths are relative to it */
  repoRoot: string;
  /** Absolute code roots */
  codeRoots: string[];
  /** Absolute documentation root */
  docsRoot?: string;
  skipDocs?: boolean;
  skipCode?: boolean;
  skipDialects?: string[];
}

export interface GateRun {
  repoRoot: string;
  /** Docs first, then code stages by name */
  stages: StageResult[];
  /** AND over non-skipped stages being pass */
  gatePassed: boolean;
  /** Some stage ended errored */
  faulted: boolean;
}

export const DOCS_STAGE = 'docs';
export const CODE_STAGE = 'code';

export class StageOrchestrator {
  constructor(
    private readonly builder: SourceModelBuilder,
    private readonly engine: RuleEngine = new RuleEngine()
  ) {}

  async run(input: GateInput): Promise<GateRun> {
    await this.validate(input);

    const [docs, codeGroups] = await Promise.all([
      this.docsStage(input),
      Promise.all(this.codeStageGroups(input)),
    ]).finally(() => this.builder.dispose());

    const codeStages = codeGroups.flat().sort((a, b) => compareStrings(a.name, b.name));
    const stages = [docs, ...codeStages];

    for (const stage of stages) {
      logger.debug(`Stage ${stage.name}: ${stage.status}`, {
        errors: stage.errorCount,
        advisories: stage.advisoryCount,
        faults: stage.faults.length,
      });
    }

    return {
      repoRoot: input.repoRoot,
      stages,
      gatePassed: stages.filter((s) => s.status !== 'skipped').every((s) => s.status === 'pass'),
      faulted: stages.some((s) => s.status === 'errored'),
    };
  }

  /**
   * Reject invalid invocations before anything is scanned.
   */
  private async validate(input: GateInput): Promise<void> {
    const roots: Array<[string, string | undefined]> = [
      ['repository root', input.repoRoot],
      ['docs root', input.skipDocs ? undefined : input.docsRoot],
      ...input.codeRoots.map((root): [string, string] => ['code root', root]),
    ];

    for (const [label, root] of roots) {
      if (root !== undefined && !(await isDirectory(root))) {
        throw new ConfigurationError(ErrorCodes.ROOT_NOT_FOUND, `The ${label} does not exist: ${root}`, { path: root });
      }
    }

    const known = this.builder.dialects();
    for (const dialect of input.skipDialects ?? []) {
      if (!known.includes(dialect)) {
        throw new ConfigurationError(
          ErrorCodes.UNKNOWN_DIALECT,
          `Unknown dialect '${dialect}' (known: ${known.join(', ')})`
        );
      }
    }
  }

  private async docsStage(input: GateInput): Promise<StageResult> {
    const stage = new Stage(DOCS_STAGE);
    if (input.skipDocs) return stage.skip('skipped by --skip-docs');

    const docsRoot = input.docsRoot;
    if (docsRoot === undefined) return stage.skip('no documentation root provided');

    return stage.run(async () => {
      const findings = await checkDocs(input.repoRoot, docsRoot);
      return { findings, faults: [], note: `documentation root ${relativePosix(input.repoRoot, docsRoot) || '.'}` };
    });
  }

  private codeStageGroups(input: GateInput): Array<Promise<StageResult[]>> {
    const multiple = input.codeRoots.length > 1;

    if (input.codeRoots.length === 0) {
      return [Promise.resolve([new Stage(CODE_STAGE).skip('no code root provided')])];
    }

    return input.codeRoots.map(async (codeRoot) => {
      const rootRel = relativePosix(input.repoRoot, codeRoot);
      const baseName = multiple ? `${CODE_STAGE}:${rootRel || '.'}` : CODE_STAGE;

      if (input.skipCode) return [new Stage(baseName).skip('skipped by --skip-code')];

      let inventory: Map<string, string[]>;
      try {
        inventory = await this.builder.enumerate(codeRoot);
      } catch (error) {
        return [await new Stage(baseName).run(() => Promise.reject(error))];
      }

      if (inventory.size === 0) {
        return [await new Stage(baseName).run(async () => sourceEmpty(rootRel))];
      }

      const skipped = new Set(input.skipDialects ?? []);
      return Promise.all(
        [...inventory.entries()].map(([dialect, files]) => {
          const stage = new Stage(`${baseName}:${dialect}`);
          if (skipped.has(dialect)) return Promise.resolve(stage.skip(`skipped by --skip-dialect ${dialect}`));

          return stage.run(async () => {
            const graph = await this.builder.build(codeRoot, dialect, files);
            const { findings, faults } = this.engine.run(graph, { pathPrefix: rootRel });
            return {
              findings,
              faults,
              note: `${graph.nodes.length} file(s), ${graph.edges.length} reference(s)`,
            };
          });
        })
      );
    });
  }
}

function sourceEmpty(rootRel: string): StageOutput {
  const file = rootRel || '.';
  return {
    findings: [
      {
        ruleId: SOURCE_EMPTY_RULE.id,
        severity: SOURCE_EMPTY_RULE.severity,
        file,
        line: null,
        message: `No source files found under ${file}`,
      },
    ],
    faults: [],
    note: 'no source files',
  };
}
