/**
 * Source model builder: enumerate, classify, extract, then resolve.
 *
 * Extraction runs in bounded parallel batches with one result slot per file.
 * Resolution starts only once every slot is filled, because a reference can
 * only be judged against the complete module index.
 */
import { extname, join } from 'node:path';
import { minimatch } from 'minimatch';
import type { AdapterRegistry } from '../../adapters/adapter-registry.js';
import { DEFAULT_ADAPTER_BUDGET, runAdapter, type AdapterBudget } from '../../adapters/boundary.js';
import { failedExtraction, type ExtractionResult } from '../../adapters/types.js';
import { compareStrings } from '../../utils/compare.js';
import { defaultConcurrency, settleInBatches } from '../../utils/concurrency.js';
import { ConfigurationError, ErrorCodes, errorMessage } from '../../utils/errors.js';
import { globFiles, toPosixPath } from '../../utils/file-system.js';
import { loadGateIgnore } from '../../utils/gateignore.js';
import { logger } from '../../utils/logger.js';
import { classify, inferClassification, normalizeRelPath } from './classifier.js';
import { SourceGraph } from './graph.js';
import { ReferenceIndex } from './resolver.js';
import type { Classification, DependencyEdge, SourceNode } from './types.js';

export interface BuilderOptions {
  /** Files processed in parallel */
  concurrency?: number;
  budget?: AdapterBudget;
  /** Glob patterns, relative to the code root, removed from the scan */
  exclude?: string[];
}

interface FileSlot {
  classification: Classification;
  extraction: ExtractionResult;
}

export class SourceModelBuilder {
  private readonly concurrency: number;
  private readonly budget: AdapterBudget;
  private readonly exclude: string[];

  constructor(
    private readonly registry: AdapterRegistry,
    options: BuilderOptions = {}
  ) {
    this.concurrency = options.concurrency ?? defaultConcurrency();
    this.budget = options.budget ?? DEFAULT_ADAPTER_BUDGET;
    this.exclude = options.exclude ?? [];
  }

  /** Release adapter state held between builds. */
  dispose(): void {
    this.registry.disposeAll();
  }

  /** Dialects the builder can extract. */
  dialects(): string[] {
    return this.registry.getRegisteredDialects();
  }

  /**
   * In-scope files under a code root, grouped by dialect.
   * Keys and file lists are sorted.
   */
  async enumerate(codeRoot: string): Promise<Map<string, string[]>> {
    const patterns = this.registry.getSupportedExtensions().map((ext) => `**/*${ext}`);
    const found = await globFiles(patterns, {
      cwd: codeRoot,
      absolute: false,
      ignore: ['**/node_modules/**'],
    });
    const gateIgnore = await loadGateIgnore(codeRoot);

    const byDialect = new Map<string, string[]>();
    for (const relPath of gateIgnore.filter(found.map(toPosixPath))) {
      if (this.isExcluded(relPath)) continue;
      const dialect = this.registry.dialectForExtension(extname(relPath));
      if (!dialect) continue;
      const list = byDialect.get(dialect) ?? [];
      list.push(relPath);
      byDialect.set(dialect, list);
    }

    return new Map([...byDialect.entries()].sort(([a], [b]) => compareStrings(a, b)));
  }

  /**
   * Build the frozen graph for one dialect's files.
   */
  async build(codeRoot: string, dialect: string, files: readonly string[]): Promise<SourceGraph> {
    const adapter = this.registry.getByDialect(dialect);
    if (!adapter) {
      throw new ConfigurationError(ErrorCodes.UNKNOWN_DIALECT, `No syntax adapter registered for '${dialect}'`);
    }

    const paths = [...new Set(files.map(normalizeRelPath))].sort();

    const settled = await settleInBatches(paths, this.concurrency, async (relPath): Promise<FileSlot> => {
      const classification = classify(relPath);
      const extraction = await runAdapter(
        adapter,
        join(codeRoot, relPath),
        { filePath: relPath, extension: extname(relPath).toLowerCase() },
        this.budget
      );
      return { classification, extraction };
    });

    const nodes: SourceNode[] = paths.map((relPath, id) => {
      const slot = settled[id];
      const { classification, extraction } =
        slot?.status === 'fulfilled'
          ? slot.value
          : {
              classification: classify(relPath),
              extraction: failedExtraction({
                reason: 'adapter-crash',
                message: slot ? errorMessage(slot.reason) : 'no extraction result',
              }),
            };

      return {
        id,
        path: relPath,
        dialect,
        classification,
        references: extraction.references,
        signals: extraction.signals,
        ...(extraction.parseFailure ? { parseFailure: extraction.parseFailure } : {}),
      };
    });

    // Barrier: every slot is filled before any reference is resolved
    const graph = assembleGraph(codeRoot, dialect, nodes);
    logger.child(`model:${dialect}`).debug('Built graph', {
      root: codeRoot,
      files: nodes.length,
      edges: graph.edges.length,
    });
    return graph;
  }

  /**
   * Enumerate and build every dialect present under a code root.
   */
  async scan(codeRoot: string): Promise<Map<string, SourceGraph>> {
    const graphs = new Map<string, SourceGraph>();
    for (const [dialect, files] of await this.enumerate(codeRoot)) {
      graphs.set(dialect, await this.build(codeRoot, dialect, files));
    }
    return graphs;
  }

  private isExcluded(relPath: string): boolean {
    return this.exclude.some((pattern) => minimatch(relPath, pattern, { dot: true }));
  }
}

/**
 * Resolve every reference against the complete node set and freeze the
 * result. Node ids must equal their index.
 *
 * Identifier references become edges only when they resolve; an unresolved
 * name in code is a variable or member, not a dependency.
 */
export function assembleGraph(codeRoot: string, dialect: string, nodes: SourceNode[]): SourceGraph {
  const index = new ReferenceIndex(nodes);
  const edges: DependencyEdge[] = [];
  for (const node of nodes) {
    for (const reference of node.references) {
      const resolution = index.resolve(node.id, node.path, reference);
      if (reference.kind === 'identifier' && resolution.kind !== 'resolved') continue;
      const unresolvedLocal = resolution.kind !== 'resolved' && reference.kind === 'local';
      edges.push(
        unresolvedLocal
          ? { source: node.id, reference, resolution, inferred: inferClassification(reference.specifier) }
          : { source: node.id, reference, resolution }
      );
    }
  }
  return new SourceGraph(codeRoot, dialect, nodes, edges);
}
