import type { SourceGraph } from '../model/graph.js';
import type { SourceNode } from '../model/types.js';
import { BaseRule, isModuleReference } from './base.js';
import type { RuleFamily, RuleViolation, Severity } from './types.js';

interface ForbiddenApi {
  pattern: RegExp;
  label: string;
}

// First match wins, so narrower namespaces come first
export const FORBIDDEN_INTENT_APIS: readonly ForbiddenApi[] = [
  { pattern: /^System\.Windows\.Forms(\.|$)/, label: 'WinForms UI layer' },
  { pattern: /^System\.Drawing(?!\.Color$)(\.|$)/, label: 'graphics API' },
  { pattern: /^Microsoft\.Office\.Interop(\.|$)/, label: 'COM interop' },
  { pattern: /^System\.IO\.Ports(\.|$)/, label: 'serial port hardware access' },
  { pattern: /^System\.IO(\.|$)/, label: 'file I/O' },
  { pattern: /^(node:)?fs(\/promises)?$/, label: 'file I/O' },
  { pattern: /^(node:)?child_process$/, label: 'OS process control' },
  { pattern: /^(node:)?(net|http|https|dgram)$/, label: 'network I/O' },
  { pattern: /^serialport$/, label: 'serial port hardware access' },
];

export const FORBIDDEN_INTENT_CALLS: ReadonlyMap<string, string> = new Map([
  ['MessageBox.Show', 'UI feedback belongs in Interpretation or Production'],
  ['Control.Invoke', 'UI thread marshalling'],
  ['Control.BeginInvoke', 'UI thread marshalling'],
  ['Thread.Sleep', 'blocking delay'],
  ['Process.Start', 'OS process control'],
]);

/**
 * Intent decides; it does not touch UI, files, hardware or the OS.
 */
export class IntentForbiddenApiRule extends BaseRule {
  readonly id = 'intent-forbidden-api';
  readonly family: RuleFamily = 'self-containment';
  readonly severity: Severity = 'error';
  readonly description = 'Intent imports or calls a UI, file I/O, hardware, network, threading or OS-process API';

  appliesTo(node: SourceNode): boolean {
    return node.classification.role === 'Intent';
  }

  evaluate(node: SourceNode, graph: SourceGraph): RuleViolation[] {
    const violations: RuleViolation[] = [];
    for (const edge of graph.outgoing(node.id)) {
      const { kind, specifier, line } = edge.reference;
      if (isModuleReference(kind)) continue;

      if (kind === 'call') {
        const label = FORBIDDEN_INTENT_CALLS.get(specifier);
        if (label) violations.push(this.violation(`Intent must not call '${specifier}' (${label})`, line));
        continue;
      }

      const forbidden = FORBIDDEN_INTENT_APIS.find((api) => api.pattern.test(specifier));
      if (!forbidden) continue;
      violations.push(this.violation(`Intent must not import '${specifier}' (${forbidden.label})`, line));
    }
    return violations;
  }
}
