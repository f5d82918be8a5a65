/**
 * Reference resolution within one code root.
 *
 * Files sharing a directory and logical name (a header/source pair) form one
 * module. A reference resolves when exactly one module matches; several
 * matches are reported as ambiguous, never guessed.
 */
import { posix } from 'node:path';
import { toPosixPath } from '../../utils/file-system.js';
import { moduleName } from './classifier.js';
import type { NodeId, RawReference, Resolution } from './types.js';

interface ModuleEntry {
  dir: string;
  name: string;
  /** Member node ids in ascending order */
  members: NodeId[];
}

export interface IndexedFile {
  id: NodeId;
  path: string;
}

export class ReferenceIndex {
  private readonly byKey = new Map<string, ModuleEntry>();
  private readonly byName = new Map<string, ModuleEntry[]>();

  constructor(files: readonly IndexedFile[]) {
    for (const file of files) {
      const dir = posix.dirname(file.path).toLowerCase();
      const name = moduleName(posix.basename(file.path));
      const key = moduleKey(dir, name);

      let entry = this.byKey.get(key);
      if (!entry) {
        entry = { dir, name, members: [] };
        this.byKey.set(key, entry);
        const named = this.byName.get(name) ?? [];
        named.push(entry);
        this.byName.set(name, named);
      }
      entry.members.push(file.id);
    }

    for (const entry of this.byKey.values()) entry.members.sort((a, b) => a - b);
  }

  /**
   * Resolve a reference made by the file at `fromPath` (relative, POSIX).
   */
  resolve(fromId: NodeId, fromPath: string, reference: RawReference): Resolution {
    if (reference.kind !== 'local' && reference.kind !== 'identifier') return { kind: 'external' };

    const spec = toPosixPath(reference.specifier).trim();
    if (spec === '') return { kind: 'external' };

    if (isRelative(spec)) {
      const base = spec.startsWith('/') ? spec.slice(1) : posix.join(posix.dirname(fromPath), spec);
      const normalized = posix.normalize(base);
      const entry = this.byKey.get(
        moduleKey(posix.dirname(normalized).toLowerCase(), moduleName(posix.basename(normalized)))
      );
      return entry ? { kind: 'resolved', target: pickTarget(entry, fromId) } : { kind: 'external' };
    }

    const name = moduleName(posix.basename(spec));
    const specDir = posix.dirname(spec).toLowerCase();
    const candidates = (this.byName.get(name) ?? []).filter(
      (entry) => specDir === '.' || entry.dir === specDir || entry.dir.endsWith(`/${specDir}`)
    );

    if (candidates.length === 0) return { kind: 'external' };
    const [only] = candidates;
    if (candidates.length === 1 && only) {
      return { kind: 'resolved', target: pickTarget(only, fromId) };
    }

    return {
      kind: 'unresolved-ambiguous',
      candidates: candidates.map((entry) => posix.join(entry.dir, entry.name)).sort(),
    };
  }
}

function moduleKey(dir: string, name: string): string {
  return `${dir}/${name}`;
}

function isRelative(spec: string): boolean {
  return spec.startsWith('./') || spec.startsWith('../') || spec.startsWith('/');
}

/**
 * Prefer a member other than the referencing file (ida_x.c including ida_x.h).
 */
function pickTarget(entry: ModuleEntry, fromId: NodeId): NodeId {
  const other = entry.members.find((id) => id !== fromId);
  return other ?? fromId;
}
