/**
 * Path classification against the naming scheme.
 *
 * Classification is a pure function of the relative path, so it is
 * computed once per file and cached on the node.
 */
import { posix } from 'node:path';
import { toPosixPath } from '../../utils/file-system.js';
import {
  ALLOWED_AREAS,
  AREA_SEGMENTS,
  CONTRACT_STEMS,
  CORE_STEMS,
  DEPS_SEGMENTS,
  LEGACY_LAYOUTS,
  MANAGED_AREAS,
  PROJECT_AREAS,
  PROJECT_CONFIG_STEMS,
  RESERVED_LAYOUT_PREFIX,
  ROLE_PREFIXES,
  describeArea,
  type Area,
  type LegacyLayout,
  type PrefixRule,
} from './naming.js';
import type { Classification, NamingIssueKind } from './types.js';

interface Placement {
  area: Area | null;
  feature: string;
  projectOwned: boolean;
}

/**
 * Logical module name: lowercase file name without its last extension.
 * `prx_alpha.h` and `prx_alpha.c` share the name `prx_alpha`.
 */
export function moduleName(fileName: string): string {
  const lower = fileName.toLowerCase();
  if (lower.endsWith('.d.ts')) return lower.slice(0, -'.d.ts'.length);
  const dot = lower.lastIndexOf('.');
  return dot > 0 ? lower.slice(0, dot) : lower;
}

/**
 * Normalize a path relative to the code root: POSIX separators, no leading './'.
 */
export function normalizeRelPath(relPath: string): string {
  let path = toPosixPath(relPath);
  while (path.startsWith('./')) path = path.slice(2);
  return path;
}

export function prefixRuleFor(name: string): PrefixRule | undefined {
  return ROLE_PREFIXES.find((rule) => name.startsWith(rule.prefix));
}

/**
 * Classify a file by its path relative to the code root.
 */
export function classify(relPath: string): Classification {
  const path = normalizeRelPath(relPath);
  const fileName = posix.basename(path);
  const name = moduleName(fileName);
  const placement = locate(path);
  const base = {
    feature: placement.feature,
    featureKnown: true,
    contract: false,
    projectOwned: placement.projectOwned,
    name,
  };

  if (name.startsWith(RESERVED_LAYOUT_PREFIX)) {
    return invalid(
      base,
      'reserved-prefix-misuse',
      `'${fileName}' uses the layout-only prefix '${RESERVED_LAYOUT_PREFIX}'`
    );
  }

  const coreRole = CORE_STEMS.get(name);
  const isContract = CONTRACT_STEMS.includes(name);
  if (coreRole || isContract) {
    if (placement.area !== 'bootstrap') {
      return invalid(base, 'naming-invalid', `'${fileName}' must be located under infra/bootstrap/`);
    }
    return coreRole
      ? { ...base, role: coreRole, category: 'bootstrap' }
      : { ...base, role: 'Resource', category: 'contract', contract: true };
  }

  const rule = prefixRuleFor(name);
  if (!rule) {
    if (placement.area && MANAGED_AREAS.has(placement.area)) {
      const known = ROLE_PREFIXES.map((r) => r.prefix).join(', ');
      return invalid(
        base,
        'naming-invalid',
        `'${fileName}' has no recognized role prefix (${known}) inside ${describeArea(placement.area)}`
      );
    }
    return { ...base, role: 'Unclassified', category: 'unmanaged' };
  }

  const allowed = ALLOWED_AREAS.get(rule.prefix) ?? [];
  if (!placement.area || !allowed.includes(placement.area)) {
    return invalid(
      base,
      'naming-invalid',
      `'${fileName}' (${rule.role}) must be placed under ${allowed.map(describeArea).join(' or ')}`
    );
  }
  if (rule.category === 'feature' && placement.feature === '') {
    return invalid(
      base,
      'naming-invalid',
      `'${fileName}' must be inside a feature folder project/features/<feature>/`
    );
  }
  if (PROJECT_CONFIG_STEMS.includes(name) && placement.area !== 'config') {
    return invalid(base, 'naming-invalid', `'${fileName}' must be located under project/config/`);
  }

  return { ...base, role: rule.role, category: rule.category };
}

/**
 * Classification implied by a reference name alone, for references that
 * did not resolve to a file in scope. The feature is unknown.
 */
export function inferClassification(specifier: string): Classification {
  const name = moduleName(posix.basename(toPosixPath(specifier)));
  const base = { feature: '', featureKnown: false, contract: false, projectOwned: false, name };

  const coreRole = CORE_STEMS.get(name);
  if (coreRole) return { ...base, role: coreRole, category: 'bootstrap', featureKnown: true };
  if (CONTRACT_STEMS.includes(name)) {
    return { ...base, role: 'Resource', category: 'contract', contract: true, featureKnown: true };
  }

  const rule = prefixRuleFor(name);
  if (!rule) return { ...base, role: 'Unclassified', category: 'unmanaged' };
  return { ...base, role: rule.role, category: rule.category };
}

/**
 * Whether a feature-role module name follows the `<prefix><feature>[_...]`
 * convention for the given feature.
 */
export function nameMatchesFeature(name: string, feature: string): boolean {
  const rule = prefixRuleFor(name);
  if (!rule || feature === '') return false;
  const rest = name.slice(rule.prefix.length);
  return rest === feature || rest.startsWith(`${feature}_`);
}

/**
 * Deprecated layout the path falls under, if any.
 */
export function legacyLayoutOf(relPath: string): LegacyLayout | undefined {
  const path = normalizeRelPath(relPath);
  return LEGACY_LAYOUTS.find((layout) => path.startsWith(layout.path));
}

function locate(path: string): Placement {
  for (const { area, segment } of AREA_SEGMENTS) {
    if (path.startsWith(segment)) return placementIn(area, path.slice(segment.length));
  }

  for (const { area, segment } of DEPS_SEGMENTS) {
    if (!path.startsWith(segment)) continue;

    // Nested architecture unit: deps/<kind>/<unit>/.../<managed segment>
    const rest = path.slice(segment.length);
    for (const inner of AREA_SEGMENTS) {
      const idx = rest.indexOf(`/${inner.segment}`);
      if (idx >= 0) {
        return placementIn(inner.area, rest.slice(idx + 1 + inner.segment.length));
      }
    }
    return { area, feature: '', projectOwned: false };
  }

  return { area: null, feature: '', projectOwned: false };
}

function placementIn(area: Area, remainder: string): Placement {
  const parts = remainder.split('/');
  const feature = area === 'features' && parts.length > 1 ? (parts[0] ?? '').toLowerCase() : '';
  return { area, feature, projectOwned: PROJECT_AREAS.has(area) };
}

function invalid(
  base: Omit<Classification, 'role' | 'category'>,
  kind: NamingIssueKind,
  message: string
): Classification {
  return { ...base, role: 'Unclassified', category: 'invalid', issue: { kind, message } };
}
