/**
 * The closed naming and placement scheme.
 *
 * Layout of a code root:
 * ```
 * infra/bootstrap/        ida_core, prx_core, poi_core, cfg_core (contract)
 * infra/service/          svc_*
 * infra/platform/hal/     hal_*
 * infra/platform/bsp/     bsp_*
 * deps/middleware/        mdw_*, stm_*, nested units
 * deps/extern/            vendored code, nested units
 * project/features/<f>/   ida_*, prx_*, poi_*, cfg_*, db_*
 * project/config/         cfg_project, db_project, cfg_*, db_*
 * project/datastreams/    stm_*
 * ```
 */
import type { Category, Role } from './types.js';

export interface PrefixRule {
  prefix: string;
  role: Exclude<Role, 'Unclassified'>;
  category: Category;
}

/** Recognized role prefixes. Order matters only for documentation. */
export const ROLE_PREFIXES: readonly PrefixRule[] = [
  { prefix: 'ida_', role: 'Intent', category: 'feature' },
  { prefix: 'prx_', role: 'Interpretation', category: 'feature' },
  { prefix: 'poi_', role: 'Production', category: 'feature' },
  { prefix: 'cfg_', role: 'Resource', category: 'resource' },
  { prefix: 'db_', role: 'Resource', category: 'resource' },
  { prefix: 'stm_', role: 'DataPlane', category: 'datastream' },
  { prefix: 'svc_', role: 'Capability', category: 'service' },
  { prefix: 'mdw_', role: 'Capability', category: 'middleware' },
  { prefix: 'hal_', role: 'Platform', category: 'hal' },
  { prefix: 'bsp_', role: 'Platform', category: 'bsp' },
];

/** Bootstrap core files: exact stems. */
export const CORE_STEMS: ReadonlyMap<string, Exclude<Role, 'Unclassified'>> = new Map([
  ['ida_core', 'Intent'],
  ['prx_core', 'Interpretation'],
  ['poi_core', 'Production'],
]);

/** Contract vocabulary: the shared-type file Intent may reference. */
export const CONTRACT_STEMS: readonly string[] = ['cfg_core'];

/** Resource stems that must live in project/config. */
export const PROJECT_CONFIG_STEMS: readonly string[] = ['cfg_project', 'db_project'];

/** Layout-only prefix reserved for folder grouping (infra/). */
export const RESERVED_LAYOUT_PREFIX = 'inf_';

/**
 * Managed placement areas. `segment` is matched at the code root, or inside a
 * nested architecture unit under deps/middleware or deps/extern.
 */
export type Area =
  | 'features'
  | 'config'
  | 'datastreams'
  | 'bootstrap'
  | 'service'
  | 'hal'
  | 'bsp'
  | 'middleware'
  | 'extern';

export const AREA_SEGMENTS: ReadonlyArray<{ area: Area; segment: string }> = [
  { area: 'features', segment: 'project/features/' },
  { area: 'config', segment: 'project/config/' },
  { area: 'datastreams', segment: 'project/datastreams/' },
  { area: 'bootstrap', segment: 'infra/bootstrap/' },
  { area: 'service', segment: 'infra/service/' },
  { area: 'hal', segment: 'infra/platform/hal/' },
  { area: 'bsp', segment: 'infra/platform/bsp/' },
];

export const DEPS_SEGMENTS: ReadonlyArray<{ area: Area; segment: string }> = [
  { area: 'middleware', segment: 'deps/middleware/' },
  { area: 'extern', segment: 'deps/extern/' },
];

/** Areas where every file must carry a role prefix. */
export const MANAGED_AREAS: ReadonlySet<Area> = new Set<Area>([
  'features',
  'config',
  'datastreams',
  'bootstrap',
]);

/** Areas under project/. */
export const PROJECT_AREAS: ReadonlySet<Area> = new Set<Area>([
  'features',
  'config',
  'datastreams',
]);

/** Where each prefix may be placed. */
export const ALLOWED_AREAS: ReadonlyMap<string, readonly Area[]> = new Map<string, readonly Area[]>([
  ['ida_', ['features']],
  ['prx_', ['features']],
  ['poi_', ['features']],
  ['cfg_', ['features', 'config', 'middleware', 'extern']],
  ['db_', ['features', 'config', 'middleware', 'extern']],
  ['stm_', ['datastreams', 'middleware', 'extern']],
  ['svc_', ['service']],
  ['mdw_', ['middleware', 'extern']],
  ['hal_', ['hal']],
  ['bsp_', ['bsp']],
]);

export interface LegacyLayout {
  /** Deprecated path prefix relative to the code root */
  path: string;
  /** Where its contents belong now */
  replacement: string;
}

/** Deprecated path shapes. */
export const LEGACY_LAYOUTS: readonly LegacyLayout[] = [
  { path: 'core/config/', replacement: 'infra/bootstrap/cfg_core' },
  { path: 'features/', replacement: 'project/features/' },
  { path: 'modules/', replacement: 'infra/ and deps/' },
  { path: 'platform/', replacement: 'infra/platform/' },
];

/**
 * Human-readable placement for an area.
 */
export function describeArea(area: Area): string {
  const found = [...AREA_SEGMENTS, ...DEPS_SEGMENTS].find((s) => s.area === area);
  return found ? found.segment : area;
}
