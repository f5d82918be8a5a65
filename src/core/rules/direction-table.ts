/**
 * Allowed dependency directions between roles.
 *
 * `own` means the same feature. For targets inferred from a bare reference
 * name the feature is unknown, so ownership follows the
 * `<prefix><feature>[_...]` naming convention instead.
 */
import { nameMatchesFeature } from '../model/classifier.js';
import type { Classification, Role } from '../model/types.js';

const LOWER_ROLES: ReadonlySet<Role> = new Set<Role>(['Capability', 'Platform', 'Resource', 'DataPlane']);

export function isOwnFeature(source: Classification, target: Classification): boolean {
  if (target.featureKnown) return source.feature === target.feature;
  return nameMatchesFeature(target.name, source.feature);
}

/**
 * Whether `source` may depend on `target`. Unclassified on either side is
 * never judged here.
 */
export function isAllowedTarget(source: Classification, target: Classification): boolean {
  if (source.role === 'Unclassified' || target.role === 'Unclassified') return true;

  if (source.category === 'bootstrap') return isAllowedFromBootstrap(source, target);

  const own = isOwnFeature(source, target);
  const sharedData = (target.role === 'Resource' || target.role === 'DataPlane') && !target.projectOwned;

  switch (source.role) {
    case 'Intent':
      return (
        target.contract ||
        (own && (target.role === 'Intent' || target.role === 'Interpretation' || target.role === 'Production'))
      );
    case 'Interpretation':
      return LOWER_ROLES.has(target.role) || (own && (target.role === 'Interpretation' || target.role === 'Production'));
    case 'Production':
      return LOWER_ROLES.has(target.role) || (own && target.role === 'Production');
    case 'Resource':
    case 'DataPlane':
      return LOWER_ROLES.has(target.role);
    case 'Capability':
      return target.role === 'Capability' || target.role === 'Platform' || target.contract || sharedData;
    case 'Platform':
      if (target.role === 'Platform') return !(source.category === 'bsp' && target.category === 'hal');
      return target.contract || sharedData;
    default:
      return true;
  }
}

function isAllowedFromBootstrap(source: Classification, target: Classification): boolean {
  if (target.contract) return true;
  const core = target.category === 'bootstrap';
  // Only the core contract reaches configuration; database resources are open to prx_core and poi_core
  const database = target.role === 'Resource' && !target.name.startsWith('cfg_');

  switch (source.role) {
    case 'Intent':
      return core || target.role === 'Intent';
    case 'Interpretation':
      return core || database || target.role === 'Capability' || target.role === 'DataPlane';
    case 'Production':
      return (
        (core && (target.role === 'Intent' || target.role === 'Production')) ||
        database ||
        target.role === 'Capability' ||
        target.role === 'DataPlane'
      );
    default:
      return false;
  }
}
