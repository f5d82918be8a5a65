export { scaffold, assertValidFeatureName, normalizeFeatureNames, LAYOUT_DIRECTORIES } from './scaffolder.js';
export type { ScaffoldOptions, ScaffoldResult } from './types.js';
