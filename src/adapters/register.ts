/**
 * Built-in dialect registration.
 */
import { AdapterRegistry } from './adapter-registry.js';
import { CFamilyAdapter } from './c-family.js';
import { CSharpAdapter } from './csharp.js';
import { TypeScriptAdapter } from './typescript.js';
import { VisualBasicAdapter } from './visual-basic.js';

/**
 * Create a registry holding every built-in adapter.
 */
export function createDefaultRegistry(): AdapterRegistry {
  const registry = new AdapterRegistry();
  registry.register('c-family', () => new CFamilyAdapter(), [
    '.c', '.h', '.cc', '.hh', '.cpp', '.hpp', '.cxx', '.hxx',
  ]);
  registry.register('csharp', () => new CSharpAdapter(), ['.cs']);
  registry.register('visual-basic', () => new VisualBasicAdapter(), ['.vb']);
  registry.register('typescript', () => new TypeScriptAdapter(), ['.ts', '.tsx', '.mts', '.cts']);
  return registry;
}
