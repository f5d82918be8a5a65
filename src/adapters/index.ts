export * from './types.js';
export * from './adapter-registry.js';
export * from './boundary.js';
export * from './register.js';
export { CFamilyAdapter } from './c-family.js';
export { CSharpAdapter } from './csharp.js';
export { VisualBasicAdapter } from './visual-basic.js';
export { TypeScriptAdapter } from './typescript.js';
