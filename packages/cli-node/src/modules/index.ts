/**
 * Modules - Re-export all module functionality
 */

export * from './errors.js';
export * from './versions.js';
export * from './schemas.js';
export * from './manifest.js';
export * from './validator.js';
export * from './loader.js';
export * from './store.js';
export * from './templates.js';
export * from './graph.js';
export * from './conflicts.js';
export * from './contracts.js';
export * from './algebra.js';
export * from './instantiator.js';
export * from './verifier.js';
export * from './composition.js';
