/**
 * Commands - Re-export all commands
 */

export * from './validate.js';
export * from './compose.js';
export * from './check.js';
export * from './verify.js';
export * from './list.js';
export * from './templates.js';
export * from './shared.js';
