/**
 * Server - Re-export HTTP server functionality
 */

export * from './http.js';
