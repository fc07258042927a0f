/**
 * MCP - Re-export MCP server functionality
 */

export * from './server.js';
