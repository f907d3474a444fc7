/**
 * Sprig Types
 * Barrel for tokens, AST nodes, locations and errors
 */

export * from './source-location.js';
export * from './token-types.js';
export * from './ast-nodes.js';
export * from './error-registry.js';
export * from './error-classes.js';
