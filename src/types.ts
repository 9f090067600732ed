/**
 * Lox Core Types
 * Source positions, tokens, AST nodes and diagnostics shared by every stage
 */

export * from './source-location.js';
export * from './token-types.js';
export * from './ast-nodes.js';
export * from './error-registry.js';
export * from './error-classes.js';
