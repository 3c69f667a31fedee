/**
 * treelox Core Types
 * Shared entry point for token, AST, value and error types.
 */

export * from './token-types.js';
export * from './ast-nodes.js';
export * from './value-types.js';
export * from './error-registry.js';
export * from './error-classes.js';
export * from './error-state.js';
