/**
 * Filter AST: node types, factories and rendering
 */

export * from './types';
export * from './factory';
export * from './render';
