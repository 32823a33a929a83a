/**
 * Source expression tree: node types, factories, method signatures and printing
 */

export * from './types';
export * from './type-refs';
export * from './factory';
export * from './methods';
export * from './printer';
