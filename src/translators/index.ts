/**
 * docfilter Translators
 *
 * Exports the translator implementations for each output format.
 */

// Export base types
export * from './types';

// Export Filter AST translator
export * from './filter';

// Export MongoDB filter document translator
export * from './mongo';
