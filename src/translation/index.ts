export * from './context';
export * from './dispatcher';
export * from './errors';
export * from './field-resolver';
export * from './serialize';
export * from './shapes';
export { escapeRegex } from './translators/string-match';
