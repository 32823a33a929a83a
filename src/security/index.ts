export * from './types';
export * from './validator';
