/**
 * Representation metadata: serializer capabilities, concrete serializers
 * and class maps
 */

export * from './types';
export * from './bson-value';
export * from './errors';
export * from './serializers';
export * from './class-map';
