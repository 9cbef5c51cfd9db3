/**
 * Payload parsing
 */

export * from './parsing.types';
export * from './parsing.utils';
export * from './descriptor.builder';
export * from './line.parser';
export * from './json.normalizer';
export * from './format.parser';
