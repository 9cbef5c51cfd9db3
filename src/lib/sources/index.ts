/**
 * Subscription sources
 */

export * from './source.types';
export * from './source.utils';
export * from './source.fetcher';
