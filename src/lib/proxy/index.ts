/**
 * Proxy descriptors
 * Main export file for descriptor types and helpers
 */

export * from './proxy.types';
export * from './proxy.utils';
