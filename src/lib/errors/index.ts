/**
 * Pipeline error exports
 */

export * from './pipeline.errors';
