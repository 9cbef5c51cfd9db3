export * from './pipeline.types';
export * from './proxy.pipeline';
