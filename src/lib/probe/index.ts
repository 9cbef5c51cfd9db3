/**
 * Proxy probing
 */

export * from './probe.types';
export * from './semaphore';
export * from './score';
export * from './tcp.connector';
export * from './throughput.estimators';
export * from './proxy.probe';
