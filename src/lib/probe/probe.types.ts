/**
 * Probe Types
 */

import { ProxyDescriptor } from '../proxy/proxy.types';

/**
 * Opens a TCP connection and resolves with the elapsed milliseconds,
 * or null when the endpoint refused, failed or timed out
 */
export type Connector = (host: string, port: number, timeout: number) => Promise<number | null>;

export interface ThroughputContext {
  /** Latency of the reachability connection in milliseconds */
  latency: number;
}

/**
 * Strategy that estimates the relative throughput of a reachable endpoint.
 * Implementations resolve with a finite number >= 0 and never reject for
 * an unreachable endpoint.
 */
export interface ThroughputEstimator {
  readonly name: string;
  estimate(descriptor: ProxyDescriptor, context: ThroughputContext): Promise<number>;
}

export interface ProxyProbeOptions {
  /** Per-connection timeout in milliseconds */
  timeout?: number;
  /** Maximum concurrent probes */
  concurrency?: number;
  /** Overall budget for testAll in milliseconds; 0 disables it */
  deadline?: number;
  estimator?: ThroughputEstimator;
  connector?: Connector;
  now?: () => number;
}
