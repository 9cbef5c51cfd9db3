/**
 * Throughput Estimators
 * Pluggable strategies for the throughput half of the probe score
 */

import { ProxyDescriptor } from '../proxy/proxy.types';
import { Connector, ThroughputEstimator } from './probe.types';
import { connectTcp } from './tcp.connector';

export enum ThroughputEstimatorType {
  RECONNECT = 'reconnect',
  NONE = 'none',
}

/**
 * Opens a second short-lived connection and uses the reciprocal of its
 * round trip (in seconds) as the estimate. Unreachable on retry yields 0.
 */
export class ReconnectThroughputEstimator implements ThroughputEstimator {
  readonly name = ThroughputEstimatorType.RECONNECT;
  private readonly connector: Connector;
  private readonly timeout: number;

  constructor(timeout: number = 5000, connector: Connector = connectTcp) {
    this.timeout = timeout;
    this.connector = connector;
  }

  async estimate(descriptor: ProxyDescriptor): Promise<number> {
    const elapsed = await this.connector(descriptor.host, descriptor.port, this.timeout);
    if (elapsed === null) {
      return 0;
    }
    // Sub-millisecond handshakes are clamped so the estimate stays finite
    return 1000 / Math.max(elapsed, 1);
  }
}

/**
 * Ranks on latency alone
 */
export class NullThroughputEstimator implements ThroughputEstimator {
  readonly name = ThroughputEstimatorType.NONE;

  async estimate(): Promise<number> {
    return 0;
  }
}

export function isThroughputEstimatorType(value: string): value is ThroughputEstimatorType {
  return Object.values(ThroughputEstimatorType).some((type) => type === value);
}

export function createThroughputEstimator(
  type: ThroughputEstimatorType,
  timeout: number,
  connector: Connector = connectTcp
): ThroughputEstimator {
  switch (type) {
    case ThroughputEstimatorType.NONE:
      return new NullThroughputEstimator();
    case ThroughputEstimatorType.RECONNECT:
    default:
      return new ReconnectThroughputEstimator(timeout, connector);
  }
}
