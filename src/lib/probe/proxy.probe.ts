/**
 * Proxy Probe
 * Tests reachability, latency and throughput of descriptors
 */

import type { Logger } from '../logger';
import { describeError } from '../errors';
import { ProbeResult, ProxyDescriptor } from '../proxy/proxy.types';
import { formatEndpoint } from '../proxy/proxy.utils';
import { Connector, ProxyProbeOptions, ThroughputEstimator } from './probe.types';
import { scoreProbe } from './score';
import { Semaphore } from './semaphore';
import { connectTcp } from './tcp.connector';
import { ReconnectThroughputEstimator } from './throughput.estimators';

const DEFAULT_TIMEOUT = 5000;
const DEFAULT_CONCURRENCY = 20;

export class ProxyProbe {
  private readonly logger: Logger;
  private readonly timeout: number;
  private readonly concurrency: number;
  private readonly deadline: number;
  private readonly connector: Connector;
  private readonly estimator: ThroughputEstimator;
  private readonly now: () => number;

  constructor(logger: Logger, options: ProxyProbeOptions = {}) {
    this.logger = logger;
    this.timeout = options.timeout || DEFAULT_TIMEOUT;
    this.concurrency = options.concurrency || DEFAULT_CONCURRENCY;
    this.deadline = options.deadline || 0;
    this.connector = options.connector || connectTcp;
    this.estimator = options.estimator || new ReconnectThroughputEstimator(this.timeout, this.connector);
    this.now = options.now || Date.now;
  }

  /**
   * Probe one descriptor. Unreachable endpoints resolve with null.
   */
  async test(descriptor: ProxyDescriptor): Promise<ProbeResult | null> {
    const latency = await this.connector(descriptor.host, descriptor.port, this.timeout);

    if (latency === null) {
      this.logger.debug('Probe rejected', {
        protocol: descriptor.protocol,
        endpoint: formatEndpoint(descriptor),
      });
      return null;
    }

    const throughput = await this.estimateThroughput(descriptor, latency);
    const result: ProbeResult = {
      descriptor,
      latency: Math.max(0, latency),
      throughput,
      score: scoreProbe(latency, throughput),
      testedAt: this.now(),
    };

    this.logger.debug('Probe succeeded', {
      protocol: descriptor.protocol,
      endpoint: formatEndpoint(descriptor),
      latency: Math.round(result.latency),
      score: Number(result.score.toFixed(3)),
    });
    return result;
  }

  /**
   * Probe every descriptor with bounded concurrency and wait for all of them
   * (or for the deadline). Only reachable descriptors produce a result.
   */
  async testAll(descriptors: ProxyDescriptor[]): Promise<ProbeResult[]> {
    const semaphore = new Semaphore(this.concurrency);
    const collected: ProbeResult[] = [];
    let completed = 0;
    let abandoned = false;

    this.logger.info('Probing descriptors', {
      count: descriptors.length,
      concurrency: this.concurrency,
      timeout: this.timeout,
      estimator: this.estimator.name,
    });

    const tasks = descriptors.map((descriptor) =>
      semaphore
        .use(async () => {
          if (abandoned) {
            return;
          }
          const result = await this.test(descriptor);
          if (result && !abandoned) {
            collected.push(result);
          }
        })
        .catch((error: unknown) => {
          this.logger.error('Probe failed unexpectedly', {
            endpoint: formatEndpoint(descriptor),
            error: describeError(error),
          });
        })
        .finally(() => {
          completed++;
        })
    );

    const outcome = await this.joinWithDeadline(Promise.all(tasks));

    if (outcome === 'deadline') {
      abandoned = true;
      this.logger.warn('Probe deadline reached, abandoning remaining probes', {
        deadline: this.deadline,
        completed,
        abandoned: descriptors.length - completed,
        ...semaphore.snapshot(),
      });
    }

    this.logger.info('Probe stage complete', {
      tested: descriptors.length,
      reachable: collected.length,
    });
    return collected.slice();
  }

  private async joinWithDeadline(all: Promise<unknown>): Promise<'done' | 'deadline'> {
    if (this.deadline <= 0) {
      await all;
      return 'done';
    }

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<'deadline'>((resolve) => {
      timer = setTimeout(() => resolve('deadline'), this.deadline);
    });

    try {
      return await Promise.race([all.then(() => 'done' as const), deadline]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async estimateThroughput(descriptor: ProxyDescriptor, latency: number): Promise<number> {
    try {
      const estimate = await this.estimator.estimate(descriptor, { latency });
      return Number.isFinite(estimate) ? Math.max(0, estimate) : 0;
    } catch (error) {
      this.logger.warn('Throughput estimation failed', {
        estimator: this.estimator.name,
        endpoint: formatEndpoint(descriptor),
        error: describeError(error),
      });
      return 0;
    }
  }
}
