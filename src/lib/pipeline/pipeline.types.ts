/**
 * Pipeline Types
 */

import type { Logger } from '../logger';
import { ConfigEmitter } from '../output/config.emitter';
import { SingBoxConfig } from '../output/singbox.types';
import { FormatParser } from '../parsing/format.parser';
import { ThroughputEstimatorType } from '../probe/throughput.estimators';
import { ProxyProbe } from '../probe/proxy.probe';
import { ProxyProtocol } from '../proxy/proxy.types';
import { Selector } from '../selection/selector';
import { SourceFetcher } from '../sources/source.fetcher';
import { SourceRef } from '../sources/source.types';

/**
 * Descriptors injected when no source yields anything
 */
export interface FallbackPolicy {
  enabled: boolean;
  /** Proxy URIs or host:port lines */
  proxies: string[];
}

/**
 * Validated settings for one run
 */
export interface PipelineOptions {
  sources: SourceRef[];
  outputPath: string;
  singboxLogLevel: string;
  fetch: {
    timeout: number;
    retries: number;
    retryBackoffBase: number;
    userAgent: string;
  };
  probe: {
    timeout: number;
    concurrency: number;
    deadline: number;
    estimator: ThroughputEstimatorType;
  };
  selection: {
    maxPerType: number;
    modernProtocols: ProxyProtocol[];
  };
  fallback: FallbackPolicy;
}

export interface PipelineDependencies {
  logger: Logger;
  sources: SourceRef[];
  fetcher: SourceFetcher;
  parser: FormatParser;
  probe: ProxyProbe;
  selector: Selector;
  emitter: ConfigEmitter;
  fallback?: FallbackPolicy;
}

/**
 * Summary of a finished run
 */
export interface PipelineReport {
  sourcesRequested: number;
  sourcesFetched: number;
  descriptorsParsed: number;
  duplicatesDropped: number;
  fallbackUsed: boolean;
  reachable: number;
  selected: Record<string, number>;
  config: SingBoxConfig;
  durationMs: number;
}
