/**
 * Application wiring
 * Builds a pipeline from validated options, giving every stage its own child logger
 */

import type { Logger } from './lib/logger';
import { ConfigEmitter } from './lib/output';
import { FormatParser } from './lib/parsing';
import { PipelineOptions, ProxyPipeline } from './lib/pipeline';
import { Connector, ProxyProbe, connectTcp, createThroughputEstimator } from './lib/probe';
import { DEFAULT_MODERN_PROTOCOLS } from './lib/proxy';
import { Selector } from './lib/selection';
import { FetchFn, SourceFetcher } from './lib/sources';

/**
 * Network primitives, replaceable in tests
 */
export interface PipelineRuntime {
  fetchImpl?: FetchFn;
  connector?: Connector;
}

export const createPipeline = (
  options: PipelineOptions,
  logger: Logger,
  runtime: PipelineRuntime = {}
): ProxyPipeline => {
  const connector = runtime.connector || connectTcp;

  return new ProxyPipeline({
    logger: logger.child({ component: 'pipeline' }),
    sources: options.sources,
    fetcher: new SourceFetcher(logger.child({ component: 'fetcher' }), {
      ...options.fetch,
      fetchImpl: runtime.fetchImpl,
    }),
    parser: new FormatParser(logger.child({ component: 'parser' })),
    probe: new ProxyProbe(logger.child({ component: 'probe' }), {
      timeout: options.probe.timeout,
      concurrency: options.probe.concurrency,
      deadline: options.probe.deadline,
      connector,
      estimator: createThroughputEstimator(options.probe.estimator, options.probe.timeout, connector),
    }),
    selector: new Selector(logger.child({ component: 'selector' }), {
      maxPerType: options.selection.maxPerType,
      modernProtocols: options.selection.modernProtocols.length
        ? options.selection.modernProtocols
        : DEFAULT_MODERN_PROTOCOLS,
    }),
    emitter: new ConfigEmitter(logger.child({ component: 'emitter' }), {
      outputPath: options.outputPath,
      logLevel: options.singboxLogLevel,
    }),
    fallback: options.fallback,
  });
};
