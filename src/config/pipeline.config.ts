/**
 * Pipeline Configuration
 * Validates environment settings into pipeline options
 */

import { ConfigError } from '../lib/errors';
import { PipelineOptions } from '../lib/pipeline/pipeline.types';
import { isThroughputEstimatorType } from '../lib/probe/throughput.estimators';
import { parseProtocolList } from '../lib/proxy/proxy.utils';
import { parseSourceRefs } from '../lib/sources/source.utils';
import { Env, env as defaultEnv } from './env';

function positiveInt(key: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(key, `${key} must be a positive integer`);
  }
  return value;
}

function nonNegativeInt(key: string, value: number): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError(key, `${key} must be zero or a positive integer`);
  }
  return value;
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

export function loadPipelineOptions(source: Env = defaultEnv): PipelineOptions {
  const estimator = source.THROUGHPUT_ESTIMATOR.trim().toLowerCase();
  if (!isThroughputEstimatorType(estimator)) {
    throw new ConfigError('THROUGHPUT_ESTIMATOR', `Unknown throughput estimator "${source.THROUGHPUT_ESTIMATOR}"`);
  }

  if (!source.OUTPUT_PATH.trim()) {
    throw new ConfigError('OUTPUT_PATH', 'OUTPUT_PATH must not be empty');
  }

  return {
    sources: parseSourceRefs(source.SOURCE_URLS),
    outputPath: source.OUTPUT_PATH.trim(),
    singboxLogLevel: source.SINGBOX_LOG_LEVEL,
    fetch: {
      timeout: positiveInt('FETCH_TIMEOUT', source.FETCH_TIMEOUT),
      retries: nonNegativeInt('FETCH_RETRIES', source.FETCH_RETRIES),
      retryBackoffBase: nonNegativeInt('RETRY_BACKOFF_BASE', source.RETRY_BACKOFF_BASE),
      userAgent: source.USER_AGENT,
    },
    probe: {
      timeout: positiveInt('PROBE_TIMEOUT', source.PROBE_TIMEOUT),
      concurrency: positiveInt('PROBE_CONCURRENCY', source.PROBE_CONCURRENCY),
      deadline: nonNegativeInt('PROBE_DEADLINE', source.PROBE_DEADLINE),
      estimator,
    },
    selection: {
      maxPerType: positiveInt('MAX_PROXIES_PER_TYPE', source.MAX_PROXIES_PER_TYPE),
      modernProtocols: parseProtocolList(source.MODERN_PROTOCOLS),
    },
    fallback: {
      enabled: source.FALLBACK_ENABLED,
      proxies: splitList(source.FALLBACK_PROXIES),
    },
  };
}
