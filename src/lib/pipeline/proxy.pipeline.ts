/**
 * Proxy Pipeline
 * fetch → parse → dedupe → probe → select → emit, once per run
 */

import type { Logger } from '../logger';
import { ConfigEmitter } from '../output/config.emitter';
import { FormatParser } from '../parsing/format.parser';
import { ProxyProbe } from '../probe/proxy.probe';
import { ProxyDescriptor } from '../proxy/proxy.types';
import { dedupeDescriptors } from '../proxy/proxy.utils';
import { Selector } from '../selection/selector';
import { SourceFetcher } from '../sources/source.fetcher';
import { SourceRef } from '../sources/source.types';
import { FallbackPolicy, PipelineDependencies, PipelineReport } from './pipeline.types';

export const FALLBACK_SOURCE = 'fallback';

export class ProxyPipeline {
  private readonly logger: Logger;
  private readonly sources: SourceRef[];
  private readonly fetcher: SourceFetcher;
  private readonly parser: FormatParser;
  private readonly probe: ProxyProbe;
  private readonly selector: Selector;
  private readonly emitter: ConfigEmitter;
  private readonly fallback: FallbackPolicy;

  constructor(deps: PipelineDependencies) {
    this.logger = deps.logger;
    this.sources = deps.sources;
    this.fetcher = deps.fetcher;
    this.parser = deps.parser;
    this.probe = deps.probe;
    this.selector = deps.selector;
    this.emitter = deps.emitter;
    this.fallback = deps.fallback || { enabled: false, proxies: [] };
  }

  /**
   * Run the pipeline once. Only a persistence failure rejects.
   */
  async run(): Promise<PipelineReport> {
    const startedAt = Date.now();
    this.logger.info('Starting proxy update cycle', { sources: this.sources.length });

    const payloads = await this.fetcher.fetchAll(this.sources);
    const parsed = this.parser.parseAll(payloads);
    const { unique, duplicates } = dedupeDescriptors(parsed);

    if (duplicates > 0) {
      this.logger.info('Dropped duplicate descriptors', { duplicates });
    }

    let candidates = unique;
    let fallbackUsed = false;

    if (candidates.length === 0) {
      if (this.fallback.enabled) {
        candidates = this.fallbackDescriptors();
        fallbackUsed = candidates.length > 0;
        this.logger.warn('No proxies fetched, using fallback descriptors', { count: candidates.length });
      } else {
        this.logger.warn('No proxies fetched');
      }
    }

    const results = await this.probe.testAll(candidates);
    if (candidates.length > 0 && results.length === 0) {
      this.logger.warn('No reachable proxies found');
    }

    const table = this.selector.select(results);
    const config = await this.emitter.emit(table);

    const report: PipelineReport = {
      sourcesRequested: this.sources.length,
      sourcesFetched: payloads.length,
      descriptorsParsed: parsed.length,
      duplicatesDropped: duplicates,
      fallbackUsed,
      reachable: results.length,
      selected: Object.fromEntries([...table].map(([protocol, list]) => [protocol, list.length])),
      config,
      durationMs: Date.now() - startedAt,
    };

    this.logger.info('Proxy update cycle complete', {
      sourcesFetched: report.sourcesFetched,
      descriptors: report.descriptorsParsed,
      reachable: report.reachable,
      selected: report.selected,
      durationMs: report.durationMs,
    });
    return report;
  }

  private fallbackDescriptors(): ProxyDescriptor[] {
    if (this.fallback.proxies.length === 0) {
      return [];
    }
    return this.parser.parse({
      source: { url: FALLBACK_SOURCE, format: 'text' },
      body: this.fallback.proxies.join('\n'),
      fetchedAt: Date.now(),
    });
  }
}
