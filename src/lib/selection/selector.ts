/**
 * Selector
 * Groups probe results by protocol, ranks them deterministically and keeps
 * the best few of each group
 */

import type { Logger } from '../logger';
import { ProbeResult, ProxyProtocol, SelectionTable } from '../proxy/proxy.types';
import {
  DEFAULT_MODERN_PROTOCOLS,
  DEFAULT_PROTOCOL_PRIORITY,
  descriptorKey,
  normalizeProtocol,
} from '../proxy/proxy.utils';
import { SelectorOptions } from './selection.types';

const DEFAULT_MAX_PER_TYPE = 3;

/**
 * Total order: score desc, latency asc, host asc (code units), port asc
 */
export function compareProbeResults(a: ProbeResult, b: ProbeResult): number {
  if (a.score !== b.score) {
    return b.score - a.score;
  }
  if (a.latency !== b.latency) {
    return a.latency - b.latency;
  }
  if (a.descriptor.host !== b.descriptor.host) {
    return a.descriptor.host < b.descriptor.host ? -1 : 1;
  }
  return a.descriptor.port - b.descriptor.port;
}

export class Selector {
  private readonly logger: Logger;
  private readonly maxPerType: number;
  private readonly modernProtocols: readonly ProxyProtocol[];
  private readonly priority: readonly ProxyProtocol[];

  constructor(logger: Logger, options: SelectorOptions = {}) {
    this.logger = logger;
    this.maxPerType = options.maxPerType || DEFAULT_MAX_PER_TYPE;
    this.modernProtocols = options.modernProtocols || DEFAULT_MODERN_PROTOCOLS;
    this.priority = options.priority || DEFAULT_PROTOCOL_PRIORITY;
  }

  select(results: ProbeResult[]): SelectionTable {
    const groups = this.groupByProtocol(results);

    const hasModern = this.modernProtocols.some((protocol) => (groups.get(protocol)?.length ?? 0) > 0);
    if (hasModern && groups.has(ProxyProtocol.HTTP)) {
      this.logger.info('Dropping HTTP proxies in favour of modern protocols', {
        dropped: groups.get(ProxyProtocol.HTTP)?.length ?? 0,
      });
      groups.delete(ProxyProtocol.HTTP);
    }

    const table: SelectionTable = new Map();
    for (const protocol of this.orderProtocols([...groups.keys()])) {
      const ranked = this.rank(groups.get(protocol) ?? []);
      if (ranked.length > 0) {
        table.set(protocol, ranked);
      }
    }

    this.logger.info('Selection complete', {
      candidates: results.length,
      selected: Object.fromEntries([...table].map(([protocol, list]) => [protocol, list.length])),
    });
    return table;
  }

  private groupByProtocol(results: ProbeResult[]): Map<ProxyProtocol, ProbeResult[]> {
    const groups = new Map<ProxyProtocol, ProbeResult[]>();

    for (const result of results) {
      const protocol = normalizeProtocol(result.descriptor.protocol);
      if (!protocol) {
        continue;
      }
      const group = groups.get(protocol);
      if (group) {
        group.push(result);
      } else {
        groups.set(protocol, [result]);
      }
    }

    return groups;
  }

  /**
   * Sort, drop repeated endpoints (keeping the best-ranked) and truncate
   */
  private rank(group: ProbeResult[]): ProbeResult[] {
    const seen = new Set<string>();
    const ranked: ProbeResult[] = [];

    for (const result of [...group].sort(compareProbeResults)) {
      if (ranked.length >= this.maxPerType) {
        break;
      }
      const key = descriptorKey(result.descriptor);
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);
      ranked.push(result);
    }

    return ranked;
  }

  private orderProtocols(protocols: ProxyProtocol[]): ProxyProtocol[] {
    const preferred = this.priority.filter((protocol) => protocols.includes(protocol));
    const rest = protocols.filter((protocol) => !preferred.includes(protocol)).sort();
    return [...preferred, ...rest];
  }
}
