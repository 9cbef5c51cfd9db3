/**
 * Test Fixtures
 * Descriptor and probe-result factories plus sample subscription payloads
 */

import {
  ProbeResult,
  ProxyDescriptor,
  ProxyProtocol,
} from '../../lib/proxy/proxy.types';
import { RawPayload, SourceRef } from '../../lib/sources/source.types';

export const TEST_SOURCE = 'https://subs.example.com/list.txt';

export function base64(value: string): string {
  return Buffer.from(value, 'utf8').toString('base64');
}

export function ssLine(method: string, password: string, endpoint: string, tag?: string): string {
  return `ss://${base64(`${method}:${password}`)}@${endpoint}${tag ? `#${encodeURIComponent(tag)}` : ''}`;
}

export function vmessLine(config: Record<string, unknown>): string {
  return `vmess://${base64(JSON.stringify(config))}`;
}

export function payload(body: string, source: SourceRef | string = TEST_SOURCE): RawPayload {
  return {
    source: typeof source === 'string' ? { url: source } : source,
    body,
    fetchedAt: 0,
  };
}

/**
 * Minimal descriptor of any protocol
 */
export function descriptor(
  protocol: ProxyProtocol,
  host: string,
  port: number,
  source: string = TEST_SOURCE
): ProxyDescriptor {
  return { protocol, host, port, source };
}

export function probeResult(
  protocol: ProxyProtocol,
  host: string,
  port: number,
  score: number,
  latency: number = 10
): ProbeResult {
  return {
    descriptor: descriptor(protocol, host, port),
    latency,
    throughput: 0,
    score,
    testedAt: 0,
  };
}
