/**
 * Selector Tests
 */

import { Selector, compareProbeResults } from '../selector';
import { ProxyProtocol } from '../../proxy/proxy.types';
import { createSilentLogger } from '../../../__tests__/helpers/mocks';
import { probeResult } from '../../../__tests__/helpers/fixtures';

describe('compareProbeResults', () => {
  it('should order by score, then latency, then host, then port', () => {
    const results = [
      probeResult(ProxyProtocol.TROJAN, 'b.example.com', 443, 10, 20),
      probeResult(ProxyProtocol.TROJAN, 'a.example.com', 444, 10, 20),
      probeResult(ProxyProtocol.TROJAN, 'a.example.com', 443, 10, 20),
      probeResult(ProxyProtocol.TROJAN, 'z.example.com', 443, 10, 5),
      probeResult(ProxyProtocol.TROJAN, 'y.example.com', 443, 50, 90),
    ];

    const ordered = [...results].sort(compareProbeResults).map((r) => `${r.descriptor.host}:${r.descriptor.port}`);

    expect(ordered).toEqual([
      'y.example.com:443',
      'z.example.com:443',
      'a.example.com:443',
      'a.example.com:444',
      'b.example.com:443',
    ]);
  });
});

describe('Selector', () => {
  const logger = createSilentLogger();

  it('should keep the best results of each protocol', () => {
    const selector = new Selector(logger, { maxPerType: 2 });

    const table = selector.select([
      probeResult(ProxyProtocol.SHADOWSOCKS, 's1.example.com', 8388, 5),
      probeResult(ProxyProtocol.SHADOWSOCKS, 's2.example.com', 8388, 50),
      probeResult(ProxyProtocol.SHADOWSOCKS, 's3.example.com', 8388, 20),
      probeResult(ProxyProtocol.HYSTERIA2, 'h1.example.com', 443, 1),
    ]);

    expect([...table.keys()]).toEqual([ProxyProtocol.HYSTERIA2, ProxyProtocol.SHADOWSOCKS]);
    expect(table.get(ProxyProtocol.SHADOWSOCKS)?.map((r) => r.descriptor.host)).toEqual([
      's2.example.com',
      's3.example.com',
    ]);
  });

  it('should cap each group at max-per-type, best score first', () => {
    const selector = new Selector(logger, { maxPerType: 3 });
    const results = [12, 48, 3, 27, 33].map((score, i) =>
      probeResult(ProxyProtocol.VMESS, `vm${i}.example.com`, 443, score)
    );

    const vmess = selector.select(results).get(ProxyProtocol.VMESS);

    expect(vmess?.map((r) => r.score)).toEqual([48, 33, 27]);
  });

  it('should drop HTTP proxies when a modern protocol is available', () => {
    const infoSpy = jest.spyOn(logger, 'info');
    const selector = new Selector(logger);

    const table = selector.select([
      probeResult(ProxyProtocol.HTTP, 'p.example.com', 8080, 900),
      probeResult(ProxyProtocol.TUIC, 't.example.com', 443, 1),
    ]);

    expect([...table.keys()]).toEqual([ProxyProtocol.TUIC]);
    expect(infoSpy).toHaveBeenCalledWith('Dropping HTTP proxies in favour of modern protocols', { dropped: 1 });
    infoSpy.mockRestore();
  });

  it('should keep HTTP proxies when nothing else is reachable', () => {
    const selector = new Selector(logger);

    const table = selector.select([
      probeResult(ProxyProtocol.HTTP, 'p1.example.com', 8080, 1),
      probeResult(ProxyProtocol.HTTP, 'p2.example.com', 8080, 2),
    ]);

    expect(table.get(ProxyProtocol.HTTP)?.map((r) => r.descriptor.host)).toEqual([
      'p2.example.com',
      'p1.example.com',
    ]);
  });

  it('should keep HTTP proxies next to protocols that are not modern', () => {
    const selector = new Selector(logger);

    const table = selector.select([
      probeResult(ProxyProtocol.HTTP, 'p.example.com', 8080, 1),
      probeResult(ProxyProtocol.VLESS, 'v.example.com', 443, 1),
    ]);

    expect([...table.keys()]).toEqual([ProxyProtocol.HTTP, ProxyProtocol.VLESS]);
  });

  it('should honour a custom modern protocol list', () => {
    const selector = new Selector(logger, { modernProtocols: [ProxyProtocol.VLESS] });

    const table = selector.select([
      probeResult(ProxyProtocol.HTTP, 'p.example.com', 8080, 1),
      probeResult(ProxyProtocol.VLESS, 'v.example.com', 443, 1),
    ]);

    expect([...table.keys()]).toEqual([ProxyProtocol.VLESS]);
  });

  it('should order groups by priority, then alphabetically', () => {
    const selector = new Selector(logger);

    const table = selector.select([
      probeResult(ProxyProtocol.TROJAN, 'tr.example.com', 443, 1),
      probeResult(ProxyProtocol.VMESS, 'vm.example.com', 443, 1),
      probeResult(ProxyProtocol.TUIC, 'tu.example.com', 443, 1),
      probeResult(ProxyProtocol.HYSTERIA2, 'hy.example.com', 443, 1),
    ]);

    expect([...table.keys()]).toEqual([
      ProxyProtocol.HYSTERIA2,
      ProxyProtocol.VMESS,
      ProxyProtocol.TROJAN,
      ProxyProtocol.TUIC,
    ]);
  });

  it('should not select the same endpoint twice', () => {
    const selector = new Selector(logger);

    const table = selector.select([
      probeResult(ProxyProtocol.TROJAN, 'A.example.com', 443, 10),
      probeResult(ProxyProtocol.TROJAN, 'a.example.com', 443, 20),
      probeResult(ProxyProtocol.TROJAN, 'b.example.com', 443, 5),
    ]);

    expect(table.get(ProxyProtocol.TROJAN)?.map((r) => r.descriptor.host)).toEqual([
      'a.example.com',
      'b.example.com',
    ]);
  });

  it('should produce the same table regardless of input order', () => {
    const selector = new Selector(logger, { maxPerType: 1 });
    const results = [
      probeResult(ProxyProtocol.TROJAN, 'b.example.com', 443, 10, 10),
      probeResult(ProxyProtocol.TROJAN, 'a.example.com', 443, 10, 10),
    ];

    const forward = selector.select(results);
    const reversed = selector.select([...results].reverse());

    expect(forward.get(ProxyProtocol.TROJAN)?.[0].descriptor.host).toBe('a.example.com');
    expect(reversed).toEqual(forward);
  });

  it('should return an empty table for no results', () => {
    expect(new Selector(logger).select([]).size).toBe(0);
  });
});
