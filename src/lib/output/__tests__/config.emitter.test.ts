/**
 * Config Emitter Tests
 */

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import {
  ConfigEmitter,
  DEFAULT_SHADOWSOCKS_METHOD,
  DEFAULT_VMESS_TRANSPORT,
  outboundTag,
} from '../config.emitter';
import { PersistenceError } from '../../errors';
import {
  ProbeResult,
  ProxyDescriptor,
  ProxyProtocol,
  SelectionTable,
  VmessDescriptor,
} from '../../proxy/proxy.types';
import { createSilentLogger } from '../../../__tests__/helpers/mocks';
import { TEST_SOURCE } from '../../../__tests__/helpers/fixtures';

function result(descriptor: ProxyDescriptor): ProbeResult {
  return { descriptor, latency: 10, throughput: 0, score: 1000 / 11, testedAt: 0 };
}

const hysteria2: ProxyDescriptor = {
  protocol: ProxyProtocol.HYSTERIA2,
  host: 'h.example.com',
  port: 443,
  source: TEST_SOURCE,
  password: 'test-secret',
  sni: 'h.example.com',
};

const shadowsocks: ProxyDescriptor = {
  protocol: ProxyProtocol.SHADOWSOCKS,
  host: 's.example.com',
  port: 8388,
  source: TEST_SOURCE,
};

describe('ConfigEmitter', () => {
  const logger = createSilentLogger();

  describe('build', () => {
    it('should emit a selector, the proxies, then direct and block', () => {
      const emitter = new ConfigEmitter(logger, { logLevel: 'warn' });
      const table: SelectionTable = new Map([
        [ProxyProtocol.SHADOWSOCKS, [result(shadowsocks)]],
        [ProxyProtocol.HYSTERIA2, [result(hysteria2)]],
      ]);

      const config = emitter.build(table);

      expect(config.log).toEqual({ level: 'warn' });
      expect(config.outbounds.map((o) => o.tag)).toEqual([
        'proxy',
        'shadowsocks-0',
        'hysteria2-0',
        'direct',
        'block',
      ]);
      expect(config.outbounds[0]).toEqual({
        type: 'selector',
        tag: 'proxy',
        outbounds: ['shadowsocks-0', 'hysteria2-0'],
        default: 'hysteria2-0',
      });
    });

    it('should render hysteria2 with bandwidth and tls defaults', () => {
      const config = new ConfigEmitter(logger).build(new Map([[ProxyProtocol.HYSTERIA2, [result(hysteria2)]]]));
      const outbound = config.outbounds[1];

      expect(outbound).toEqual({
        type: 'hysteria2',
        server: 'h.example.com',
        port: 443,
        tag: 'hysteria2-0',
        up_mbps: 100,
        down_mbps: 100,
        password: 'test-secret',
        tls: { enabled: true, server_name: 'h.example.com' },
      });
      expect(Object.keys(outbound).slice(0, 4)).toEqual(['type', 'server', 'port', 'tag']);
    });

    it('should fill in the shadowsocks method', () => {
      const config = new ConfigEmitter(logger).build(new Map([[ProxyProtocol.SHADOWSOCKS, [result(shadowsocks)]]]));

      expect(config.outbounds[1]).toEqual({
        type: 'shadowsocks',
        server: 's.example.com',
        port: 8388,
        tag: 'shadowsocks-0',
        method: DEFAULT_SHADOWSOCKS_METHOD,
        password: '',
      });
    });

    it('should give vmess a grpc transport unless the link names one', () => {
      const bare: VmessDescriptor = {
        protocol: ProxyProtocol.VMESS,
        host: 'vm.example.com',
        port: 443,
        source: TEST_SOURCE,
        uuid: 'u-1',
      };
      const tcp: VmessDescriptor = { ...bare, host: 'vm2.example.com', network: 'tcp', tls: true, alterId: 0 };
      const config = new ConfigEmitter(logger).build(
        new Map([[ProxyProtocol.VMESS, [result(bare), result(tcp)]]])
      );

      expect(config.outbounds[1]).toEqual({
        type: 'vmess',
        server: 'vm.example.com',
        port: 443,
        tag: 'vmess-0',
        uuid: 'u-1',
        transport: { type: 'grpc' },
      });
      expect(config.outbounds[2]).toEqual({
        type: 'vmess',
        server: 'vm2.example.com',
        port: 443,
        tag: 'vmess-1',
        uuid: 'u-1',
        alter_id: 0,
        tls: { enabled: true },
      });
    });

    it('should give each vmess outbound its own default transport', () => {
      const first: VmessDescriptor = {
        protocol: ProxyProtocol.VMESS,
        host: 'vm1.example.com',
        port: 443,
        source: TEST_SOURCE,
      };
      const second: VmessDescriptor = { ...first, host: 'vm2.example.com' };
      const config = new ConfigEmitter(logger).build(
        new Map([[ProxyProtocol.VMESS, [result(first), result(second)]]])
      );
      const [a, b] = config.outbounds.slice(1, 3).map((o) => (o.type === 'vmess' ? o.transport : undefined));

      expect(a).toEqual({ type: 'grpc' });
      expect(a).not.toBe(b);
      expect(a).not.toBe(DEFAULT_VMESS_TRANSPORT);
    });

    it('should carry the vmess tls server name and insecure flag', () => {
      const vmess: VmessDescriptor = {
        protocol: ProxyProtocol.VMESS,
        host: 'vm.example.com',
        port: 443,
        source: TEST_SOURCE,
        uuid: 'u-1',
        network: 'tcp',
        tls: true,
        sni: 'edge.example.com',
        insecure: true,
      };
      const config = new ConfigEmitter(logger).build(new Map([[ProxyProtocol.VMESS, [result(vmess)]]]));

      expect(config.outbounds[1]).toMatchObject({
        tls: { enabled: true, server_name: 'edge.example.com', insecure: true },
      });
    });

    it('should render vless transports', () => {
      const vless: ProxyDescriptor = {
        protocol: ProxyProtocol.VLESS,
        host: 'v.example.com',
        port: 443,
        source: TEST_SOURCE,
        uuid: 'u-2',
        network: 'ws',
        path: '/ws',
        hostHeader: 'cdn.example.com',
        tls: true,
        sni: 'v.example.com',
      };
      const config = new ConfigEmitter(logger).build(new Map([[ProxyProtocol.VLESS, [result(vless)]]]));

      expect(config.outbounds[1]).toEqual({
        type: 'vless',
        server: 'v.example.com',
        port: 443,
        tag: 'vless-0',
        uuid: 'u-2',
        transport: { type: 'ws', path: '/ws', headers: { Host: 'cdn.example.com' } },
        tls: { enabled: true, server_name: 'v.example.com' },
      });
    });

    it('should render http and socks credentials only when present', () => {
      const http: ProxyDescriptor = {
        protocol: ProxyProtocol.HTTP,
        host: 'p.example.com',
        port: 3128,
        source: TEST_SOURCE,
        username: 'user',
        password: 'test-secret',
      };
      const socks: ProxyDescriptor = {
        protocol: ProxyProtocol.SOCKS,
        host: 'k.example.com',
        port: 1080,
        source: TEST_SOURCE,
      };
      const config = new ConfigEmitter(logger).build(
        new Map([
          [ProxyProtocol.HTTP, [result(http)]],
          [ProxyProtocol.SOCKS, [result(socks)]],
        ])
      );

      expect(config.outbounds.slice(1, 3)).toEqual([
        { type: 'http', server: 'p.example.com', port: 3128, tag: 'http-0', username: 'user', password: 'test-secret' },
        { type: 'socks', server: 'k.example.com', port: 1080, tag: 'socks-0', version: '5' },
      ]);
    });

    it('should enable tls for https proxies', () => {
      const https: ProxyDescriptor = {
        protocol: ProxyProtocol.HTTP,
        host: 'proxy.example.com',
        port: 443,
        source: TEST_SOURCE,
        username: 'user',
        password: 'test-secret',
        tls: true,
        sni: 'proxy.example.com',
      };
      const config = new ConfigEmitter(logger).build(new Map([[ProxyProtocol.HTTP, [result(https)]]]));

      expect(config.outbounds[1]).toEqual({
        type: 'http',
        server: 'proxy.example.com',
        port: 443,
        tag: 'http-0',
        username: 'user',
        password: 'test-secret',
        tls: { enabled: true, server_name: 'proxy.example.com' },
      });
    });

    it('should default the selector to the first tag when no priority protocol is present', () => {
      const trojan: ProxyDescriptor = {
        protocol: ProxyProtocol.TROJAN,
        host: 't.example.com',
        port: 443,
        source: TEST_SOURCE,
        password: 'test-secret',
        insecure: true,
      };
      const config = new ConfigEmitter(logger).build(new Map([[ProxyProtocol.TROJAN, [result(trojan)]]]));

      expect(config.outbounds[0]).toMatchObject({ default: 'trojan-0', outbounds: ['trojan-0'] });
      expect(config.outbounds[1]).toMatchObject({ tls: { enabled: true, insecure: true } });
    });

    it('should emit only direct and block for an empty selection', () => {
      const config = new ConfigEmitter(logger).build(new Map());

      expect(config).toEqual({
        log: { level: 'info' },
        outbounds: [
          { type: 'direct', tag: 'direct' },
          { type: 'block', tag: 'block' },
        ],
      });
    });

    it('should number tags per protocol', () => {
      expect(outboundTag(ProxyProtocol.TUIC, 2)).toBe('tuic-2');
    });
  });

  describe('emit', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'emitter-'));
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it('should write the document to the output path', async () => {
      const outputPath = path.join(dir, 'sing-box-config.json');
      const emitter = new ConfigEmitter(logger, { outputPath });

      const config = await emitter.emit(new Map([[ProxyProtocol.HYSTERIA2, [result(hysteria2)]]]));

      const written = await fs.readFile(outputPath, 'utf-8');
      expect(JSON.parse(written)).toEqual(config);
      expect(written).toBe(`${JSON.stringify(config, null, 2)}\n`);
    });

    it('should reject with PersistenceError when the path cannot be written', async () => {
      const blocker = path.join(dir, 'not-a-directory');
      await fs.writeFile(blocker, 'x');
      const emitter = new ConfigEmitter(logger, { outputPath: path.join(blocker, 'config.json') });

      await expect(emitter.emit(new Map())).rejects.toBeInstanceOf(PersistenceError);
    });
  });
});
