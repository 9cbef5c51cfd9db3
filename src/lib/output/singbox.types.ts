/**
 * sing-box configuration schema (the subset this tool writes)
 */

export interface SingBoxTls {
  enabled: boolean;
  server_name?: string;
  insecure?: boolean;
}

export type SingBoxTransport =
  | { type: 'ws'; path?: string; headers?: { Host: string } }
  | { type: 'grpc'; service_name?: string }
  | { type: 'http'; path?: string; host?: string[] }
  | { type: 'httpupgrade'; path?: string; host?: string }
  | { type: 'quic' };

interface ServerOutbound {
  server: string;
  port: number;
  tag: string;
}

export interface Hysteria2Outbound extends ServerOutbound {
  type: 'hysteria2';
  up_mbps: number;
  down_mbps: number;
  password: string;
  tls: SingBoxTls;
}

export interface ShadowsocksOutbound extends ServerOutbound {
  type: 'shadowsocks';
  method: string;
  password: string;
}

export interface VmessOutbound extends ServerOutbound {
  type: 'vmess';
  uuid: string;
  alter_id?: number;
  transport?: SingBoxTransport;
  tls?: SingBoxTls;
}

export interface VlessOutbound extends ServerOutbound {
  type: 'vless';
  uuid: string;
  flow?: string;
  transport?: SingBoxTransport;
  tls?: SingBoxTls;
}

export interface TuicOutbound extends ServerOutbound {
  type: 'tuic';
  uuid: string;
  password: string;
  tls: SingBoxTls;
}

export interface TrojanOutbound extends ServerOutbound {
  type: 'trojan';
  password: string;
  tls: SingBoxTls;
}

export interface HttpOutbound extends ServerOutbound {
  type: 'http';
  username?: string;
  password?: string;
  tls?: SingBoxTls;
}

export interface SocksOutbound extends ServerOutbound {
  type: 'socks';
  version: '4' | '4a' | '5';
  username?: string;
  password?: string;
}

export type ProxyOutbound =
  | Hysteria2Outbound
  | ShadowsocksOutbound
  | VmessOutbound
  | VlessOutbound
  | TuicOutbound
  | TrojanOutbound
  | HttpOutbound
  | SocksOutbound;

export interface SelectorOutbound {
  type: 'selector';
  tag: string;
  outbounds: string[];
  default: string;
}

export interface DirectOutbound {
  type: 'direct';
  tag: 'direct';
}

export interface BlockOutbound {
  type: 'block';
  tag: 'block';
}

export type SingBoxOutbound = SelectorOutbound | ProxyOutbound | DirectOutbound | BlockOutbound;

export interface SingBoxConfig {
  log: { level: string };
  outbounds: SingBoxOutbound[];
}
