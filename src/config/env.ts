import dotenv from 'dotenv';

dotenv.config();

const DEFAULT_SOURCE_URLS = [
  'https://raw.githubusercontent.com/mixool/hysteria/master/hysteria2.json',
  'https://raw.githubusercontent.com/mahdibland/V2RayAggregator/master/sub/shadowsocks2022.json',
  'https://raw.githubusercontent.com/Epodonios/v2ray-configs/main/vmess_configs.json',
  'https://raw.githubusercontent.com/soroushmirzaei/telegram-configs-collector/main/configs.json',
  'https://raw.githubusercontent.com/TheSpeedX/PROXY-List/master/http.txt',
].join(',');

export const env = {
  NODE_ENV: process.env.NODE_ENV || 'development',

  // Sources
  SOURCE_URLS: process.env.SOURCE_URLS || DEFAULT_SOURCE_URLS, // Comma-separated, optional |json or |text suffix
  FETCH_TIMEOUT: parseInt(process.env.FETCH_TIMEOUT || '5000', 10),
  FETCH_RETRIES: parseInt(process.env.FETCH_RETRIES || '0', 10), // 0 = single attempt
  RETRY_BACKOFF_BASE: parseInt(process.env.RETRY_BACKOFF_BASE || '1000', 10),
  USER_AGENT: process.env.USER_AGENT || 'singbox-proxy-curator/1.0',

  // Probing
  PROBE_TIMEOUT: parseInt(process.env.PROBE_TIMEOUT || '5000', 10),
  PROBE_CONCURRENCY: parseInt(process.env.PROBE_CONCURRENCY || '20', 10),
  PROBE_DEADLINE: parseInt(process.env.PROBE_DEADLINE || '60000', 10), // 0 disables the overall deadline
  THROUGHPUT_ESTIMATOR: process.env.THROUGHPUT_ESTIMATOR || 'reconnect',

  // Selection
  MAX_PROXIES_PER_TYPE: parseInt(process.env.MAX_PROXIES_PER_TYPE || '3', 10),
  MODERN_PROTOCOLS: process.env.MODERN_PROTOCOLS || 'hysteria2,shadowsocks,vmess,tuic,trojan',

  // Fallback when no source yields a descriptor
  FALLBACK_ENABLED: process.env.FALLBACK_ENABLED === 'true', // Default false
  FALLBACK_PROXIES: process.env.FALLBACK_PROXIES || '', // Comma-separated proxy URIs

  // Output
  OUTPUT_PATH: process.env.OUTPUT_PATH || 'sing-box-config.json',
  SINGBOX_LOG_LEVEL: process.env.SINGBOX_LOG_LEVEL || 'info',

  // Logging
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
  LOG_FILE: process.env.LOG_FILE ?? 'proxy_manager.log', // Empty string disables the file log
} as const;

export type Env = typeof env;

export default env;
