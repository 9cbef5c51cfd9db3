/**
 * sing-box configuration output
 */

export * from './singbox.types';
export * from './config.writer';
export * from './config.emitter';
