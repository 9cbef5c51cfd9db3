/**
 * TCP Connector
 * Measures how long a TCP handshake to host:port takes
 */

import net from 'net';
import { performance } from 'perf_hooks';
import { Connector } from './probe.types';

export const connectTcp: Connector = (host, port, timeout) =>
  new Promise((resolve) => {
    const startedAt = performance.now();
    const socket = net.createConnection({ host, port });
    let settled = false;

    const finish = (elapsed: number | null): void => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      socket.destroy();
      resolve(elapsed);
    };

    const timer = setTimeout(() => finish(null), timeout);

    socket.once('connect', () => finish(performance.now() - startedAt));
    // Refusals, resets and DNS failures all mean "unreachable"
    socket.on('error', () => finish(null));
  });
