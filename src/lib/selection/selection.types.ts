/**
 * Selection Types
 */

import { ProxyProtocol } from '../proxy/proxy.types';

export interface SelectorOptions {
  /** Upper bound on entries kept per protocol */
  maxPerType?: number;
  /** Protocols whose presence pushes plain HTTP proxies out of the selection */
  modernProtocols?: readonly ProxyProtocol[];
  /** Protocols laid out first, in this order; the rest follow alphabetically */
  priority?: readonly ProxyProtocol[];
}
