/**
 * Egress Types
 */

export interface EgressAddress {
  scheme: string;
  host: string;
  port: number;
}

/**
 * Capability that mutates process-wide egress configuration
 */
export interface EgressConfigurator {
  apply(address: EgressAddress): Promise<void>;
  clear(): Promise<void>;
}

/**
 * Signals emitted after an apply for collaborators the core does not implement
 */
export enum EgressSignal {
  APPLIED = 'applied',
  CLEARED = 'cleared',
  KILL_SWITCH = 'killSwitch',
  DNS_PROTECTION = 'dnsProtection',
  TOR_INTEGRATION = 'torIntegration',
  PROXY_CHAIN = 'proxyChain',
}

export function formatEgressUrl(address: EgressAddress): string {
  return `${address.scheme}://${address.host}:${address.port}`;
}
