/**
 * Relay status page rendering
 */

import { EgressAddress } from '../../lib/egress';
import { ProxyRecord } from '../../lib/proxy';
import { RotatorSnapshot } from '../../lib/state';

export interface RelayEndpoint {
  host: string;
  port: number;
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function renderStatusPage(snapshot: RotatorSnapshot, endpoint: RelayEndpoint): string | null {
  const proxy = snapshot.rotation.currentProxy;
  if (!proxy) {
    return null;
  }

  const rows: Array<[string, string]> = [
    ['Host', endpoint.host],
    ['Port', String(endpoint.port)],
    ['Current Proxy', `${proxy.host}:${proxy.port} (${proxy.protocol.toUpperCase()})`],
    ['Your IP', proxy.observedIp ?? 'Unknown'],
    ['Country', proxy.country ?? 'Unknown'],
    ['Latency', proxy.latencyMs !== undefined ? `${proxy.latencyMs} ms` : 'N/A'],
    ['Rotation', snapshot.rotation.active ? 'active' : 'inactive'],
    ['Rotation Interval', `${snapshot.rotation.intervalSeconds} seconds`],
  ];

  const body = rows
    .map(([label, value]) => `    <p><strong>${label}:</strong> ${escapeHtml(value)}</p>`)
    .join('\n');

  return [
    '<!DOCTYPE html>',
    '<html>',
    '<head><title>Egress Rotator</title></head>',
    '<body>',
    '    <h1>Active Proxy Endpoint</h1>',
    '    <p>This device is serving as a fixed proxy endpoint</p>',
    body,
    '</body>',
    '</html>',
    '',
  ].join('\n');
}

const RULE = '='.repeat(50);

/**
 * Console lines telling other devices how to point at the egress address
 */
export function renderConnectionInstructions(address: EgressAddress, record: ProxyRecord): string[] {
  return [
    RULE,
    '📱 PROXY SETUP INSTRUCTIONS',
    RULE,
    `Proxy Host: ${address.host}`,
    `Proxy Port: ${address.port}`,
    `Protocol: ${address.scheme.toUpperCase()}`,
    `Country: ${record.country ?? 'Unknown'}`,
    `Latency: ${record.latencyMs !== undefined ? `${record.latencyMs} ms` : 'N/A'}`,
    '',
    '1. Open the Wi-Fi settings of the device and edit the connected network',
    '2. Set the proxy to Manual under the advanced options',
    '3. Enter the host and port above, then save',
    RULE,
  ];
}
