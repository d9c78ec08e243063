/**
 * LAN address discovery for the advertised relay host
 */

import * as os from 'os';

export type InterfaceMap = NodeJS.Dict<os.NetworkInterfaceInfo[]>;

export const LOOPBACK_ADDRESS = '127.0.0.1';

/**
 * First external IPv4 address, so other devices on the network can reach the relay.
 * Falls back to loopback on a host without one.
 */
export function detectLanAddress(interfaces: InterfaceMap = os.networkInterfaces()): string {
  for (const addresses of Object.values(interfaces)) {
    const external = addresses?.find(info => info.family === 'IPv4' && !info.internal);
    if (external) {
      return external.address;
    }
  }
  return LOOPBACK_ADDRESS;
}
