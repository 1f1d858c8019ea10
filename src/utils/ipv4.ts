import { isIPv4 } from 'net';

export interface Subnet {
  /** Network address as an unsigned 32-bit integer */
  network: number;
  prefix: number;
}

export function isValidIPv4(value: string): boolean {
  return isIPv4(value);
}

export function ipv4ToInt(ip: string): number {
  if (!isIPv4(ip)) {
    throw new Error(`Not an IPv4 address: ${ip}`);
  }
  return ip.split('.').reduce((acc, octet) => acc * 256 + Number(octet), 0);
}

export function intToIPv4(value: number): string {
  return [24, 16, 8, 0].map((shift) => Math.floor(value / 2 ** shift) % 256).join('.');
}

function hostBits(prefix: number): number {
  return 2 ** (32 - prefix);
}

export function subnetOf(ip: string, prefix: number): Subnet {
  const size = hostBits(prefix);
  return { network: Math.floor(ipv4ToInt(ip) / size) * size, prefix };
}

export function subnetSize(subnet: Subnet): number {
  return hostBits(subnet.prefix);
}

export function broadcastOf(subnet: Subnet): number {
  return subnet.network + subnetSize(subnet) - 1;
}

export function formatSubnet(subnet: Subnet): string {
  return `${intToIPv4(subnet.network)}/${subnet.prefix}`;
}

/**
 * Usable host addresses of a subnet, network and broadcast excluded.
 * /31 and /32 have none.
 */
export function* hostAddresses(subnet: Subnet): Generator<string> {
  const last = broadcastOf(subnet);
  for (let value = subnet.network + 1; value < last; value++) {
    yield intToIPv4(value);
  }
}

export function isLoopback(ip: string): boolean {
  return ip.startsWith('127.');
}

export function isLinkLocal(ip: string): boolean {
  return ip.startsWith('169.254.');
}
