import os from 'os';
import { setMaxListeners } from 'events';
import { config } from '../config';
import { logger } from '../utils/logger';
import { InvalidAddressError } from '../utils/errors';
import { AsyncQueue, runWithConcurrency } from '../utils/asyncQueue';
import { Dialer, tcpDial } from '../utils/tcpDial';
import {
  Subnet,
  formatSubnet,
  hostAddresses,
  ipv4ToInt,
  isLinkLocal,
  isValidIPv4,
  subnetOf,
  subnetSize,
} from '../utils/ipv4';
import { DiscoveryCandidate } from '../types';

/**
 * Subnets wider than this are narrowed to the local /24
 */
const MAX_SUBNET_ADDRESSES = 512;

export interface ScanTarget {
  subnet: Subnet;
  /** The scanning host's own address, never dialed */
  self: string;
}

export interface ScanOptions {
  port: number;
  /** Scan only the /24 around this address */
  overrideAddress?: string;
  signal?: AbortSignal;
  concurrency?: number;
  dialTimeoutMs?: number;
}

export interface DiscoveryScannerDeps {
  dial: Dialer;
  interfaces: () => NodeJS.Dict<os.NetworkInterfaceInfo[]>;
}

const defaultDeps: DiscoveryScannerDeps = {
  dial: tcpDial,
  interfaces: () => os.networkInterfaces(),
};

function prefixFromNetmask(netmask: string): number {
  const value = ipv4ToInt(netmask);
  let prefix = 0;
  for (let bit = 31; bit >= 0; bit--) {
    if (Math.floor(value / 2 ** bit) % 2 === 1) {
      prefix++;
    } else {
      break;
    }
  }
  return prefix;
}

function prefixOf(info: os.NetworkInterfaceInfo): number {
  const fromCidr = info.cidr ? Number(info.cidr.split('/')[1]) : NaN;
  if (Number.isInteger(fromCidr) && fromCidr >= 0 && fromCidr <= 32) {
    return fromCidr;
  }
  return prefixFromNetmask(info.netmask);
}

/**
 * Subnets a scan covers: the /24 around `overrideAddress`, or the subnet of
 * every non-internal IPv4 interface address. Oversized subnets are clamped to
 * the /24 holding the interface address.
 */
export function deriveScanTargets(
  interfaces: NodeJS.Dict<os.NetworkInterfaceInfo[]>,
  overrideAddress?: string
): ScanTarget[] {
  if (overrideAddress) {
    if (!isValidIPv4(overrideAddress)) {
      throw new InvalidAddressError(overrideAddress, 'interface_ip');
    }
    return [{ subnet: subnetOf(overrideAddress, 24), self: overrideAddress }];
  }

  const targets = new Map<string, ScanTarget>();
  for (const [name, entries] of Object.entries(interfaces)) {
    for (const info of entries ?? []) {
      if (info.family !== 'IPv4' || info.internal || isLinkLocal(info.address)) {
        continue;
      }

      let subnet = subnetOf(info.address, prefixOf(info));
      if (subnetSize(subnet) > MAX_SUBNET_ADDRESSES) {
        logger.info(`Clamping ${formatSubnet(subnet)} on ${name} to the local /24`);
        subnet = subnetOf(info.address, 24);
      }

      const key = formatSubnet(subnet);
      if (!targets.has(key)) {
        targets.set(key, { subnet, self: info.address });
      }
    }
  }

  return Array.from(targets.values());
}

/**
 * Candidate addresses of all targets, interleaved so every subnet makes
 * progress at the same pace.
 */
export function* candidateAddresses(targets: ScanTarget[]): Generator<string> {
  const iterators = targets.map((target) => ({ target, addresses: hostAddresses(target.subnet) }));
  while (iterators.length > 0) {
    for (let index = 0; index < iterators.length; ) {
      const { target, addresses } = iterators[index];
      const next = addresses.next();
      if (next.done) {
        iterators.splice(index, 1);
        continue;
      }
      index++;
      if (next.value !== target.self) {
        yield next.value;
      }
    }
  }
}

/**
 * Discovery Scanner
 * Dials every candidate address of the local subnets and streams the ones
 * accepting connections on the target port
 */
class DiscoveryScanner {
  constructor(private readonly deps: DiscoveryScannerDeps = defaultDeps) {}

  /**
   * Finite, single-use sequence of responsive addresses. Ends when every
   * address was tried or `signal` aborts; breaking out of the loop stops
   * the scan.
   */
  async *scan(options: ScanOptions): AsyncGenerator<DiscoveryCandidate> {
    const targets = deriveScanTargets(this.deps.interfaces(), options.overrideAddress);
    const concurrency = options.concurrency ?? config.network.scanConcurrency;
    const dialTimeoutMs = options.dialTimeoutMs ?? config.network.scanDialTimeoutMs;

    const controller = new AbortController();
    // Every in-flight dial listens on this signal
    setMaxListeners(concurrency + 1, controller.signal);
    const forwardAbort = () => controller.abort();
    if (options.signal?.aborted) {
      controller.abort();
    }
    options.signal?.addEventListener('abort', forwardAbort, { once: true });

    const results = new AsyncQueue<DiscoveryCandidate>();
    const startedAt = Date.now();
    let dialed = 0;
    let found = 0;

    logger.info('Starting discovery scan', {
      port: options.port,
      subnets: targets.map((target) => formatSubnet(target.subnet)),
      concurrency,
    });

    const work = runWithConcurrency(
      candidateAddresses(targets),
      concurrency,
      async (ip) => {
        dialed++;
        const outcome = await this.deps.dial(ip, options.port, dialTimeoutMs, controller.signal);
        if (outcome === 'open' && !controller.signal.aborted) {
          found++;
          results.push({ ip, port: options.port });
        }
      },
      controller.signal
    )
      .catch((error: unknown) => {
        logger.error('Discovery scan failed', {
          error: error instanceof Error ? error.message : String(error),
        });
      })
      .finally(() => {
        results.close();
      });

    try {
      yield* results;
    } finally {
      controller.abort();
      options.signal?.removeEventListener('abort', forwardAbort);
      await work;
      logger.info('Discovery scan finished', {
        dialed,
        found,
        durationMs: Date.now() - startedAt,
        cancelled: options.signal?.aborted ?? false,
      });
    }
  }
}

export default DiscoveryScanner;
