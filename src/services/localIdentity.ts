import os from 'os';
import { randomUUID } from 'crypto';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { config } from '../config';
import { logger } from '../utils/logger';
import { APP_VERSION } from '../utils/appVersion';
import { buildHost, dashboardUrlFor } from '../utils/hostRecord';
import { isLinkLocal, isValidIPv4 } from '../utils/ipv4';
import { Host, SERVICE_ONLINE } from '../types';

// Virtual adapter address some hypervisors assign to every guest
const IGNORED_ADDRESSES = new Set(['10.255.255.254']);

export interface LocalIdentityOptions {
  identityFile: string;
  hostIpOverride: string;
  managementPort: number;
  version: string;
}

export interface LocalIdentityDeps {
  interfaces: () => NodeJS.Dict<os.NetworkInterfaceInfo[]>;
  hostname: () => string;
}

const defaultDeps: LocalIdentityDeps = {
  interfaces: () => os.networkInterfaces(),
  hostname: () => os.hostname(),
};

/**
 * The local node: its persistent id and the record it advertises to peers.
 */
class LocalIdentity {
  private readonly options: LocalIdentityOptions;
  private cachedId: string | null = null;

  constructor(
    options: Partial<LocalIdentityOptions> = {},
    private readonly deps: LocalIdentityDeps = defaultDeps
  ) {
    this.options = {
      identityFile: config.identity.file,
      hostIpOverride: config.identity.hostIp,
      managementPort: config.server.port,
      version: APP_VERSION,
      ...options,
    };
  }

  /**
   * Node id, generated and saved on first use.
   */
  getId(): string {
    if (this.cachedId) {
      return this.cachedId;
    }

    const file = this.options.identityFile;
    if (existsSync(file)) {
      const stored = readFileSync(file, 'utf-8').trim();
      if (stored.length > 0) {
        this.cachedId = stored;
        return stored;
      }
    }

    const id = randomUUID();
    mkdirSync(dirname(file), { recursive: true });
    writeFileSync(file, `${id}\n`, 'utf-8');
    logger.info('Generated node identity', { id, file });
    this.cachedId = id;
    return id;
  }

  getHostname(): string {
    try {
      return this.deps.hostname() || 'unknown';
    } catch {
      return 'unknown';
    }
  }

  /**
   * Address advertised to peers: the configured override, else the first
   * external IPv4 interface address.
   */
  primaryAddress(): string {
    const override = this.options.hostIpOverride.trim();
    if (override) {
      if (isValidIPv4(override)) {
        return override;
      }
      logger.warn(`Ignoring invalid HOST_IP override: ${override}`);
    }

    for (const entries of Object.values(this.deps.interfaces())) {
      for (const info of entries ?? []) {
        if (
          info.family === 'IPv4' &&
          !info.internal &&
          !isLinkLocal(info.address) &&
          !IGNORED_ADDRESSES.has(info.address)
        ) {
          return info.address;
        }
      }
    }

    return '127.0.0.1';
  }

  /**
   * Fresh self-description of this running node.
   */
  describe(): Host {
    const hostname = this.getHostname();
    const ip = this.primaryAddress();
    return buildHost({
      id: this.getId(),
      nickname: hostname,
      hostname,
      ip_address: ip,
      status: 'Healthy',
      nsm_status: SERVICE_ONLINE,
      nsm_version: this.options.version,
      cms_status: 'Unknown',
      dashboard_url: dashboardUrlFor(ip, this.options.managementPort),
      last_checked: new Date().toISOString(),
    });
  }
}

export default LocalIdentity;
