import axios from 'axios';
import { config } from '../config';
import { logger } from '../utils/logger';
import { APP_VERSION, compareVersions } from '../utils/appVersion';
import { Dialer, tcpDial } from '../utils/tcpDial';
import {
  applyPrimaryProbe,
  applyVpnProbe,
  clearVpnNetwork,
  dashboardUrlFor,
} from '../utils/hostRecord';
import {
  CmsStatus,
  Host,
  NetworkProbe,
  SERVICE_OFFLINE,
  SERVICE_ONLINE,
  UNKNOWN_VERSION,
} from '../types';

export interface HealthProberOptions {
  managementPort: number;
  cmsPort: number;
  timeoutMs: number;
  /** Peers reporting an older version are classified Stale */
  localVersion: string;
}

export interface HealthProberDeps {
  dial: Dialer;
}

const defaultOptions: HealthProberOptions = {
  managementPort: config.network.managementPort,
  cmsPort: config.network.cmsPort,
  timeoutMs: config.network.probeTimeoutMs,
  localVersion: APP_VERSION,
};

/**
 * Layered health check of a host: TCP reachability of the management port,
 * then the CMS endpoint, the service version and the health endpoint.
 */
class HealthProber {
  private readonly options: HealthProberOptions;

  constructor(
    options: Partial<HealthProberOptions> = {},
    private readonly deps: HealthProberDeps = { dial: tcpDial }
  ) {
    this.options = { ...defaultOptions, ...options };
  }

  private url(ip: string, port: number, path: string): string {
    return port === 80 ? `http://${ip}${path}` : `http://${ip}:${port}${path}`;
  }

  private async checkCms(
    ip: string,
    signal?: AbortSignal
  ): Promise<{ cmsStatus: CmsStatus; assetCount: number }> {
    try {
      const response = await axios.get<unknown>(this.url(ip, this.options.cmsPort, '/api/v1/assets'), {
        timeout: this.options.timeoutMs,
        signal,
        validateStatus: () => true,
      });
      if (response.status !== 200) {
        return { cmsStatus: 'Offline', assetCount: 0 };
      }
      return {
        cmsStatus: 'Online',
        assetCount: Array.isArray(response.data) ? response.data.length : 0,
      };
    } catch (error) {
      logger.debug(`CMS check failed for ${ip}`, {
        error: error instanceof Error ? error.message : String(error),
      });
      return { cmsStatus: 'Offline', assetCount: 0 };
    }
  }

  private async fetchVersion(ip: string, signal?: AbortSignal): Promise<string | null> {
    try {
      const response = await axios.get<unknown>(
        this.url(ip, this.options.managementPort, '/api/version'),
        { timeout: this.options.timeoutMs, signal, validateStatus: () => true }
      );
      const data = response.data;
      if (
        response.status === 200 &&
        data &&
        typeof data === 'object' &&
        'version' in data &&
        typeof data.version === 'string' &&
        data.version.length > 0
      ) {
        return data.version;
      }
      return null;
    } catch {
      return null;
    }
  }

  private async healthEndpointOk(ip: string, signal?: AbortSignal): Promise<boolean> {
    try {
      const response = await axios.get(this.url(ip, this.options.managementPort, '/api/health'), {
        timeout: this.options.timeoutMs,
        signal,
        validateStatus: () => true,
      });
      return response.status === 200;
    } catch {
      return false;
    }
  }

  /**
   * Probe one network path of a host.
   */
  async probeAddress(ip: string, signal?: AbortSignal): Promise<NetworkProbe> {
    const { managementPort, timeoutMs, localVersion } = this.options;
    const offline: Omit<NetworkProbe, 'status'> = {
      serviceStatus: SERVICE_OFFLINE,
      serviceVersion: UNKNOWN_VERSION,
      cmsStatus: 'Unknown',
      assetCount: 0,
      dashboardUrl: dashboardUrlFor(ip, managementPort),
      checkedAt: new Date().toISOString(),
    };

    const reachability = await this.deps.dial(ip, managementPort, timeoutMs, signal);
    if (reachability === 'unreachable') {
      return { ...offline, status: 'Unreachable' };
    }
    if (reachability === 'refused') {
      return { ...offline, status: 'Connection Refused' };
    }

    const cms = await this.checkCms(ip, signal);
    const version = await this.fetchVersion(ip, signal);
    if (!version) {
      return { ...offline, ...cms, status: 'Unhealthy' };
    }

    if (compareVersions(version, localVersion) < 0) {
      return { ...offline, ...cms, serviceVersion: version, serviceStatus: SERVICE_ONLINE, status: 'Stale' };
    }

    const healthy = await this.healthEndpointOk(ip, signal);
    return {
      ...offline,
      ...cms,
      serviceVersion: version,
      serviceStatus: healthy ? SERVICE_ONLINE : SERVICE_OFFLINE,
      status: healthy ? 'Healthy' : 'Unhealthy',
    };
  }

  /**
   * Probe every network path of `host` and return an updated copy. Only the
   * probe-owned fields change.
   */
  async probeHost(host: Host, signal?: AbortSignal): Promise<Host> {
    const updated = { ...host };

    const [primary, vpn] = await Promise.all([
      updated.ip_address ? this.probeAddress(updated.ip_address, signal) : Promise.resolve(null),
      updated.vpn_ip_address ? this.probeAddress(updated.vpn_ip_address, signal) : Promise.resolve(null),
    ]);

    if (primary) {
      applyPrimaryProbe(updated, primary);
    } else {
      updated.status = 'Unreachable';
      updated.last_checked = new Date().toISOString();
    }

    if (vpn) {
      applyVpnProbe(updated, vpn);
    } else {
      clearVpnNetwork(updated);
    }

    logger.debug(`Probed ${updated.ip_address || updated.id}: ${updated.status}`, {
      vpnStatus: updated.status_vpn || undefined,
    });
    return updated;
  }
}

export default HealthProber;
