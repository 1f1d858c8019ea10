import { hostRecordSchema } from '../validators/hostValidator';
import { Host, NetworkProbe, SERVICE_OFFLINE, UNKNOWN_VERSION } from '../types';

/**
 * Fills every missing field of a record with its empty default.
 */
export function buildHost(fields: Partial<Host> = {}): Host {
  return hostRecordSchema.parse(fields);
}

export function dashboardUrlFor(ip: string, port: number): string {
  return ip ? `http://${ip}:${port}` : '';
}

/**
 * Network fields for an address nobody has probed yet.
 */
export function resetPrimaryNetwork(host: Host, port: number): void {
  host.status = 'Unreachable';
  host.nsm_status = SERVICE_OFFLINE;
  host.nsm_version = UNKNOWN_VERSION;
  host.cms_status = 'Unknown';
  host.asset_count = 0;
  host.dashboard_url = dashboardUrlFor(host.ip_address, port);
  host.last_checked = null;
}

export function resetVpnNetwork(host: Host, port: number): void {
  host.status_vpn = 'Unreachable';
  host.nsm_status_vpn = SERVICE_OFFLINE;
  host.nsm_version_vpn = UNKNOWN_VERSION;
  host.cms_status_vpn = 'Unknown';
  host.asset_count_vpn = 0;
  host.dashboard_url_vpn = dashboardUrlFor(host.vpn_ip_address, port);
  host.last_checked_vpn = null;
}

export function clearVpnNetwork(host: Host): void {
  host.vpn_ip_address = '';
  host.status_vpn = '';
  host.nsm_status_vpn = '';
  host.nsm_version_vpn = '';
  host.cms_status_vpn = '';
  host.asset_count_vpn = 0;
  host.dashboard_url_vpn = '';
  host.last_checked_vpn = null;
}

export function applyPrimaryProbe(host: Host, probe: NetworkProbe): void {
  host.status = probe.status;
  host.nsm_status = probe.serviceStatus;
  host.nsm_version = probe.serviceVersion;
  host.cms_status = probe.cmsStatus;
  host.asset_count = probe.assetCount;
  host.dashboard_url = probe.dashboardUrl;
  host.last_checked = probe.checkedAt;
}

export function applyVpnProbe(host: Host, probe: NetworkProbe): void {
  host.status_vpn = probe.status;
  host.nsm_status_vpn = probe.serviceStatus;
  host.nsm_version_vpn = probe.serviceVersion;
  host.cms_status_vpn = probe.cmsStatus;
  host.asset_count_vpn = probe.assetCount;
  host.dashboard_url_vpn = probe.dashboardUrl;
  host.last_checked_vpn = probe.checkedAt;
}

/**
 * Copies the probe-owned fields of `source` onto `target`, leaving operator
 * fields (nickname, notes, hostname) alone.
 */
export function copyNetworkState(target: Host, source: Host): void {
  target.status = source.status;
  target.nsm_status = source.nsm_status;
  target.nsm_version = source.nsm_version;
  target.cms_status = source.cms_status;
  target.asset_count = source.asset_count;
  target.dashboard_url = source.dashboard_url;
  target.last_checked = source.last_checked;
  target.status_vpn = source.status_vpn;
  target.nsm_status_vpn = source.nsm_status_vpn;
  target.nsm_version_vpn = source.nsm_version_vpn;
  target.cms_status_vpn = source.cms_status_vpn;
  target.asset_count_vpn = source.asset_count_vpn;
  target.dashboard_url_vpn = source.dashboard_url_vpn;
  target.last_checked_vpn = source.last_checked_vpn;
}
