/**
 * Type definitions for the fleet roster
 */

export const HOST_STATUSES = [
  'Healthy',
  'Unhealthy',
  'Unreachable',
  'Connection Refused',
  'Stale',
] as const;

export type HostStatus = (typeof HOST_STATUSES)[number];

export const CMS_STATUSES = ['Online', 'Offline', 'Unknown'] as const;

export type CmsStatus = (typeof CMS_STATUSES)[number];

export const SERVICE_ONLINE = 'NSM Online';
export const SERVICE_OFFLINE = 'NSM Offline';
export const UNKNOWN_VERSION = 'unknown';
export const DISCOVERED_NICKNAME = 'Discovered Host';

/**
 * One roster entry. Field names are the peer wire format.
 */
export interface Host {
  id: string;
  nickname: string;
  ip_address: string;
  vpn_ip_address: string;
  hostname: string;
  notes: string;
  status: HostStatus;
  status_vpn: HostStatus | '';
  nsm_status: string;
  nsm_status_vpn: string;
  nsm_version: string;
  nsm_version_vpn: string;
  anthias_version: string;
  anthias_version_vpn: string;
  anthias_status: string;
  anthias_status_vpn: string;
  cms_status: CmsStatus;
  cms_status_vpn: CmsStatus | '';
  asset_count: number;
  asset_count_vpn: number;
  dashboard_url: string;
  dashboard_url_vpn: string;
  last_checked: string | null;
  last_checked_vpn: string | null;
}

/**
 * Column order of the hosts table and of serialized records.
 */
export const HOST_FIELDS = [
  'id',
  'nickname',
  'ip_address',
  'vpn_ip_address',
  'hostname',
  'notes',
  'status',
  'status_vpn',
  'nsm_status',
  'nsm_status_vpn',
  'nsm_version',
  'nsm_version_vpn',
  'anthias_version',
  'anthias_version_vpn',
  'anthias_status',
  'anthias_status_vpn',
  'cms_status',
  'cms_status_vpn',
  'asset_count',
  'asset_count_vpn',
  'dashboard_url',
  'dashboard_url_vpn',
  'last_checked',
  'last_checked_vpn',
] as const satisfies ReadonlyArray<keyof Host>;

/**
 * Outcome of probing one network path of a host
 */
export interface NetworkProbe {
  status: HostStatus;
  serviceStatus: string;
  serviceVersion: string;
  cmsStatus: CmsStatus;
  assetCount: number;
  dashboardUrl: string;
  checkedAt: string;
}

export interface BackupInfo {
  filename: string;
  path: string;
  timestamp: number;
  size: number;
}

export interface DiscoveryCandidate {
  ip: string;
  port: number;
}

export type RosterChangeReason =
  | 'add'
  | 'update'
  | 'delete'
  | 'upsert'
  | 'replace'
  | 'import';

export interface RosterChange {
  reason: RosterChangeReason;
  at: string;
}

export type PushOutcome =
  | { ip: string; status: 'pushed' }
  | { ip: string; status: 'failed'; error: string };

export interface ReceiveResult {
  mode: 'merge' | 'replace';
  received: number;
  applied: number;
  failed: number;
  backupPath?: string;
}

export type DiscoveryResult =
  | {
      success: true;
      candidates: number;
      registered: number;
      durationMs: number;
    }
  | {
      success: false;
      error: string;
      code: 'SCAN_IN_PROGRESS' | 'SCAN_FAILED';
    };

export interface VersionInfo {
  version: string;
  status: string;
  hostname: string;
  id: string;
}
