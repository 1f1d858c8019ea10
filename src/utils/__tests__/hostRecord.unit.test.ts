import {
  buildHost,
  clearVpnNetwork,
  copyNetworkState,
  dashboardUrlFor,
  resetPrimaryNetwork,
  resetVpnNetwork,
} from '../hostRecord';

describe('hostRecord helpers', () => {
  it('builds a record with empty defaults', () => {
    const host = buildHost({ id: 'h1', ip_address: '10.0.0.5' });
    expect(host).toMatchObject({
      id: 'h1',
      nickname: '',
      ip_address: '10.0.0.5',
      vpn_ip_address: '',
      status: 'Unreachable',
      status_vpn: '',
      cms_status: 'Unknown',
      cms_status_vpn: '',
      asset_count: 0,
      asset_count_vpn: 0,
      last_checked: null,
      last_checked_vpn: null,
    });
  });

  it('formats dashboard URLs', () => {
    expect(dashboardUrlFor('10.0.0.5', 8080)).toBe('http://10.0.0.5:8080');
    expect(dashboardUrlFor('', 8080)).toBe('');
  });

  it('resets primary network state for a new address', () => {
    const host = buildHost({
      ip_address: '10.0.0.9',
      status: 'Healthy',
      nsm_status: 'NSM Online',
      nsm_version: '2.1.0',
      cms_status: 'Online',
      asset_count: 12,
      last_checked: '2026-01-01T00:00:00.000Z',
      nickname: 'Lobby',
    });

    resetPrimaryNetwork(host, 8080);

    expect(host).toMatchObject({
      nickname: 'Lobby',
      status: 'Unreachable',
      nsm_status: 'NSM Offline',
      nsm_version: 'unknown',
      cms_status: 'Unknown',
      asset_count: 0,
      dashboard_url: 'http://10.0.0.9:8080',
      last_checked: null,
    });
  });

  it('resets and clears the VPN path', () => {
    const host = buildHost({
      vpn_ip_address: '172.16.0.4',
      status_vpn: 'Healthy',
      cms_status_vpn: 'Online',
      asset_count_vpn: 3,
    });

    resetVpnNetwork(host, 8080);
    expect(host).toMatchObject({
      vpn_ip_address: '172.16.0.4',
      status_vpn: 'Unreachable',
      nsm_status_vpn: 'NSM Offline',
      cms_status_vpn: 'Unknown',
      asset_count_vpn: 0,
      dashboard_url_vpn: 'http://172.16.0.4:8080',
    });

    clearVpnNetwork(host);
    expect(host).toMatchObject({
      vpn_ip_address: '',
      status_vpn: '',
      nsm_status_vpn: '',
      cms_status_vpn: '',
      asset_count_vpn: 0,
      dashboard_url_vpn: '',
      last_checked_vpn: null,
    });
  });

  it('copies only probe-owned fields', () => {
    const target = buildHost({ id: 'a', nickname: 'Kept', notes: 'n', hostname: 'screen-a' });
    const source = buildHost({
      id: 'b',
      nickname: 'Ignored',
      hostname: 'other',
      status: 'Stale',
      nsm_version: '1.0.0',
      asset_count: 4,
      status_vpn: 'Healthy',
    });

    copyNetworkState(target, source);

    expect(target).toMatchObject({
      id: 'a',
      nickname: 'Kept',
      notes: 'n',
      hostname: 'screen-a',
      status: 'Stale',
      nsm_version: '1.0.0',
      asset_count: 4,
      status_vpn: 'Healthy',
    });
  });
});
