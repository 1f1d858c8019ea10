import { randomUUID } from 'crypto';
import { config } from '../config';
import { logger } from '../utils/logger';
import { runWithConcurrency } from '../utils/asyncQueue';
import { APP_VERSION } from '../utils/appVersion';
import {
  HostNotFoundError,
  InvalidAddressError,
  InvalidHostnameError,
  errorMessage,
} from '../utils/errors';
import { buildHost, copyNetworkState, dashboardUrlFor } from '../utils/hostRecord';
import { isLoopback, isValidIPv4 } from '../utils/ipv4';
import HostStore from './hostStore';
import HealthProber from './healthProber';
import DiscoveryScanner from './discoveryScanner';
import PeerClient, { PeerIdentity } from './peerClient';
import LocalIdentity from './localIdentity';
import {
  DISCOVERED_NICKNAME,
  DiscoveryCandidate,
  DiscoveryResult,
  Host,
  PushOutcome,
  ReceiveResult,
  SERVICE_OFFLINE,
  UNKNOWN_VERSION,
  VersionInfo,
} from '../types';

export interface FleetSyncDeps {
  store: HostStore;
  prober: Pick<HealthProber, 'probeHost'>;
  scanner: Pick<DiscoveryScanner, 'scan'>;
  peers: Pick<PeerClient, 'fetchSelfDescription' | 'fetchIdentity' | 'sendRoster'>;
  identity: Pick<LocalIdentity, 'getId' | 'getHostname' | 'primaryAddress' | 'describe'>;
}

export interface FleetSyncOptions {
  managementPort: number;
  scanBudgetMs: number;
  /** Retention for backups taken before a roster replacement */
  maxBackups: number;
  probeConcurrency: number;
  sweepEnabled: boolean;
  sweepIntervalMs: number;
  selfRegisterIntervalMs: number;
}

export interface SetPrimaryResult {
  primary: Host;
  removed: string[];
}

const RESERVED_HOSTNAMES = new Set(['', 'localhost', 'unknown']);

function isMeaningfulHostname(hostname: string): boolean {
  return !RESERVED_HOSTNAMES.has(hostname.trim().toLowerCase());
}

/**
 * Fleet Synchronization Coordinator
 * Gossip push/receive between peers, discovery-driven registration, probe
 * sweeps and the local node's own roster entry.
 */
class FleetSyncCoordinator {
  private readonly options: FleetSyncOptions;
  private scanInProgress = false;
  private sweepInProgress = false;
  private lastScanTime: Date | null = null;
  private sweepInterval?: NodeJS.Timeout;
  private selfRegisterInterval?: NodeJS.Timeout;

  constructor(
    private readonly deps: FleetSyncDeps,
    options: Partial<FleetSyncOptions> = {}
  ) {
    this.options = {
      managementPort: config.network.managementPort,
      scanBudgetMs: config.network.scanBudgetMs,
      maxBackups: config.backups.maxBackups,
      probeConcurrency: 10,
      sweepEnabled: config.sync.sweepEnabled,
      sweepIntervalMs: config.sync.sweepIntervalMs,
      selfRegisterIntervalMs: config.sync.selfRegisterIntervalMs,
      ...options,
    };
  }

  isScanInProgress(): boolean {
    return this.scanInProgress;
  }

  getLastScanTime(): string | null {
    return this.lastScanTime ? this.lastScanTime.toISOString() : null;
  }

  private async findById(id: string): Promise<Host | null> {
    try {
      return await this.deps.store.getById(id);
    } catch (error) {
      if (error instanceof HostNotFoundError) {
        return null;
      }
      throw error;
    }
  }

  private async findByIp(ip: string): Promise<Host | null> {
    try {
      return await this.deps.store.getByIp(ip);
    } catch (error) {
      if (error instanceof HostNotFoundError) {
        return null;
      }
      throw error;
    }
  }

  /**
   * The stored record of this node, or its live metadata before the first
   * registration.
   */
  async describeSelf(): Promise<Host> {
    return (await this.findById(this.deps.identity.getId())) ?? this.deps.identity.describe();
  }

  versionInfo(): VersionInfo {
    return {
      version: APP_VERSION,
      status: 'ok',
      hostname: this.deps.identity.getHostname(),
      id: this.deps.identity.getId(),
    };
  }

  /**
   * Write this node's own record. Operator-set nickname, notes and address
   * survive; a fresh identity whose hostname is already listed is not added.
   */
  async registerSelf(): Promise<Host | null> {
    const metadata = this.deps.identity.describe();
    const existing = await this.findById(metadata.id);

    if (existing) {
      if (existing.nickname) {
        metadata.nickname = existing.nickname;
      }
      if (existing.notes) {
        metadata.notes = existing.notes;
      }
      if (existing.ip_address && existing.ip_address !== metadata.ip_address) {
        metadata.ip_address = existing.ip_address;
        metadata.dashboard_url = existing.dashboard_url;
      }
      metadata.vpn_ip_address = existing.vpn_ip_address;
      return this.deps.store.upsert(metadata);
    }

    const roster = await this.deps.store.getAll();
    if (
      isMeaningfulHostname(metadata.hostname) &&
      roster.some((host) => host.hostname === metadata.hostname)
    ) {
      logger.debug(`Skipping self-registration: hostname ${metadata.hostname} already listed`);
      return null;
    }

    const saved = await this.deps.store.upsert(metadata);
    logger.info('Added local host to roster', { id: saved.id, ip: saved.ip_address });
    return saved;
  }

  /**
   * Addresses a push goes to: the given list, or every listed host other
   * than loopback and this node.
   */
  async resolvePushTargets(targets?: string[]): Promise<string[]> {
    if (targets && targets.length > 0) {
      for (const target of targets) {
        if (!isValidIPv4(target)) {
          throw new InvalidAddressError(target, 'targets');
        }
      }
      return Array.from(new Set(targets));
    }

    const selfIp = this.deps.identity.primaryAddress();
    const roster = await this.deps.store.getAll();
    const resolved = roster
      .map((host) => host.ip_address)
      .filter((ip) => ip.length > 0 && !isLoopback(ip) && ip !== selfIp);
    return Array.from(new Set(resolved));
  }

  /**
   * Send the full roster to every target in replace mode. Each delivery
   * fails on its own; the returned list reports every target.
   */
  async pushToFleet(targets?: string[]): Promise<PushOutcome[]> {
    const resolved = await this.resolvePushTargets(targets);
    const roster = await this.deps.store.getAll();

    return Promise.all(
      resolved.map(async (ip): Promise<PushOutcome> => {
        try {
          await this.deps.peers.sendRoster(ip, this.options.managementPort, roster, { merge: false });
          logger.info(`Pushed roster to ${ip}`, { hosts: roster.length });
          return { ip, status: 'pushed' };
        } catch (error) {
          logger.warn(`Failed to push roster to ${ip}`, { error: errorMessage(error) });
          return { ip, status: 'failed', error: errorMessage(error) };
        }
      })
    );
  }

  /**
   * Resolve targets, then deliver in the background. Resolves with the
   * target list as soon as deliveries have started.
   */
  async launchPush(targets?: string[]): Promise<string[]> {
    const resolved = await this.resolvePushTargets(targets);
    void this.pushToFleet(resolved).then(
      (outcomes) => {
        const failed = outcomes.filter((outcome) => outcome.status === 'failed').length;
        logger.info('Fleet push finished', { targets: outcomes.length, failed });
      },
      (error: unknown) => {
        logger.error('Fleet push failed', { error: errorMessage(error) });
      }
    );
    return resolved;
  }

  /**
   * Apply a roster received from a peer. Merge upserts record by record;
   * replace backs up the current roster and swaps in the received one.
   */
  async receive(hosts: Host[], options: { merge: boolean }): Promise<ReceiveResult> {
    if (options.merge) {
      let applied = 0;
      let failed = 0;
      for (const host of hosts) {
        try {
          await this.deps.store.upsert(host);
          applied++;
        } catch (error) {
          failed++;
          logger.warn('Failed to merge received host', {
            id: host.id,
            ip: host.ip_address,
            error: errorMessage(error),
          });
        }
      }
      logger.info('Merged received roster', { received: hosts.length, applied, failed });
      return { mode: 'merge', received: hosts.length, applied, failed };
    }

    const backupPath = await this.deps.store.backupCurrent(this.options.maxBackups);
    const installed = await this.deps.store.replaceAll(hosts);
    logger.info('Replaced roster with received roster', { hosts: installed.length });
    return {
      mode: 'replace',
      received: hosts.length,
      applied: installed.length,
      failed: 0,
      ...(backupPath ? { backupPath } : {}),
    };
  }

  /**
   * Probe a host in the background and store the outcome, unless the record
   * moved or disappeared meanwhile.
   */
  launchProbe(host: Host): void {
    void this.deps.prober
      .probeHost(host)
      .then((probed) => this.applyProbe(probed))
      .catch((error: unknown) => {
        logger.warn(`Background probe of ${host.ip_address || host.id} failed`, {
          error: errorMessage(error),
        });
      });
  }

  private async applyProbe(probed: Host): Promise<Host | null> {
    const current = await this.findById(probed.id);
    if (
      !current ||
      current.ip_address !== probed.ip_address ||
      current.vpn_ip_address !== probed.vpn_ip_address
    ) {
      return null;
    }

    const merged = { ...current };
    copyNetworkState(merged, probed);
    return this.deps.store.upsert(merged);
  }

  /**
   * Probe one listed host and store the outcome.
   */
  async probeOne(ip: string): Promise<Host> {
    const current = await this.deps.store.getByIp(ip);
    const probed = await this.deps.prober.probeHost(current);
    return this.deps.store.update(ip, (host) => copyNetworkState(host, probed));
  }

  /**
   * Probe every listed host and persist the outcomes with one replacement.
   * A failed probe leaves that host as it was.
   */
  async probeAll(): Promise<Host[]> {
    const roster = await this.deps.store.getAll();
    const probed = new Map<string, Host>();

    await runWithConcurrency(roster.values(), this.options.probeConcurrency, async (host) => {
      try {
        probed.set(host.id, await this.deps.prober.probeHost(host));
      } catch (error) {
        logger.warn(`Probe of ${host.ip_address || host.id} failed`, { error: errorMessage(error) });
      }
    });

    // Fold results into the roster as it is now; edits made during the sweep are kept
    const latest = await this.deps.store.getAll();
    const merged = latest.map((host) => {
      const result = probed.get(host.id);
      if (
        !result ||
        result.ip_address !== host.ip_address ||
        result.vpn_ip_address !== host.vpn_ip_address
      ) {
        return host;
      }
      const updated = { ...host };
      copyNetworkState(updated, result);
      return updated;
    });

    const saved = await this.deps.store.replaceAll(merged);
    logger.info('Probe sweep finished', { hosts: saved.length, probed: probed.size });
    return saved;
  }

  /**
   * Start a sweep in the background. False when one is already running.
   */
  launchSweep(): boolean {
    if (this.sweepInProgress) {
      logger.debug('Probe sweep already in progress, skipping...');
      return false;
    }

    this.sweepInProgress = true;
    void this.probeAll()
      .catch((error: unknown) => {
        logger.error('Probe sweep failed', { error: errorMessage(error) });
      })
      .finally(() => {
        this.sweepInProgress = false;
      });
    return true;
  }

  /**
   * Turn a responsive address into a roster entry. Returns whether the
   * roster changed.
   */
  async resolveCandidate(candidate: DiscoveryCandidate): Promise<boolean> {
    const { ip, port } = candidate;
    const localId = this.deps.identity.getId();
    const dashboardUrl = dashboardUrlFor(ip, port);

    let described: Host | null = null;
    try {
      described = await this.deps.peers.fetchSelfDescription(ip, port);
    } catch (error) {
      logger.debug(`No self-description from ${ip}`, { error: errorMessage(error) });
    }

    if (described) {
      if (described.id === localId) {
        return false;
      }

      const saved = await this.deps.store.upsert({
        ...described,
        ip_address: ip,
        dashboard_url: dashboardUrl,
        status: 'Unreachable',
        nsm_status: SERVICE_OFFLINE,
        cms_status: 'Unknown',
        asset_count: 0,
      });
      logger.info(`Registered discovered peer ${ip}`, { id: saved.id });
      this.launchProbe(saved);
      this.launchMutualPush(ip, port);
      return true;
    }

    let identity: PeerIdentity | null = null;
    try {
      identity = await this.deps.peers.fetchIdentity(ip, port);
    } catch (error) {
      logger.debug(`No identification from ${ip}`, { error: errorMessage(error) });
    }

    const peerId = identity?.id ?? '';
    if (peerId === localId) {
      return false;
    }

    if (peerId) {
      const known = await this.findById(peerId);
      if (known) {
        const saved = await this.deps.store.upsert({
          ...known,
          ip_address: ip,
          dashboard_url: dashboardUrl,
          status: 'Unreachable',
        });
        logger.info(`Updated address of known peer ${peerId} to ${ip}`);
        this.launchProbe(saved);
        return true;
      }
    }

    if (await this.findByIp(ip)) {
      logger.debug(`Keeping existing record at ${ip}`);
      return false;
    }

    const saved = await this.deps.store.upsert(
      buildHost({
        id: peerId || randomUUID(),
        nickname: DISCOVERED_NICKNAME,
        hostname: identity?.hostname ?? '',
        ip_address: ip,
        dashboard_url: dashboardUrl,
        status: 'Unreachable',
        nsm_status: SERVICE_OFFLINE,
        nsm_version: UNKNOWN_VERSION,
        cms_status: 'Unknown',
      })
    );
    logger.info(`Added placeholder for discovered host ${ip}`, { id: saved.id });
    this.launchProbe(saved);
    return true;
  }

  /**
   * Announce this node to a peer that just announced itself to us.
   */
  private launchMutualPush(ip: string, port: number): void {
    void this.describeSelf()
      .then((self) => this.deps.peers.sendRoster(ip, port, [self], { merge: true }))
      .then(
        () => {
          logger.debug(`Announced local host to ${ip}`);
        },
        (error: unknown) => {
          logger.warn(`Failed to announce local host to ${ip}`, { error: errorMessage(error) });
        }
      );
  }

  /**
   * One discovery pass: scan, resolve every responsive address as it is
   * found, then refresh the local node's entry.
   */
  async runDiscovery(overrideAddress?: string): Promise<DiscoveryResult> {
    if (this.scanInProgress) {
      logger.info('Scan already in progress, skipping...');
      return {
        success: false,
        error: 'Scan already in progress',
        code: 'SCAN_IN_PROGRESS',
      };
    }

    this.scanInProgress = true;
    const startedAt = Date.now();

    try {
      const signal = AbortSignal.timeout(this.options.scanBudgetMs);
      const resolutions: Array<Promise<boolean>> = [];
      let candidates = 0;

      for await (const candidate of this.deps.scanner.scan({
        port: this.options.managementPort,
        overrideAddress,
        signal,
      })) {
        candidates++;
        resolutions.push(
          this.resolveCandidate(candidate).catch((error: unknown) => {
            logger.warn(`Failed to register discovered host ${candidate.ip}`, {
              error: errorMessage(error),
            });
            return false;
          })
        );
      }

      const registered = (await Promise.all(resolutions)).filter(Boolean).length;

      const self = await this.registerSelf();
      if (self) {
        this.launchProbe(self);
      }

      this.lastScanTime = new Date();
      const durationMs = Date.now() - startedAt;
      logger.info('Discovery finished', { candidates, registered, durationMs });
      return { success: true, candidates, registered, durationMs };
    } catch (error) {
      logger.error('Discovery failed', { error: errorMessage(error) });
      return {
        success: false,
        error: errorMessage(error),
        code: 'SCAN_FAILED',
      };
    } finally {
      this.scanInProgress = false;
    }
  }

  /**
   * Validate the override and start a discovery pass in the background.
   * False when a scan is already running.
   */
  launchDiscovery(overrideAddress?: string): boolean {
    if (overrideAddress !== undefined && !isValidIPv4(overrideAddress)) {
      throw new InvalidAddressError(overrideAddress, 'interface_ip');
    }
    if (this.scanInProgress) {
      return false;
    }

    void this.runDiscovery(overrideAddress).then((result) => {
      if (!result.success && result.code !== 'SCAN_IN_PROGRESS') {
        logger.warn('Background discovery failed', { error: result.error });
      }
    });
    return true;
  }

  /**
   * Keep `id` and delete every other record sharing its hostname.
   */
  async setPrimary(id: string): Promise<SetPrimaryResult> {
    const primary = await this.deps.store.getById(id);
    if (!isMeaningfulHostname(primary.hostname)) {
      throw new InvalidHostnameError(primary.hostname);
    }

    const roster = await this.deps.store.getAll();
    const duplicates = roster.filter((host) => host.id !== id && host.hostname === primary.hostname);
    for (const duplicate of duplicates) {
      await this.deps.store.deleteById(duplicate.id);
    }

    logger.info(`Set ${id} as primary for ${primary.hostname}`, { removed: duplicates.length });
    return { primary, removed: duplicates.map((host) => host.id) };
  }

  private launchSelfRegistration(): void {
    void this.registerSelf().catch((error: unknown) => {
      logger.warn('Failed to register local host', { error: errorMessage(error) });
    });
  }

  start(): void {
    this.launchSelfRegistration();
    this.selfRegisterInterval = setInterval(
      () => this.launchSelfRegistration(),
      this.options.selfRegisterIntervalMs
    );

    if (this.options.sweepEnabled) {
      logger.info(`Starting periodic probe sweep every ${this.options.sweepIntervalMs / 1000}s`);
      this.sweepInterval = setInterval(() => {
        this.launchSweep();
      }, this.options.sweepIntervalMs);
    }
  }

  stop(): void {
    if (this.selfRegisterInterval) {
      clearInterval(this.selfRegisterInterval);
      this.selfRegisterInterval = undefined;
    }
    if (this.sweepInterval) {
      clearInterval(this.sweepInterval);
      this.sweepInterval = undefined;
      logger.info('Stopped periodic probe sweep');
    }
  }
}

export default FleetSyncCoordinator;
