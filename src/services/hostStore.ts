import Database from 'better-sqlite3';
import { randomUUID } from 'crypto';
import {
  copyFileSync,
  existsSync,
  mkdirSync,
  mkdtempSync,
  readdirSync,
  readFileSync,
  renameSync,
  rmSync,
  statSync,
  writeFileSync,
} from 'fs';
import { tmpdir } from 'os';
import { basename, dirname, extname, join } from 'path';
import { logger } from '../utils/logger';
import {
  AppError,
  BackupUnavailableError,
  HostConflictError,
  HostNotFoundError,
  InvalidAddressError,
  InvalidSnapshotError,
  StoreIOError,
  errorMessage,
} from '../utils/errors';
import { buildHost } from '../utils/hostRecord';
import { isValidIPv4 } from '../utils/ipv4';
import { rosterPayloadSchema, storedHostSchema } from '../validators/hostValidator';
import { ChangeFeed, ChangeListener } from './changeFeed';
import {
  BackupInfo,
  CMS_STATUSES,
  HOST_FIELDS,
  HOST_STATUSES,
  Host,
  RosterChange,
  RosterChangeReason,
} from '../types';

/**
 * Host Record Store
 * Durable roster in a single SQLite file with rotating backups and
 * recovery from a damaged file at startup
 */

export interface HostStoreOptions {
  /** Defaults to `<dir of the store file>/backups` */
  backupDir?: string;
  /** Defaults to `<dir of the store file>/hosts.json`; `null` disables migration */
  legacyJsonPath?: string | null;
  /** Retention used when an import backs up the replaced roster */
  maxBackups?: number;
}

export type HostMutation = (host: Host) => void;

type HostField = (typeof HOST_FIELDS)[number];

function columnDefinition(field: HostField): string {
  switch (field) {
    case 'asset_count':
    case 'asset_count_vpn':
      return `${field} INTEGER NOT NULL DEFAULT 0`;
    case 'last_checked':
    case 'last_checked_vpn':
      return `${field} TEXT`;
    default:
      return `${field} TEXT NOT NULL DEFAULT ''`;
  }
}

const COUNT_FIELDS: ReadonlySet<string> = new Set(['asset_count', 'asset_count_vpn']);
const TIMESTAMP_FIELDS: ReadonlySet<string> = new Set(['last_checked', 'last_checked_vpn']);

function quoteList(values: readonly string[]): string {
  return values.map((value) => `'${value}'`).join(', ');
}

const SELECT_COLUMNS = HOST_FIELDS.join(', ');
const INSERT_SQL = `INSERT INTO hosts (${SELECT_COLUMNS}) VALUES (${HOST_FIELDS.map((field) => `@${field}`).join(', ')})`;
const UPDATE_SQL = `UPDATE hosts SET ${HOST_FIELDS.filter((field) => field !== 'id')
  .map((field) => `${field} = @${field}`)
  .join(', ')} WHERE id = @id`;

const DATABASE_COMPANIONS = ['-wal', '-shm', '-journal'];
const DEFAULT_MAX_BACKUPS = 20;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function isUniqueViolation(error: unknown): boolean {
  return (
    error instanceof Database.SqliteError &&
    (error.code === 'SQLITE_CONSTRAINT_UNIQUE' || error.code === 'SQLITE_CONSTRAINT_PRIMARYKEY')
  );
}

class HostStore {
  private db: Database.Database | null = null;
  private readonly feed = new ChangeFeed<RosterChange>();
  readonly backupDir: string;
  private readonly legacyJsonPath: string | null;
  private readonly maxBackups: number;
  private readonly backupPattern: RegExp;
  private readonly backupStem: string;
  private readonly backupExt: string;

  constructor(
    readonly path: string = './data/hosts.db',
    options: HostStoreOptions = {}
  ) {
    const directory = dirname(path);
    this.backupDir = options.backupDir ?? join(directory, 'backups');
    this.legacyJsonPath =
      options.legacyJsonPath === undefined ? join(directory, 'hosts.json') : options.legacyJsonPath;
    this.maxBackups = options.maxBackups ?? DEFAULT_MAX_BACKUPS;
    this.backupExt = extname(path) || '.db';
    this.backupStem = basename(path, extname(path)) || 'hosts';
    this.backupPattern = new RegExp(
      `^${escapeRegExp(this.backupStem)}-(\\d+)${escapeRegExp(this.backupExt)}$`
    );
  }

  /**
   * Opens (or recovers) the store file and prepares the schema.
   */
  static async open(path: string, options: HostStoreOptions = {}): Promise<HostStore> {
    const store = new HostStore(path, options);
    await store.initialize();
    return store;
  }

  async initialize(): Promise<void> {
    for (const dir of [dirname(this.path), this.backupDir]) {
      const created = mkdirSync(dir, { recursive: true });
      if (created) {
        logger.info(`Created directory: ${dir}`);
      }
    }

    let db = this.openIfUsable();
    if (!db) {
      db = this.recover();
    }

    this.db = db;
    this.ensureSchema(db);
    logger.info('Connected to the host store.', { path: this.path });

    this.migrateLegacyJson();
  }

  private assertReady(): Database.Database {
    if (!this.db) {
      throw new Error('Host store is not open');
    }

    return this.db;
  }

  /**
   * Live file opened and checked, or null when it is missing, empty or damaged.
   */
  private openIfUsable(): Database.Database | null {
    if (!existsSync(this.path)) {
      logger.info('Host store file is missing', { path: this.path });
      return null;
    }

    if (statSync(this.path).size === 0) {
      logger.warn('Host store file is empty', { path: this.path });
      return null;
    }

    return this.openVerified(this.path, false);
  }

  /**
   * Opens a database file and runs the integrity probe. A file that fails the
   * probe is closed again and null is returned.
   */
  private openVerified(file: string, requireHostsTable: boolean): Database.Database | null {
    let db: Database.Database | null = null;
    try {
      db = new Database(file, { fileMustExist: true });
      const check: unknown = db.pragma('quick_check', { simple: true });
      if (check !== 'ok') {
        throw new Error(`integrity check reported: ${String(check)}`);
      }

      const table = db
        .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'hosts'")
        .get();
      if (table) {
        db.prepare('SELECT COUNT(*) FROM hosts').get();
      } else if (requireHostsTable) {
        throw new Error('no hosts table');
      }

      return db;
    } catch (error) {
      logger.warn('Database file failed integrity probe', { file, error: errorMessage(error) });
      db?.close();
      return null;
    }
  }

  /**
   * Restores the newest backup that opens cleanly, or starts an empty roster.
   */
  private recover(): Database.Database {
    const hadLiveFile = existsSync(this.path);
    const candidates = this.readBackups().reverse();

    for (const backup of candidates) {
      this.removeDatabaseFiles();
      try {
        copyFileSync(backup.path, this.path);
      } catch (error) {
        logger.warn('Could not copy backup into place', {
          backup: backup.filename,
          error: errorMessage(error),
        });
        continue;
      }

      const db = this.openVerified(this.path, true);
      if (db) {
        logger.warn(`Recovered host store from backup ${backup.filename}`, { path: this.path });
        return db;
      }
    }

    this.removeDatabaseFiles();
    if (hadLiveFile || candidates.length > 0) {
      logger.error('No usable host store backup found; starting with an empty roster', {
        path: this.path,
        backupsTried: candidates.length,
      });
    } else {
      logger.info('Creating new host store', { path: this.path });
    }

    return new Database(this.path);
  }

  private removeDatabaseFiles(): void {
    for (const file of [this.path, ...DATABASE_COMPANIONS.map((suffix) => `${this.path}${suffix}`)]) {
      rmSync(file, { force: true });
    }
  }

  private columnNames(db: Database.Database): Set<string> {
    const rows: unknown[] = db.prepare('PRAGMA table_info(hosts)').all();
    const names = new Set<string>();
    for (const row of rows) {
      if (row && typeof row === 'object' && 'name' in row && typeof row.name === 'string') {
        names.add(row.name);
      }
    }
    return names;
  }

  private ensureSchema(db: Database.Database): void {
    db.pragma('busy_timeout = 5000');
    db.exec(`
      CREATE TABLE IF NOT EXISTS hosts (
        ${HOST_FIELDS.map(columnDefinition).join(',\n        ')}
      )
    `);

    // Files written by older releases lack some columns
    const existing = this.columnNames(db);
    for (const field of HOST_FIELDS) {
      if (!existing.has(field)) {
        try {
          db.exec(`ALTER TABLE hosts ADD COLUMN ${columnDefinition(field)}`);
          logger.info(`Added ${field} column to hosts table`);
        } catch (error) {
          logger.warn(`Could not add ${field} column:`, { error: errorMessage(error) });
        }
      }
    }

    this.normalizeLegacyRows(db);

    const missingIds: unknown[] = db
      .prepare("SELECT rowid AS row_id FROM hosts WHERE id IS NULL OR id = ''")
      .all();
    const assignId = db.prepare('UPDATE hosts SET id = ? WHERE rowid = ?');
    for (const row of missingIds) {
      if (row && typeof row === 'object' && 'row_id' in row && typeof row.row_id === 'number') {
        assignId.run(randomUUID(), row.row_id);
      }
    }

    db.exec('CREATE UNIQUE INDEX IF NOT EXISTS idx_hosts_id ON hosts(id)');
    db.exec(
      "CREATE UNIQUE INDEX IF NOT EXISTS idx_hosts_ip_address ON hosts(ip_address) WHERE ip_address <> ''"
    );
  }

  /**
   * Older files declared every column nullable and left unset fields NULL.
   */
  private normalizeLegacyRows(db: Database.Database): void {
    const statements = [
      ...HOST_FIELDS.filter((field) => !TIMESTAMP_FIELDS.has(field)).map((field) =>
        COUNT_FIELDS.has(field)
          ? `UPDATE hosts SET ${field} = 0 WHERE ${field} IS NULL`
          : `UPDATE hosts SET ${field} = '' WHERE ${field} IS NULL`
      ),
      `UPDATE hosts SET status = 'Unreachable' WHERE status NOT IN (${quoteList(HOST_STATUSES)})`,
      `UPDATE hosts SET status_vpn = '' WHERE status_vpn NOT IN (${quoteList(HOST_STATUSES)})`,
      `UPDATE hosts SET cms_status = 'Unknown' WHERE cms_status NOT IN (${quoteList(CMS_STATUSES)})`,
      `UPDATE hosts SET cms_status_vpn = '' WHERE cms_status_vpn NOT IN (${quoteList(CMS_STATUSES)})`,
    ];
    db.transaction(() => {
      for (const sql of statements) {
        db.exec(sql);
      }
    })();
  }

  /**
   * One-time import of a roster kept as a JSON file by older releases.
   */
  private migrateLegacyJson(): void {
    const file = this.legacyJsonPath;
    if (!file || !existsSync(file)) {
      return;
    }

    try {
      const parsed = rosterPayloadSchema.parse(JSON.parse(readFileSync(file, 'utf-8')));
      const db = this.assertReady();
      const count = db.prepare('SELECT COUNT(*) AS total FROM hosts').get();
      const empty = count && typeof count === 'object' && 'total' in count && count.total === 0;
      if (empty && parsed.length > 0) {
        this.writeAll(parsed.map((host) => this.prepareRecord(host)));
        this.notify('import');
        logger.info(`Migrated ${parsed.length} hosts from ${file}`);
      }
      renameSync(file, `${file}.migrated`);
    } catch (error) {
      logger.warn('Failed to migrate legacy host roster', { file, error: errorMessage(error) });
    }
  }

  private parseRow(row: unknown): Host {
    const result = storedHostSchema.safeParse(row);
    if (!result.success) {
      throw new StoreIOError('read', new Error(result.error.issues[0]?.message ?? 'malformed row'));
    }
    return result.data;
  }

  private findById(db: Database.Database, id: string): Host | undefined {
    const row: unknown = db.prepare(`SELECT ${SELECT_COLUMNS} FROM hosts WHERE id = ?`).get(id);
    return row === undefined ? undefined : this.parseRow(row);
  }

  private findByIp(db: Database.Database, ip: string): Host | undefined {
    const row: unknown = db
      .prepare(`SELECT ${SELECT_COLUMNS} FROM hosts WHERE ip_address = ?`)
      .get(ip);
    return row === undefined ? undefined : this.parseRow(row);
  }

  private assertAddress(ip: string, field = 'ip_address'): void {
    if (!isValidIPv4(ip)) {
      throw new InvalidAddressError(ip, field);
    }
  }

  /**
   * Defaults filled, id assigned, addresses checked.
   */
  private prepareRecord(input: Partial<Host>): Host {
    const host = buildHost(input);
    if (!host.id) {
      host.id = randomUUID();
    }
    if (host.ip_address) {
      this.assertAddress(host.ip_address);
    }
    if (host.vpn_ip_address) {
      this.assertAddress(host.vpn_ip_address, 'vpn_ip_address');
    }
    return host;
  }

  private writeAll(hosts: Host[]): void {
    const db = this.assertReady();
    const insert = db.prepare(INSERT_SQL);
    db.transaction((records: Host[]) => {
      db.prepare('DELETE FROM hosts').run();
      for (const record of records) {
        insert.run(record);
      }
    })(hosts);
  }

  /**
   * Runs a write and maps driver failures onto the store's error types.
   */
  private persist<T>(operation: string, work: (db: Database.Database) => T): T {
    try {
      return work(this.assertReady());
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      if (isUniqueViolation(error)) {
        throw new HostConflictError(`Host ${operation} conflicts with an existing record: ${errorMessage(error)}`);
      }
      logger.error(`Failed to ${operation} host record:`, { error: errorMessage(error) });
      throw new StoreIOError(operation, error);
    }
  }

  private notify(reason: RosterChangeReason): void {
    this.feed.publish({ reason, at: new Date().toISOString() });
  }

  /**
   * Registers a change listener; returns the unsubscribe function.
   */
  subscribe(listener: ChangeListener<RosterChange>): () => void {
    return this.feed.subscribe(listener);
  }

  getFeedStats(): { subscribers: number; dropped: number } {
    return this.feed.getStats();
  }

  /**
   * Get all hosts in storage order
   */
  async getAll(): Promise<Host[]> {
    try {
      const db = this.assertReady();
      const rows: unknown[] = db
        .prepare(`SELECT ${SELECT_COLUMNS} FROM hosts ORDER BY rowid`)
        .all();
      return rows.map((row) => this.parseRow(row));
    } catch (error) {
      logger.error('Failed to get all hosts:', { error: errorMessage(error) });
      throw error;
    }
  }

  async getById(id: string): Promise<Host> {
    const host = this.findById(this.assertReady(), id);
    if (!host) {
      throw new HostNotFoundError(id, 'id');
    }
    return host;
  }

  async getByIp(ip: string): Promise<Host> {
    this.assertAddress(ip);
    const host = this.findByIp(this.assertReady(), ip);
    if (!host) {
      throw new HostNotFoundError(ip);
    }
    return host;
  }

  /**
   * Append a new host. An empty id is replaced with a fresh UUID.
   */
  async add(input: Partial<Host>): Promise<Host> {
    const host = this.persist('add', (db) => {
      const record = this.prepareRecord(input);
      if (this.findById(db, record.id)) {
        throw new HostConflictError(`Host with id '${record.id}' already exists`);
      }
      if (record.ip_address && this.findByIp(db, record.ip_address)) {
        throw new HostConflictError(`Host with IP '${record.ip_address}' already exists`);
      }
      db.prepare(INSERT_SQL).run(record);
      return record;
    });

    logger.info(`Added host: ${host.ip_address || host.id}`);
    this.notify('add');
    return { ...host };
  }

  /**
   * Locate the record by its current address and apply `mutation` to a copy.
   * The id cannot be changed through an update.
   */
  async update(ip: string, mutation: HostMutation): Promise<Host> {
    this.assertAddress(ip);
    const host = this.persist('update', (db) => {
      const current = this.findByIp(db, ip);
      if (!current) {
        throw new HostNotFoundError(ip);
      }

      const draft = { ...current };
      mutation(draft);
      const record = this.prepareRecord({ ...draft, id: current.id });

      if (record.ip_address && record.ip_address !== ip) {
        const occupant = this.findByIp(db, record.ip_address);
        if (occupant && occupant.id !== record.id) {
          throw new HostConflictError(`Host with IP '${record.ip_address}' already exists`);
        }
      }

      db.prepare(UPDATE_SQL).run(record);
      return record;
    });

    this.notify('update');
    return { ...host };
  }

  async delete(ip: string): Promise<void> {
    this.assertAddress(ip);
    this.persist('delete', (db) => {
      const info = db.prepare('DELETE FROM hosts WHERE ip_address = ?').run(ip);
      if (info.changes === 0) {
        throw new HostNotFoundError(ip);
      }
    });
    logger.info(`Deleted host: ${ip}`);
    this.notify('delete');
  }

  async deleteById(id: string): Promise<void> {
    this.persist('delete', (db) => {
      const info = db.prepare('DELETE FROM hosts WHERE id = ?').run(id);
      if (info.changes === 0) {
        throw new HostNotFoundError(id, 'id');
      }
    });
    logger.info(`Deleted host with id: ${id}`);
    this.notify('delete');
  }

  /**
   * Insert or overwrite by id (by address when the id is empty). A different
   * record holding the same address is a stale entry and is removed first.
   */
  async upsert(input: Partial<Host>): Promise<Host> {
    const host = this.persist('upsert', (db) => {
      let existing = input.id ? this.findById(db, input.id) : undefined;
      let id = input.id ?? '';
      if (!id && input.ip_address) {
        existing = this.findByIp(db, input.ip_address);
        id = existing?.id ?? '';
      }

      const record = this.prepareRecord({ ...input, id });

      return db.transaction(() => {
        if (record.ip_address) {
          const evicted = db
            .prepare('DELETE FROM hosts WHERE ip_address = ? AND id <> ?')
            .run(record.ip_address, record.id);
          if (evicted.changes > 0) {
            logger.warn('Evicted stale host entry', {
              ip: record.ip_address,
              replacedBy: record.id,
            });
          }
        }

        if (existing) {
          db.prepare(UPDATE_SQL).run(record);
        } else {
          db.prepare(INSERT_SQL).run(record);
        }
        return record;
      })();
    });

    this.notify('upsert');
    return { ...host };
  }

  /**
   * Atomically swap the whole roster for `hosts`, kept in the given order.
   */
  async replaceAll(hosts: Array<Partial<Host>>): Promise<Host[]> {
    const records = this.persist('replace', () => {
      const prepared = hosts.map((host) => this.prepareRecord(host));
      this.writeAll(prepared);
      return prepared;
    });

    logger.info(`Replaced roster with ${records.length} hosts`);
    this.notify('replace');
    return records.map((record) => ({ ...record }));
  }

  private readBackups(): BackupInfo[] {
    let entries: string[];
    try {
      entries = readdirSync(this.backupDir);
    } catch {
      return [];
    }

    const backups: BackupInfo[] = [];
    for (const filename of entries) {
      if (!filename.startsWith(`${this.backupStem}-`) || !filename.endsWith(this.backupExt)) {
        continue;
      }

      const path = join(this.backupDir, filename);
      try {
        const stats = statSync(path);
        if (!stats.isFile()) {
          continue;
        }
        const match = this.backupPattern.exec(filename);
        const timestamp = match ? Number(match[1]) : Math.floor(stats.mtimeMs / 1000);
        backups.push({ filename, path, timestamp, size: stats.size });
      } catch (error) {
        logger.warn('Skipping unreadable backup', { filename, error: errorMessage(error) });
      }
    }

    return backups.sort((a, b) => a.timestamp - b.timestamp || a.filename.localeCompare(b.filename));
  }

  private nextBackupPath(): string {
    let timestamp = Math.floor(Date.now() / 1000);
    let candidate = join(this.backupDir, `${this.backupStem}-${timestamp}${this.backupExt}`);
    while (existsSync(candidate)) {
      timestamp++;
      candidate = join(this.backupDir, `${this.backupStem}-${timestamp}${this.backupExt}`);
    }
    return candidate;
  }

  private pruneBackups(maxBackups: number): void {
    if (maxBackups < 1) {
      return;
    }

    const backups = this.readBackups();
    for (const backup of backups.slice(0, Math.max(0, backups.length - maxBackups))) {
      try {
        rmSync(backup.path, { force: true });
        logger.debug(`Pruned backup ${backup.filename}`);
      } catch (error) {
        logger.warn('Failed to prune backup', { filename: backup.filename, error: errorMessage(error) });
      }
    }
  }

  /**
   * Backups in ascending timestamp order
   */
  async listBackups(): Promise<BackupInfo[]> {
    return this.readBackups();
  }

  /**
   * Copy the live store into the backup directory and prune to `maxBackups`.
   * Returns '' when there is no live file to copy.
   */
  async backupCurrent(maxBackups: number = this.maxBackups): Promise<string> {
    return this.createBackup(maxBackups);
  }

  private createBackup(maxBackups: number): string {
    if (!existsSync(this.path)) {
      return '';
    }

    const target = this.nextBackupPath();
    this.persist('backup', (db) => {
      mkdirSync(this.backupDir, { recursive: true });
      db.prepare('VACUUM INTO ?').run(target);
    });
    this.pruneBackups(maxBackups);
    logger.info(`Created host store backup ${basename(target)}`);
    return target;
  }

  /**
   * Consistent copy of the live database file
   */
  async exportSnapshot(): Promise<Buffer> {
    const workDir = mkdtempSync(join(tmpdir(), 'host-store-export-'));
    const target = join(workDir, basename(this.path) || 'hosts.db');
    try {
      this.persist('export', (db) => {
        db.prepare('VACUUM INTO ?').run(target);
      });
      return readFileSync(target);
    } finally {
      rmSync(workDir, { recursive: true, force: true });
    }
  }

  /**
   * Install `bytes` as the live store after backing up the current one.
   * Returns the path of that backup ('' when there was no live file).
   */
  async importSnapshot(bytes: Buffer, maxBackups: number = this.maxBackups): Promise<string> {
    if (bytes.length === 0) {
      throw new InvalidSnapshotError('snapshot is empty');
    }

    const staging = `${this.path}.import-${process.pid}-${Date.now()}`;
    writeFileSync(staging, bytes);
    const candidate = this.openVerified(staging, true);
    if (!candidate) {
      rmSync(staging, { force: true });
      throw new InvalidSnapshotError('not a readable host database');
    }
    candidate.close();

    let backupPath = '';
    try {
      backupPath = this.createBackup(maxBackups);
      this.assertReady().close();
      this.db = null;
      this.removeDatabaseFiles();
      renameSync(staging, this.path);
    } catch (error) {
      rmSync(staging, { force: true });
      logger.error('Failed to install host store snapshot', { error: errorMessage(error) });
      if (!this.db) {
        this.db = new Database(this.path);
        this.ensureSchema(this.db);
      }
      if (error instanceof AppError) {
        throw error;
      }
      throw new StoreIOError('import', error);
    }

    this.db = new Database(this.path);
    this.ensureSchema(this.db);
    logger.info('Imported host store snapshot', { backup: backupPath ? basename(backupPath) : null });
    this.notify('import');
    return backupPath;
  }

  /**
   * Restore a named backup. Only the base name is honored.
   */
  async restoreBackup(filename: string, maxBackups: number = this.maxBackups): Promise<string> {
    const name = basename(filename.trim());
    if (!name || name === '.' || name === '..') {
      throw new BackupUnavailableError(`Backup '${filename}' not found`);
    }

    const path = join(this.backupDir, name);
    let bytes: Buffer;
    try {
      bytes = readFileSync(path);
    } catch (error) {
      logger.warn('Backup could not be read', { filename: name, error: errorMessage(error) });
      throw new BackupUnavailableError(`Backup '${name}' not found`);
    }

    await this.importSnapshot(bytes, maxBackups);
    logger.info(`Restored host store from backup ${name}`);
    return name;
  }

  async restoreLatestBackup(maxBackups: number = this.maxBackups): Promise<string> {
    const latest = this.readBackups().at(-1);
    if (!latest) {
      throw new BackupUnavailableError();
    }
    return this.restoreBackup(latest.filename, maxBackups);
  }

  /**
   * Close database connection
   */
  close(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      try {
        this.feed.clear();
        if (!this.db) {
          logger.info('Host store already closed');
          resolve();
          return;
        }
        this.db.close();
        this.db = null;
        logger.info('Host store closed');
        resolve();
      } catch (error) {
        logger.error('Failed to close host store:', { error: errorMessage(error) });
        reject(error);
      }
    });
  }
}

export default HostStore;
