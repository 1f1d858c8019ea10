import { Request, Response } from 'express';
import HostStore from '../services/hostStore';
import { BackupUnavailableError } from '../utils/errors';

export interface BackupsControllerDeps {
  store: HostStore;
  /** Retention for operator-requested backups */
  manualMaxBackups: number;
}

export function createBackupsController({ store, manualMaxBackups }: BackupsControllerDeps) {
  return {
    async listBackups(_req: Request, res: Response): Promise<void> {
      const backups = await store.listBackups();
      res.status(200).json({
        backups: backups.map(({ filename, timestamp, size }) => ({ filename, timestamp, size })),
      });
    },

    /**
     * POST /api/backups
     */
    async createBackup(_req: Request, res: Response): Promise<void> {
      const path = await store.backupCurrent(manualMaxBackups);
      if (!path) {
        throw new BackupUnavailableError('No database file to back up');
      }
      res.status(201).json({ message: 'Backup created', path });
    },

    /**
     * POST /api/backups/restore
     * Restores the named backup, or the newest one when no file is given.
     */
    async restoreBackup(req: Request, res: Response): Promise<void> {
      const { file }: { file?: string } = req.body;
      const restored = file
        ? await store.restoreBackup(file)
        : await store.restoreLatestBackup();
      res.status(200).json({ message: 'Backup restored', file: restored });
    },

    /**
     * POST /api/backups/import
     */
    async importSnapshot(req: Request, res: Response): Promise<void> {
      const bytes = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
      const backupPath = await store.importSnapshot(bytes);
      res.status(200).json({ message: 'Snapshot imported', backupPath });
    },

    /**
     * GET /api/backups/snapshot
     */
    async downloadSnapshot(_req: Request, res: Response): Promise<void> {
      const bytes = await store.exportSnapshot();
      res.setHeader('Content-Type', 'application/octet-stream');
      res.setHeader('Content-Disposition', 'attachment; filename="hosts.db"');
      res.status(200).send(bytes);
    },
  };
}

export type BackupsController = ReturnType<typeof createBackupsController>;
