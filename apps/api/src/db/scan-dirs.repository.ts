import { Injectable } from '@nestjs/common';
import { StoreUnavailableError, errToMessage } from '../reconcile/reconcile.errors';
import { DatabaseService } from './database.service';

export type ScanDir = { id: number; dirname: string; firstAdded: string };

type ScanDirRow = { id: number; dirname: string; first_added: string };

/**
 * Directories the filesystem pass walks. A directory stays registered until
 * it is removed with `unregister`; its files are then soft-deleted by the
 * next pass.
 */
@Injectable()
export class ScanDirsRepository {
  constructor(private readonly database: DatabaseService) {}

  /** Returns true when the directory was not registered before. */
  register(dirname: string, now: Date = new Date()): boolean {
    try {
      const info = this.database.connection
        .prepare('INSERT OR IGNORE INTO scan_dirs (dirname, first_added) VALUES (?, ?)')
        .run(dirname, now.toISOString());
      return info.changes > 0;
    } catch (err) {
      throw new StoreUnavailableError(
        `Cannot register scan directory ${dirname}: ${errToMessage(err)}`,
        { cause: err },
      );
    }
  }

  /** Returns true when a registered directory was removed. */
  unregister(dirname: string): boolean {
    try {
      const info = this.database.connection
        .prepare('DELETE FROM scan_dirs WHERE dirname = ?')
        .run(dirname);
      return info.changes > 0;
    } catch (err) {
      throw new StoreUnavailableError(
        `Cannot unregister scan directory ${dirname}: ${errToMessage(err)}`,
        { cause: err },
      );
    }
  }

  list(): ScanDir[] {
    return this.database.connection
      .prepare<unknown[], ScanDirRow>(
        'SELECT id, dirname, first_added FROM scan_dirs ORDER BY dirname',
      )
      .all()
      .map((row) => ({ id: row.id, dirname: row.dirname, firstAdded: row.first_added }));
  }
}
