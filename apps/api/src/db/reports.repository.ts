import { Injectable } from '@nestjs/common';
import { basename, dirname, join } from 'node:path';
import { StoreUnavailableError, errToMessage } from '../reconcile/reconcile.errors';
import type { SyncSource } from '../sources/key-models';
import { DatabaseService } from './database.service';
import { LIFECYCLE_LAYOUTS } from './schema';

export type ActiveFile = {
  path: string;
  dir: string;
  name: string;
};

type CompositeRow = { dir: string; name: string };
type PathRow = { path: string };

/** Read-only queries over the active (not removed) rows of each source. */
@Injectable()
export class ReportsRepository {
  constructor(private readonly database: DatabaseService) {}

  activeFiles(source: SyncSource): ActiveFile[] {
    const { leafShape, leaves } = LIFECYCLE_LAYOUTS[source];
    try {
      if (leafShape === 'composite') {
        return this.database.connection
          .prepare<unknown[], CompositeRow>(
            `SELECT filepath AS dir, filename AS name FROM ${leaves.table}
             WHERE removed_date IS NULL ORDER BY filepath, filename`,
          )
          .all()
          .map((row) => ({ path: join(row.dir, row.name), dir: row.dir, name: row.name }));
      }
      return this.database.connection
        .prepare<unknown[], PathRow>(
          `SELECT file_path AS path FROM ${leaves.table}
           WHERE removed_date IS NULL ORDER BY file_path`,
        )
        .all()
        .map((row) => ({ path: row.path, dir: dirname(row.path), name: basename(row.path) }));
    } catch (err) {
      throw new StoreUnavailableError(
        `Cannot read ${source} files: ${errToMessage(err)}`,
        { cause: err },
      );
    }
  }
}
