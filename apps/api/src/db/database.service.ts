import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { StoreUnavailableError, errToMessage } from '../reconcile/reconcile.errors';
import { SettingsService } from '../settings/settings.service';
import type { SyncSource } from '../sources/key-models';
import { LIFECYCLE_LAYOUTS, SCHEMA_STATEMENTS } from './schema';
import { SqliteLifecycleStore } from './sqlite-lifecycle.store';

/**
 * Owns the single SQLite connection for the process. Opened (and the schema
 * applied) when the module initialises, closed when the application context
 * shuts down, including after a failed run.
 */
@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private db: Database.Database | null = null;

  constructor(private readonly settings: SettingsService) {}

  onModuleInit() {
    const path = this.settings.databasePath;
    if (path !== ':memory:') mkdirSync(dirname(path), { recursive: true });

    try {
      const db = new Database(path);
      db.pragma('journal_mode = WAL');
      db.pragma('foreign_keys = ON');
      for (const sql of SCHEMA_STATEMENTS) db.exec(sql);
      this.db = db;
    } catch (err) {
      throw new StoreUnavailableError(
        `Cannot open database ${path}: ${errToMessage(err)}`,
        { cause: err },
      );
    }
    this.logger.log(`Database ready: ${path}`);
  }

  onModuleDestroy() {
    if (!this.db) return;
    if (this.db.inTransaction) this.db.exec('ROLLBACK');
    this.db.close();
    this.db = null;
    this.logger.debug('Database closed');
  }

  get connection(): Database.Database {
    if (!this.db) throw new StoreUnavailableError('Database is not open');
    return this.db;
  }

  lifecycleStore(source: SyncSource): SqliteLifecycleStore {
    return new SqliteLifecycleStore(this.connection, LIFECYCLE_LAYOUTS[source]);
  }
}
