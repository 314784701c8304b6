import Database from 'better-sqlite3';
import type {
  ChildAttributes,
  LeafKey,
  LeafKeyShape,
  ParentAttributes,
} from '../reconcile/entity-keys';
import { describeLeafKey } from '../reconcile/entity-keys';
import type {
  ActiveLeaf,
  LeafInsert,
  LifecycleStore,
  StoredLeaf,
} from '../reconcile/lifecycle-store';
import {
  DuplicateKeyError,
  ReconcileError,
  StoreUnavailableError,
  errToMessage,
} from '../reconcile/reconcile.errors';
import type { LifecycleLayout } from './schema';

type IdRow = { id: number };
type LeafRow = { id: number; added_date: string; removed_date: string | null };
type ActiveRow = { id: number; first: string; second: string | null };
type CountRow = { active: number | null; removed: number | null };

export type LeafCounts = { active: number; removed: number };

function isUniqueViolation(err: unknown): boolean {
  return (
    err instanceof Database.SqliteError &&
    (err.code === 'SQLITE_CONSTRAINT_UNIQUE' ||
      err.code === 'SQLITE_CONSTRAINT_PRIMARYKEY')
  );
}

/**
 * `LifecycleStore` over one source's parent/child/leaf tables.
 * Statements are prepared once; composite leaves are keyed by
 * (filename, filepath), path leaves by file_path.
 */
export class SqliteLifecycleStore implements LifecycleStore {
  readonly leafShape: LeafKeyShape;

  private readonly findParentStmt: Database.Statement<unknown[], IdRow> | null;
  private readonly findChildStmt: Database.Statement<unknown[], IdRow> | null;
  private readonly insertParentStmt: Database.Statement<unknown[]> | null;
  private readonly insertChildStmt: Database.Statement<unknown[]> | null;
  private readonly findLeafStmt: Database.Statement<unknown[], LeafRow>;
  private readonly insertLeafStmt: Database.Statement<unknown[]>;
  private readonly activeLeavesStmt: Database.Statement<unknown[], ActiveRow>;
  private readonly markRemovedStmt: Database.Statement<unknown[]>;
  private readonly clearRemovedStmt: Database.Statement<unknown[]>;
  private readonly countStmt: Database.Statement<unknown[], CountRow>;

  constructor(
    private readonly db: Database.Database,
    private readonly layout: LifecycleLayout,
  ) {
    this.leafShape = layout.leafShape;
    const { parents, children, leaves } = layout;

    this.findParentStmt = parents
      ? db.prepare<unknown[], IdRow>(
          `SELECT id FROM ${parents.table} WHERE ${parents.keyColumn} = ?`,
        )
      : null;
    this.insertParentStmt = parents
      ? db.prepare(
          parents.pathColumn
            ? `INSERT INTO ${parents.table} (${parents.keyColumn}, title, ${parents.pathColumn}) VALUES (?, ?, ?)`
            : `INSERT INTO ${parents.table} (${parents.keyColumn}, title) VALUES (?, ?)`,
        )
      : null;
    this.findChildStmt = children
      ? db.prepare<unknown[], IdRow>(
          `SELECT id FROM ${children.table} WHERE ${children.keyColumn} = ?`,
        )
      : null;
    this.insertChildStmt = children
      ? db.prepare(
          `INSERT INTO ${children.table} (${children.keyColumn}, series_id, season_number, episode_number) VALUES (?, ?, ?, ?)`,
        )
      : null;

    const keyWhere =
      layout.leafShape === 'composite' ? 'filename = ? AND filepath = ?' : 'file_path = ?';
    const keyColumns =
      layout.leafShape === 'composite' ? ['filename', 'filepath'] : ['file_path'];
    const insertColumns = [
      ...keyColumns,
      ...(leaves.createdColumn ? [leaves.createdColumn] : []),
      ...(leaves.parentColumn ? [leaves.parentColumn] : []),
      ...(leaves.childColumn ? [leaves.childColumn] : []),
      'added_date',
      'removed_date',
    ];

    this.findLeafStmt = db.prepare<unknown[], LeafRow>(
      `SELECT id, added_date, removed_date FROM ${leaves.table} WHERE ${keyWhere}`,
    );
    this.insertLeafStmt = db.prepare(
      `INSERT INTO ${leaves.table} (${insertColumns.join(', ')}) VALUES (${insertColumns
        .map((c) => (c === 'removed_date' ? 'NULL' : '?'))
        .join(', ')})`,
    );
    this.activeLeavesStmt = db.prepare<unknown[], ActiveRow>(
      layout.leafShape === 'composite'
        ? `SELECT id, filename AS first, filepath AS second FROM ${leaves.table} WHERE removed_date IS NULL`
        : `SELECT id, file_path AS first, NULL AS second FROM ${leaves.table} WHERE removed_date IS NULL`,
    );
    this.markRemovedStmt = db.prepare(
      `UPDATE ${leaves.table} SET removed_date = ? WHERE id = ? AND removed_date IS NULL`,
    );
    this.clearRemovedStmt = db.prepare(
      `UPDATE ${leaves.table} SET removed_date = NULL WHERE id = ?`,
    );
    this.countStmt = db.prepare<unknown[], CountRow>(
      `SELECT SUM(CASE WHEN removed_date IS NULL THEN 1 ELSE 0 END) AS active,
              SUM(CASE WHEN removed_date IS NULL THEN 0 ELSE 1 END) AS removed
       FROM ${leaves.table}`,
    );
  }

  findByKey(kind: 'parent' | 'child', key: string): number | null {
    const stmt = kind === 'parent' ? this.findParentStmt : this.findChildStmt;
    if (!stmt) return null;
    return this.guard(`find ${kind}`, () => stmt.get(key)?.id ?? null);
  }

  findLeaf(key: LeafKey): StoredLeaf | null {
    return this.guard('find leaf', () => {
      const row = this.findLeafStmt.get(...this.keyParams(key));
      if (!row) return null;
      return { id: row.id, addedAt: row.added_date, removedAt: row.removed_date };
    });
  }

  insertParent(key: string, attributes: ParentAttributes): number {
    const stmt = this.requireStmt(this.insertParentStmt, 'parent');
    const params = this.layout.parents?.pathColumn
      ? [key, attributes.title, attributes.path ?? '']
      : [key, attributes.title];
    return this.guardInsert('series', key, () => stmt.run(...params).lastInsertRowid);
  }

  insertChild(key: string, attributes: ChildAttributes, parentId: number | null): number {
    const stmt = this.requireStmt(this.insertChildStmt, 'child');
    return this.guardInsert('episode', key, () =>
      stmt.run(key, parentId, attributes.seasonNumber, attributes.episodeNumber)
        .lastInsertRowid,
    );
  }

  insertLeaf(key: LeafKey, row: LeafInsert): number {
    const { leaves } = this.layout;
    const params: Array<string | number | null> = [
      ...this.keyParams(key),
      ...(leaves.createdColumn ? [row.attributes.createdAt] : []),
      ...(leaves.parentColumn ? [row.parentId] : []),
      ...(leaves.childColumn ? [row.childId] : []),
      row.addedAt,
    ];
    return this.guardInsert('file', describeLeafKey(key), () =>
      this.insertLeafStmt.run(...params).lastInsertRowid,
    );
  }

  listActiveLeafKeys(): ActiveLeaf[] {
    return this.guard('list active leaves', () =>
      this.activeLeavesStmt.all().map((row) => ({
        id: row.id,
        key: this.rowKey(row),
      })),
    );
  }

  markRemoved(leafId: number, timestamp: string): void {
    this.guard('mark removed', () => this.markRemovedStmt.run(timestamp, leafId));
  }

  clearRemoved(leafId: number): void {
    this.guard('clear removed', () => this.clearRemovedStmt.run(leafId));
  }

  countLeaves(): LeafCounts {
    const row = this.guard('count leaves', () => this.countStmt.get());
    return { active: row?.active ?? 0, removed: row?.removed ?? 0 };
  }

  begin(): void {
    // IMMEDIATE takes the write lock up front, so a second writer fails fast.
    this.guard('begin', () => this.db.exec('BEGIN IMMEDIATE'));
  }

  commit(): void {
    this.guard('commit', () => this.db.exec('COMMIT'));
  }

  rollback(): void {
    if (!this.db.inTransaction) return;
    this.guard('rollback', () => this.db.exec('ROLLBACK'));
  }

  private keyParams(key: LeafKey): string[] {
    if (key.shape !== this.leafShape) {
      throw new StoreUnavailableError(
        `Store expects ${this.leafShape} keys, got ${key.shape}`,
      );
    }
    return key.shape === 'composite' ? [key.name, key.dir] : [key.path];
  }

  private rowKey(row: ActiveRow): LeafKey {
    if (this.leafShape === 'path') return { shape: 'path', path: row.first };
    return { shape: 'composite', name: row.first, dir: row.second ?? '' };
  }

  private requireStmt<T>(stmt: T | null, level: string): T {
    if (!stmt) {
      throw new StoreUnavailableError(`This source has no ${level} table`);
    }
    return stmt;
  }

  private guardInsert(entity: string, key: string, fn: () => number | bigint): number {
    try {
      return Number(fn());
    } catch (err) {
      if (isUniqueViolation(err)) throw new DuplicateKeyError(entity, key, { cause: err });
      throw this.wrap(`insert ${entity}`, err);
    }
  }

  private guard<T>(op: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      throw this.wrap(op, err);
    }
  }

  private wrap(op: string, err: unknown): Error {
    if (err instanceof ReconcileError) return err;
    return new StoreUnavailableError(`Store ${op} failed: ${errToMessage(err)}`, {
      cause: err,
    });
  }
}
