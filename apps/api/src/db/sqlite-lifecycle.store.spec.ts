import Database from 'better-sqlite3';
import { compositeLeafKey, leafKeyFromPath } from '../reconcile/entity-keys';
import { ObservationReconciler } from '../reconcile/observation-reconciler';
import { DuplicateKeyError, StoreUnavailableError } from '../reconcile/reconcile.errors';
import { sonarrKeyModel } from '../sources/key-models';
import type { SonarrObservation } from '../sources/key-models';
import { LIFECYCLE_LAYOUTS, SCHEMA_STATEMENTS } from './schema';
import { SqliteLifecycleStore } from './sqlite-lifecycle.store';

type FileRow = {
  filename: string;
  filepath: string;
  creation_date: string | null;
  added_date: string;
  removed_date: string | null;
};

function openDb(): Database.Database {
  const db = new Database(':memory:');
  db.pragma('foreign_keys = ON');
  for (const sql of SCHEMA_STATEMENTS) db.exec(sql);
  return db;
}

describe('SqliteLifecycleStore', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = openDb();
  });

  afterEach(() => {
    db.close();
  });

  it('inserts and finds composite leaves by (filename, filepath)', () => {
    const store = new SqliteLifecycleStore(db, LIFECYCLE_LAYOUTS.filesystem);
    const key = compositeLeafKey('/tv/Show', 'e01.mkv');

    const id = store.insertLeaf(key, {
      attributes: { createdAt: '2025-12-31T00:00:00.000Z' },
      parentId: null,
      childId: null,
      addedAt: '2026-01-01T00:00:00.000Z',
    });

    expect(store.findLeaf(key)).toEqual({
      id,
      addedAt: '2026-01-01T00:00:00.000Z',
      removedAt: null,
    });
    expect(
      db.prepare<unknown[], FileRow>('SELECT filename, filepath, creation_date, added_date, removed_date FROM files').all(),
    ).toEqual([
      {
        filename: 'e01.mkv',
        filepath: '/tv/Show',
        creation_date: '2025-12-31T00:00:00.000Z',
        added_date: '2026-01-01T00:00:00.000Z',
        removed_date: null,
      },
    ]);
    expect(store.findLeaf(compositeLeafKey('/tv/Other', 'e01.mkv'))).toBeNull();
  });

  it('marks removed once and clears the mark on restore', () => {
    const store = new SqliteLifecycleStore(db, LIFECYCLE_LAYOUTS.filesystem);
    const key = compositeLeafKey('/tv', 'a.mkv');
    const id = store.insertLeaf(key, {
      attributes: { createdAt: null },
      parentId: null,
      childId: null,
      addedAt: '2026-01-01T00:00:00.000Z',
    });

    store.markRemoved(id, '2026-01-02T00:00:00.000Z');
    store.markRemoved(id, '2026-01-03T00:00:00.000Z');
    expect(store.findLeaf(key)?.removedAt).toBe('2026-01-02T00:00:00.000Z');
    expect(store.listActiveLeafKeys()).toEqual([]);
    expect(store.countLeaves()).toEqual({ active: 0, removed: 1 });

    store.clearRemoved(id);
    expect(store.listActiveLeafKeys()).toEqual([{ id, key }]);
    expect(store.countLeaves()).toEqual({ active: 1, removed: 0 });
  });

  it('reports zero counts on an empty table', () => {
    const store = new SqliteLifecycleStore(db, LIFECYCLE_LAYOUTS.plex);
    expect(store.countLeaves()).toEqual({ active: 0, removed: 0 });
  });

  it('maps unique violations to DuplicateKeyError', () => {
    const store = new SqliteLifecycleStore(db, LIFECYCLE_LAYOUTS.plex);
    store.insertParent('/library/metadata/1', { title: 'Show', path: null });

    expect(() => store.insertParent('/library/metadata/1', { title: 'Show', path: null })).toThrow(
      DuplicateKeyError,
    );
    expect(() => store.insertParent('/library/metadata/1', { title: 'Show', path: null })).toThrow(
      'Duplicate series key: /library/metadata/1',
    );
  });

  it('wraps other failures as StoreUnavailableError', () => {
    const store = new SqliteLifecycleStore(db, LIFECYCLE_LAYOUTS.plex);
    // series 99 does not exist, so the foreign key check fails.
    expect(() =>
      store.insertChild('ep-1', { seasonNumber: 1, episodeNumber: 1 }, 99),
    ).toThrow(StoreUnavailableError);
  });

  it('refuses keys of the wrong shape', () => {
    const store = new SqliteLifecycleStore(db, LIFECYCLE_LAYOUTS.sonarr);
    expect(() => store.findLeaf(compositeLeafKey('/tv', 'a.mkv'))).toThrow(
      'Store expects path keys, got composite',
    );
  });

  it('discards staged writes on rollback', () => {
    const store = new SqliteLifecycleStore(db, LIFECYCLE_LAYOUTS.filesystem);
    store.begin();
    store.insertLeaf(compositeLeafKey('/tv', 'a.mkv'), {
      attributes: { createdAt: null },
      parentId: null,
      childId: null,
      addedAt: '2026-01-01T00:00:00.000Z',
    });
    store.rollback();

    expect(db.inTransaction).toBe(false);
    expect(store.countLeaves()).toEqual({ active: 0, removed: 0 });
    expect(() => store.rollback()).not.toThrow();
  });

  it('runs a Sonarr pass end to end with path keys', async () => {
    const store = new SqliteLifecycleStore(db, LIFECYCLE_LAYOUTS.sonarr);
    const observation: SonarrObservation = {
      series: { id: 12, title: 'Show', path: '/tv/Show' },
      episode: { id: 345, seasonNumber: 1, episodeNumber: 2 },
      file: '/tv/Show/Season 01/e02.mkv',
    };
    const orphan: SonarrObservation = {
      series: { id: 12, title: 'Show', path: '/tv/Show' },
      episode: null,
      file: '/tv/Show/Season 01/pack.mkv',
    };

    const pass = await new ObservationReconciler({
      store,
      model: sonarrKeyModel,
      now: () => new Date('2026-02-01T00:00:00.000Z'),
    }).run([observation, orphan]);

    expect(pass.counters).toMatchObject({
      seen: 2,
      inserted: 2,
      parentsInserted: 1,
      childrenInserted: 1,
      resolved: 1,
      unresolved: 1,
    });
    expect(
      db
        .prepare<unknown[], { file_path: string; sonarr_id: number; episode: number | null }>(
          `SELECT f.file_path, s.sonarr_id, e.sonarr_id AS episode
           FROM sonarr_files f
           JOIN sonarr_series s ON s.id = f.series_id
           LEFT JOIN sonarr_episodes e ON e.id = f.episode_id
           ORDER BY f.file_path`,
        )
        .all(),
    ).toEqual([
      { file_path: '/tv/Show/Season 01/e02.mkv', sonarr_id: 12, episode: 345 },
      { file_path: '/tv/Show/Season 01/pack.mkv', sonarr_id: 12, episode: null },
    ]);
    expect(store.findLeaf(leafKeyFromPath('path', '/tv/Show/Season 01/e02.mkv'))?.addedAt).toBe(
      '2026-02-01T00:00:00.000Z',
    );
    expect(db.inTransaction).toBe(false);
  });

  it('stores one sonarr_files row for differently spelled paths', async () => {
    const store = new SqliteLifecycleStore(db, LIFECYCLE_LAYOUTS.sonarr);
    const series = { id: 12, title: 'Show', path: '/tv/Show' };

    await new ObservationReconciler({
      store,
      model: sonarrKeyModel,
      now: () => new Date('2026-02-01T00:00:00.000Z'),
    }).run([
      { series, episode: null, file: '/tv/Show/./e.mkv' },
      { series, episode: null, file: '/tv/Show//e.mkv' },
    ]);

    expect(
      db.prepare<unknown[], { file_path: string }>('SELECT file_path FROM sonarr_files').all(),
    ).toEqual([{ file_path: '/tv/Show/e.mkv' }]);
  });
});
