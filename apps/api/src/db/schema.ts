import type { LeafKeyShape } from '../reconcile/entity-keys';
import type { SyncSource } from '../sources/key-models';

export type LifecycleLayout = {
  leafShape: LeafKeyShape;
  parents: { table: string; keyColumn: string; pathColumn: string | null } | null;
  children: { table: string; keyColumn: string } | null;
  leaves: {
    table: string;
    createdColumn: string | null;
    parentColumn: string | null;
    childColumn: string | null;
  };
};

// Table and column names below are the only identifiers ever interpolated
// into SQL by the lifecycle store.
export const LIFECYCLE_LAYOUTS: Record<SyncSource, LifecycleLayout> = {
  filesystem: {
    leafShape: 'composite',
    parents: null,
    children: null,
    leaves: {
      table: 'files',
      createdColumn: 'creation_date',
      parentColumn: null,
      childColumn: null,
    },
  },
  plex: {
    leafShape: 'composite',
    parents: { table: 'plex_series', keyColumn: 'plex_key', pathColumn: null },
    children: { table: 'plex_episodes', keyColumn: 'plex_key' },
    leaves: {
      table: 'plex_files',
      createdColumn: null,
      parentColumn: 'series_id',
      childColumn: 'episode_id',
    },
  },
  sonarr: {
    leafShape: 'path',
    parents: { table: 'sonarr_series', keyColumn: 'sonarr_id', pathColumn: 'path' },
    children: { table: 'sonarr_episodes', keyColumn: 'sonarr_id' },
    leaves: {
      table: 'sonarr_files',
      createdColumn: null,
      parentColumn: 'series_id',
      childColumn: 'episode_id',
    },
  },
};

export const SCHEMA_STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS scan_dirs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    dirname TEXT UNIQUE NOT NULL,
    first_added TEXT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS files (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    filename TEXT NOT NULL,
    filepath TEXT NOT NULL,
    creation_date TEXT,
    added_date TEXT NOT NULL,
    removed_date TEXT,
    UNIQUE(filename, filepath)
  )`,
  `CREATE TABLE IF NOT EXISTS plex_series (
    id INTEGER PRIMARY KEY,
    plex_key TEXT UNIQUE NOT NULL,
    title TEXT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS plex_episodes (
    id INTEGER PRIMARY KEY,
    plex_key TEXT UNIQUE NOT NULL,
    series_id INTEGER NOT NULL,
    season_number INTEGER,
    episode_number INTEGER,
    FOREIGN KEY(series_id) REFERENCES plex_series(id)
  )`,
  `CREATE TABLE IF NOT EXISTS plex_files (
    id INTEGER PRIMARY KEY,
    filename TEXT NOT NULL,
    filepath TEXT NOT NULL,
    series_id INTEGER NOT NULL,
    episode_id INTEGER,
    added_date TEXT NOT NULL,
    removed_date TEXT,
    UNIQUE(filename, filepath),
    FOREIGN KEY(series_id) REFERENCES plex_series(id),
    FOREIGN KEY(episode_id) REFERENCES plex_episodes(id)
  )`,
  `CREATE TABLE IF NOT EXISTS sonarr_series (
    id INTEGER PRIMARY KEY,
    sonarr_id INTEGER UNIQUE NOT NULL,
    title TEXT NOT NULL,
    path TEXT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS sonarr_episodes (
    id INTEGER PRIMARY KEY,
    sonarr_id INTEGER UNIQUE NOT NULL,
    series_id INTEGER NOT NULL,
    season_number INTEGER,
    episode_number INTEGER,
    FOREIGN KEY(series_id) REFERENCES sonarr_series(id)
  )`,
  `CREATE TABLE IF NOT EXISTS sonarr_files (
    id INTEGER PRIMARY KEY,
    file_path TEXT UNIQUE NOT NULL,
    series_id INTEGER NOT NULL,
    episode_id INTEGER,
    added_date TEXT NOT NULL,
    removed_date TEXT,
    FOREIGN KEY(series_id) REFERENCES sonarr_series(id),
    FOREIGN KEY(episode_id) REFERENCES sonarr_episodes(id)
  )`,
  `CREATE TABLE IF NOT EXISTS sync_runs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    job_id TEXT NOT NULL,
    source TEXT NOT NULL,
    status TEXT NOT NULL,
    dry_run INTEGER NOT NULL DEFAULT 0,
    started_at TEXT NOT NULL,
    finished_at TEXT,
    summary TEXT,
    error_message TEXT
  )`,
  `CREATE TABLE IF NOT EXISTS sync_run_logs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    run_id INTEGER NOT NULL,
    time TEXT NOT NULL,
    level TEXT NOT NULL,
    message TEXT NOT NULL,
    context TEXT,
    FOREIGN KEY(run_id) REFERENCES sync_runs(id)
  )`,
  `CREATE INDEX IF NOT EXISTS sync_runs_source_started ON sync_runs(source, started_at)`,
];
