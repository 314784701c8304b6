import { Injectable } from '@nestjs/common';
import type { SyncSource } from '../sources/key-models';
import { DatabaseService } from './database.service';

export type SyncRunStatus = 'RUNNING' | 'SUCCESS' | 'FAILED';

export type SyncRun = {
  id: number;
  jobId: string;
  source: string;
  status: SyncRunStatus;
  dryRun: boolean;
  startedAt: string;
  finishedAt: string | null;
  /** Parsed summary JSON; shape depends on the job. */
  summary: unknown;
  errorMessage: string | null;
};

export type SyncRunLogLine = {
  time: string;
  level: string;
  message: string;
  context: unknown;
};

type SyncRunRow = {
  id: number;
  job_id: string;
  source: string;
  status: string;
  dry_run: number;
  started_at: string;
  finished_at: string | null;
  summary: string | null;
  error_message: string | null;
};

type LogRow = { time: string; level: string; message: string; context: string | null };

function parseJson(text: string | null): unknown {
  if (text === null) return null;
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
}

function toStatus(value: string): SyncRunStatus {
  return value === 'SUCCESS' || value === 'FAILED' ? value : 'RUNNING';
}

function toRun(row: SyncRunRow): SyncRun {
  return {
    id: row.id,
    jobId: row.job_id,
    source: row.source,
    status: toStatus(row.status),
    dryRun: row.dry_run === 1,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
    summary: parseJson(row.summary),
    errorMessage: row.error_message,
  };
}

/** Run history: one `sync_runs` row per invocation plus its log lines. */
@Injectable()
export class SyncRunsRepository {
  constructor(private readonly database: DatabaseService) {}

  create(params: {
    jobId: string;
    source: SyncSource;
    dryRun: boolean;
    startedAt: Date;
  }): SyncRun {
    const info = this.database.connection
      .prepare(
        `INSERT INTO sync_runs (job_id, source, status, dry_run, started_at)
         VALUES (?, ?, 'RUNNING', ?, ?)`,
      )
      .run(params.jobId, params.source, params.dryRun ? 1 : 0, params.startedAt.toISOString());
    return this.require(Number(info.lastInsertRowid));
  }

  finish(params: {
    runId: number;
    status: Exclude<SyncRunStatus, 'RUNNING'>;
    finishedAt: Date;
    summary: unknown;
    errorMessage: string | null;
  }): SyncRun {
    this.database.connection
      .prepare(
        `UPDATE sync_runs SET status = ?, finished_at = ?, summary = ?, error_message = ?
         WHERE id = ?`,
      )
      .run(
        params.status,
        params.finishedAt.toISOString(),
        params.summary === null || params.summary === undefined
          ? null
          : JSON.stringify(params.summary),
        params.errorMessage,
        params.runId,
      );
    return this.require(params.runId);
  }

  appendLogs(runId: number, lines: SyncRunLogLine[]): void {
    if (!lines.length) return;
    const db = this.database.connection;
    const insert = db.prepare(
      'INSERT INTO sync_run_logs (run_id, time, level, message, context) VALUES (?, ?, ?, ?, ?)',
    );
    db.transaction((batch: SyncRunLogLine[]) => {
      for (const line of batch) {
        insert.run(
          runId,
          line.time,
          line.level,
          line.message,
          line.context === null || line.context === undefined
            ? null
            : JSON.stringify(line.context),
        );
      }
    })(lines);
  }

  get(runId: number): SyncRun | null {
    const row = this.database.connection
      .prepare<unknown[], SyncRunRow>('SELECT * FROM sync_runs WHERE id = ?')
      .get(runId);
    return row ? toRun(row) : null;
  }

  list(params: { source?: SyncSource; take: number }): SyncRun[] {
    const db = this.database.connection;
    const rows = params.source
      ? db
          .prepare<unknown[], SyncRunRow>(
            'SELECT * FROM sync_runs WHERE source = ? ORDER BY started_at DESC, id DESC LIMIT ?',
          )
          .all(params.source, params.take)
      : db
          .prepare<unknown[], SyncRunRow>(
            'SELECT * FROM sync_runs ORDER BY started_at DESC, id DESC LIMIT ?',
          )
          .all(params.take);
    return rows.map(toRun);
  }

  logs(runId: number): SyncRunLogLine[] {
    return this.database.connection
      .prepare<unknown[], LogRow>(
        'SELECT time, level, message, context FROM sync_run_logs WHERE run_id = ? ORDER BY id',
      )
      .all(runId)
      .map((row) => ({
        time: row.time,
        level: row.level,
        message: row.message,
        context: parseJson(row.context),
      }));
  }

  private require(runId: number): SyncRun {
    const run = this.get(runId);
    if (!run) throw new Error(`Sync run ${runId} not found`);
    return run;
  }
}
