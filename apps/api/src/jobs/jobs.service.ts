import {
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { join } from 'node:path';
import { STATUS_DEFAULT_RUN_LIMIT } from '../app.constants';
import { DatabaseService } from '../db/database.service';
import type { SyncRun, SyncRunLogLine } from '../db/sync-runs.repository';
import { SyncRunsRepository } from '../db/sync-runs.repository';
import { errToMessage } from '../reconcile/reconcile.errors';
import { SettingsService } from '../settings/settings.service';
import type { SyncSource } from '../sources/key-models';
import { SYNC_SOURCES } from '../sources/key-models';
import { findJobDefinition } from './job-registry';
import { JobsHandlers } from './jobs.handlers';
import type { JobContext, JobLogLevel, JsonObject } from './jobs.types';
import { acquireRunLock } from './run-lock';

export type SourceStatus = {
  source: SyncSource;
  activeLeaves: number;
  removedLeaves: number;
  lastRun: SyncRun | null;
};

export type JobRunOutcome = {
  run: SyncRun;
  /** The failure, when `run.status` is FAILED. */
  error: unknown;
};

@Injectable()
export class JobsService {
  private readonly logger = new Logger(JobsService.name);
  private readonly runningSources = new Set<SyncSource>();

  constructor(
    private readonly database: DatabaseService,
    private readonly runs: SyncRunsRepository,
    private readonly settings: SettingsService,
    private readonly handlers: JobsHandlers,
  ) {}

  lockPath(source: SyncSource): string {
    return join(this.settings.dataDir, `${source}.lock`);
  }

  /**
   * Runs a sync job to completion. Refuses to start while another run of the
   * same source is active in this process or holds the source's lock file.
   * Failures inside the job are recorded on the run rather than thrown.
   */
  async runJob(params: {
    jobId: string;
    dryRun: boolean;
    input?: JsonObject;
  }): Promise<JobRunOutcome> {
    const { jobId, dryRun, input } = params;
    const def = findJobDefinition(jobId);
    if (!def) throw new NotFoundException(`Unknown job: ${jobId}`);
    const source = def.source;

    if (this.runningSources.has(source)) {
      throw new ConflictException(`Sync already running: ${source}`);
    }
    this.runningSources.add(source);

    try {
      const lockPath = this.lockPath(source);
      const acquired = await acquireRunLock(lockPath);
      if (!acquired.acquired) {
        throw new ConflictException(
          `Sync already running: ${source} (pid ${acquired.holderPid ?? 'unknown'}, lock ${lockPath})`,
        );
      }

      try {
        return await this.executeJobRun({ jobId, source, dryRun, input });
      } finally {
        await acquired.lock.release();
      }
    } finally {
      this.runningSources.delete(source);
    }
  }

  private async executeJobRun(params: {
    jobId: string;
    source: SyncSource;
    dryRun: boolean;
    input?: JsonObject;
  }): Promise<JobRunOutcome> {
    const { jobId, source, dryRun, input } = params;
    const run = this.runs.create({ jobId, source, dryRun, startedAt: new Date() });

    // Log lines are buffered and written once the pass transaction is closed;
    // written earlier they would share its fate on rollback.
    const buffered: SyncRunLogLine[] = [];
    let summaryCache: JsonObject | null = null;

    const log = async (
      level: JobLogLevel,
      message: string,
      context?: JsonObject,
    ) => {
      buffered.push({
        time: new Date().toISOString(),
        level,
        message,
        context: context ?? null,
      });
      const line = `[${jobId}#${run.id}] ${message}`;
      if (level === 'error') this.logger.error(line);
      else if (level === 'warn') this.logger.warn(line);
      else if (level === 'debug') this.logger.debug(line);
      else this.logger.log(line);
    };

    const ctx: JobContext = {
      jobId,
      runId: run.id,
      source,
      dryRun,
      input,
      getSummary: () => summaryCache,
      setSummary: async (summary) => {
        summaryCache = summary;
      },
      patchSummary: async (patch) => {
        summaryCache = { ...(summaryCache ?? {}), ...patch };
      },
      log,
      debug: (m, c) => log('debug', m, c),
      info: (m, c) => log('info', m, c),
      warn: (m, c) => log('warn', m, c),
      error: (m, c) => log('error', m, c),
    };

    try {
      await ctx.setSummary({ phase: 'starting', dryRun });
      await ctx.info('run: started', { dryRun, input: input ?? null });
      const result = await this.handlers.run(jobId, ctx);
      await ctx.info('run: finished');

      this.flushLogs(run.id, buffered);
      const finished = this.runs.finish({
        runId: run.id,
        status: 'SUCCESS',
        finishedAt: new Date(),
        summary: result.report,
        errorMessage: null,
      });
      return { run: finished, error: null };
    } catch (err) {
      const msg = errToMessage(err);
      await ctx.error('run: failed', { error: msg });
      this.flushLogs(run.id, buffered);
      const finished = this.runs.finish({
        runId: run.id,
        status: 'FAILED',
        finishedAt: new Date(),
        summary: ctx.getSummary(),
        errorMessage: msg,
      });
      return { run: finished, error: err };
    }
  }

  private flushLogs(runId: number, lines: SyncRunLogLine[]) {
    try {
      this.runs.appendLogs(runId, lines);
    } catch (err) {
      this.logger.warn(`[run#${runId}] log write failed: ${errToMessage(err)}`);
    }
  }

  listRuns(params: { source?: SyncSource; take?: number }): SyncRun[] {
    return this.runs.list({
      source: params.source,
      take: params.take ?? STATUS_DEFAULT_RUN_LIMIT,
    });
  }

  getRunLogs(runId: number): SyncRunLogLine[] {
    if (!this.runs.get(runId)) throw new NotFoundException(`Run #${runId} not found`);
    return this.runs.logs(runId);
  }

  sourceStatus(source?: SyncSource): SourceStatus[] {
    const sources = source ? [source] : SYNC_SOURCES;
    return sources.map((s) => {
      const counts = this.database.lifecycleStore(s).countLeaves();
      return {
        source: s,
        activeLeaves: counts.active,
        removedLeaves: counts.removed,
        lastRun: this.runs.list({ source: s, take: 1 })[0] ?? null,
      };
    });
  }
}
