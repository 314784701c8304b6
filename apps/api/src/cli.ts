import type { INestApplicationContext } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { Argument, Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import { APP_NAME, STATUS_DEFAULT_RUN_LIMIT } from './app.constants';
import { AppModule } from './app.module';
import { ScanDirsRepository } from './db/scan-dirs.repository';
import type { SyncRunLogLine } from './db/sync-runs.repository';
import { renderJobReport } from './jobs/job-report-v1';
import type { JobReportV1 } from './jobs/job-report-v1';
import { jobIdForSource } from './jobs/job-registry';
import { JobsService } from './jobs/jobs.service';
import type { SourceStatus } from './jobs/jobs.service';
import { CliLogger } from './logs/cli-logger';
import type { Verbosity } from './logs/cli-logger';
import { canonicalPath } from './reconcile/entity-keys';
import { errToMessage } from './reconcile/reconcile.errors';
import { UNRESOLVED_LINK_POLICIES } from './reconcile/upsert-resolver';
import type { DuplicateName, MismatchReport, PathMapping } from './reports/reports.service';
import { parsePathMapping, ReportsService } from './reports/reports.service';
import type { ConfigOverrides } from './settings/config-loader';
import { loadAppConfig } from './settings/config-loader';
import { SettingsService } from './settings/settings.service';
import { isSyncSource, SYNC_SOURCES } from './sources/key-models';

export type CliIo = {
  out: (line: string) => void;
  err: (line: string) => void;
  env: NodeJS.ProcessEnv;
};

type CommonOptions = {
  config?: string;
  db?: string;
  dataDir?: string;
  verbose?: boolean;
  quiet?: boolean;
};

type SyncOptions = CommonOptions & {
  dir: string[];
  policy?: string;
  dryRun?: boolean;
  plexUrl?: string;
  plexToken?: string;
  sonarrUrl?: string;
  sonarrApiKey?: string;
};

type StatusOptions = CommonOptions & { limit: number };

type MismatchOptions = CommonOptions & {
  map: PathMapping[];
  source?: string[];
  videoOnly?: boolean;
};

type DuplicateOptions = CommonOptions & { videoOnly?: boolean };

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function collectMapping(value: string, previous: PathMapping[]): PathMapping[] {
  try {
    return [...previous, parsePathMapping(value)];
  } catch (err) {
    throw new InvalidArgumentError(errToMessage(err));
  }
}

function commonOverrides(options: CommonOptions): ConfigOverrides {
  return { configPath: options.config, dataDir: options.dataDir, databasePath: options.db };
}

function positiveInt(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError(`Expected a positive integer, got ${value}`);
  }
  return n;
}

function verbosityOf(options: CommonOptions): Verbosity {
  if (options.verbose) return 'verbose';
  if (options.quiet) return 'quiet';
  return 'normal';
}

function isJobReport(value: unknown): value is JobReportV1 {
  return (
    Boolean(value) &&
    typeof value === 'object' &&
    value !== null &&
    'template' in value &&
    value.template === 'jobReportV1'
  );
}

function withCommonOptions(cmd: Command): Command {
  return cmd
    .option('--config <path>', 'YAML config file')
    .option('--db <path>', 'SQLite database path')
    .option('--data-dir <path>', 'data directory (lock files, default database)')
    .option('-v, --verbose', 'debug logging')
    .option('-q, --quiet', 'only warnings and errors');
}

export function formatStatus(rows: SourceStatus[]): string[] {
  const lines: string[] = [];
  for (const row of rows) {
    const last = row.lastRun;
    const lastText = last
      ? `${last.status}${last.dryRun ? ' (dry run)' : ''} at ${last.finishedAt ?? last.startedAt}`
      : 'never';
    lines.push(
      `${row.source}: ${row.activeLeaves} active, ${row.removedLeaves} removed; last run: ${lastText}`,
    );
  }
  return lines;
}

export function formatRunLogs(lines: SyncRunLogLine[]): string[] {
  return lines.map((l) => {
    const context = l.context === null ? '' : ` ${JSON.stringify(l.context)}`;
    return `${l.time} ${l.level.toUpperCase()} ${l.message}${context}`;
  });
}

export function formatMismatches(report: MismatchReport): string[] {
  const lines = report.rows.map(
    (r) => `${r.path}: in ${r.presentIn.join(', ')}; missing from ${r.missingFrom.join(', ')}`,
  );
  if (lines.length) lines.push('');
  lines.push(
    `${report.rows.length} of ${report.total} paths missing from at least one of: ${report.sources.join(', ')}`,
  );
  return lines;
}

export function formatDuplicates(rows: DuplicateName[]): string[] {
  const lines: string[] = [];
  for (const row of rows) {
    lines.push(`${row.name}: ${row.dirs.length} directories`);
    for (const dir of row.dirs) lines.push(`  ${dir}`);
  }
  if (lines.length) lines.push('');
  lines.push(`${rows.length} file names active in more than one directory`);
  return lines;
}

/**
 * Builds the command tree. Returns the exit code through `onExit` rather
 * than calling `process.exit`, so callers (and tests) stay in control.
 */
export function buildCli(io: CliIo, onExit: (code: number) => void): Command {
  const withApp = async <T>(
    overrides: ConfigOverrides,
    verbosity: Verbosity,
    fn: (app: INestApplicationContext) => Promise<T>,
  ): Promise<T> => {
    const config = await loadAppConfig({ overrides, env: io.env });
    const app = await NestFactory.createApplicationContext(AppModule.forRoot(config), {
      logger: new CliLogger(verbosity),
      abortOnError: false,
    });
    try {
      return await fn(app);
    } finally {
      await app.close();
    }
  };

  const program = new Command(APP_NAME)
    .description('Track TV media files across the filesystem, Plex and Sonarr, with add/remove history')
    .exitOverride()
    .configureOutput({
      writeOut: (s) => io.out(s.replace(/\n$/, '')),
      writeErr: (s) => io.err(s.replace(/\n$/, '')),
    });

  withCommonOptions(
    program
      .command('sync')
      .description('Run one reconciliation pass for a source')
      .addArgument(new Argument('<source>', 'what to observe').choices(SYNC_SOURCES))
      .option('-d, --dir <path>', 'register a scan directory (repeatable)', collect, [])
      .addOption(
        new Option('--policy <policy>', 'what to do with files whose episode is unknown').choices(
          UNRESOLVED_LINK_POLICIES,
        ),
      )
      .option('--dry-run', 'compute and report the pass, then roll it back')
      .option('--plex-url <url>', 'Plex server URL')
      .option('--plex-token <token>', 'Plex token')
      .option('--sonarr-url <url>', 'Sonarr URL')
      .option('--sonarr-api-key <key>', 'Sonarr API key'),
  ).action(async (source: string, options: SyncOptions) => {
    if (!isSyncSource(source)) throw new Error(`Unknown source: ${source}`);
    const overrides: ConfigOverrides = {
      ...commonOverrides(options),
      unresolvedPolicy: options.policy,
      plexUrl: options.plexUrl,
      plexToken: options.plexToken,
      sonarrUrl: options.sonarrUrl,
      sonarrApiKey: options.sonarrApiKey,
    };

    const outcome = await withApp(overrides, verbosityOf(options), async (app) =>
      app.get(JobsService).runJob({
        jobId: jobIdForSource(source),
        dryRun: Boolean(options.dryRun),
        input: { dirs: options.dir },
      }),
    );

    const { run } = outcome;
    if (run.status !== 'SUCCESS') {
      io.err(`Sync ${source} failed (run #${run.id}): ${run.errorMessage ?? errToMessage(outcome.error)}`);
      onExit(1);
      return;
    }
    if (isJobReport(run.summary)) {
      for (const line of renderJobReport(run.summary)) io.out(line);
    }
    onExit(0);
  });

  withCommonOptions(
    program
      .command('status')
      .description('Show inventory counts and recent runs')
      .addArgument(new Argument('[source]', 'limit to one source').choices(SYNC_SOURCES))
      .option('-n, --limit <n>', 'recent runs to list', positiveInt, STATUS_DEFAULT_RUN_LIMIT),
  ).action(async (source: string | undefined, options: StatusOptions) => {
    const only = source !== undefined && isSyncSource(source) ? source : undefined;
    const lines = await withApp(
      commonOverrides(options),
      verbosityOf(options),
      async (app) => {
        const jobs = app.get(JobsService);
        const out = formatStatus(jobs.sourceStatus(only));
        const runs = jobs.listRuns({ source: only, take: options.limit });
        if (runs.length) out.push('', 'Recent runs:');
        for (const run of runs) {
          const error = run.errorMessage ? ` ${run.errorMessage}` : '';
          out.push(
            `  #${run.id} ${run.source} ${run.status}${run.dryRun ? ' (dry run)' : ''} ${run.startedAt}${error}`,
          );
        }
        return out;
      },
    );
    for (const line of lines) io.out(line);
    onExit(0);
  });

  withCommonOptions(
    program
      .command('logs')
      .description('Print the log lines recorded for a run')
      .argument('<runId>', 'run number, as shown by status', positiveInt),
  ).action(async (runId: number, options: CommonOptions) => {
    const lines = await withApp(commonOverrides(options), verbosityOf(options), async (app) =>
      formatRunLogs(app.get(JobsService).getRunLogs(runId)),
    );
    for (const line of lines) io.out(line);
    onExit(0);
  });

  const dirs = program.command('dirs').description('Manage the directories the filesystem sync walks');

  withCommonOptions(dirs.command('list').description('List registered scan directories')).action(
    async (options: CommonOptions) => {
      const registered = await withApp(commonOverrides(options), verbosityOf(options), async (app) =>
        app.get(ScanDirsRepository).list(),
      );
      if (!registered.length) io.out('No scan directories registered');
      for (const d of registered) io.out(`${d.dirname} (since ${d.firstAdded})`);
      onExit(0);
    },
  );

  withCommonOptions(
    dirs
      .command('remove')
      .description('Stop walking a directory; its files are marked removed by the next sync')
      .argument('<path>', 'registered directory'),
  ).action(async (path: string, options: CommonOptions) => {
    const dir = canonicalPath(path);
    const outcome = await withApp(commonOverrides(options), verbosityOf(options), async (app) => ({
      removed: app.get(ScanDirsRepository).unregister(dir),
      configured: app
        .get(SettingsService)
        .filesystemDirs.some((d) => canonicalPath(d) === dir),
    }));
    if (!outcome.removed) {
      io.err(`Not a registered scan directory: ${dir}`);
      onExit(1);
      return;
    }
    io.out(`Unregistered scan directory: ${dir}`);
    if (outcome.configured) {
      io.err(`Warning: ${dir} is still listed in filesystem.dirs and will be registered again`);
    }
    onExit(0);
  });

  const report = program.command('report').description('Read-only reports over the tracked files');

  withCommonOptions(
    report
      .command('mismatches')
      .description('Active files missing from at least one source')
      .option('--map <from=to>', 'rewrite a path prefix before comparing (repeatable)', collectMapping, [])
      .addOption(
        new Option('-s, --source <sources...>', 'sources to compare (default: all)').choices(
          SYNC_SOURCES,
        ),
      )
      .option('--video-only', 'only video files'),
  ).action(async (options: MismatchOptions) => {
    const sources = options.source?.filter(isSyncSource);
    const lines = await withApp(commonOverrides(options), verbosityOf(options), async (app) =>
      formatMismatches(
        app.get(ReportsService).mismatches({
          sources,
          maps: options.map,
          videoOnly: Boolean(options.videoOnly),
        }),
      ),
    );
    for (const line of lines) io.out(line);
    onExit(0);
  });

  withCommonOptions(
    report
      .command('duplicates')
      .description('File names active in more than one directory')
      .addArgument(
        new Argument('[source]', 'source to inspect').choices(SYNC_SOURCES).default('filesystem'),
      )
      .option('--video-only', 'only video files'),
  ).action(async (source: string, options: DuplicateOptions) => {
    if (!isSyncSource(source)) throw new Error(`Unknown source: ${source}`);
    const lines = await withApp(commonOverrides(options), verbosityOf(options), async (app) =>
      formatDuplicates(
        app.get(ReportsService).duplicates({ source, videoOnly: Boolean(options.videoOnly) }),
      ),
    );
    for (const line of lines) io.out(line);
    onExit(0);
  });

  return program;
}

export async function runCli(argv: string[], io: CliIo): Promise<number> {
  let exitCode = 0;
  const program = buildCli(io, (code) => {
    exitCode = code;
  });
  try {
    await program.parseAsync(argv, { from: 'user' });
    return exitCode;
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    io.err(`Error: ${errToMessage(err)}`);
    return 1;
  }
}
