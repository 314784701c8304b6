import { Injectable } from '@nestjs/common';
import { DatabaseService } from '../db/database.service';
import { ScanDirsRepository } from '../db/scan-dirs.repository';
import { canonicalPath } from '../reconcile/entity-keys';
import { ConfigError } from '../settings/config-loader';
import { SettingsService } from '../settings/settings.service';
import { FilesystemSource } from '../sources/filesystem.source';
import { filesystemKeyModel } from '../sources/key-models';
import type { JobContext, JobRunResult, JsonValue } from './jobs.types';
import { runSyncPass } from './sync-pass';

function stringList(value: JsonValue | undefined): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((v): v is string => typeof v === 'string' && v.trim() !== '');
}

@Injectable()
export class FilesystemSyncJob {
  constructor(
    private readonly database: DatabaseService,
    private readonly scanDirs: ScanDirsRepository,
    private readonly settings: SettingsService,
    private readonly source: FilesystemSource,
  ) {}

  async run(ctx: JobContext): Promise<JobRunResult> {
    const requested = [
      ...this.settings.filesystemDirs,
      ...stringList(ctx.input?.['dirs']),
    ].map((d) => canonicalPath(d));

    const registered = new Set(this.scanDirs.list().map((d) => d.dirname));
    for (const dir of requested) {
      if (registered.has(dir)) continue;
      if (ctx.dryRun) {
        await ctx.info(`Would register scan directory: ${dir}`);
      } else {
        this.scanDirs.register(dir);
        await ctx.info(`Registered scan directory: ${dir}`);
      }
      registered.add(dir);
    }

    const roots = [...registered].sort();
    if (!roots.length) {
      throw new ConfigError(
        'No scan directories registered: pass --dir <path> or set filesystem.dirs',
      );
    }
    await ctx.patchSummary({ roots });

    return await runSyncPass({
      ctx,
      store: this.database.lifecycleStore('filesystem'),
      model: filesystemKeyModel,
      observations: this.source.observe(roots, async (event) => {
        if (event.kind !== 'directory') return;
        await ctx.info(`Scanned: ${event.label} | files: ${event.count ?? 0}`);
      }),
      policy: this.settings.unresolvedPolicy,
      labels: { title: 'Filesystem', leafUnit: 'files' },
    });
  }
}
