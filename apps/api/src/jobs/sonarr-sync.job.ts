import { Injectable } from '@nestjs/common';
import { DatabaseService } from '../db/database.service';
import { SettingsService } from '../settings/settings.service';
import { sonarrKeyModel } from '../sources/key-models';
import { SonarrLibrarySource } from '../sources/sonarr-library.source';
import type { JobContext, JobRunResult } from './jobs.types';
import { runSyncPass } from './sync-pass';

@Injectable()
export class SonarrSyncJob {
  constructor(
    private readonly database: DatabaseService,
    private readonly settings: SettingsService,
    private readonly source: SonarrLibrarySource,
  ) {}

  async run(ctx: JobContext): Promise<JobRunResult> {
    const conn = this.settings.requireSonarrConnection();

    return await runSyncPass({
      ctx,
      store: this.database.lifecycleStore('sonarr'),
      model: sonarrKeyModel,
      observations: this.source.observe(conn, async (event) => {
        if (event.kind === 'section') {
          await ctx.info(`${event.label}: ${event.count ?? 0}`);
        } else if (event.kind === 'series') {
          await ctx.debug(`Series: ${event.label} | files: ${event.count ?? 0}`);
        }
      }),
      policy: this.settings.unresolvedPolicy,
      labels: { title: 'Sonarr', leafUnit: 'files' },
    });
  }
}
