import { Injectable } from '@nestjs/common';
import { DatabaseService } from '../db/database.service';
import { SettingsService } from '../settings/settings.service';
import { plexKeyModel } from '../sources/key-models';
import { PlexLibrarySource } from '../sources/plex-library.source';
import type { JobContext, JobRunResult } from './jobs.types';
import { runSyncPass } from './sync-pass';

@Injectable()
export class PlexSyncJob {
  constructor(
    private readonly database: DatabaseService,
    private readonly settings: SettingsService,
    private readonly source: PlexLibrarySource,
  ) {}

  async run(ctx: JobContext): Promise<JobRunResult> {
    const conn = this.settings.requirePlexConnection();

    return await runSyncPass({
      ctx,
      store: this.database.lifecycleStore('plex'),
      model: plexKeyModel,
      observations: this.source.observe(conn, async (event) => {
        if (event.kind === 'section') {
          await ctx.info(
            event.count === undefined
              ? `Library: ${event.label}`
              : `${event.label}: ${event.count}`,
          );
        } else if (event.kind === 'series') {
          await ctx.debug(`Series: ${event.label}`);
        }
      }),
      policy: this.settings.unresolvedPolicy,
      labels: { title: 'Plex', leafUnit: 'files' },
    });
  }
}
