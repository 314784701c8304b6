import { Injectable } from '@nestjs/common';
import type { JobContext, JobRunResult } from './jobs.types';
import { FilesystemSyncJob } from './filesystem-sync.job';
import { PlexSyncJob } from './plex-sync.job';
import { SonarrSyncJob } from './sonarr-sync.job';

@Injectable()
export class JobsHandlers {
  constructor(
    private readonly filesystemSyncJob: FilesystemSyncJob,
    private readonly plexSyncJob: PlexSyncJob,
    private readonly sonarrSyncJob: SonarrSyncJob,
  ) {}

  async run(jobId: string, ctx: JobContext): Promise<JobRunResult> {
    switch (jobId) {
      case 'filesystemSync':
        return await this.filesystemSyncJob.run(ctx);
      case 'plexSync':
        return await this.plexSyncJob.run(ctx);
      case 'sonarrSync':
        return await this.sonarrSyncJob.run(ctx);
      default:
        throw new Error(`No handler registered for jobId=${jobId}`);
    }
  }
}
