import { Module } from '@nestjs/common';
import { DbModule } from '../db/db.module';
import { SourcesModule } from '../sources/sources.module';
import { FilesystemSyncJob } from './filesystem-sync.job';
import { JobsHandlers } from './jobs.handlers';
import { JobsService } from './jobs.service';
import { PlexSyncJob } from './plex-sync.job';
import { SonarrSyncJob } from './sonarr-sync.job';

@Module({
  imports: [DbModule, SourcesModule],
  providers: [
    JobsService,
    JobsHandlers,
    FilesystemSyncJob,
    PlexSyncJob,
    SonarrSyncJob,
  ],
  exports: [JobsService],
})
export class JobsModule {}
