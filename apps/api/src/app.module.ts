import { DynamicModule, Module } from '@nestjs/common';
import { DbModule } from './db/db.module';
import { JobsModule } from './jobs/jobs.module';
import { PlexModule } from './plex/plex.module';
import { ReportsModule } from './reports/reports.module';
import type { AppConfig } from './settings/app-config';
import { SettingsModule } from './settings/settings.module';
import { SonarrModule } from './sonarr/sonarr.module';
import { SourcesModule } from './sources/sources.module';

@Module({})
export class AppModule {
  static forRoot(config: AppConfig): DynamicModule {
    return {
      module: AppModule,
      imports: [
        SettingsModule.forRoot(config),
        DbModule,
        PlexModule,
        SonarrModule,
        SourcesModule,
        JobsModule,
        ReportsModule,
      ],
    };
  }
}
