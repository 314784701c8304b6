import { Module } from '@nestjs/common';
import { DatabaseService } from './database.service';
import { ReportsRepository } from './reports.repository';
import { ScanDirsRepository } from './scan-dirs.repository';
import { SyncRunsRepository } from './sync-runs.repository';

@Module({
  providers: [DatabaseService, ReportsRepository, ScanDirsRepository, SyncRunsRepository],
  exports: [DatabaseService, ReportsRepository, ScanDirsRepository, SyncRunsRepository],
})
export class DbModule {}
