import { Module } from '@nestjs/common';
import { DbModule } from '../db/db.module';
import { ReportsService } from './reports.service';

@Module({
  imports: [DbModule],
  providers: [ReportsService],
  exports: [ReportsService],
})
export class ReportsModule {}
