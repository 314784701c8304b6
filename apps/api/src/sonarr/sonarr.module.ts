import { Module } from '@nestjs/common';
import { SonarrService } from './sonarr.service';

@Module({
  providers: [SonarrService],
  exports: [SonarrService],
})
export class SonarrModule {}
