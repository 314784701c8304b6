import { Module } from '@nestjs/common';
import { PlexServerService } from './plex-server.service';

@Module({
  providers: [PlexServerService],
  exports: [PlexServerService],
})
export class PlexModule {}
