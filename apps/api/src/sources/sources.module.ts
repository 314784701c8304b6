import { Module } from '@nestjs/common';
import { PlexModule } from '../plex/plex.module';
import { SonarrModule } from '../sonarr/sonarr.module';
import { FilesystemSource } from './filesystem.source';
import { PlexLibrarySource } from './plex-library.source';
import { SonarrLibrarySource } from './sonarr-library.source';

@Module({
  imports: [PlexModule, SonarrModule],
  providers: [FilesystemSource, PlexLibrarySource, SonarrLibrarySource],
  exports: [FilesystemSource, PlexLibrarySource, SonarrLibrarySource],
})
export class SourcesModule {}
