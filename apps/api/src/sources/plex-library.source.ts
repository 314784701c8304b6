import { Injectable } from '@nestjs/common';
import { PlexServerService } from '../plex/plex-server.service';
import type { PlexConnectionParams } from '../plex/plex.types';
import type { PlexObservation } from './key-models';
import type { SourceListener } from './observation-source';

/** Every media part of every episode in every Plex TV library. */
@Injectable()
export class PlexLibrarySource {
  constructor(private readonly plexServer: PlexServerService) {}

  async *observe(
    conn: PlexConnectionParams,
    listener?: SourceListener,
  ): AsyncGenerator<PlexObservation> {
    const sections = await this.plexServer.getShowSections(conn);
    await listener?.({ kind: 'section', label: 'TV libraries found', count: sections.length });

    for (const section of sections) {
      await listener?.({ kind: 'section', label: section.title || section.key });
      const shows = await this.plexServer.listSectionShows({
        ...conn,
        sectionKey: section.key,
      });

      for (const show of shows) {
        await listener?.({ kind: 'series', label: show.title || show.key });
        // A show without a key cannot be walked; its files stay unseen.
        if (!show.key) continue;

        const seasons = await this.plexServer.listSeasons({ ...conn, showKey: show.key });
        for (const season of seasons) {
          const episodes = await this.plexServer.listEpisodes({
            ...conn,
            seasonKey: season.key,
          });

          for (const ep of episodes) {
            for (const file of ep.files) {
              yield {
                series: { key: show.key, title: show.title },
                episode: ep.key
                  ? {
                      key: ep.key,
                      seasonNumber: season.index ?? ep.seasonNumber,
                      episodeNumber: ep.episodeNumber,
                    }
                  : null,
                file,
              };
            }
          }
        }
      }
    }
  }
}
