import { Injectable } from '@nestjs/common';
import { SonarrService } from '../sonarr/sonarr.service';
import type { SonarrConnectionParams, SonarrEpisode } from '../sonarr/sonarr.types';
import type { SonarrObservation } from './key-models';
import type { SourceListener } from './observation-source';

/** Every episode file Sonarr tracks, linked to its first episode when known. */
@Injectable()
export class SonarrLibrarySource {
  constructor(private readonly sonarr: SonarrService) {}

  async *observe(
    conn: SonarrConnectionParams,
    listener?: SourceListener,
  ): AsyncGenerator<SonarrObservation> {
    const seriesList = await this.sonarr.listSeries(conn);
    await listener?.({ kind: 'section', label: 'Series found', count: seriesList.length });

    for (const series of seriesList) {
      const episodes = await this.sonarr.getEpisodesBySeries({
        ...conn,
        seriesId: series.id,
      });
      const episodeById = new Map<number, SonarrEpisode>(episodes.map((e) => [e.id, e]));

      const files = await this.sonarr.getEpisodeFilesBySeries({
        ...conn,
        seriesId: series.id,
      });
      await listener?.({ kind: 'series', label: series.title, count: files.length });

      for (const ef of files) {
        // Season packs and multi-episode files link to their first episode only.
        const firstId = ef.episodeIds?.[0];
        const ep = firstId === undefined ? undefined : episodeById.get(firstId);
        yield {
          series: { id: series.id, title: series.title, path: series.path },
          episode: ep
            ? {
                id: ep.id,
                seasonNumber: ep.seasonNumber ?? null,
                episodeNumber: ep.episodeNumber ?? null,
              }
            : null,
          file: ef.path,
        };
      }
    }
  }
}
