import type { EntityKeyModel } from '../reconcile/entity-keys';
import { compositeLeafKey, leafKeyFromPath } from '../reconcile/entity-keys';

export type SyncSource = 'filesystem' | 'plex' | 'sonarr';

export const SYNC_SOURCES: readonly SyncSource[] = ['filesystem', 'plex', 'sonarr'];

export function isSyncSource(value: string): value is SyncSource {
  return SYNC_SOURCES.some((s) => s === value);
}

export type FilesystemObservation = {
  dir: string;
  name: string;
  ctime: Date | null;
};

export type PlexObservation = {
  series: { key: string; title: string };
  episode: {
    key: string;
    seasonNumber: number | null;
    episodeNumber: number | null;
  } | null;
  file: string;
};

export type SonarrObservation = {
  series: { id: number; title: string; path: string };
  episode: {
    id: number;
    seasonNumber: number | null;
    episodeNumber: number | null;
  } | null;
  file: string;
};

export const filesystemKeyModel: EntityKeyModel<FilesystemObservation> = {
  leafShape: 'composite',
  links: { parent: 'none', child: 'none' },
  extract: (raw) => ({
    parent: null,
    child: null,
    leaf: {
      key: compositeLeafKey(raw.dir, raw.name),
      attributes: { createdAt: raw.ctime ? raw.ctime.toISOString() : null },
    },
  }),
};

export const plexKeyModel: EntityKeyModel<PlexObservation> = {
  leafShape: 'composite',
  links: { parent: 'required', child: 'optional' },
  extract: (raw) => ({
    parent: raw.series.key
      ? { key: raw.series.key, attributes: { title: raw.series.title, path: null } }
      : null,
    child:
      raw.episode && raw.episode.key
        ? {
            key: raw.episode.key,
            attributes: {
              seasonNumber: raw.episode.seasonNumber,
              episodeNumber: raw.episode.episodeNumber,
            },
          }
        : null,
    leaf: {
      key: leafKeyFromPath('composite', raw.file),
      attributes: { createdAt: null },
    },
  }),
};

export const sonarrKeyModel: EntityKeyModel<SonarrObservation> = {
  leafShape: 'path',
  links: { parent: 'required', child: 'optional' },
  extract: (raw) => ({
    parent: {
      key: String(raw.series.id),
      attributes: { title: raw.series.title, path: raw.series.path },
    },
    child: raw.episode
      ? {
          key: String(raw.episode.id),
          attributes: {
            seasonNumber: raw.episode.seasonNumber,
            episodeNumber: raw.episode.episodeNumber,
          },
        }
      : null,
    leaf: {
      key: leafKeyFromPath('path', raw.file),
      attributes: { createdAt: null },
    },
  }),
};
