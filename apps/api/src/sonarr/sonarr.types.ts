import { z } from 'zod';

// Sonarr returns much more than this; unknown fields are kept but ignored.
export const SonarrSeriesSchema = z
  .object({
    id: z.number().int(),
    title: z.string(),
    path: z.string(),
  })
  .passthrough();

export const SonarrEpisodeSchema = z
  .object({
    id: z.number().int(),
    seasonNumber: z.number().int().nullish(),
    episodeNumber: z.number().int().nullish(),
  })
  .passthrough();

export const SonarrEpisodeFileSchema = z
  .object({
    id: z.number().int(),
    path: z.string().min(1),
    episodeIds: z.array(z.number().int()).nullish(),
  })
  .passthrough();

export type SonarrSeries = z.infer<typeof SonarrSeriesSchema>;
export type SonarrEpisode = z.infer<typeof SonarrEpisodeSchema>;
export type SonarrEpisodeFile = z.infer<typeof SonarrEpisodeFileSchema>;

export type SonarrConnectionParams = {
  baseUrl: string;
  apiKey: string;
};
