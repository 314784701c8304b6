export type PlexConnectionParams = {
  baseUrl: string;
  token: string;
};

export type PlexSection = {
  key: string;
  title: string;
  type?: string;
};

export type PlexShow = {
  key: string;
  title: string;
};

export type PlexSeason = {
  key: string;
  index: number | null;
};

export type PlexEpisode = {
  key: string;
  seasonNumber: number | null;
  episodeNumber: number | null;
  files: string[];
};
