import { PlexServerService } from '../plex/plex-server.service';
import type { PlexObservation } from './key-models';
import { PlexLibrarySource } from './plex-library.source';
import type { SourceEvent } from './observation-source';

const conn = { baseUrl: 'http://plex.local:32400', token: 'test-token' };

function createSource() {
  const plex = new PlexServerService();
  jest
    .spyOn(plex, 'getShowSections')
    .mockResolvedValue([{ key: '2', title: 'TV Shows', type: 'show' }]);
  jest.spyOn(plex, 'listSectionShows').mockResolvedValue([
    { key: '/library/metadata/10/children', title: 'Show' },
    { key: '', title: 'Broken' },
  ]);
  jest
    .spyOn(plex, 'listSeasons')
    .mockResolvedValue([{ key: '/library/metadata/11/children', index: 1 }]);
  jest.spyOn(plex, 'listEpisodes').mockResolvedValue([
    {
      key: '/library/metadata/21',
      seasonNumber: null,
      episodeNumber: 1,
      files: ['/tv/Show/S01E01.mkv', '/tv/Show/S01E01.720p.mkv'],
    },
    { key: '', seasonNumber: 1, episodeNumber: 2, files: ['/tv/Show/S01E02.mkv'] },
  ]);
  return { plex, source: new PlexLibrarySource(plex) };
}

describe('PlexLibrarySource', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('yields one observation per media part with series and episode', async () => {
    const { plex, source } = createSource();
    const events: SourceEvent[] = [];
    const out: PlexObservation[] = [];

    for await (const obs of source.observe(conn, (e) => {
      events.push(e);
    })) {
      out.push(obs);
    }

    const series = { key: '/library/metadata/10/children', title: 'Show' };
    expect(out).toEqual([
      {
        series,
        episode: { key: '/library/metadata/21', seasonNumber: 1, episodeNumber: 1 },
        file: '/tv/Show/S01E01.mkv',
      },
      {
        series,
        episode: { key: '/library/metadata/21', seasonNumber: 1, episodeNumber: 1 },
        file: '/tv/Show/S01E01.720p.mkv',
      },
      { series, episode: null, file: '/tv/Show/S01E02.mkv' },
    ]);
    expect(events).toEqual([
      { kind: 'section', label: 'TV libraries found', count: 1 },
      { kind: 'section', label: 'TV Shows' },
      { kind: 'series', label: 'Show' },
      { kind: 'series', label: 'Broken' },
    ]);
    expect(plex.listSectionShows).toHaveBeenCalledWith({ ...conn, sectionKey: '2' });
    expect(plex.listSeasons).toHaveBeenCalledTimes(1);
  });
});
