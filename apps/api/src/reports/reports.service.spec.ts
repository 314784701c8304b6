import { Test } from '@nestjs/testing';
import type { TestingModule } from '@nestjs/testing';
import { tmpdir } from 'node:os';
import { DatabaseService } from '../db/database.service';
import { leafKeyFromPath } from '../reconcile/entity-keys';
import type { AppConfig } from '../settings/app-config';
import { SettingsModule } from '../settings/settings.module';
import type { SyncSource } from '../sources/key-models';
import { ReportsModule } from './reports.module';
import {
  applyPathMappings,
  isVideoFile,
  parsePathMapping,
  ReportsService,
} from './reports.service';

const ADDED = '2026-03-01T00:00:00.000Z';
const REMOVED = '2026-03-02T00:00:00.000Z';

const config: AppConfig = {
  dataDir: tmpdir(),
  databasePath: ':memory:',
  unresolvedPolicy: 'insert-unlinked',
  plex: { baseUrl: null, token: null },
  sonarr: { baseUrl: null, apiKey: null },
  filesystem: { dirs: [] },
};

describe('ReportsService', () => {
  let moduleRef: TestingModule;
  let reports: ReportsService;
  let database: DatabaseService;

  function track(source: SyncSource, paths: string[], opts: { removed?: boolean } = {}) {
    const store = database.lifecycleStore(source);
    const seriesId =
      source === 'filesystem'
        ? null
        : (store.findByKey('parent', '1') ??
          store.insertParent('1', { title: 'Show', path: '/tv/Show' }));
    for (const path of paths) {
      const id = store.insertLeaf(leafKeyFromPath(store.leafShape, path), {
        attributes: { createdAt: null },
        parentId: seriesId,
        childId: null,
        addedAt: ADDED,
      });
      if (opts.removed) store.markRemoved(id, REMOVED);
    }
  }

  beforeEach(async () => {
    moduleRef = await Test.createTestingModule({
      imports: [SettingsModule.forRoot(config), ReportsModule],
    }).compile();
    await moduleRef.init();
    reports = moduleRef.get(ReportsService);
    database = moduleRef.get(DatabaseService);
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  describe('mismatches', () => {
    beforeEach(() => {
      track('filesystem', [
        '/mnt/nas/tv/Show/e01.mkv',
        '/mnt/nas/tv/Show/e02.mkv',
        '/mnt/nas/tv/Show/notes.txt',
      ]);
      track('filesystem', ['/mnt/nas/tv/Old/e01.mkv'], { removed: true });
      track('sonarr', ['/tv/Show/e01.mkv', '/tv/Show/e03.mkv']);
      track('plex', ['/tv/Show/e01.mkv', '/tv/Show/e02.mkv']);
    });

    it('lists active paths missing from some source after mapping prefixes', () => {
      const report = reports.mismatches({ maps: [{ from: '/mnt/nas/tv/', to: '/tv/' }] });

      expect(report).toEqual({
        sources: ['filesystem', 'plex', 'sonarr'],
        total: 4,
        rows: [
          { path: '/tv/Show/e02.mkv', presentIn: ['filesystem', 'plex'], missingFrom: ['sonarr'] },
          { path: '/tv/Show/e03.mkv', presentIn: ['sonarr'], missingFrom: ['filesystem', 'plex'] },
          {
            path: '/tv/Show/notes.txt',
            presentIn: ['filesystem'],
            missingFrom: ['plex', 'sonarr'],
          },
        ],
      });
    });

    it('can restrict the comparison to video files and to some sources', () => {
      const report = reports.mismatches({
        sources: ['sonarr', 'filesystem'],
        maps: [{ from: '/mnt/nas/tv/', to: '/tv/' }],
        videoOnly: true,
      });

      expect(report).toEqual({
        sources: ['filesystem', 'sonarr'],
        total: 3,
        rows: [
          { path: '/tv/Show/e02.mkv', presentIn: ['filesystem'], missingFrom: ['sonarr'] },
          { path: '/tv/Show/e03.mkv', presentIn: ['sonarr'], missingFrom: ['filesystem'] },
        ],
      });
    });

    it('needs two sources to compare', () => {
      expect(() => reports.mismatches({ sources: ['plex'] })).toThrow(
        'Pick at least two sources to compare',
      );
    });
  });

  describe('duplicates', () => {
    it('groups active file names found in several directories, most copies first', () => {
      track('filesystem', [
        '/a/x.mkv',
        '/b/x.mkv',
        '/c/x.mkv',
        '/a/y.mkv',
        '/b/y.mkv',
        '/a/z.txt',
        '/b/z.txt',
        '/a/solo.mkv',
      ]);
      track('filesystem', ['/d/x.mkv'], { removed: true });

      expect(reports.duplicates({ source: 'filesystem' })).toEqual([
        { name: 'x.mkv', dirs: ['/a', '/b', '/c'] },
        { name: 'y.mkv', dirs: ['/a', '/b'] },
        { name: 'z.txt', dirs: ['/a', '/b'] },
      ]);
      expect(reports.duplicates({ source: 'filesystem', videoOnly: true })).toEqual([
        { name: 'x.mkv', dirs: ['/a', '/b', '/c'] },
        { name: 'y.mkv', dirs: ['/a', '/b'] },
      ]);
    });

    it('splits path-keyed files into directory and name', () => {
      track('sonarr', ['/tv/A/e.mkv', '/tv/B/e.mkv', '/tv/B/f.mkv']);

      expect(reports.duplicates({ source: 'sonarr' })).toEqual([
        { name: 'e.mkv', dirs: ['/tv/A', '/tv/B'] },
      ]);
    });
  });
});

describe('path mappings', () => {
  it('parses <from>=<to>, allowing an empty target', () => {
    expect(parsePathMapping('/mnt/nas/=/tv/')).toEqual({ from: '/mnt/nas/', to: '/tv/' });
    expect(parsePathMapping('/mnt/p2p/=')).toEqual({ from: '/mnt/p2p/', to: '' });
    expect(() => parsePathMapping('=/tv/')).toThrow('Expected <from>=<to>, got =/tv/');
    expect(() => parsePathMapping('/tv')).toThrow('Expected <from>=<to>, got /tv');
  });

  it('applies the first matching prefix only', () => {
    const maps = [
      { from: '/mnt/a/', to: '/x/' },
      { from: '/mnt/', to: '/y/' },
    ];
    expect(applyPathMappings('/mnt/a/e.mkv', maps)).toBe('/x/e.mkv');
    expect(applyPathMappings('/mnt/b/e.mkv', maps)).toBe('/y/b/e.mkv');
    expect(applyPathMappings('/srv/e.mkv', maps)).toBe('/srv/e.mkv');
  });

  it('recognises video extensions case-insensitively', () => {
    expect(isVideoFile('Show.S01E01.MKV')).toBe(true);
    expect(isVideoFile('clip.ts')).toBe(true);
    expect(isVideoFile('Show.S01E01.srt')).toBe(false);
    expect(isVideoFile('README')).toBe(false);
  });
});
