import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigError, loadAppConfig, readConfigFile } from './config-loader';

describe('loadAppConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tvledger-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('falls back to defaults under the data directory', async () => {
    const config = await loadAppConfig({ env: { TVLEDGER_DATA_DIR: dir } });

    expect(config).toEqual({
      dataDir: dir,
      databasePath: join(dir, 'tvledger.sqlite'),
      unresolvedPolicy: 'insert-unlinked',
      plex: { baseUrl: null, token: null },
      sonarr: { baseUrl: null, apiKey: null },
      filesystem: { dirs: [] },
    });
  });

  it('reads the YAML config file from the data directory', async () => {
    await writeFile(
      join(dir, 'tvledger.yaml'),
      [
        'database: ledger.db',
        'unresolved_policy: drop-unresolved',
        'plex:',
        '  url: http://plex.local:32400/',
        '  token: test-token',
        'sonarr:',
        '  url: http://sonarr.local:8989',
        '  api_key: test-api-key',
        'filesystem:',
        '  dirs:',
        '    - /tv',
        '',
      ].join('\n'),
    );

    const config = await loadAppConfig({ env: { TVLEDGER_DATA_DIR: dir } });

    expect(config).toEqual({
      dataDir: dir,
      databasePath: join(dir, 'ledger.db'),
      unresolvedPolicy: 'drop-unresolved',
      plex: { baseUrl: 'http://plex.local:32400', token: 'test-token' },
      sonarr: { baseUrl: 'http://sonarr.local:8989', apiKey: 'test-api-key' },
      filesystem: { dirs: ['/tv'] },
    });
  });

  it('lets env override the file and flags override env', async () => {
    await writeFile(
      join(dir, 'tvledger.yaml'),
      'plex:\n  url: http://from-file:32400\n  token: file-token\n',
    );

    const fromEnv = await loadAppConfig({
      env: { TVLEDGER_DATA_DIR: dir, PLEX_URL: 'http://from-env:32400' },
    });
    expect(fromEnv.plex).toEqual({ baseUrl: 'http://from-env:32400', token: 'file-token' });

    const fromFlags = await loadAppConfig({
      env: { TVLEDGER_DATA_DIR: dir, PLEX_URL: 'http://from-env:32400' },
      overrides: { plexUrl: 'http://from-flag:32400', databasePath: ':memory:' },
    });
    expect(fromFlags.plex.baseUrl).toBe('http://from-flag:32400');
    expect(fromFlags.databasePath).toBe(':memory:');
  });

  it('treats an empty config file as no settings', async () => {
    await writeFile(join(dir, 'tvledger.yaml'), '');
    const config = await loadAppConfig({ env: { TVLEDGER_DATA_DIR: dir } });
    expect(config.unresolvedPolicy).toBe('insert-unlinked');
  });

  it('rejects an unknown unresolved policy', async () => {
    await expect(
      loadAppConfig({ env: { TVLEDGER_DATA_DIR: dir, TVLEDGER_UNRESOLVED_POLICY: 'ignore' } }),
    ).rejects.toThrow(
      'Invalid configuration: unresolvedPolicy: Expected one of: insert-unlinked, drop-unresolved',
    );
  });

  it('rejects a non-http service URL', async () => {
    await expect(
      loadAppConfig({ env: { TVLEDGER_DATA_DIR: dir, PLEX_URL: 'ftp://plex.local' } }),
    ).rejects.toThrow('Invalid configuration: plex.baseUrl: Expected an http(s) URL');
  });

  it('fails when an explicitly named config file is missing', async () => {
    const missing = join(dir, 'nope.yaml');
    await expect(
      loadAppConfig({ env: { TVLEDGER_DATA_DIR: dir }, overrides: { configPath: missing } }),
    ).rejects.toThrow(`Cannot read config file ${missing}`);
  });
});

describe('readConfigFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tvledger-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns an empty object for a missing optional file', async () => {
    await expect(readConfigFile(join(dir, 'absent.yaml'), false)).resolves.toEqual({});
  });

  it('names unknown keys', async () => {
    const path = join(dir, 'bad.yaml');
    await writeFile(path, 'plx:\n  url: http://plex\n');

    const err = await readConfigFile(path, true).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ConfigError);
    expect(err).toHaveProperty(
      'message',
      `Invalid config file ${path}: (root): Unrecognized key(s) in object: 'plx'`,
    );
  });

  it('reports YAML syntax errors', async () => {
    const path = join(dir, 'broken.yaml');
    await writeFile(path, 'plex: [unclosed\n');
    await expect(readConfigFile(path, true)).rejects.toThrow(
      `Config file ${path} is not valid YAML`,
    );
  });
});
