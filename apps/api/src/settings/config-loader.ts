import { readFile } from 'node:fs/promises';
import { dirname, isAbsolute, join, resolve } from 'node:path';
import YAML from 'yaml';
import { CONFIG_FILE_NAME } from '../app.constants';
import { ensureBootstrapEnv } from '../bootstrap-env';
import type { AppConfig, ConfigFile } from './app-config';
import { AppConfigSchema, ConfigFileSchema, formatZodIssues } from './app-config';

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/** Values given on the command line; they win over env and the config file. */
export type ConfigOverrides = {
  configPath?: string;
  dataDir?: string;
  databasePath?: string;
  unresolvedPolicy?: string;
  plexUrl?: string;
  plexToken?: string;
  sonarrUrl?: string;
  sonarrApiKey?: string;
};

function normalizeString(value: unknown): string {
  return (value === null || value === undefined ? '' : String(value)).trim();
}

function firstNonEmpty(...values: unknown[]): string | null {
  for (const v of values) {
    const s = normalizeString(v);
    if (s) return s;
  }
  return null;
}

function trimTrailingSlashes(url: string | null): string | null {
  return url ? url.replace(/\/+$/, '') : null;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export async function readConfigFile(
  path: string,
  required: boolean,
): Promise<ConfigFile> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    if (!required && isNotFound(err)) return {};
    throw new ConfigError(`Cannot read config file ${path}`, { cause: err });
  }

  let doc: unknown;
  try {
    doc = YAML.parse(text);
  } catch (err) {
    throw new ConfigError(`Config file ${path} is not valid YAML`, { cause: err });
  }
  // An empty document parses to null.
  if (doc === null || doc === undefined) return {};

  const parsed = ConfigFileSchema.safeParse(doc);
  if (!parsed.success) {
    throw new ConfigError(`Invalid config file ${path}: ${formatZodIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Build the runtime config. Precedence: CLI overrides, then environment,
 * then the YAML config file, then defaults.
 */
export async function loadAppConfig(params?: {
  overrides?: ConfigOverrides;
  env?: NodeJS.ProcessEnv;
}): Promise<AppConfig> {
  const overrides = params?.overrides ?? {};
  const env = params?.env ?? process.env;

  const boot = await ensureBootstrapEnv({
    env,
    dataDir: overrides.dataDir,
    databasePath: overrides.databasePath,
  });

  const explicitConfig = firstNonEmpty(overrides.configPath, env.TVLEDGER_CONFIG);
  const configPath = resolve(explicitConfig ?? join(boot.dataDir, CONFIG_FILE_NAME));
  const file = await readConfigFile(configPath, explicitConfig !== null);

  const dbFromFlagsOrEnv = firstNonEmpty(overrides.databasePath, env.TVLEDGER_DB_PATH);
  const databasePath =
    dbFromFlagsOrEnv === null && file.database
      ? isAbsolute(file.database) || file.database === ':memory:'
        ? file.database
        : resolve(dirname(configPath), file.database)
      : boot.databasePath;

  const candidate = {
    dataDir: boot.dataDir,
    databasePath,
    unresolvedPolicy:
      firstNonEmpty(
        overrides.unresolvedPolicy,
        env.TVLEDGER_UNRESOLVED_POLICY,
        file.unresolved_policy,
      ) ?? 'insert-unlinked',
    plex: {
      baseUrl: trimTrailingSlashes(
        firstNonEmpty(overrides.plexUrl, env.PLEX_URL, file.plex?.url),
      ),
      token: firstNonEmpty(overrides.plexToken, env.PLEX_TOKEN, file.plex?.token),
    },
    sonarr: {
      baseUrl: trimTrailingSlashes(
        firstNonEmpty(overrides.sonarrUrl, env.SONARR_URL, file.sonarr?.url),
      ),
      apiKey: firstNonEmpty(
        overrides.sonarrApiKey,
        env.SONARR_API_KEY,
        file.sonarr?.api_key,
      ),
    },
    filesystem: {
      dirs: file.filesystem?.dirs ?? [],
    },
  };

  const parsed = AppConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatZodIssues(parsed.error)}`);
  }
  return parsed.data;
}
