import { chmod, mkdir, stat } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { DATABASE_FILE_NAME, DATA_DIR_NAME } from './app.constants';

export type BootstrapEnv = {
  dataDir: string;
  databasePath: string;
};

function parseUmask(raw: string | undefined): number | null {
  const v = raw?.trim();
  if (!v) return null;
  let s = v.toLowerCase();
  if (s.startsWith('0o')) s = s.slice(2);
  // Support "77" / "077" / "0077"
  if (!/^[0-7]{1,4}$/.test(s)) return null;
  return Number.parseInt(s, 8);
}

async function tightenModeNoWorldAccess(path: string) {
  const mode = (await stat(path)).mode & 0o777;
  // Remove "other" (world) perms, leave owner/group unchanged.
  const tightened = mode & 0o770;
  if (tightened !== mode) {
    await chmod(path, tightened);
  }
}

/**
 * Resolve the data directory and database location, create the directory,
 * and restrict the permissions of files created from here on.
 */
export async function ensureBootstrapEnv(params?: {
  env?: NodeJS.ProcessEnv;
  dataDir?: string;
  databasePath?: string;
}): Promise<BootstrapEnv> {
  const env = params?.env ?? process.env;

  // The database holds media paths; keep new files private by default.
  // Can be overridden by setting TVLEDGER_UMASK (octal).
  const desiredUmask = parseUmask(env.TVLEDGER_UMASK) ?? 0o077;
  process.umask(desiredUmask);

  const dataDir = resolve(
    params?.dataDir?.trim() ||
      env.TVLEDGER_DATA_DIR?.trim() ||
      join(process.cwd(), DATA_DIR_NAME),
  );
  await mkdir(dataDir, { recursive: true });
  await tightenModeNoWorldAccess(dataDir);

  const rawDbPath = params?.databasePath?.trim() || env.TVLEDGER_DB_PATH?.trim();
  const databasePath =
    rawDbPath === ':memory:'
      ? rawDbPath
      : resolve(rawDbPath || join(dataDir, DATABASE_FILE_NAME));

  return { dataDir, databasePath };
}
