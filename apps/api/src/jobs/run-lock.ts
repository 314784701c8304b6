import { mkdir, open, readFile, unlink } from 'node:fs/promises';
import { dirname } from 'node:path';

export type RunLock = {
  path: string;
  release: () => Promise<void>;
};

export type RunLockResult =
  | { acquired: true; lock: RunLock }
  | { acquired: false; holderPid: number | null };

function errCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to someone else.
    return errCode(err) === 'EPERM';
  }
}

async function readHolderPid(path: string): Promise<number | null> {
  const text = await readFile(path, 'utf8').catch((err: unknown) => {
    if (errCode(err) === 'ENOENT') return '';
    throw err;
  });
  const pid = Number.parseInt(text.trim(), 10);
  return Number.isInteger(pid) && pid > 0 ? pid : null;
}

async function tryCreate(path: string, pid: number): Promise<boolean> {
  try {
    const handle = await open(path, 'wx', 0o600);
    try {
      await handle.writeFile(`${pid}\n`, 'utf8');
    } finally {
      await handle.close();
    }
    return true;
  } catch (err) {
    if (errCode(err) === 'EEXIST') return false;
    throw err;
  }
}

/**
 * Exclusive PID lock file. A lock left behind by a process that no longer
 * exists is taken over once; a live holder makes the call fail.
 */
export async function acquireRunLock(
  path: string,
  pid: number = process.pid,
): Promise<RunLockResult> {
  await mkdir(dirname(path), { recursive: true });

  for (let attempt = 0; attempt < 2; attempt += 1) {
    if (await tryCreate(path, pid)) {
      let released = false;
      return {
        acquired: true,
        lock: {
          path,
          release: async () => {
            if (released) return;
            released = true;
            await unlink(path).catch((err: unknown) => {
              if (errCode(err) !== 'ENOENT') throw err;
            });
          },
        },
      };
    }

    const holderPid = await readHolderPid(path);
    if (holderPid !== null && isProcessAlive(holderPid)) {
      return { acquired: false, holderPid };
    }
    // Stale (or unreadable) lock: remove and retry once.
    await unlink(path).catch((err: unknown) => {
      if (errCode(err) !== 'ENOENT') throw err;
    });
  }

  return { acquired: false, holderPid: await readHolderPid(path) };
}
