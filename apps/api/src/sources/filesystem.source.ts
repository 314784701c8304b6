import { Injectable, Logger } from '@nestjs/common';
import type { Dirent } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { canonicalPath } from '../reconcile/entity-keys';
import { SourceUnavailableError, errToMessage } from '../reconcile/reconcile.errors';
import type { FilesystemObservation } from './key-models';
import type { SourceListener } from './observation-source';

function byName(a: Dirent, b: Dirent): number {
  if (a.name < b.name) return -1;
  return a.name > b.name ? 1 : 0;
}

/**
 * Walks registered directories top-down, files of a directory before its
 * subdirectories. Symlinked directories are listed but not followed.
 */
@Injectable()
export class FilesystemSource {
  private readonly logger = new Logger(FilesystemSource.name);

  async *observe(
    roots: readonly string[],
    listener?: SourceListener,
  ): AsyncGenerator<FilesystemObservation> {
    for (const root of roots) {
      const dir = canonicalPath(root);
      const info = await stat(dir).catch((err: unknown) => {
        throw new SourceUnavailableError(
          `Scan directory ${dir} is not readable: ${errToMessage(err)}`,
          { cause: err },
        );
      });
      if (!info.isDirectory()) {
        throw new SourceUnavailableError(`Scan directory ${dir} is not a directory`);
      }
      yield* this.walk(dir, listener);
    }
  }

  private async *walk(
    dir: string,
    listener?: SourceListener,
  ): AsyncGenerator<FilesystemObservation> {
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (err) {
      throw new SourceUnavailableError(`Cannot list ${dir}: ${errToMessage(err)}`, {
        cause: err,
      });
    }
    entries.sort(byName);

    const files: string[] = [];
    const subdirs: string[] = [];
    for (const entry of entries) {
      if (entry.isDirectory()) subdirs.push(entry.name);
      else if (entry.isSymbolicLink()) {
        if (!(await this.pointsToDirectory(join(dir, entry.name)))) files.push(entry.name);
      } else if (entry.isFile()) files.push(entry.name);
    }

    for (const name of files) {
      yield { dir, name, ctime: await this.readCtime(join(dir, name)) };
    }
    if (files.length > 0 && listener) {
      await listener({ kind: 'directory', label: dir, count: files.length });
    }

    for (const name of subdirs) {
      yield* this.walk(join(dir, name), listener);
    }
  }

  private async pointsToDirectory(path: string): Promise<boolean> {
    try {
      return (await stat(path)).isDirectory();
    } catch {
      // Dangling link: tracked like a file, with no creation time.
      return false;
    }
  }

  private async readCtime(path: string): Promise<Date | null> {
    try {
      return (await stat(path)).ctime;
    } catch (err) {
      this.logger.debug(`stat failed for ${path}: ${errToMessage(err)}`);
      return null;
    }
  }
}
