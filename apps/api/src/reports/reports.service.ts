import { Injectable } from '@nestjs/common';
import { extname } from 'node:path';
import { ReportsRepository } from '../db/reports.repository';
import type { ActiveFile } from '../db/reports.repository';
import type { SyncSource } from '../sources/key-models';
import { SYNC_SOURCES } from '../sources/key-models';

export const VIDEO_EXTENSIONS: readonly string[] = [
  '.mp4',
  '.mkv',
  '.avi',
  '.mov',
  '.wmv',
  '.flv',
  '.webm',
  '.mpeg',
  '.mpg',
  '.m4v',
  '.ts',
];

export function isVideoFile(name: string): boolean {
  return VIDEO_EXTENSIONS.includes(extname(name).toLowerCase());
}

/** Rewrites a leading `from` into `to`, e.g. a mount point seen by another host. */
export type PathMapping = { from: string; to: string };

export function parsePathMapping(raw: string): PathMapping {
  const at = raw.indexOf('=');
  if (at <= 0) throw new Error(`Expected <from>=<to>, got ${raw}`);
  return { from: raw.slice(0, at), to: raw.slice(at + 1) };
}

/** First matching mapping wins; unmatched paths are compared as stored. */
export function applyPathMappings(path: string, maps: readonly PathMapping[]): string {
  for (const m of maps) {
    if (path.startsWith(m.from)) return `${m.to}${path.slice(m.from.length)}`;
  }
  return path;
}

export type MismatchRow = {
  path: string;
  presentIn: SyncSource[];
  missingFrom: SyncSource[];
};

export type MismatchReport = {
  sources: SyncSource[];
  /** Distinct paths seen across the compared sources, after mapping. */
  total: number;
  rows: MismatchRow[];
};

export type DuplicateName = {
  name: string;
  dirs: string[];
};

@Injectable()
export class ReportsService {
  constructor(private readonly repo: ReportsRepository) {}

  /**
   * Active files that are missing from at least one of the compared sources.
   * Paths are matched after `maps` are applied, so sources that see the
   * library under different mount points can still be compared.
   */
  mismatches(params: {
    sources?: readonly SyncSource[];
    maps?: readonly PathMapping[];
    videoOnly?: boolean;
  } = {}): MismatchReport {
    const wanted = params.sources ?? SYNC_SOURCES;
    const sources = SYNC_SOURCES.filter((s) => wanted.includes(s));
    if (sources.length < 2) {
      throw new Error('Pick at least two sources to compare');
    }
    const maps = params.maps ?? [];

    const seenIn = new Map<string, Set<SyncSource>>();
    for (const source of sources) {
      for (const file of this.filesOf(source, params.videoOnly)) {
        const path = applyPathMappings(file.path, maps);
        const set = seenIn.get(path) ?? new Set<SyncSource>();
        set.add(source);
        seenIn.set(path, set);
      }
    }

    const rows: MismatchRow[] = [];
    for (const [path, present] of seenIn) {
      if (present.size === sources.length) continue;
      rows.push({
        path,
        presentIn: sources.filter((s) => present.has(s)),
        missingFrom: sources.filter((s) => !present.has(s)),
      });
    }
    rows.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
    return { sources, total: seenIn.size, rows };
  }

  /** File names active in more than one directory of a source, most copies first. */
  duplicates(params: { source: SyncSource; videoOnly?: boolean }): DuplicateName[] {
    const byName = new Map<string, string[]>();
    for (const file of this.filesOf(params.source, params.videoOnly)) {
      const dirs = byName.get(file.name) ?? [];
      dirs.push(file.dir);
      byName.set(file.name, dirs);
    }

    const out: DuplicateName[] = [];
    for (const [name, dirs] of byName) {
      if (dirs.length > 1) out.push({ name, dirs: [...dirs].sort() });
    }
    return out.sort(
      (a, b) =>
        b.dirs.length - a.dirs.length || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0),
    );
  }

  private filesOf(source: SyncSource, videoOnly?: boolean): ActiveFile[] {
    const files = this.repo.activeFiles(source);
    return videoOnly ? files.filter((f) => isVideoFile(f.name)) : files;
  }
}
