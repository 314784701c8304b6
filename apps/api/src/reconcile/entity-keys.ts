import { basename, dirname, resolve } from 'node:path';

/** series, episode, file */
export type EntityKind = 'parent' | 'child' | 'leaf';

/**
 * How a source identifies its file records.
 * - `composite`: (file name, containing directory)
 * - `path`: one canonical absolute path
 */
export type LeafKeyShape = 'composite' | 'path';

export type LeafKey =
  | { shape: 'composite'; name: string; dir: string }
  | { shape: 'path'; path: string };

export type ParentAttributes = {
  title: string;
  path: string | null;
};

export type ChildAttributes = {
  seasonNumber: number | null;
  episodeNumber: number | null;
};

export type LeafAttributes = {
  createdAt: string | null;
};

export type ExtractedEntity<TAttributes> = {
  key: string;
  attributes: TAttributes;
};

export type ExtractedObservation = {
  parent: ExtractedEntity<ParentAttributes> | null;
  child: ExtractedEntity<ChildAttributes> | null;
  leaf: { key: LeafKey; attributes: LeafAttributes };
};

/**
 * `none`: the source has no such level.
 * `required`: a leaf cannot be stored without this link.
 * `optional`: the link column is nullable.
 */
export type LinkRequirement = 'none' | 'required' | 'optional';

export type EntityLinks = {
  parent: LinkRequirement;
  child: LinkRequirement;
};

/**
 * Per-source view of a raw observation. `extract` must be pure and
 * deterministic: the same raw record always yields the same keys.
 */
export interface EntityKeyModel<TRaw> {
  readonly leafShape: LeafKeyShape;
  readonly links: EntityLinks;
  extract(raw: TRaw): ExtractedObservation;
}

/**
 * Absolute form of a path without touching the filesystem. Relative paths
 * resolve against `cwd`; `.`/`..` and repeated separators collapse, trailing
 * separators are dropped. Symlinks are not followed.
 */
export function canonicalPath(raw: string, cwd: string = process.cwd()): string {
  return resolve(cwd, raw);
}

export function compositeLeafKey(dir: string, name: string, cwd?: string): LeafKey {
  return { shape: 'composite', name, dir: canonicalPath(dir, cwd) };
}

export function leafKeyFromPath(
  shape: LeafKeyShape,
  rawPath: string,
  cwd?: string,
): LeafKey {
  const full = canonicalPath(rawPath, cwd);
  if (shape === 'path') return { shape, path: full };
  return { shape, name: basename(full), dir: dirname(full) };
}

export function serializeLeafKey(key: LeafKey): string {
  return key.shape === 'composite'
    ? JSON.stringify(['c', key.dir, key.name])
    : JSON.stringify(['p', key.path]);
}

export function describeLeafKey(key: LeafKey): string {
  return key.shape === 'composite' ? `${key.dir}/${key.name}` : key.path;
}
