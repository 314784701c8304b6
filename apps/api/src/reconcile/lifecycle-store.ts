import type {
  ChildAttributes,
  EntityKind,
  LeafAttributes,
  LeafKey,
  LeafKeyShape,
  ParentAttributes,
} from './entity-keys';

export type StoredLeaf = {
  id: number;
  addedAt: string;
  removedAt: string | null;
};

export type ActiveLeaf = {
  id: number;
  key: LeafKey;
};

export type LeafInsert = {
  attributes: LeafAttributes;
  parentId: number | null;
  childId: number | null;
  addedAt: string;
};

/**
 * Persistence operations the reconciler needs for one source's table set.
 *
 * Inserts never overwrite: inserting an existing key throws
 * `DuplicateKeyError`, so callers look the key up first. Every call made
 * between `begin()` and `commit()`/`rollback()` belongs to one pass.
 */
export interface LifecycleStore {
  readonly leafShape: LeafKeyShape;

  findByKey(kind: Exclude<EntityKind, 'leaf'>, key: string): number | null;
  findLeaf(key: LeafKey): StoredLeaf | null;

  insertParent(key: string, attributes: ParentAttributes): number;
  insertChild(
    key: string,
    attributes: ChildAttributes,
    parentId: number | null,
  ): number;
  insertLeaf(key: LeafKey, row: LeafInsert): number;

  listActiveLeafKeys(): ActiveLeaf[];
  markRemoved(leafId: number, timestamp: string): void;
  clearRemoved(leafId: number): void;

  begin(): void;
  commit(): void;
  rollback(): void;
}
