import type {
  ChildAttributes,
  EntityLinks,
  LeafAttributes,
  LeafKey,
  ParentAttributes,
} from './entity-keys';
import { describeLeafKey } from './entity-keys';
import type { LifecycleStore } from './lifecycle-store';

/**
 * What to do with a file whose optional episode link could not be resolved.
 * - `insert-unlinked`: keep tracking it with a null link (counted as unresolved)
 * - `drop-unresolved`: do not track it at all
 */
export type UnresolvedLinkPolicy = 'insert-unlinked' | 'drop-unresolved';

export const UNRESOLVED_LINK_POLICIES: readonly UnresolvedLinkPolicy[] = [
  'insert-unlinked',
  'drop-unresolved',
];

export type ResolveRequest =
  | { kind: 'parent'; key: string; attributes: ParentAttributes }
  | {
      kind: 'child';
      key: string;
      attributes: ChildAttributes;
      parentId: number | null;
    }
  | {
      kind: 'leaf';
      key: LeafKey;
      attributes: LeafAttributes;
      parentId: number | null;
      childId: number | null;
    };

export type ResolveOutcome =
  | {
      status: 'resolved';
      id: number;
      inserted: boolean;
      restored: boolean;
      unlinked: boolean;
    }
  | { status: 'unresolved'; reason: string };

export class UpsertResolver {
  constructor(
    private readonly store: LifecycleStore,
    private readonly params: {
      links: EntityLinks;
      policy: UnresolvedLinkPolicy;
      passTimestamp: string;
    },
  ) {}

  resolve(request: ResolveRequest): ResolveOutcome {
    switch (request.kind) {
      case 'parent':
        return this.resolveParent(request.key, request.attributes);
      case 'child':
        return this.resolveChild(request.key, request.attributes, request.parentId);
      case 'leaf':
        return this.resolveLeaf(request);
    }
  }

  private resolveParent(key: string, attributes: ParentAttributes): ResolveOutcome {
    const existing = this.store.findByKey('parent', key);
    if (existing !== null) return resolved(existing);
    return resolved(this.store.insertParent(key, attributes), { inserted: true });
  }

  private resolveChild(
    key: string,
    attributes: ChildAttributes,
    parentId: number | null,
  ): ResolveOutcome {
    if (parentId === null && this.params.links.parent === 'required') {
      return { status: 'unresolved', reason: `episode ${key} has no series` };
    }

    const existing = this.store.findByKey('child', key);
    if (existing !== null) return resolved(existing);
    return resolved(this.store.insertChild(key, attributes, parentId), {
      inserted: true,
    });
  }

  private resolveLeaf(
    request: Extract<ResolveRequest, { kind: 'leaf' }>,
  ): ResolveOutcome {
    const { links, policy, passTimestamp } = this.params;
    const label = describeLeafKey(request.key);

    if (request.parentId === null && links.parent === 'required') {
      return { status: 'unresolved', reason: `${label}: series could not be resolved` };
    }

    let unlinked = false;
    if (request.childId === null && links.child !== 'none') {
      if (links.child === 'required' || policy === 'drop-unresolved') {
        return { status: 'unresolved', reason: `${label}: episode could not be resolved` };
      }
      unlinked = true;
    }

    const existing = this.store.findLeaf(request.key);
    if (existing) {
      // First write wins: links and attributes stay as inserted.
      if (existing.removedAt === null) return resolved(existing.id, { unlinked });
      this.store.clearRemoved(existing.id);
      return resolved(existing.id, { restored: true, unlinked });
    }

    const id = this.store.insertLeaf(request.key, {
      attributes: request.attributes,
      parentId: links.parent === 'none' ? null : request.parentId,
      childId: links.child === 'none' ? null : request.childId,
      addedAt: passTimestamp,
    });
    return resolved(id, { inserted: true, unlinked });
  }
}

function resolved(
  id: number,
  flags: { inserted?: boolean; restored?: boolean; unlinked?: boolean } = {},
): ResolveOutcome {
  return {
    status: 'resolved',
    id,
    inserted: flags.inserted ?? false,
    restored: flags.restored ?? false,
    unlinked: flags.unlinked ?? false,
  };
}
