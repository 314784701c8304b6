import { InMemoryLifecycleStore } from '../testing/in-memory-lifecycle.store';
import { compositeLeafKey } from './entity-keys';
import type { EntityLinks } from './entity-keys';
import type { UnresolvedLinkPolicy } from './upsert-resolver';
import { UpsertResolver } from './upsert-resolver';

const PASS_TS = '2026-01-02T03:04:05.000Z';
const PLEX_LINKS: EntityLinks = { parent: 'required', child: 'optional' };

function setup(links: EntityLinks, policy: UnresolvedLinkPolicy = 'insert-unlinked') {
  const store = new InMemoryLifecycleStore('composite');
  const resolver = new UpsertResolver(store, { links, policy, passTimestamp: PASS_TS });
  return { store, resolver };
}

const leafKey = compositeLeafKey('/tv/Show', 'e01.mkv');
const noAttrs = { createdAt: null };

describe('UpsertResolver', () => {
  it('inserts a missing parent once and finds it afterwards', () => {
    const { store, resolver } = setup(PLEX_LINKS);
    const first = resolver.resolve({
      kind: 'parent',
      key: '/library/metadata/1',
      attributes: { title: 'Show', path: null },
    });
    const second = resolver.resolve({
      kind: 'parent',
      key: '/library/metadata/1',
      attributes: { title: 'Renamed', path: null },
    });

    expect(first).toEqual({
      status: 'resolved',
      id: 1,
      inserted: true,
      restored: false,
      unlinked: false,
    });
    expect(second).toEqual({
      status: 'resolved',
      id: 1,
      inserted: false,
      restored: false,
      unlinked: false,
    });
    expect(store.parents).toEqual([
      { id: 1, key: '/library/metadata/1', attributes: { title: 'Show', path: null } },
    ]);
  });

  it('leaves a child unresolved when its required parent is missing', () => {
    const { store, resolver } = setup(PLEX_LINKS);
    const out = resolver.resolve({
      kind: 'child',
      key: 'ep-1',
      attributes: { seasonNumber: 1, episodeNumber: 1 },
      parentId: null,
    });
    expect(out).toEqual({ status: 'unresolved', reason: 'episode ep-1 has no series' });
    expect(store.children).toHaveLength(0);
  });

  it('inserts a new leaf stamped with the pass timestamp', () => {
    const { store, resolver } = setup(PLEX_LINKS);
    const out = resolver.resolve({
      kind: 'leaf',
      key: leafKey,
      attributes: noAttrs,
      parentId: 7,
      childId: 9,
    });
    expect(out).toMatchObject({ status: 'resolved', inserted: true, unlinked: false });
    expect(store.leaf(leafKey)).toMatchObject({
      addedAt: PASS_TS,
      removedAt: null,
      parentId: 7,
      childId: 9,
    });
  });

  it('restores a soft-deleted leaf and keeps its original added date', () => {
    const { store, resolver } = setup(PLEX_LINKS);
    const id = store.insertLeaf(leafKey, {
      attributes: noAttrs,
      parentId: 1,
      childId: 2,
      addedAt: '2025-01-01T00:00:00.000Z',
    });
    store.markRemoved(id, '2025-06-01T00:00:00.000Z');

    const out = resolver.resolve({
      kind: 'leaf',
      key: leafKey,
      attributes: noAttrs,
      parentId: 1,
      childId: 2,
    });

    expect(out).toEqual({
      status: 'resolved',
      id,
      inserted: false,
      restored: true,
      unlinked: false,
    });
    expect(store.leaf(leafKey)).toMatchObject({
      addedAt: '2025-01-01T00:00:00.000Z',
      removedAt: null,
    });
  });

  it('returns an active leaf untouched', () => {
    const { store, resolver } = setup(PLEX_LINKS);
    const id = store.insertLeaf(leafKey, {
      attributes: noAttrs,
      parentId: 1,
      childId: 2,
      addedAt: '2025-01-01T00:00:00.000Z',
    });
    const out = resolver.resolve({
      kind: 'leaf',
      key: leafKey,
      attributes: noAttrs,
      parentId: 1,
      childId: 2,
    });
    expect(out).toEqual({
      status: 'resolved',
      id,
      inserted: false,
      restored: false,
      unlinked: false,
    });
  });

  it('does not store a leaf whose required parent is unresolved', () => {
    const { store, resolver } = setup(PLEX_LINKS);
    const out = resolver.resolve({
      kind: 'leaf',
      key: leafKey,
      attributes: noAttrs,
      parentId: null,
      childId: null,
    });
    expect(out).toEqual({
      status: 'unresolved',
      reason: '/tv/Show/e01.mkv: series could not be resolved',
    });
    expect(store.leaves).toHaveLength(0);
  });

  it('inserts an unlinked leaf under insert-unlinked', () => {
    const { store, resolver } = setup(PLEX_LINKS, 'insert-unlinked');
    const out = resolver.resolve({
      kind: 'leaf',
      key: leafKey,
      attributes: noAttrs,
      parentId: 3,
      childId: null,
    });
    expect(out).toMatchObject({ status: 'resolved', inserted: true, unlinked: true });
    expect(store.leaf(leafKey)).toMatchObject({ parentId: 3, childId: null });
  });

  it('skips an unlinked leaf under drop-unresolved', () => {
    const { store, resolver } = setup(PLEX_LINKS, 'drop-unresolved');
    const out = resolver.resolve({
      kind: 'leaf',
      key: leafKey,
      attributes: noAttrs,
      parentId: 3,
      childId: null,
    });
    expect(out).toEqual({
      status: 'unresolved',
      reason: '/tv/Show/e01.mkv: episode could not be resolved',
    });
    expect(store.leaves).toHaveLength(0);
  });

  it('ignores links for sources without parent and child levels', () => {
    const { store, resolver } = setup({ parent: 'none', child: 'none' }, 'drop-unresolved');
    const out = resolver.resolve({
      kind: 'leaf',
      key: leafKey,
      attributes: { createdAt: '2024-05-05T00:00:00.000Z' },
      parentId: 11,
      childId: null,
    });
    expect(out).toMatchObject({ status: 'resolved', inserted: true, unlinked: false });
    expect(store.leaf(leafKey)).toMatchObject({
      parentId: null,
      childId: null,
      createdAt: '2024-05-05T00:00:00.000Z',
    });
  });
});
