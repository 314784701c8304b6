import { Logger } from '@nestjs/common';
import type { EntityKeyModel } from './entity-keys';
import { describeLeafKey, serializeLeafKey } from './entity-keys';
import type { LifecycleStore } from './lifecycle-store';
import { errToMessage, InvalidReconcilerStateError } from './reconcile.errors';
import type { UnresolvedLinkPolicy } from './upsert-resolver';
import { UpsertResolver } from './upsert-resolver';

export type ReconcilerState = 'idle' | 'streaming' | 'finalizing' | 'done' | 'failed';

export type PassCounters = {
  seen: number;
  inserted: number;
  restored: number;
  resolved: number;
  unresolved: number;
  removed: number;
  parentsInserted: number;
  childrenInserted: number;
};

export type PassSummary = {
  startedAt: string;
  finishedAt: string;
  committed: boolean;
  counters: PassCounters;
};

export type ReconcilerOptions<TRaw> = {
  store: LifecycleStore;
  model: EntityKeyModel<TRaw>;
  policy?: UnresolvedLinkPolicy;
  /** Roll back instead of committing once the pass is computed. */
  dryRun?: boolean;
  now?: () => Date;
  progressEvery?: number;
  onProgress?: (counters: PassCounters) => void | Promise<void>;
};

function emptyCounters(): PassCounters {
  return {
    seen: 0,
    inserted: 0,
    restored: 0,
    resolved: 0,
    unresolved: 0,
    removed: 0,
    parentsInserted: 0,
    childrenInserted: 0,
  };
}

/**
 * Drives one observation pass against one store:
 * idle -> streaming -> finalizing -> done (or failed).
 *
 * Streaming upserts every observation parent-first and collects the seen leaf
 * keys; finalizing soft-deletes every active leaf that was not seen. All
 * writes share one store transaction, committed only when the pass completes.
 * An instance runs a single pass.
 */
export class ObservationReconciler<TRaw> {
  private readonly logger = new Logger(ObservationReconciler.name);
  private state: ReconcilerState = 'idle';
  private readonly counters = emptyCounters();

  constructor(private readonly options: ReconcilerOptions<TRaw>) {
    if (options.model.leafShape !== options.store.leafShape) {
      throw new InvalidReconcilerStateError(
        `Key model produces ${options.model.leafShape} keys but the store expects ${options.store.leafShape} keys`,
      );
    }
  }

  get currentState(): ReconcilerState {
    return this.state;
  }

  async run(observations: AsyncIterable<TRaw> | Iterable<TRaw>): Promise<PassSummary> {
    if (this.state !== 'idle') {
      throw new InvalidReconcilerStateError(
        `Reconciler already used (state=${this.state}); start a new pass instead`,
      );
    }

    const { store } = this.options;
    const now = this.options.now ?? (() => new Date());
    const startedAt = now().toISOString();

    store.begin();
    this.state = 'streaming';

    try {
      const seen = await this.stream(observations, startedAt);

      this.state = 'finalizing';
      this.finalize(seen, startedAt);

      const committed = !this.options.dryRun;
      if (committed) store.commit();
      else store.rollback();

      this.state = 'done';
      return {
        startedAt,
        finishedAt: now().toISOString(),
        committed,
        counters: { ...this.counters },
      };
    } catch (err) {
      this.state = 'failed';
      try {
        store.rollback();
      } catch (rollbackErr) {
        this.logger.error(`Rollback failed: ${errToMessage(rollbackErr)}`);
      }
      throw err;
    }
  }

  private async stream(
    observations: AsyncIterable<TRaw> | Iterable<TRaw>,
    passTimestamp: string,
  ): Promise<Set<string>> {
    const { store, model, onProgress } = this.options;
    const progressEvery = Math.max(1, this.options.progressEvery ?? 500);
    const resolver = new UpsertResolver(store, {
      links: model.links,
      policy: this.options.policy ?? 'insert-unlinked',
      passTimestamp,
    });
    const seen = new Set<string>();
    const counters = this.counters;

    for await (const raw of observations) {
      const extracted = model.extract(raw);
      counters.seen += 1;

      let parentId: number | null = null;
      if (model.links.parent !== 'none' && extracted.parent) {
        const parent = resolver.resolve({ kind: 'parent', ...extracted.parent });
        if (parent.status === 'resolved') {
          parentId = parent.id;
          if (parent.inserted) counters.parentsInserted += 1;
        }
      }

      let childId: number | null = null;
      if (model.links.child !== 'none' && extracted.child) {
        const child = resolver.resolve({ kind: 'child', ...extracted.child, parentId });
        if (child.status === 'resolved') {
          childId = child.id;
          if (child.inserted) counters.childrenInserted += 1;
        }
      }

      const leaf = resolver.resolve({
        kind: 'leaf',
        ...extracted.leaf,
        parentId,
        childId,
      });

      if (leaf.status === 'unresolved') {
        counters.unresolved += 1;
        this.logger.debug(`Skipped: ${leaf.reason}`);
      } else {
        seen.add(serializeLeafKey(extracted.leaf.key));
        if (leaf.inserted) counters.inserted += 1;
        if (leaf.restored) counters.restored += 1;
        if (leaf.unlinked) counters.unresolved += 1;
        else if (childId !== null) counters.resolved += 1;
      }

      if (onProgress && counters.seen % progressEvery === 0) {
        await onProgress({ ...counters });
      }
    }

    return seen;
  }

  private finalize(seen: Set<string>, passTimestamp: string) {
    const { store } = this.options;
    for (const active of store.listActiveLeafKeys()) {
      if (seen.has(serializeLeafKey(active.key))) continue;
      store.markRemoved(active.id, passTimestamp);
      this.counters.removed += 1;
      this.logger.debug(`Removed: ${describeLeafKey(active.key)}`);
    }
  }
}
