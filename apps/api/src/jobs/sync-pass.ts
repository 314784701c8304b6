import { RECONCILE_PROGRESS_EVERY } from '../app.constants';
import type { SqliteLifecycleStore } from '../db/sqlite-lifecycle.store';
import type { EntityKeyModel } from '../reconcile/entity-keys';
import type { PassSummary } from '../reconcile/observation-reconciler';
import { ObservationReconciler } from '../reconcile/observation-reconciler';
import type { UnresolvedLinkPolicy } from '../reconcile/upsert-resolver';
import type { JobReportV1 } from './job-report-v1';
import { issue, metricRow } from './job-report-v1';
import type { JobContext, JobRunResult } from './jobs.types';

export type SyncPassLabels = {
  /** Headline noun, e.g. "Plex". */
  title: string;
  /** What a leaf is called in the report, e.g. "files". */
  leafUnit: string;
};

export async function runSyncPass<TRaw>(params: {
  ctx: JobContext;
  store: SqliteLifecycleStore;
  model: EntityKeyModel<TRaw>;
  observations: AsyncIterable<TRaw> | Iterable<TRaw>;
  policy: UnresolvedLinkPolicy;
  labels: SyncPassLabels;
  now?: () => Date;
  progressEvery?: number;
}): Promise<JobRunResult> {
  const { ctx, store, labels } = params;
  const before = store.countLeaves();

  const reconciler = new ObservationReconciler<TRaw>({
    store,
    model: params.model,
    policy: params.policy,
    dryRun: ctx.dryRun,
    now: params.now,
    progressEvery: params.progressEvery ?? RECONCILE_PROGRESS_EVERY,
    onProgress: async (counters) => {
      await ctx.patchSummary({
        phase: 'streaming',
        progress: {
          step: 'streaming',
          current: counters.seen,
          updatedAt: new Date().toISOString(),
        },
      });
      await ctx.info(`Progress: ${counters.seen} observed`, {
        inserted: counters.inserted,
        restored: counters.restored,
        unresolved: counters.unresolved,
      });
    },
  });

  await ctx.patchSummary({ phase: 'streaming' });
  const pass = await reconciler.run(params.observations);

  const c = pass.counters;
  const after = pass.committed
    ? store.countLeaves()
    : {
        active: before.active + c.inserted + c.restored - c.removed,
        removed: before.removed - c.restored + c.removed,
      };

  await ctx.info(
    `${labels.title}: ${c.seen} observed, ${c.inserted} added, ${c.restored} restored, ${c.removed} removed, ${c.unresolved} unresolved`,
  );

  return { report: buildSyncReport({ ctx, pass, before, after, labels }) };
}

export function buildSyncReport(params: {
  ctx: Pick<JobContext, 'jobId' | 'dryRun'>;
  pass: PassSummary;
  before: { active: number; removed: number };
  after: { active: number; removed: number };
  labels: SyncPassLabels;
}): JobReportV1 {
  const { ctx, pass, before, after, labels } = params;
  const c = pass.counters;

  const issues =
    c.unresolved > 0
      ? [
          issue(
            'warn',
            `${c.unresolved} observation(s) could not be fully linked to a series or episode`,
          ),
        ]
      : [];

  return {
    template: 'jobReportV1',
    version: 1,
    jobId: ctx.jobId,
    dryRun: ctx.dryRun,
    headline: `${labels.title} sync ${pass.committed ? 'completed' : 'computed'}: ${c.inserted} added, ${c.restored} restored, ${c.removed} removed.`,
    sections: [
      {
        id: 'inventory',
        title: 'Inventory',
        rows: [
          metricRow({
            label: 'Active',
            start: before.active,
            changed: after.active - before.active,
            end: after.active,
            unit: labels.leafUnit,
          }),
          metricRow({
            label: 'Removed (history)',
            start: before.removed,
            changed: after.removed - before.removed,
            end: after.removed,
            unit: labels.leafUnit,
          }),
        ],
      },
    ],
    tasks: [
      {
        id: 'reconcile',
        title: 'Reconcile',
        status: 'success',
        facts: [
          { label: 'Observed', value: c.seen },
          { label: 'Added', value: c.inserted },
          { label: 'Restored', value: c.restored },
          { label: 'Removed', value: c.removed },
          { label: 'Linked to an episode', value: c.resolved },
          { label: 'Unresolved', value: c.unresolved },
          { label: 'New series', value: c.parentsInserted },
          { label: 'New episodes', value: c.childrenInserted },
        ],
      },
    ],
    issues,
    raw: {
      startedAt: pass.startedAt,
      finishedAt: pass.finishedAt,
      committed: pass.committed,
      counters: { ...c },
    },
  };
}
