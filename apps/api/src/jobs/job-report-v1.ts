import type { JsonObject, JsonValue } from './jobs.types';

export type JobReportIssueLevel = 'warn' | 'error';
export type JobReportTaskStatus = 'success' | 'skipped' | 'failed';

export type JobReportMetricRow = {
  label: string;
  start: number | null;
  changed: number | null;
  end: number | null;
  unit?: string;
  note?: string;
};

export type JobReportSection = {
  id: string;
  title: string;
  rows: JobReportMetricRow[];
};

export type JobReportIssue = {
  level: JobReportIssueLevel;
  message: string;
};

export type JobReportTask = {
  id: string;
  title: string;
  status: JobReportTaskStatus;
  rows?: JobReportMetricRow[];
  facts?: Array<{ label: string; value: JsonValue }>;
  issues?: JobReportIssue[];
};

export type JobReportV1 = {
  template: 'jobReportV1';
  version: 1;
  jobId: string;
  dryRun: boolean;
  headline: string;
  sections: JobReportSection[];
  tasks: JobReportTask[];
  issues: JobReportIssue[];
  /** Job-specific output kept for debugging; not a stable contract. */
  raw: JsonObject;
};

function asFiniteNumber(v: unknown): number | null {
  return typeof v === 'number' && Number.isFinite(v) ? v : null;
}

export function metricRow(params: {
  label: string;
  start?: number | null;
  changed?: number | null;
  end?: number | null;
  unit?: string | null;
  note?: string | null;
}): JobReportMetricRow {
  const row: JobReportMetricRow = {
    label: params.label,
    start: asFiniteNumber(params.start),
    changed: asFiniteNumber(params.changed),
    end: asFiniteNumber(params.end),
  };
  const unit = (params.unit ?? '').trim();
  if (unit) row.unit = unit;
  const note = (params.note ?? '').trim();
  if (note) row.note = note;
  return row;
}

export function issue(level: JobReportIssueLevel, message: string): JobReportIssue {
  return { level, message: message.trim() };
}

function formatNumber(n: number | null): string {
  return n === null ? '-' : String(n);
}

function formatSigned(n: number | null): string {
  if (n === null) return '-';
  return n > 0 ? `+${n}` : String(n);
}

function formatValue(value: JsonValue): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/** Plain-text rendering for the terminal. */
export function renderJobReport(report: JobReportV1): string[] {
  const lines: string[] = [report.dryRun ? `${report.headline} (dry run)` : report.headline];

  for (const section of report.sections) {
    lines.push('', `${section.title}:`);
    for (const row of section.rows) {
      const unit = row.unit ? ` ${row.unit}` : '';
      const note = row.note ? ` (${row.note})` : '';
      lines.push(
        `  ${row.label}: ${formatNumber(row.start)} -> ${formatNumber(row.end)}${unit} [${formatSigned(row.changed)}]${note}`,
      );
    }
  }

  for (const task of report.tasks) {
    lines.push('', `${task.title} [${task.status}]`);
    for (const fact of task.facts ?? []) {
      lines.push(`  ${fact.label}: ${formatValue(fact.value)}`);
    }
    for (const i of task.issues ?? []) lines.push(`  ${i.level}: ${i.message}`);
  }

  if (report.issues.length) {
    lines.push('', 'Issues:');
    for (const i of report.issues) lines.push(`  ${i.level}: ${i.message}`);
  }
  return lines;
}
