import type { SyncSource } from '../sources/key-models';
import type { JobReportV1 } from './job-report-v1';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type JobRunResult = {
  report: JobReportV1;
};

export type JobLogLevel = 'debug' | 'info' | 'warn' | 'error';

export type JobContext = {
  jobId: string;
  runId: number;
  source: SyncSource;
  dryRun: boolean;
  input?: JsonObject;
  /** Current run summary snapshot (progress while streaming). */
  getSummary: () => JsonObject | null;
  setSummary: (summary: JsonObject | null) => Promise<void>;
  /** Shallow-merge into the current summary snapshot. */
  patchSummary: (patch: JsonObject) => Promise<void>;
  log: (
    level: JobLogLevel,
    message: string,
    context?: JsonObject,
  ) => Promise<void>;
  debug: (message: string, context?: JsonObject) => Promise<void>;
  info: (message: string, context?: JsonObject) => Promise<void>;
  warn: (message: string, context?: JsonObject) => Promise<void>;
  error: (message: string, context?: JsonObject) => Promise<void>;
};
