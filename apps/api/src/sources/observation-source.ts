export type SourceEventKind = 'directory' | 'section' | 'series';

export type SourceEvent = {
  kind: SourceEventKind;
  label: string;
  count?: number;
};

/** Progress hook for the per-directory / per-series lines a pass logs. */
export type SourceListener = (event: SourceEvent) => void | Promise<void>;
