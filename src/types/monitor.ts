export type SourceErrorKind = "fetch" | "parse" | "unexpected";

export type SourceSkipReason = "disabled" | "no_keywords" | "no_adapter";

export interface SourceErrorRecord {
  keyword: string;
  kind: SourceErrorKind;
  message: string;
  status?: number;
}

export interface SourceCycleSummary {
  source: string;
  skipped?: SourceSkipReason;
  keywords: number;
  fetched: number;
  belowMinPrice: number;
  alreadySeen: number;
  notified: number;
  notifyFailures: number;
  seeded: number;
  errors: SourceErrorRecord[];
}

export interface MonitorResult {
  reason: CycleReason;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  errors: number;
  notifyFailures: number;
  sources: SourceCycleSummary[];
}

export type CycleReason = "startup" | "schedule" | "manual";

export type SchedulerState = "idle" | "running" | "stopped";

export interface SchedulerSnapshot {
  state: SchedulerState;
  intervalMs: number;
  cyclesCompleted: number;
  cyclesFailed: number;
  lastResult?: MonitorResult;
  lastError?: { at: string; name: string; message: string };
  nextRunAt?: string;
}
