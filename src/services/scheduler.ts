import type { CycleReason, MonitorResult, SchedulerSnapshot, SchedulerState } from "../types/monitor.js";
import { errorMessage, logger } from "../utils/logger.js";
import { cancellableSleep, type SleepFn } from "../utils/sleep.js";
import { CycleInProgressError } from "./errors.js";
import type { CycleRunOptions } from "./monitor-cycle.js";

export interface CycleRunner {
  run(options?: CycleRunOptions): Promise<MonitorResult>;
}

interface SchedulerOptions {
  cycle: CycleRunner;
  intervalMs: number;
  sleep?: SleepFn;
  nowFn?: () => number;
}

/**
 * Drives the monitor cycle: `idle → running → idle → … → stopped`.
 *
 * Cycles never overlap; the loop and manual runs share one in-flight guard.
 * A failed cycle is logged and the loop carries on; only an abort of the
 * signal given to {@link Scheduler.run} stops it.
 */
export class Scheduler {
  private readonly cycle: CycleRunner;
  private readonly intervalMs: number;
  private readonly sleep: SleepFn;
  private readonly nowFn: () => number;

  private currentState: SchedulerState = "idle";
  private inFlight: Promise<MonitorResult> | null = null;
  private loopSignal: AbortSignal | undefined;
  private cyclesCompleted = 0;
  private cyclesFailed = 0;
  private lastResult?: MonitorResult;
  private lastError?: SchedulerSnapshot["lastError"];
  private nextRunAt?: string;

  constructor(options: SchedulerOptions) {
    this.cycle = options.cycle;
    this.intervalMs = options.intervalMs;
    this.sleep = options.sleep ?? cancellableSleep;
    this.nowFn = options.nowFn ?? (() => Date.now());
  }

  get state(): SchedulerState {
    return this.currentState;
  }

  snapshot(): SchedulerSnapshot {
    return {
      state: this.currentState,
      intervalMs: this.intervalMs,
      cyclesCompleted: this.cyclesCompleted,
      cyclesFailed: this.cyclesFailed,
      lastResult: this.lastResult,
      lastError: this.lastError,
      nextRunAt: this.nextRunAt,
    };
  }

  /** Loops until `signal` aborts. The first cycle starts immediately. */
  async run(signal: AbortSignal): Promise<void> {
    if (this.currentState === "stopped") {
      throw new Error("Scheduler has been stopped");
    }
    if (this.loopSignal) {
      throw new Error("Scheduler loop is already running");
    }
    this.loopSignal = signal;
    logger.info("scheduler_started", { intervalMs: this.intervalMs });

    let reason: CycleReason = "startup";
    try {
      while (!signal.aborted) {
        if (this.inFlight) {
          // A manual run is in progress; wait for it instead of overlapping.
          await this.inFlight.catch(() => undefined);
        } else {
          await this.execute(reason).catch(() => undefined);
        }
        if (signal.aborted) break;

        this.nextRunAt = new Date(this.nowFn() + this.intervalMs).toISOString();
        await this.sleep(this.intervalMs, signal);
        reason = "schedule";
      }
    } finally {
      this.nextRunAt = undefined;
      this.currentState = "stopped";
      logger.info("scheduler_stopped", { cyclesCompleted: this.cyclesCompleted, cyclesFailed: this.cyclesFailed });
    }
  }

  /** Runs one cycle now. Rejects with CycleInProgressError when a cycle is already running. */
  async runNow(reason: CycleReason = "manual"): Promise<MonitorResult> {
    if (this.currentState === "stopped") {
      throw new Error("Scheduler has been stopped");
    }
    if (this.inFlight) {
      throw new CycleInProgressError();
    }
    return this.execute(reason);
  }

  private execute(reason: CycleReason): Promise<MonitorResult> {
    const startedAt = this.nowFn();
    this.currentState = "running";

    const running = this.cycle
      .run({ reason, signal: this.loopSignal })
      .then((result) => {
        this.cyclesCompleted += 1;
        this.lastResult = result;
        this.lastError = undefined;
        logger.info("monitor_cycle_ok", {
          reason,
          durationMs: this.nowFn() - startedAt,
          errors: result.errors,
          notifyFailures: result.notifyFailures,
          notified: result.sources.reduce((sum, source) => sum + source.notified, 0),
        });
        return result;
      })
      .catch((error: unknown) => {
        this.cyclesFailed += 1;
        this.lastError = {
          at: new Date(this.nowFn()).toISOString(),
          name: error instanceof Error ? error.name : "Error",
          message: errorMessage(error),
        };
        logger.error("monitor_cycle_failed", {
          reason,
          durationMs: this.nowFn() - startedAt,
          error: errorMessage(error),
        });
        throw error;
      })
      .finally(() => {
        this.inFlight = null;
        if (this.currentState === "running") {
          this.currentState = "idle";
        }
      });

    this.inFlight = running;
    return running;
  }
}
