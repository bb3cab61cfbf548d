import { setTimeout as sleepFor } from "node:timers/promises";

/** Resolves after `ms`, or early once `signal` aborts. Never rejects on abort. */
export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export const cancellableSleep: SleepFn = async (ms, signal) => {
  if (ms <= 0 || signal?.aborted) return;
  try {
    await sleepFor(ms, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) return;
    throw error;
  }
};
