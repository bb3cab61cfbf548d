import type { Item, SourceAdapter, SourceConfig, SourceConfigMap } from "../types/listing.js";
import type { CycleReason, MonitorResult, SourceCycleSummary, SourceErrorKind } from "../types/monitor.js";
import { errorMessage, logger } from "../utils/logger.js";
import { cancellableSleep } from "../utils/sleep.js";
import { FetchError, ParseError, StoreIOError } from "./errors.js";
import { formatItemMessage, type Notifier } from "./notifier.js";
import type { SeenItemStore } from "./seen-store.js";

export type SourceConfigProvider = () => Promise<SourceConfigMap>;

export interface MonitorCycleOptions {
  adapters: ReadonlyMap<string, SourceAdapter>;
  loadConfigs: SourceConfigProvider;
  store: SeenItemStore;
  notifier: Notifier;
  requestDelayMs?: number;
  nowFn?: () => number;
}

export interface CycleRunOptions {
  reason?: CycleReason;
  signal?: AbortSignal;
}

function classifySourceError(error: unknown): SourceErrorKind {
  if (error instanceof FetchError) return "fetch";
  if (error instanceof ParseError) return "parse";
  return "unexpected";
}

function emptySummary(source: string, keywords: number): SourceCycleSummary {
  return {
    source,
    keywords,
    fetched: 0,
    belowMinPrice: 0,
    alreadySeen: 0,
    notified: 0,
    notifyFailures: 0,
    seeded: 0,
    errors: [],
  };
}

/**
 * One pass over every enabled source and its keywords.
 *
 * Sources run as concurrent workers; keywords inside a source run in
 * configured order. Adapter failures stay inside their keyword and notify
 * failures stay inside their item. A StoreIOError rejects the whole cycle,
 * but only after every worker has settled.
 */
export class MonitorCycle {
  private readonly adapters: ReadonlyMap<string, SourceAdapter>;
  private readonly loadConfigs: SourceConfigProvider;
  private readonly store: SeenItemStore;
  private readonly notifier: Notifier;
  private readonly requestDelayMs: number;
  private readonly nowFn: () => number;
  // Keywords per source still to be seeded; a keyword leaves once it was fetched.
  private readonly pendingSeeds = new Map<string, Set<string>>();

  constructor(options: MonitorCycleOptions) {
    this.adapters = options.adapters;
    this.loadConfigs = options.loadConfigs;
    this.store = options.store;
    this.notifier = options.notifier;
    this.requestDelayMs = options.requestDelayMs ?? 0;
    this.nowFn = options.nowFn ?? (() => Date.now());
  }

  async run(options: CycleRunOptions = {}): Promise<MonitorResult> {
    const reason = options.reason ?? "manual";
    const startedAtMs = this.nowFn();
    const configs = await this.loadConfigs();
    await this.store.load();

    const entries = Object.entries(configs);
    const settled = await Promise.allSettled(
      entries.map(([source, config]) => this.runSource(source, config, options.signal)),
    );

    const sources: SourceCycleSummary[] = [];
    let fatal: unknown;
    settled.forEach((result, index) => {
      const source = entries[index]?.[0];
      if (!source) return;
      if (result.status === "fulfilled") {
        sources.push(result.value);
        return;
      }
      logger.error("monitor_source_worker_failed", { source, error: errorMessage(result.reason) });
      fatal ??= result.reason;
    });

    if (fatal === undefined) {
      try {
        await this.store.flush();
      } catch (error) {
        fatal = error;
      }
    }
    if (fatal !== undefined) {
      throw fatal;
    }

    const finishedAtMs = this.nowFn();
    return {
      reason,
      startedAt: new Date(startedAtMs).toISOString(),
      finishedAt: new Date(finishedAtMs).toISOString(),
      durationMs: finishedAtMs - startedAtMs,
      errors: sources.reduce((sum, summary) => sum + summary.errors.length, 0),
      notifyFailures: sources.reduce((sum, summary) => sum + summary.notifyFailures, 0),
      sources,
    };
  }

  private async runSource(source: string, config: SourceConfig, signal?: AbortSignal): Promise<SourceCycleSummary> {
    const summary = emptySummary(source, config.keywords.length);
    const log = logger.child({ source });

    if (!config.enabled) {
      log.info("monitor_source_skipped", { reason: "disabled" });
      return { ...summary, skipped: "disabled" };
    }
    if (config.keywords.length === 0) {
      log.warn("monitor_source_skipped", { reason: "no_keywords" });
      return { ...summary, skipped: "no_keywords" };
    }
    const adapter = this.adapters.get(source);
    if (!adapter) {
      log.warn("monitor_source_skipped", { reason: "no_adapter" });
      return { ...summary, skipped: "no_adapter" };
    }

    let pendingSeed = config.seedOnFirstRun ? this.pendingSeeds.get(source) : undefined;
    if (config.seedOnFirstRun && !pendingSeed && (await this.store.count(source)) === 0) {
      pendingSeed = new Set(config.keywords);
      this.pendingSeeds.set(source, pendingSeed);
    }
    if (pendingSeed) {
      log.info("monitor_source_seeding", { keywords: Array.from(pendingSeed) });
    }

    for (const [index, keyword] of config.keywords.entries()) {
      if (signal?.aborted) break;
      if (index > 0) {
        await cancellableSleep(this.requestDelayMs, signal);
        if (signal?.aborted) break;
      }

      let items: Item[];
      try {
        items = await adapter.search(keyword, { signal });
      } catch (error) {
        if (error instanceof StoreIOError) throw error;
        const kind = classifySourceError(error);
        summary.errors.push({
          keyword,
          kind,
          message: errorMessage(error),
          status: error instanceof FetchError ? error.status : undefined,
        });
        log.warn("monitor_keyword_failed", { keyword, kind, error: errorMessage(error) });
        continue;
      }

      summary.fetched += items.length;
      const seeding = pendingSeed?.has(keyword) ?? false;
      await this.processItems(source, keyword, config, items, summary, seeding);
      if (seeding) {
        pendingSeed?.delete(keyword);
      }
    }

    if (pendingSeed && pendingSeed.size === 0) {
      this.pendingSeeds.delete(source);
    }

    log.info("monitor_source_done", {
      fetched: summary.fetched,
      belowMinPrice: summary.belowMinPrice,
      alreadySeen: summary.alreadySeen,
      notified: summary.notified,
      notifyFailures: summary.notifyFailures,
      seeded: summary.seeded,
      errors: summary.errors.length,
    });
    return summary;
  }

  private async processItems(
    source: string,
    keyword: string,
    config: SourceConfig,
    items: Item[],
    summary: SourceCycleSummary,
    seeding: boolean,
  ): Promise<void> {
    for (const item of items) {
      if (!item.id) continue;
      // Below-threshold items never reach the notifier or the store.
      if (item.price < config.minPrice) {
        summary.belowMinPrice += 1;
        continue;
      }
      if (await this.store.has(source, item.id)) {
        summary.alreadySeen += 1;
        continue;
      }

      if (seeding) {
        await this.store.markSeen(source, item.id, new Date(this.nowFn()));
        summary.seeded += 1;
        continue;
      }

      const result = await this.notifier
        .send(formatItemMessage(item), { source, keyword, itemId: item.id })
        .catch((error: unknown) => ({ ok: false as const, error }));
      if (result.ok) {
        summary.notified += 1;
        logger.info("monitor_item_notified", { source, keyword, itemId: item.id, title: item.title });
      } else {
        summary.notifyFailures += 1;
        logger.warn("monitor_item_notify_failed", {
          source,
          keyword,
          itemId: item.id,
          error: errorMessage(result.error),
        });
      }

      // Marked seen whatever the send outcome: a failed send is a missed
      // notification, never a repeated one.
      await this.store.markSeen(source, item.id, new Date(this.nowFn()));
    }
  }
}
