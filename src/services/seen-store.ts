import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { SeenRecord } from "../types/listing.js";
import { logger } from "../utils/logger.js";
import { StoreIOError } from "./errors.js";

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Durable set of `(source, id)` pairs that have already been reported.
 *
 * `markSeen` resolves only once the record is persisted, so a record that was
 * marked survives a crash that happens right after. Every backend failure
 * surfaces as a {@link StoreIOError}; nothing is answered from a store that
 * could not be read.
 */
export interface SeenItemStore {
  /** Loads persisted state. Idempotent: once loaded, later calls do nothing. */
  load(): Promise<void>;
  has(source: string, id: string): Promise<boolean>;
  /** Keeps the first `firstSeenAt` when the record already exists. */
  markSeen(source: string, id: string, timestamp: Date): Promise<void>;
  list(source: string): Promise<SeenRecord[]>;
  count(source: string): Promise<number>;
  flush(): Promise<void>;
}

export class InMemorySeenItemStore implements SeenItemStore {
  protected readonly records = new Map<string, Map<string, SeenRecord>>();

  async load(): Promise<void> {}

  async has(source: string, id: string): Promise<boolean> {
    return this.records.get(source)?.has(id) ?? false;
  }

  async markSeen(source: string, id: string, timestamp: Date): Promise<void> {
    this.remember({ source, id, firstSeenAt: timestamp.toISOString() });
  }

  async list(source: string): Promise<SeenRecord[]> {
    return Array.from(this.records.get(source)?.values() ?? []);
  }

  async count(source: string): Promise<number> {
    return this.records.get(source)?.size ?? 0;
  }

  async flush(): Promise<void> {}

  protected remember(record: SeenRecord): boolean {
    let bucket = this.records.get(record.source);
    if (!bucket) {
      bucket = new Map();
      this.records.set(record.source, bucket);
    }
    if (bucket.has(record.id)) return false;
    bucket.set(record.id, record);
    return true;
  }

  protected contains(source: string, id: string): boolean {
    return this.records.get(source)?.has(id) ?? false;
  }
}

const seenRecordSchema = z.object({
  source: z.string().min(1),
  id: z.string().min(1),
  firstSeenAt: z.string().refine((value) => Number.isFinite(Date.parse(value))),
});

function parseLine(line: string): SeenRecord | null {
  try {
    const parsed = seenRecordSchema.safeParse(JSON.parse(line));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

interface FileSeenItemStoreOptions {
  retentionDays?: number;
  nowFn?: () => number;
}

/**
 * Append-only JSON Lines log. `markSeen` appends one line; `flush` rewrites
 * the log in compacted form through a tmp file and rename. Appends and
 * compaction share one queue so they never interleave.
 */
export class FileSeenItemStore extends InMemorySeenItemStore {
  private readonly statePath: string;
  private readonly tmpPath: string;
  private readonly retentionDays: number;
  private readonly nowFn: () => number;
  private loaded = false;
  private queue: Promise<void> = Promise.resolve();

  constructor(statePath: string, options: FileSeenItemStoreOptions = {}) {
    super();
    const absolute = path.isAbsolute(statePath) ? statePath : path.resolve(process.cwd(), statePath);
    this.statePath = absolute;
    this.tmpPath = `${absolute}.tmp`;
    this.retentionDays = options.retentionDays ?? 0;
    this.nowFn = options.nowFn ?? (() => Date.now());
  }

  get filePath(): string {
    return this.statePath;
  }

  override async load(): Promise<void> {
    if (this.loaded) return;

    let raw: string;
    try {
      raw = await fs.readFile(this.statePath, "utf8");
    } catch (error) {
      const code = (error as NodeJS.ErrnoException | undefined)?.code;
      if (code === "ENOENT") {
        this.loaded = true;
        return;
      }
      throw new StoreIOError("load", error);
    }

    const lines = raw.split("\n");
    const endsCleanly = raw.length === 0 || raw.endsWith("\n");

    for (let index = 0; index < lines.length; index += 1) {
      const line = lines[index]?.trim() ?? "";
      if (!line) continue;
      const record = parseLine(line);
      if (record) {
        this.remember(record);
        continue;
      }
      const isLast = index === lines.length - 1;
      if (isLast && !endsCleanly) {
        logger.warn("seen_store_torn_tail_skipped", { path: this.statePath, line: index + 1 });
        continue;
      }
      throw new StoreIOError("load", new Error(`Corrupt record at ${this.statePath}:${index + 1}`));
    }

    this.loaded = true;

    // Without a trailing newline the next append would be glued onto the
    // last line, whether or not that line parsed.
    if (!endsCleanly) {
      await this.flush();
    }
  }

  override async has(source: string, id: string): Promise<boolean> {
    this.assertLoaded("has");
    return this.contains(source, id);
  }

  override async markSeen(source: string, id: string, timestamp: Date): Promise<void> {
    this.assertLoaded("markSeen");
    if (this.contains(source, id)) return;

    const record: SeenRecord = { source, id, firstSeenAt: timestamp.toISOString() };
    await this.enqueue(async () => {
      try {
        await fs.mkdir(path.dirname(this.statePath), { recursive: true });
        await fs.appendFile(this.statePath, `${JSON.stringify(record)}\n`, "utf8");
      } catch (error) {
        throw new StoreIOError("markSeen", error);
      }
      this.remember(record);
    });
  }

  override async list(source: string): Promise<SeenRecord[]> {
    this.assertLoaded("list");
    return super.list(source);
  }

  override async count(source: string): Promise<number> {
    this.assertLoaded("count");
    return super.count(source);
  }

  override async flush(): Promise<void> {
    if (!this.loaded) return;

    await this.enqueue(async () => {
      this.prune();
      const lines = Array.from(this.records.values())
        .flatMap((bucket) => Array.from(bucket.values()))
        .map((record) => `${JSON.stringify(record)}\n`)
        .join("");
      try {
        await fs.mkdir(path.dirname(this.statePath), { recursive: true });
        await fs.writeFile(this.tmpPath, lines, "utf8");
        await fs.rename(this.tmpPath, this.statePath);
      } catch (error) {
        throw new StoreIOError("flush", error);
      }
    });
  }

  private prune(): void {
    if (this.retentionDays <= 0) return;
    const cutoffMs = this.nowFn() - this.retentionDays * DAY_MS;
    let removed = 0;
    for (const bucket of this.records.values()) {
      for (const [id, record] of bucket) {
        if (Date.parse(record.firstSeenAt) < cutoffMs) {
          bucket.delete(id);
          removed += 1;
        }
      }
    }
    if (removed > 0) {
      logger.info("seen_store_pruned", { removed, retentionDays: this.retentionDays });
    }
  }

  private assertLoaded(operation: string): void {
    if (!this.loaded) {
      throw new StoreIOError(operation, new Error("store has not been loaded"));
    }
  }

  private enqueue(task: () => Promise<void>): Promise<void> {
    const run = this.queue.then(task);
    this.queue = run.catch(() => undefined);
    return run;
  }
}

/** The subset of the ioredis client the Redis store calls. */
export interface SeenRedisClient {
  ping(): Promise<string>;
  hsetnx(key: string, field: string, value: string): Promise<number>;
  hexists(key: string, field: string): Promise<number>;
  hgetall(key: string): Promise<Record<string, string>>;
  hlen(key: string): Promise<number>;
}

/** One hash per source: `<prefix>:seen:<source>` maps item id to firstSeenAt. */
export class RedisSeenItemStore implements SeenItemStore {
  private readonly client: SeenRedisClient;
  private readonly prefix: string;

  constructor(client: SeenRedisClient, prefix: string) {
    this.client = client;
    this.prefix = prefix;
  }

  private sourceKey(source: string): string {
    return `${this.prefix}:seen:${source}`;
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new StoreIOError(operation, error);
    }
  }

  async load(): Promise<void> {
    await this.call("load", () => this.client.ping());
  }

  async has(source: string, id: string): Promise<boolean> {
    const exists = await this.call("has", () => this.client.hexists(this.sourceKey(source), id));
    return exists === 1;
  }

  async markSeen(source: string, id: string, timestamp: Date): Promise<void> {
    await this.call("markSeen", () => this.client.hsetnx(this.sourceKey(source), id, timestamp.toISOString()));
  }

  async list(source: string): Promise<SeenRecord[]> {
    const entries = await this.call("list", () => this.client.hgetall(this.sourceKey(source)));
    return Object.entries(entries).map(([id, firstSeenAt]) => ({ source, id, firstSeenAt }));
  }

  async count(source: string): Promise<number> {
    return this.call("count", () => this.client.hlen(this.sourceKey(source)));
  }

  async flush(): Promise<void> {}
}
