import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { StoreIOError } from "../src/services/errors.js";
import {
  FileSeenItemStore,
  InMemorySeenItemStore,
  RedisSeenItemStore,
  type SeenRedisClient,
} from "../src/services/seen-store.js";

const T1 = new Date("2026-03-01T00:00:00.000Z");
const T2 = new Date("2026-03-02T00:00:00.000Z");

class FakeRedis implements SeenRedisClient {
  readonly hashes = new Map<string, Map<string, string>>();
  failing = false;

  private check(): void {
    if (this.failing) throw new Error("connection refused");
  }

  async ping(): Promise<string> {
    this.check();
    return "PONG";
  }

  async hsetnx(key: string, field: string, value: string): Promise<number> {
    this.check();
    const hash = this.hashes.get(key) ?? new Map<string, string>();
    this.hashes.set(key, hash);
    if (hash.has(field)) return 0;
    hash.set(field, value);
    return 1;
  }

  async hexists(key: string, field: string): Promise<number> {
    this.check();
    return this.hashes.get(key)?.has(field) ? 1 : 0;
  }

  async hgetall(key: string): Promise<Record<string, string>> {
    this.check();
    return Object.fromEntries(this.hashes.get(key) ?? []);
  }

  async hlen(key: string): Promise<number> {
    this.check();
    return this.hashes.get(key)?.size ?? 0;
  }
}

describe("InMemorySeenItemStore", () => {
  test("scopes ids per source and keeps the first timestamp", async () => {
    const store = new InMemorySeenItemStore();
    await store.markSeen("yahoo", "a1", T1);
    await store.markSeen("yahoo", "a1", T2);

    expect(await store.has("yahoo", "a1")).toBe(true);
    expect(await store.has("mercari", "a1")).toBe(false);
    expect(await store.count("yahoo")).toBe(1);
    expect(await store.list("yahoo")).toEqual([
      { source: "yahoo", id: "a1", firstSeenAt: "2026-03-01T00:00:00.000Z" },
    ]);
  });
});

describe("FileSeenItemStore", () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "seen-store-"));
    file = path.join(dir, "nested", "seen.jsonl");
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  test("starts empty when the log does not exist", async () => {
    const store = new FileSeenItemStore(file);
    await store.load();
    expect(await store.has("yahoo", "a1")).toBe(false);
    expect(await store.count("yahoo")).toBe(0);
  });

  test("marked ids survive a restart without flush", async () => {
    const first = new FileSeenItemStore(file);
    await first.load();
    await first.markSeen("yahoo", "a1", T1);
    await first.markSeen("yahoo", "b2", T2);

    const restarted = new FileSeenItemStore(file);
    await restarted.load();
    expect(await restarted.has("yahoo", "a1")).toBe(true);
    expect(await restarted.has("yahoo", "b2")).toBe(true);
    expect(await restarted.has("yahoo", "c3")).toBe(false);
  });

  test("appends one line per new record and none for repeats", async () => {
    const store = new FileSeenItemStore(file);
    await store.load();
    await store.markSeen("yahoo", "a1", T1);
    await store.markSeen("yahoo", "a1", T2);

    const raw = await fs.readFile(file, "utf8");
    expect(raw).toBe(`${JSON.stringify({ source: "yahoo", id: "a1", firstSeenAt: "2026-03-01T00:00:00.000Z" })}\n`);
  });

  test("skips a torn final line and repairs the log", async () => {
    await fs.mkdir(path.dirname(file), { recursive: true });
    const good = JSON.stringify({ source: "yahoo", id: "a1", firstSeenAt: T1.toISOString() });
    await fs.writeFile(file, `${good}\n{"source":"yah`, "utf8");

    const store = new FileSeenItemStore(file);
    await store.load();
    expect(await store.has("yahoo", "a1")).toBe(true);

    await store.markSeen("yahoo", "b2", T2);
    const restarted = new FileSeenItemStore(file);
    await restarted.load();
    expect(await restarted.has("yahoo", "a1")).toBe(true);
    expect(await restarted.has("yahoo", "b2")).toBe(true);
  });

  test("repairs a valid final record that lacks its newline", async () => {
    await fs.mkdir(path.dirname(file), { recursive: true });
    const good = JSON.stringify({ source: "yahoo", id: "a1", firstSeenAt: T1.toISOString() });
    await fs.writeFile(file, good, "utf8");

    const store = new FileSeenItemStore(file);
    await store.load();
    await store.markSeen("yahoo", "b2", T2);

    const raw = await fs.readFile(file, "utf8");
    expect(raw.split("\n")).toEqual([
      good,
      JSON.stringify({ source: "yahoo", id: "b2", firstSeenAt: T2.toISOString() }),
      "",
    ]);

    const restarted = new FileSeenItemStore(file);
    await restarted.load();
    expect(await restarted.has("yahoo", "a1")).toBe(true);
    expect(await restarted.has("yahoo", "b2")).toBe(true);
  });

  test("fails with StoreIOError on a corrupt line in the middle", async () => {
    await fs.mkdir(path.dirname(file), { recursive: true });
    const good = JSON.stringify({ source: "yahoo", id: "a1", firstSeenAt: T1.toISOString() });
    await fs.writeFile(file, `not-json\n${good}\n`, "utf8");

    const store = new FileSeenItemStore(file);
    await expect(store.load()).rejects.toBeInstanceOf(StoreIOError);
  });

  test("refuses lookups before load", async () => {
    const store = new FileSeenItemStore(file);
    await expect(store.has("yahoo", "a1")).rejects.toBeInstanceOf(StoreIOError);
  });

  test("fails with StoreIOError when the log path is unreadable", async () => {
    await fs.mkdir(file, { recursive: true });
    const store = new FileSeenItemStore(file);
    await expect(store.load()).rejects.toBeInstanceOf(StoreIOError);
  });

  test("flush compacts the log and drops records past retention", async () => {
    const now = Date.parse("2026-03-10T00:00:00.000Z");
    const store = new FileSeenItemStore(file, { retentionDays: 5, nowFn: () => now });
    await store.load();
    await store.markSeen("yahoo", "old", new Date("2026-03-01T00:00:00.000Z"));
    await store.markSeen("yahoo", "recent", new Date("2026-03-08T00:00:00.000Z"));
    await store.flush();

    const raw = await fs.readFile(file, "utf8");
    expect(raw.trim().split("\n")).toEqual([
      JSON.stringify({ source: "yahoo", id: "recent", firstSeenAt: "2026-03-08T00:00:00.000Z" }),
    ]);
    expect(await store.has("yahoo", "old")).toBe(false);
    expect(await store.has("yahoo", "recent")).toBe(true);
  });

  test("concurrent marks from different sources are all persisted", async () => {
    const store = new FileSeenItemStore(file);
    await store.load();
    await Promise.all([
      store.markSeen("yahoo", "a1", T1),
      store.markSeen("mercari", "m1", T1),
      store.markSeen("yahoo", "a2", T1),
      store.flush(),
      store.markSeen("mercari", "m2", T1),
    ]);

    const restarted = new FileSeenItemStore(file);
    await restarted.load();
    expect(await restarted.count("yahoo")).toBe(2);
    expect(await restarted.count("mercari")).toBe(2);
  });
});

describe("RedisSeenItemStore", () => {
  test("keeps one hash per source", async () => {
    const redis = new FakeRedis();
    const store = new RedisSeenItemStore(redis, "test");
    await store.load();
    await store.markSeen("yahoo", "a1", T1);
    await store.markSeen("yahoo", "a1", T2);

    expect(await store.has("yahoo", "a1")).toBe(true);
    expect(await store.has("mercari", "a1")).toBe(false);
    expect(await store.count("yahoo")).toBe(1);
    expect(await store.list("yahoo")).toEqual([
      { source: "yahoo", id: "a1", firstSeenAt: "2026-03-01T00:00:00.000Z" },
    ]);
    expect(Array.from(redis.hashes.keys())).toEqual(["test:seen:yahoo"]);
  });

  test("wraps client failures in StoreIOError", async () => {
    const redis = new FakeRedis();
    const store = new RedisSeenItemStore(redis, "test");
    redis.failing = true;

    await expect(store.load()).rejects.toBeInstanceOf(StoreIOError);
    await expect(store.has("yahoo", "a1")).rejects.toThrow("Seen item store has failed: connection refused");
    await expect(store.markSeen("yahoo", "a1", T1)).rejects.toBeInstanceOf(StoreIOError);
  });
});
