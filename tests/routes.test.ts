import { describe, expect, test } from "vitest";
import { createApp } from "../src/app.js";
import { StoreIOError } from "../src/services/errors.js";
import { Scheduler, type CycleRunner } from "../src/services/scheduler.js";
import type { SourceConfigMap } from "../src/types/listing.js";
import type { MonitorResult } from "../src/types/monitor.js";

const RESULT: MonitorResult = {
  reason: "manual",
  startedAt: "2026-05-01T09:00:00.000Z",
  finishedAt: "2026-05-01T09:00:02.000Z",
  durationMs: 2000,
  errors: 0,
  notifyFailures: 0,
  sources: [
    {
      source: "yahoo",
      keywords: 1,
      fetched: 3,
      belowMinPrice: 1,
      alreadySeen: 1,
      notified: 1,
      notifyFailures: 0,
      seeded: 0,
      errors: [],
    },
  ],
};

const CONFIGS: SourceConfigMap = {
  yahoo: { enabled: true, keywords: ["camera"], minPrice: 3000, seedOnFirstRun: false },
};

function makeTestApp(cycle: CycleRunner = { run: async () => RESULT }) {
  const scheduler = new Scheduler({ cycle, intervalMs: 60_000 });
  const app = createApp({ scheduler, loadConfigs: async () => CONFIGS });
  return { app, scheduler };
}

describe("Routes", () => {
  test("GET /healthz is ok before any cycle", async () => {
    const { app } = makeTestApp();
    const response = await app.request("/healthz");
    const json = (await response.json()) as { code: number; message: string; data: Record<string, unknown> };

    expect(response.status).toBe(200);
    expect(json.message).toBe("ok");
    expect(json.data).toEqual({ state: "idle", cyclesCompleted: 0, cyclesFailed: 0 });
  });

  test("GET /healthz is degraded after a failed cycle", async () => {
    const { app, scheduler } = makeTestApp({
      run: async () => {
        throw new StoreIOError("load", new Error("disk full"));
      },
    });
    await scheduler.runNow().catch(() => undefined);

    const response = await app.request("/healthz");
    const json = (await response.json()) as { code: number; message: string; data: { lastError?: { name: string } } };

    expect(response.status).toBe(503);
    expect(json.code).toBe(503);
    expect(json.message).toBe("degraded");
    expect(json.data.lastError?.name).toBe("StoreIOError");
  });

  test("POST /api/v1/monitor/run returns the cycle result", async () => {
    const { app } = makeTestApp();
    const response = await app.request("/api/v1/monitor/run", { method: "POST" });
    const json = (await response.json()) as { code: number; data: MonitorResult };

    expect(response.status).toBe(200);
    expect(json.data).toEqual(RESULT);
  });

  test("POST /api/v1/monitor/run answers 409 while a cycle is running", async () => {
    let release: (value: MonitorResult) => void = () => undefined;
    const { app, scheduler } = makeTestApp({
      run: () =>
        new Promise<MonitorResult>((resolve) => {
          release = resolve;
        }),
    });
    const inFlight = scheduler.runNow();

    const response = await app.request("/api/v1/monitor/run", { method: "POST" });
    expect(response.status).toBe(409);
    expect(await response.json()).toEqual({ code: 409, message: "Monitor cycle already running" });

    release(RESULT);
    await inFlight;
  });

  test("POST /api/v1/monitor/run answers 503 when the store fails", async () => {
    const { app } = makeTestApp({
      run: async () => {
        throw new StoreIOError("load", new Error("disk full"));
      },
    });

    const response = await app.request("/api/v1/monitor/run", { method: "POST" });
    expect(response.status).toBe(503);
    expect(await response.json()).toEqual({ code: 503, message: "Seen Item Store Unavailable" });
  });

  test("GET /api/v1/monitor/status returns the scheduler snapshot", async () => {
    const { app, scheduler } = makeTestApp();
    await scheduler.runNow();

    const response = await app.request("/api/v1/monitor/status");
    const json = (await response.json()) as { data: { state: string; cyclesCompleted: number; lastResult: MonitorResult } };

    expect(response.status).toBe(200);
    expect(json.data.state).toBe("idle");
    expect(json.data.cyclesCompleted).toBe(1);
    expect(json.data.lastResult).toEqual(RESULT);
  });

  test("GET /api/v1/sources lists sources with their config", async () => {
    const { app } = makeTestApp();
    const response = await app.request("/api/v1/sources");
    const json = (await response.json()) as { data: unknown[] };

    expect(response.status).toBe(200);
    expect(json.data).toEqual([
      {
        id: "yahoo",
        title: "Yahoo!オークション",
        link: "https://auctions.yahoo.co.jp",
        config: CONFIGS.yahoo,
      },
    ]);
  });

  test("echoes the request id and answers 404 for unknown paths", async () => {
    const { app } = makeTestApp();
    const response = await app.request("/nope", { headers: { "x-request-id": "req-1" } });

    expect(response.status).toBe(404);
    expect(response.headers.get("x-request-id")).toBe("req-1");
    expect(await response.json()).toEqual({ code: 404, message: "Not Found" });
  });
});
