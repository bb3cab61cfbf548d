import { serve } from "@hono/node-server";
import { Redis } from "ioredis";
import { createApp } from "./app.js";
import { env } from "./config/env.js";
import { createRegisteredAdapters } from "./domain/sources.js";
import { MonitorCycle } from "./services/monitor-cycle.js";
import { LineNotifier } from "./services/notifier.js";
import { Scheduler } from "./services/scheduler.js";
import { FileSeenItemStore, RedisSeenItemStore, type SeenItemStore } from "./services/seen-store.js";
import { readSourceConfigs } from "./services/source-config.js";
import { errorMessage, logger } from "./utils/logger.js";

const loadConfigs = () => readSourceConfigs(env.CONFIG_PATH);

let redis: Redis | undefined;
function createStore(): SeenItemStore {
  if (env.SEEN_STORE === "redis") {
    if (!env.REDIS_URL) {
      throw new Error("SEEN_STORE=redis requires REDIS_URL");
    }
    redis = new Redis(env.REDIS_URL, {
      lazyConnect: true,
      maxRetriesPerRequest: 1,
    });
    redis.on("error", (error: unknown) => {
      logger.warn("redis_error", { message: errorMessage(error) });
    });
    return new RedisSeenItemStore(redis, env.REDIS_PREFIX);
  }
  return new FileSeenItemStore(env.SEEN_STORE_PATH, { retentionDays: env.SEEN_RETENTION_DAYS });
}

// The sources file is only read by the cycle, so a broken file fails that cycle, not the process.
const adapters = createRegisteredAdapters({ timeoutMs: env.REQUEST_TIMEOUT_MS });

const notifier = new LineNotifier({
  channelAccessToken: env.LINE_CHANNEL_ACCESS_TOKEN,
  userId: env.LINE_USER_ID,
  timeoutMs: env.REQUEST_TIMEOUT_MS,
});
if (!notifier.configured) {
  logger.warn("notifier_not_configured", { channel: notifier.channel });
}

const cycle = new MonitorCycle({
  adapters,
  loadConfigs,
  store: createStore(),
  notifier,
  requestDelayMs: env.REQUEST_DELAY_MS,
});
const scheduler = new Scheduler({
  cycle,
  intervalMs: env.MONITOR_INTERVAL_MINUTES * 60 * 1000,
});

const controller = new AbortController();

const server = env.HTTP_ENABLED
  ? serve(
      {
        fetch: createApp({ scheduler, loadConfigs }).fetch,
        port: env.PORT,
      },
      () => {
        logger.info("server_started", {
          port: env.PORT,
          env: env.NODE_ENV,
        });
      },
    )
  : null;

server?.on("error", (error) => {
  logger.error("server_start_failed", {
    port: env.PORT,
    env: env.NODE_ENV,
    error: errorMessage(error),
  });
});

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    logger.info("shutdown_requested", { signal });
    controller.abort();
  });
}

logger.info("monitor_starting", {
  configPath: env.CONFIG_PATH,
  sources: Array.from(adapters.keys()),
  store: env.SEEN_STORE,
  intervalMinutes: env.MONITOR_INTERVAL_MINUTES,
});

await scheduler.run(controller.signal);

server?.close();
if (redis) {
  await redis.quit().catch((error: unknown) => {
    logger.warn("redis_quit_failed", { message: errorMessage(error) });
  });
}
logger.info("monitor_exited");
