import { Hono } from "hono";
import { formatErrorResponse } from "./middleware/error-handler.js";
import { createV1Router } from "./routes/v1.js";
import type { SourceConfigProvider } from "./services/monitor-cycle.js";
import type { Scheduler } from "./services/scheduler.js";
import { logger } from "./utils/logger.js";

interface CreateAppOptions {
  scheduler: Scheduler;
  loadConfigs: SourceConfigProvider;
}

function generateRequestId(): string {
  return `${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 10)}`;
}

export function createApp(options: CreateAppOptions): Hono {
  const app = new Hono();
  const { scheduler } = options;

  app.use("*", async (c, next) => {
    const start = Date.now();
    const requestId = c.req.header("x-request-id")?.trim() || generateRequestId();
    c.header("x-request-id", requestId);
    await next();
    logger.info("request", {
      requestId,
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
    });
  });

  app.get("/healthz", (c) => {
    const snapshot = scheduler.snapshot();
    const healthy = snapshot.state !== "stopped" && !snapshot.lastError;
    const statusCode = healthy ? 200 : 503;
    return c.json(
      {
        code: statusCode,
        message: healthy ? "ok" : "degraded",
        data: {
          state: snapshot.state,
          cyclesCompleted: snapshot.cyclesCompleted,
          cyclesFailed: snapshot.cyclesFailed,
          lastError: snapshot.lastError,
          nextRunAt: snapshot.nextRunAt,
        },
      },
      statusCode,
    );
  });

  app.route("/api/v1", createV1Router(scheduler, options.loadConfigs));

  app.notFound((c) => {
    return c.json(
      {
        code: 404,
        message: "Not Found",
      },
      404,
    );
  });

  app.onError((error, c) => formatErrorResponse(error, c));

  return app;
}
