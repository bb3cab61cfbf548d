import { Hono } from "hono";
import { SOURCE_DEFINITIONS } from "../domain/sources.js";
import type { SourceConfigProvider } from "../services/monitor-cycle.js";
import type { Scheduler } from "../services/scheduler.js";
import { createMonitorRouter } from "./monitor.js";

export function createV1Router(scheduler: Scheduler, loadConfigs: SourceConfigProvider): Hono {
  const app = new Hono();

  app.get("/sources", async (c) => {
    const configs = await loadConfigs();
    return c.json({
      code: 200,
      message: "ok",
      data: SOURCE_DEFINITIONS.map((source) => ({
        id: source.id,
        title: source.title,
        link: source.link,
        config: configs[source.id] ?? null,
      })),
    });
  });

  app.route("/monitor", createMonitorRouter(scheduler));

  return app;
}
