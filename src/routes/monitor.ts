import { Hono } from "hono";
import type { Scheduler } from "../services/scheduler.js";

export function createMonitorRouter(scheduler: Scheduler): Hono {
  const app = new Hono();

  app.get("/status", (c) => {
    return c.json({ code: 200, message: "ok", data: scheduler.snapshot() }, 200);
  });

  app.post("/run", async (c) => {
    const result = await scheduler.runNow("manual");
    return c.json({ code: 200, message: "ok", data: result }, 200);
  });

  return app;
}
