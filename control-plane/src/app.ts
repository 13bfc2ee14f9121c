import cors from "cors";
import express from "express";
import { bodyErrorHandler, sendError } from "./api/errors.js";
import { createApiRouter } from "./api/routes.js";
import type { AppConfig } from "./config.js";
import type { DispatchEvents } from "./events.js";
import { createRateLimiter } from "./limits/rateLimiter.js";
import { metricsSnapshot } from "./metrics/metrics.js";
import type { ResultService } from "./results.js";
import type { SubmissionService } from "./submission.js";
import type { UpdateService } from "./updates.js";

export function createApp(deps: {
  config: Pick<AppConfig, "maxBodyBytes" | "requestPerMinute">;
  submissions: SubmissionService;
  updates: UpdateService;
  results: ResultService;
  events: DispatchEvents;
}) {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: deps.config.maxBodyBytes }));
  app.use(bodyErrorHandler);
  app.get("/api/health", (_request, response) => {
    response.status(200).json({ ok: true });
  });
  app.get("/api/metrics", async (_request, response) => {
    try {
      const body = await metricsSnapshot();
      response.setHeader("Content-Type", "text/plain");
      response.send(body);
    } catch (error) {
      sendError(response, error);
    }
  });
  app.use(createRateLimiter(deps.config.requestPerMinute));
  app.use(
    "/api",
    createApiRouter({
      submissions: deps.submissions,
      updates: deps.updates,
      results: deps.results,
      events: deps.events
    })
  );
  return app;
}
