import { Router } from "express";
import type { DispatchEvent, DispatchEvents } from "../events.js";
import type { ResultService } from "../results.js";
import type { SubmissionService } from "../submission.js";
import type { UpdateService } from "../updates.js";
import { sendError } from "./errors.js";
import { toWireAck, toWireResult, toWireSummary } from "./serializers.js";

export function createApiRouter(deps: {
  submissions: SubmissionService;
  updates: UpdateService;
  results: ResultService;
  events: DispatchEvents;
}): Router {
  const router = Router();

  router.post("/dispatch", async (request, response) => {
    try {
      const { dispatchId } = await deps.submissions.submit(request.body);
      response.status(202).json({ dispatch_id: dispatchId });
    } catch (error) {
      sendError(response, error);
    }
  });

  router.get("/results", async (_request, response) => {
    try {
      const results = await deps.results.list();
      response.status(200).json({ results: results.map(toWireSummary) });
    } catch (error) {
      sendError(response, error);
    }
  });

  router.get("/results/:dispatchId", async (request, response) => {
    try {
      const result = await deps.results.get(String(request.params.dispatchId ?? ""));
      response.status(200).json(toWireResult(result));
    } catch (error) {
      sendError(response, error);
    }
  });

  router.put("/results/:dispatchId", async (request, response) => {
    try {
      const ack = await deps.updates.applyUpdate(String(request.params.dispatchId ?? ""), request.body);
      response.status(200).json(toWireAck(ack));
    } catch (error) {
      sendError(response, error);
    }
  });

  router.post("/results/:dispatchId/cancel", async (request, response) => {
    try {
      const result = await deps.updates.cancel(String(request.params.dispatchId ?? ""));
      response.status(200).json({ dispatch_id: result.dispatchId, status: result.status });
    } catch (error) {
      sendError(response, error);
    }
  });

  router.get("/events", (request, response) => {
    const dispatchId = typeof request.query.dispatch_id === "string" ? request.query.dispatch_id : null;
    response.setHeader("Content-Type", "text/event-stream");
    response.setHeader("Cache-Control", "no-cache");
    response.setHeader("Connection", "keep-alive");
    response.flushHeaders();

    const unsubscribe = deps.events.onEvent((event: DispatchEvent) => {
      if (dispatchId && event.dispatchId !== dispatchId) return;
      response.write(`event: ${event.type}\ndata: ${JSON.stringify(event)}\n\n`);
    });
    const ping = setInterval(() => {
      response.write(":keepalive\n\n");
    }, 15_000);

    response.on("close", () => {
      clearInterval(ping);
      unsubscribe();
      response.end();
    });
  });

  return router;
}
