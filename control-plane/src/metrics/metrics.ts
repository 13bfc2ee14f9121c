import client from "prom-client";

export const registry = new client.Registry();

client.collectDefaultMetrics({ register: registry });

export const dispatchSubmittedCounter = new client.Counter({
  name: "dispatch_submitted_total",
  help: "Dispatch submissions by outcome.",
  labelNames: ["outcome"] as const,
  registers: [registry]
});

export const nodeUpdateCounter = new client.Counter({
  name: "node_update_total",
  help: "Runner node updates by outcome and reported status.",
  labelNames: ["outcome", "status"] as const,
  registers: [registry]
});

export const resultCompletedCounter = new client.Counter({
  name: "result_completed_total",
  help: "Dispatches reaching a terminal status.",
  labelNames: ["status"] as const,
  registers: [registry]
});

export const publishLatencyHistogram = new client.Histogram({
  name: "dispatch_publish_seconds",
  help: "Time spent waiting for the broker to acknowledge a dispatch.",
  buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
  registers: [registry]
});

export const notificationFailureCounter = new client.Counter({
  name: "completion_notification_failures_total",
  help: "Completion webhook deliveries that failed.",
  registers: [registry]
});

export async function metricsSnapshot(): Promise<string> {
  return registry.metrics();
}
