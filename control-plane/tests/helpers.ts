import { vi } from "vitest";
import type { CompletionEvent, CompletionNotifier } from "../src/notifier.js";
import { MemoryDispatchQueue } from "../src/queue/memoryQueue.js";
import { createServices, type ServiceConfig } from "../src/services.js";
import { MemoryResultStore } from "../src/store/memoryStore.js";

export const testConfig: ServiceConfig = {
  dispatchTopic: "dispatches",
  resultsDir: "/srv/results",
  storeTimeoutMs: 200,
  publishTimeoutMs: 200,
  completionWebhookUrl: null
};

export function recordingNotifier() {
  const events: CompletionEvent[] = [];
  const notifier: CompletionNotifier = {
    notify: vi.fn((event: CompletionEvent) => {
      events.push(event);
    })
  };
  return { notifier, events };
}

export function makeServices(overrides: Partial<ServiceConfig> = {}) {
  const store = new MemoryResultStore();
  const queue = new MemoryDispatchQueue();
  const { notifier, events: completions } = recordingNotifier();
  let counter = 0;
  const services = createServices({
    config: { ...testConfig, ...overrides },
    store,
    queue,
    notifier,
    generateId: () => {
      counter += 1;
      return `00000000-0000-4000-8000-${String(counter).padStart(12, "0")}`;
    }
  });
  return { ...services, store, queue, notifier, completions };
}

export const loadAndTrain = {
  nodes: [
    { id: 0, name: "load_data", metadata: { executor: "local" } },
    { id: 1, name: "train", function_string: "def train(data): ..." }
  ],
  edges: [{ source: 0, target: 1, edge_name: "data", param_type: "kwarg" }]
};
