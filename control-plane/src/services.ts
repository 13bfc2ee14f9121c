import type { AppConfig } from "./config.js";
import { DispatchEvents } from "./events.js";
import { KeyedMutex } from "./locks/keyedMutex.js";
import { EventCompletionNotifier, type CompletionNotifier } from "./notifier.js";
import type { DispatchQueue } from "./queue/types.js";
import { ResultService } from "./results.js";
import type { ResultStore } from "./store/types.js";
import { SubmissionService } from "./submission.js";
import { UpdateService } from "./updates.js";

export type ServiceConfig = Pick<
  AppConfig,
  "dispatchTopic" | "resultsDir" | "storeTimeoutMs" | "publishTimeoutMs" | "completionWebhookUrl"
>;

export interface Services {
  submissions: SubmissionService;
  updates: UpdateService;
  results: ResultService;
  events: DispatchEvents;
}

/** Wires the services around one store, one queue and one shared lock table. */
export function createServices(deps: {
  config: ServiceConfig;
  store: ResultStore;
  queue: DispatchQueue;
  events?: DispatchEvents;
  notifier?: CompletionNotifier;
  generateId?: () => string;
}): Services {
  const events = deps.events ?? new DispatchEvents();
  const notifier = deps.notifier ?? new EventCompletionNotifier(events, deps.config.completionWebhookUrl);
  const locks = new KeyedMutex();

  return {
    events,
    submissions: new SubmissionService({
      store: deps.store,
      queue: deps.queue,
      locks,
      events,
      notifier,
      generateId: deps.generateId,
      options: {
        topic: deps.config.dispatchTopic,
        resultsDir: deps.config.resultsDir,
        storeTimeoutMs: deps.config.storeTimeoutMs,
        publishTimeoutMs: deps.config.publishTimeoutMs
      }
    }),
    updates: new UpdateService({
      store: deps.store,
      locks,
      events,
      notifier,
      storeTimeoutMs: deps.config.storeTimeoutMs
    }),
    results: new ResultService(deps.store, deps.config.storeTimeoutMs)
  };
}
