import { errorMessage, type ResultStatus } from "@workflow-dispatch/shared";
import type { DispatchEvents } from "./events.js";
import { notificationFailureCounter, resultCompletedCounter } from "./metrics/metrics.js";

export interface CompletionEvent {
  dispatchId: string;
  status: ResultStatus;
  completedAt: string;
}

/** Invoked once per transition of a result into a terminal status. Must not throw. */
export interface CompletionNotifier {
  notify(event: CompletionEvent): void;
}

type Fetch = (url: string, init: { method: string; headers: Record<string, string>; body: string }) => Promise<{
  ok: boolean;
  status: number;
}>;

export class EventCompletionNotifier implements CompletionNotifier {
  constructor(
    private readonly events: DispatchEvents,
    private readonly webhookUrl: string | null = null,
    private readonly send: Fetch = fetch
  ) {}

  notify(event: CompletionEvent): void {
    resultCompletedCounter.inc({ status: event.status });
    this.events.emitEvent({ type: "result.completed", ...event });
    if (!this.webhookUrl) return;

    const url = this.webhookUrl;
    this.post(url, event).catch((error: unknown) => {
      notificationFailureCounter.inc();
      console.error(`completion webhook failed for dispatch ${event.dispatchId}: ${errorMessage(error)}`);
    });
  }

  private async post(url: string, event: CompletionEvent): Promise<void> {
    const response = await this.send(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        dispatch_id: event.dispatchId,
        status: event.status,
        completed_at: event.completedAt
      })
    });
    if (!response.ok) {
      throw new Error(`webhook responded with ${response.status}`);
    }
  }
}
