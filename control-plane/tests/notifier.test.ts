import { afterEach, describe, expect, it, vi } from "vitest";
import { DispatchEvents, type DispatchEvent } from "../src/events.js";
import { EventCompletionNotifier } from "../src/notifier.js";

const completion = {
  dispatchId: "d-1",
  status: "COMPLETED" as const,
  completedAt: "2026-03-01T08:00:00.000Z"
};

describe("EventCompletionNotifier", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("publishes a result.completed event", () => {
    const events = new DispatchEvents();
    const seen: DispatchEvent[] = [];
    events.onEvent((event) => seen.push(event));
    const send = vi.fn(async () => ({ ok: true, status: 200 }));

    new EventCompletionNotifier(events, null, send).notify(completion);

    expect(seen).toEqual([{ type: "result.completed", ...completion }]);
    expect(send).not.toHaveBeenCalled();
  });

  it("posts the completion to the webhook", () => {
    const send = vi.fn(async () => ({ ok: true, status: 200 }));
    new EventCompletionNotifier(new DispatchEvents(), "http://hooks.test/done", send).notify(completion);

    expect(send).toHaveBeenCalledWith("http://hooks.test/done", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        dispatch_id: "d-1",
        status: "COMPLETED",
        completed_at: "2026-03-01T08:00:00.000Z"
      })
    });
  });

  it("logs webhook failures instead of throwing", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const send = vi.fn(async () => ({ ok: false, status: 500 }));

    expect(() =>
      new EventCompletionNotifier(new DispatchEvents(), "http://hooks.test/done", send).notify(completion)
    ).not.toThrow();

    await vi.waitFor(() => {
      expect(errorSpy).toHaveBeenCalledWith(
        "completion webhook failed for dispatch d-1: webhook responded with 500"
      );
    });
  });
});
