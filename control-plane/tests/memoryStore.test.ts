import {
  AlreadyExistsError,
  InvalidTransitionError,
  NotFoundError,
  buildInitialResult,
  parseWorkflowGraph
} from "@workflow-dispatch/shared";
import { describe, expect, it } from "vitest";
import { MemoryResultStore } from "../src/store/memoryStore.js";

const CREATED = "2026-03-01T08:00:00.000Z";

function seed(dispatchId: string, createdAt = CREATED) {
  return buildInitialResult({
    dispatchId,
    resultsDir: `/srv/results/${dispatchId}`,
    now: createdAt,
    graph: parseWorkflowGraph({
      nodes: [
        { id: 0, name: "extract" },
        { id: 1, name: "transform" }
      ],
      edges: [{ source: 0, target: 1 }]
    })
  });
}

describe("MemoryResultStore", () => {
  it("rejects a duplicate dispatch id", async () => {
    const store = new MemoryResultStore();
    await store.create(seed("d-1"));
    await expect(store.create(seed("d-1"))).rejects.toBeInstanceOf(AlreadyExistsError);
  });

  it("throws NotFoundError for unknown dispatches and nodes", async () => {
    const store = new MemoryResultStore();
    await expect(store.get("missing")).rejects.toBeInstanceOf(NotFoundError);
    await store.create(seed("d-1"));
    await expect(store.updateNode("d-1", { nodeId: 5, status: "RUNNING" })).rejects.toThrow(
      "Node 5 not found in dispatch d-1."
    );
  });

  it("hands out copies so callers cannot mutate stored state", async () => {
    const store = new MemoryResultStore();
    await store.create(seed("d-1"));
    const copy = await store.get("d-1");
    copy.nodes[0].status = "COMPLETED";
    expect((await store.get("d-1")).nodes[0].status).toBe("PENDING");
  });

  it("keeps the last good state when an update is rejected", async () => {
    const store = new MemoryResultStore(() => new Date("2026-03-01T08:05:00.000Z"));
    await store.create(seed("d-1"));
    await store.updateNode("d-1", { nodeId: 0, status: "COMPLETED", output: 10 });
    await expect(
      store.updateNode("d-1", { nodeId: 0, status: "RUNNING", output: 11 })
    ).rejects.toBeInstanceOf(InvalidTransitionError);

    const stored = await store.get("d-1");
    expect(stored.nodes[0]).toMatchObject({ status: "COMPLETED", output: 10 });
    expect(stored.updatedAt).toBe("2026-03-01T08:05:00.000Z");
  });

  it("applies concurrent updates to different nodes", async () => {
    const store = new MemoryResultStore();
    await store.create(
      buildInitialResult({
        dispatchId: "d-1",
        resultsDir: "/srv/results/d-1",
        now: CREATED,
        graph: parseWorkflowGraph({ nodes: [{ id: 0, name: "left" }, { id: 1, name: "right" }] })
      })
    );
    await Promise.all([
      store.updateNode("d-1", { nodeId: 0, status: "COMPLETED" }),
      store.updateNode("d-1", { nodeId: 1, status: "COMPLETED" })
    ]);
    const stored = await store.get("d-1");
    expect(stored.nodes.map((node) => node.status)).toEqual(["COMPLETED", "COMPLETED"]);
    expect(stored.status).toBe("COMPLETED");
  });

  it("fails and cancels dispatches", async () => {
    const store = new MemoryResultStore();
    await store.create(seed("d-1"));
    await store.create(seed("d-2"));

    const failed = await store.failDispatch("d-1", "broker down");
    expect(failed.status).toBe("FAILED");
    expect(failed.error).toBe("broker down");

    const cancelled = await store.cancel("d-2");
    expect(cancelled.status).toBe("CANCELLED");
    await expect(store.cancel("d-2")).rejects.toBeInstanceOf(InvalidTransitionError);
  });

  it("lists newest first", async () => {
    const store = new MemoryResultStore();
    await store.create(seed("older", "2026-03-01T08:00:00.000Z"));
    await store.create(seed("newer", "2026-03-02T08:00:00.000Z"));
    const summaries = await store.list();
    expect(summaries.map((summary) => summary.dispatchId)).toEqual(["newer", "older"]);
    expect(summaries[0]).toMatchObject({ status: "PENDING", nodeCount: 2, completedCount: 0 });
  });
});
