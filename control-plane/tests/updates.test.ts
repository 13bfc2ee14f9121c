import {
  InvalidTransitionError,
  NotFoundError,
  StoreTimeoutError,
  ValidationError
} from "@workflow-dispatch/shared";
import { describe, expect, it, vi } from "vitest";
import type { DispatchEvent } from "../src/events.js";
import { loadAndTrain, makeServices } from "./helpers.js";

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function submitted(payload: unknown = loadAndTrain) {
  const services = makeServices();
  const { dispatchId } = await services.submissions.submit(payload);
  return { ...services, dispatchId };
}

describe("UpdateService", () => {
  it("completes a single-node dispatch", async () => {
    const { updates, results, notifier, dispatchId } = await submitted({
      nodes: [{ id: 0, name: "load_data" }],
      edges: []
    });

    const ack = await updates.applyUpdate(dispatchId, { node_id: 0, status: "COMPLETED", output: [1, 2, 3] });
    expect(ack).toEqual({
      status: "updated",
      dispatchId,
      nodeId: 0,
      nodeStatus: "COMPLETED",
      resultStatus: "COMPLETED"
    });

    const result = await results.get(dispatchId);
    expect(result.status).toBe("COMPLETED");
    expect(result.nodes[0].output).toEqual([1, 2, 3]);
    expect(notifier.notify).toHaveBeenCalledTimes(1);
    expect(notifier.notify).toHaveBeenCalledWith({
      dispatchId,
      status: "COMPLETED",
      completedAt: result.updatedAt
    });
  });

  it("rejects a terminal node moving back to RUNNING", async () => {
    const { updates, results, notifier, dispatchId } = await submitted();
    await updates.applyUpdate(dispatchId, { node_id: 0, status: "COMPLETED" });

    await expect(updates.applyUpdate(dispatchId, { node_id: 0, status: "RUNNING" })).rejects.toThrow(
      "Invalid node 0 transition: COMPLETED -> RUNNING"
    );
    await expect(updates.applyUpdate(dispatchId, { node_id: 0, status: "FAILED" })).rejects.toBeInstanceOf(
      InvalidTransitionError
    );
    expect((await results.get(dispatchId)).nodes[0].status).toBe("COMPLETED");
    expect(notifier.notify).not.toHaveBeenCalled();
  });

  it("accepts a repeated terminal report without notifying again", async () => {
    const { updates, notifier, dispatchId } = await submitted({ nodes: [{ id: 0, name: "only" }] });
    await updates.applyUpdate(dispatchId, { node_id: 0, status: "COMPLETED" });
    const repeat = await updates.applyUpdate(dispatchId, { node_id: 0, status: "COMPLETED" });

    expect(repeat.resultStatus).toBe("COMPLETED");
    expect(notifier.notify).toHaveBeenCalledTimes(1);
  });

  it("applies concurrent reports for sibling nodes", async () => {
    const { updates, results, notifier, dispatchId } = await submitted({
      nodes: [
        { id: 0, name: "left" },
        { id: 1, name: "right" }
      ]
    });

    await Promise.all([
      updates.applyUpdate(dispatchId, { node_id: 0, status: "COMPLETED" }),
      updates.applyUpdate(dispatchId, { node_id: 1, status: "COMPLETED" })
    ]);

    const result = await results.get(dispatchId);
    expect(result.nodes.map((node) => node.status)).toEqual(["COMPLETED", "COMPLETED"]);
    expect(result.status).toBe("COMPLETED");
    expect(notifier.notify).toHaveBeenCalledTimes(1);
  });

  it("fails the result once the only runnable path has failed", async () => {
    const { updates, notifier, dispatchId } = await submitted();
    const ack = await updates.applyUpdate(dispatchId, { node_id: 0, status: "FAILED", error: "disk full" });

    expect(ack.resultStatus).toBe("FAILED");
    expect(notifier.notify).toHaveBeenCalledWith(expect.objectContaining({ status: "FAILED" }));
  });

  it("streams output while a node is running and emits events", async () => {
    const { updates, results, events, dispatchId } = await submitted();
    const seen: DispatchEvent[] = [];
    events.onEvent((event) => seen.push(event));

    await updates.applyUpdate(dispatchId, { node_id: 0, status: "RUNNING", stdout: "epoch 1" });
    await updates.applyUpdate(dispatchId, { node_id: 0, stdout: "epoch 1\nepoch 2" });

    const node = (await results.get(dispatchId)).nodes[0];
    expect(node.status).toBe("RUNNING");
    expect(node.stdout).toBe("epoch 1\nepoch 2");
    expect(seen).toEqual([
      { type: "node.updated", dispatchId, nodeId: 0, status: "RUNNING" },
      { type: "result.updated", dispatchId, status: "RUNNING" },
      { type: "node.updated", dispatchId, nodeId: 0, status: "RUNNING" }
    ]);
  });

  it("reports unknown dispatches and nodes as not found", async () => {
    const { updates, dispatchId } = await submitted();
    await expect(updates.applyUpdate("missing", { node_id: 0, status: "RUNNING" })).rejects.toBeInstanceOf(
      NotFoundError
    );
    await expect(updates.applyUpdate(dispatchId, { node_id: 9, status: "RUNNING" })).rejects.toThrow(
      `Node 9 not found in dispatch ${dispatchId}.`
    );
  });

  it("rejects malformed reports before touching the store", async () => {
    const { updates, results, dispatchId } = await submitted();
    await expect(
      updates.applyUpdate(dispatchId, { node_id: 0, status: "DONE" })
    ).rejects.toBeInstanceOf(ValidationError);
    expect((await results.get(dispatchId)).nodes[0].status).toBe("PENDING");
  });

  it("cancels unfinished nodes and refuses further transitions", async () => {
    const { updates, notifier, dispatchId } = await submitted();
    await updates.applyUpdate(dispatchId, { node_id: 0, status: "COMPLETED" });

    const cancelled = await updates.cancel(dispatchId);
    expect(cancelled.status).toBe("CANCELLED");
    expect(cancelled.nodes.map((node) => node.status)).toEqual(["COMPLETED", "CANCELLED"]);
    expect(notifier.notify).toHaveBeenCalledTimes(1);
    expect(notifier.notify).toHaveBeenCalledWith(expect.objectContaining({ status: "CANCELLED" }));

    await expect(updates.cancel(dispatchId)).rejects.toThrow(`Dispatch ${dispatchId} is already CANCELLED.`);
    await expect(updates.applyUpdate(dispatchId, { node_id: 1, status: "COMPLETED" })).rejects.toBeInstanceOf(
      InvalidTransitionError
    );
  });

  it("announces an update whose store write outlived the timeout", async () => {
    const { updates, store, events, notifier, dispatchId } = await submitted({ nodes: [{ id: 0, name: "only" }] });
    const realUpdate = store.updateNode.bind(store);
    vi.spyOn(store, "updateNode").mockImplementationOnce(async (id, update) => {
      await sleep(300);
      return realUpdate(id, update);
    });
    const seen: string[] = [];
    events.onEvent((event) => seen.push(event.type));

    await expect(updates.applyUpdate(dispatchId, { node_id: 0, status: "COMPLETED" })).rejects.toBeInstanceOf(
      StoreTimeoutError
    );
    expect(notifier.notify).not.toHaveBeenCalled();

    await vi.waitFor(() => {
      expect(notifier.notify).toHaveBeenCalledTimes(1);
    });
    expect(notifier.notify).toHaveBeenCalledWith(expect.objectContaining({ dispatchId, status: "COMPLETED" }));
    expect(seen).toEqual(["node.updated", "result.updated"]);

    const redelivered = await updates.applyUpdate(dispatchId, { node_id: 0, status: "COMPLETED" });
    expect(redelivered.resultStatus).toBe("COMPLETED");
    expect(notifier.notify).toHaveBeenCalledTimes(1);
  });

  it("holds the dispatch lock until a slow write lands", async () => {
    const { updates, store, dispatchId } = await submitted();
    const realUpdate = store.updateNode.bind(store);
    vi.spyOn(store, "updateNode").mockImplementationOnce(async (id, update) => {
      await sleep(300);
      return realUpdate(id, update);
    });

    await expect(updates.applyUpdate(dispatchId, { node_id: 0, status: "COMPLETED" })).rejects.toBeInstanceOf(
      StoreTimeoutError
    );
    const next = await updates.applyUpdate(dispatchId, { node_id: 1, status: "RUNNING" });

    expect(next.resultStatus).toBe("RUNNING");
    const nodes = (await store.get(dispatchId)).nodes;
    expect(nodes.map((node) => node.status)).toEqual(["COMPLETED", "RUNNING"]);
  });

  it("announces a cancellation whose store write outlived the timeout", async () => {
    const { updates, store, notifier, dispatchId } = await submitted();
    const realCancel = store.cancel.bind(store);
    vi.spyOn(store, "cancel").mockImplementationOnce(async (id) => {
      await sleep(300);
      return realCancel(id);
    });

    await expect(updates.cancel(dispatchId)).rejects.toBeInstanceOf(StoreTimeoutError);
    await vi.waitFor(() => {
      expect(notifier.notify).toHaveBeenCalledWith(expect.objectContaining({ dispatchId, status: "CANCELLED" }));
    });
  });
});
