import {
  DispatchError,
  StoreTimeoutError,
  errorMessage,
  isTerminalResultStatus,
  parseNodeUpdate,
  type NodeStatus,
  type NodeUpdateOutcome,
  type ResultRecord,
  type ResultStatus
} from "@workflow-dispatch/shared";
import type { DispatchEvents } from "./events.js";
import type { KeyedMutex } from "./locks/keyedMutex.js";
import { nodeUpdateCounter } from "./metrics/metrics.js";
import type { CompletionNotifier } from "./notifier.js";
import type { ResultStore } from "./store/types.js";
import { withStoreTimeout } from "./timeout.js";

export interface UpdateAck {
  status: "updated";
  dispatchId: string;
  nodeId: number;
  nodeStatus: NodeStatus;
  resultStatus: ResultStatus;
}

export interface UpdateDeps {
  store: ResultStore;
  locks: KeyedMutex;
  events: DispatchEvents;
  notifier: CompletionNotifier;
  storeTimeoutMs: number;
}

export class UpdateService {
  constructor(private readonly deps: UpdateDeps) {}

  /**
   * Applies a runner's report for one node. Updates to the same dispatch are
   * applied one at a time; the completion notifier fires when this update is
   * the one that moves the result into a terminal status. A store write that
   * outlives the timeout keeps the lock and is announced once it lands.
   */
  async applyUpdate(dispatchId: string, body: unknown): Promise<UpdateAck> {
    const update = parseNodeUpdate(body);
    const reported = update.status ?? "unchanged";
    const applying = this.deps.locks.run(dispatchId, () => this.deps.store.updateNode(dispatchId, update));
    try {
      const outcome = await withStoreTimeout(
        applying,
        this.deps.storeTimeoutMs,
        `updating node ${update.nodeId} of dispatch ${dispatchId}`
      );
      nodeUpdateCounter.inc({ outcome: "applied", status: reported });
      this.announceUpdate(dispatchId, outcome);

      const { result, node } = outcome;
      return {
        status: "updated",
        dispatchId,
        nodeId: node.id,
        nodeStatus: node.status,
        resultStatus: result.status
      };
    } catch (error) {
      if (error instanceof StoreTimeoutError) {
        applying
          .then((outcome) => {
            nodeUpdateCounter.inc({ outcome: "applied_late", status: reported });
            this.announceUpdate(dispatchId, outcome);
          })
          .catch((lateError: unknown) => {
            console.error(`late update failure for dispatch ${dispatchId}: ${errorMessage(lateError)}`);
          });
      }
      nodeUpdateCounter.inc({
        outcome: error instanceof DispatchError ? error.code : "error",
        status: reported
      });
      throw error;
    }
  }

  /** Best-effort: runners are not guaranteed to observe the cancellation. */
  async cancel(dispatchId: string): Promise<ResultRecord> {
    const cancelling = this.deps.locks.run(dispatchId, () => this.deps.store.cancel(dispatchId));
    try {
      const result = await withStoreTimeout(
        cancelling,
        this.deps.storeTimeoutMs,
        `cancelling dispatch ${dispatchId}`
      );
      this.announceCancel(result);
      return result;
    } catch (error) {
      if (error instanceof StoreTimeoutError) {
        cancelling
          .then((result) => this.announceCancel(result))
          .catch((lateError: unknown) => {
            console.error(`late cancel failure for dispatch ${dispatchId}: ${errorMessage(lateError)}`);
          });
      }
      throw error;
    }
  }

  private announceUpdate(dispatchId: string, outcome: NodeUpdateOutcome): void {
    const { result, node, previousStatus } = outcome;
    this.deps.events.emitEvent({ type: "node.updated", dispatchId, nodeId: node.id, status: node.status });
    if (result.status !== previousStatus) {
      this.deps.events.emitEvent({ type: "result.updated", dispatchId, status: result.status });
    }
    this.notifyOnCompletion(previousStatus, result);
  }

  // store.cancel rejects results that were already terminal
  private announceCancel(result: ResultRecord): void {
    this.deps.events.emitEvent({ type: "result.updated", dispatchId: result.dispatchId, status: result.status });
    this.deps.notifier.notify({
      dispatchId: result.dispatchId,
      status: result.status,
      completedAt: result.updatedAt
    });
  }

  private notifyOnCompletion(previousStatus: ResultStatus, result: ResultRecord): void {
    if (isTerminalResultStatus(previousStatus) || !isTerminalResultStatus(result.status)) return;
    this.deps.notifier.notify({
      dispatchId: result.dispatchId,
      status: result.status,
      completedAt: result.updatedAt
    });
  }
}
