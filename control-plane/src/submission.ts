import path from "node:path";
import {
  AlreadyExistsError,
  PublishError,
  StoreTimeoutError,
  buildInitialResult,
  errorMessage,
  parseWorkflowGraph,
  type ResultRecord,
  type WorkflowGraph
} from "@workflow-dispatch/shared";
import { v4 as uuidv4 } from "uuid";
import type { DispatchEvents } from "./events.js";
import type { KeyedMutex } from "./locks/keyedMutex.js";
import { dispatchSubmittedCounter, publishLatencyHistogram } from "./metrics/metrics.js";
import type { CompletionNotifier } from "./notifier.js";
import type { DispatchQueue } from "./queue/types.js";
import type { ResultStore } from "./store/types.js";
import { withStoreTimeout, withTimeout } from "./timeout.js";

export interface SubmissionOptions {
  topic: string;
  resultsDir: string;
  storeTimeoutMs: number;
  publishTimeoutMs: number;
}

export interface SubmissionDeps {
  store: ResultStore;
  queue: DispatchQueue;
  locks: KeyedMutex;
  events: DispatchEvents;
  notifier: CompletionNotifier;
  options: SubmissionOptions;
  generateId?: () => string;
  clock?: () => Date;
}

export class SubmissionService {
  private readonly generateId: () => string;
  private readonly clock: () => Date;

  constructor(private readonly deps: SubmissionDeps) {
    this.generateId = deps.generateId ?? (() => uuidv4());
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Validates and enqueues a workflow. Resolves only after the broker has
   * acknowledged the message; if publishing fails the stored result is marked
   * FAILED and PublishError is thrown.
   */
  async submit(payload: unknown): Promise<{ dispatchId: string }> {
    const graph = parseWorkflowGraph(payload);
    try {
      const dispatchId = await this.dispatch(graph);
      dispatchSubmittedCounter.inc({ outcome: "accepted" });
      this.deps.events.emitEvent({ type: "dispatch.accepted", dispatchId });
      return { dispatchId };
    } catch (error) {
      dispatchSubmittedCounter.inc({ outcome: "failed" });
      throw error;
    }
  }

  private async dispatch(graph: WorkflowGraph): Promise<string> {
    try {
      return await this.dispatchOnce(graph);
    } catch (error) {
      if (!(error instanceof AlreadyExistsError)) throw error;
      console.error(`dispatch id collision, retrying: ${error.message}`);
      return this.dispatchOnce(graph);
    }
  }

  private async dispatchOnce(graph: WorkflowGraph): Promise<string> {
    const dispatchId = this.generateId();
    return this.deps.locks.run(dispatchId, async () => {
      const result = buildInitialResult({
        dispatchId,
        graph,
        resultsDir: graph.resultsDir ?? path.join(this.deps.options.resultsDir, dispatchId),
        now: this.clock().toISOString()
      });
      await this.create(result);
      await this.enqueue(result, graph);
      return dispatchId;
    });
  }

  private async create(result: ResultRecord): Promise<void> {
    const creating = this.deps.store.create(result);
    try {
      await withStoreTimeout(
        creating,
        this.deps.options.storeTimeoutMs,
        `storing dispatch ${result.dispatchId}`
      );
    } catch (error) {
      if (error instanceof StoreTimeoutError) {
        this.failWhenStored(creating, result.dispatchId, error.message);
      }
      throw error;
    }
  }

  /** A create that outlives its timeout must not leave a PENDING record behind. */
  private failWhenStored(creating: Promise<void>, dispatchId: string, reason: string): void {
    creating
      .then(() => this.deps.locks.run(dispatchId, () => this.markUnqueued(dispatchId, reason)))
      .catch((error: unknown) => {
        console.error(`late store failure for dispatch ${dispatchId}: ${errorMessage(error)}`);
      });
  }

  private async enqueue(result: ResultRecord, graph: WorkflowGraph): Promise<void> {
    const stopTimer = publishLatencyHistogram.startTimer();
    try {
      await withTimeout(
        this.deps.queue.publish(this.deps.options.topic, {
          dispatchId: result.dispatchId,
          payload: JSON.stringify(serializeGraph(graph)),
          publishedAt: this.clock().toISOString()
        }),
        this.deps.options.publishTimeoutMs,
        () => new PublishError(`Timed out publishing dispatch ${result.dispatchId}.`)
      );
    } catch (error) {
      const publishError =
        error instanceof PublishError
          ? error
          : new PublishError(`Failed to publish dispatch ${result.dispatchId}: ${errorMessage(error)}`);
      try {
        await this.markUnqueued(result.dispatchId, publishError.message);
      } catch (markError) {
        console.error(
          `could not mark dispatch ${result.dispatchId} failed after publish error: ${errorMessage(markError)}`
        );
      }
      throw publishError;
    } finally {
      stopTimer();
    }
  }

  private async markUnqueued(dispatchId: string, reason: string): Promise<void> {
    const failed = await withStoreTimeout(
      this.deps.store.failDispatch(dispatchId, reason),
      this.deps.options.storeTimeoutMs,
      `failing dispatch ${dispatchId}`
    );
    this.deps.events.emitEvent({ type: "dispatch.failed", dispatchId, error: reason });
    this.deps.notifier.notify({
      dispatchId,
      status: failed.status,
      completedAt: failed.updatedAt
    });
  }
}

/** Wire form of a validated graph, as handed to runners. */
export function serializeGraph(graph: WorkflowGraph) {
  return {
    nodes: graph.nodes.map((node) => ({
      id: node.id,
      name: node.name,
      metadata: node.metadata,
      function_string: node.functionString,
      doc: node.doc,
      kwargs: node.kwargs
    })),
    edges: graph.edges.map((edge) => ({
      source: edge.source,
      target: edge.target,
      edge_name: edge.edgeName,
      param_type: edge.paramType
    }))
  };
}
