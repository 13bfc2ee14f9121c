import {
  AlreadyExistsError,
  NotFoundError,
  applyNodeUpdate,
  cancelResult,
  failDispatch,
  summarizeResult,
  type NodeUpdate,
  type NodeUpdateOutcome,
  type ResultRecord,
  type ResultSummary
} from "@workflow-dispatch/shared";
import { LIST_LIMIT, type ResultStore } from "./types.js";

/**
 * Process-local store. Records are replaced wholesale on every mutation so
 * readers only ever see complete snapshots.
 */
export class MemoryResultStore implements ResultStore {
  private readonly results = new Map<string, ResultRecord>();

  constructor(private readonly clock: () => Date = () => new Date()) {}

  async create(result: ResultRecord): Promise<void> {
    if (this.results.has(result.dispatchId)) {
      throw new AlreadyExistsError(`Dispatch ${result.dispatchId} already exists.`);
    }
    this.results.set(result.dispatchId, structuredClone(result));
  }

  async get(dispatchId: string): Promise<ResultRecord> {
    return structuredClone(this.require(dispatchId));
  }

  async updateNode(dispatchId: string, update: NodeUpdate): Promise<NodeUpdateOutcome> {
    const outcome = applyNodeUpdate(this.require(dispatchId), update, this.now());
    this.results.set(dispatchId, outcome.result);
    return structuredClone(outcome);
  }

  async failDispatch(dispatchId: string, reason: string): Promise<ResultRecord> {
    const failed = failDispatch(this.require(dispatchId), reason, this.now());
    this.results.set(dispatchId, failed);
    return structuredClone(failed);
  }

  async cancel(dispatchId: string): Promise<ResultRecord> {
    const cancelled = cancelResult(this.require(dispatchId), this.now());
    this.results.set(dispatchId, cancelled);
    return structuredClone(cancelled);
  }

  async list(): Promise<ResultSummary[]> {
    return [...this.results.values()]
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt))
      .slice(0, LIST_LIMIT)
      .map(summarizeResult);
  }

  async close(): Promise<void> {
    this.results.clear();
  }

  private require(dispatchId: string): ResultRecord {
    const result = this.results.get(dispatchId);
    if (!result) {
      throw new NotFoundError(`Dispatch ${dispatchId} not found.`);
    }
    return result;
  }

  private now(): string {
    return this.clock().toISOString();
  }
}
