import type { ResultRecord, ResultSummary } from "@workflow-dispatch/shared";
import type { ResultStore } from "./store/types.js";
import { withStoreTimeout } from "./timeout.js";

/** Read side of the result store. Reads never wait on the per-dispatch lock. */
export class ResultService {
  constructor(
    private readonly store: ResultStore,
    private readonly storeTimeoutMs: number
  ) {}

  get(dispatchId: string): Promise<ResultRecord> {
    return withStoreTimeout(this.store.get(dispatchId), this.storeTimeoutMs, `reading dispatch ${dispatchId}`);
  }

  list(): Promise<ResultSummary[]> {
    return withStoreTimeout(this.store.list(), this.storeTimeoutMs, "listing results");
  }
}
