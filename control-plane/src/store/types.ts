import type {
  NodeUpdate,
  NodeUpdateOutcome,
  ResultRecord,
  ResultSummary
} from "@workflow-dispatch/shared";

export const LIST_LIMIT = 200;

/**
 * Durable mapping from dispatch id to result state. Every mutation is atomic
 * for its dispatch: a failed call leaves the stored record untouched.
 */
export interface ResultStore {
  /** Throws AlreadyExistsError when the dispatch id is taken. */
  create(result: ResultRecord): Promise<void>;
  /** Throws NotFoundError. */
  get(dispatchId: string): Promise<ResultRecord>;
  /** Throws NotFoundError or InvalidTransitionError. */
  updateNode(dispatchId: string, update: NodeUpdate): Promise<NodeUpdateOutcome>;
  /** Fails every unfinished node of the dispatch with `reason`. */
  failDispatch(dispatchId: string, reason: string): Promise<ResultRecord>;
  /** Throws NotFoundError, or InvalidTransitionError if already terminal. */
  cancel(dispatchId: string): Promise<ResultRecord>;
  /** Newest first. */
  list(): Promise<ResultSummary[]>;
  close(): Promise<void>;
}
