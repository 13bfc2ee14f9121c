import { isJsonValue, isObject } from "./dag.js";
import { InvalidTransitionError, NotFoundError, ValidationError } from "./errors.js";
import {
  assertNodeTransition,
  deriveResultStatus,
  isTerminalNodeStatus,
  isTerminalResultStatus
} from "./stateMachine.js";
import {
  NODE_STATUSES,
  type JsonValue,
  type NodeRecord,
  type NodeStatus,
  type NodeUpdate,
  type NodeUpdateOutcome,
  type ResultRecord,
  type ResultSummary,
  type ValidationIssue,
  type WorkflowGraph
} from "./types.js";

const UPDATE_KEYS = new Set([
  "node_id",
  "status",
  "output",
  "error",
  "stdout",
  "stderr",
  "start_time",
  "end_time",
  "sublattice_result"
]);

const ISO_TIMESTAMP = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2})$/;

export function buildInitialResult(params: {
  dispatchId: string;
  graph: WorkflowGraph;
  resultsDir: string;
  now: string;
}): ResultRecord {
  const nodes = params.graph.nodes.map((definition): NodeRecord => ({
    ...definition,
    status: "PENDING",
    startTime: null,
    endTime: null,
    output: null,
    error: null,
    stdout: "",
    stderr: "",
    sublatticeResult: null
  }));
  return {
    dispatchId: params.dispatchId,
    resultsDir: params.resultsDir,
    status: deriveResultStatus(nodes, params.graph.edges, false),
    cancelRequested: false,
    error: null,
    resultBlob: params.graph.resultBlob,
    nodes,
    edges: params.graph.edges,
    createdAt: params.now,
    updatedAt: params.now
  };
}

function withNodes(result: ResultRecord, nodes: NodeRecord[], now: string): ResultRecord {
  return {
    ...result,
    nodes,
    status: deriveResultStatus(nodes, result.edges, result.cancelRequested),
    updatedAt: now
  };
}

function jsonEqual(a: JsonValue, b: JsonValue): boolean {
  if (a === b) return true;
  if (Array.isArray(a)) {
    return Array.isArray(b) && a.length === b.length && a.every((item, index) => jsonEqual(item, b[index]));
  }
  if (a === null || b === null || Array.isArray(b) || typeof a !== "object" || typeof b !== "object") {
    return false;
  }
  const keys = Object.keys(a);
  return (
    keys.length === Object.keys(b).length &&
    keys.every((key) => key in b && jsonEqual(a[key], b[key]))
  );
}

/** True when every field the report carries matches what the node already holds. */
function repeatsRecordedFields(node: NodeRecord, update: NodeUpdate): boolean {
  const reported: Array<[JsonValue | undefined, JsonValue]> = [
    [update.output, node.output],
    [update.error, node.error],
    [update.stdout, node.stdout],
    [update.stderr, node.stderr],
    [update.startTime, node.startTime],
    [update.endTime, node.endTime],
    [update.sublatticeResult, node.sublatticeResult]
  ];
  return reported.every(([next, recorded]) => next === undefined || jsonEqual(next, recorded));
}

/**
 * Applies one runner report to a copy of `result`. Throws NotFoundError for an
 * unknown node and InvalidTransitionError for a status regression; the input
 * record is never mutated. A redelivered terminal report returns the record
 * unchanged; one that would alter a finished node is an InvalidTransitionError.
 */
export function applyNodeUpdate(
  result: ResultRecord,
  update: NodeUpdate,
  now: string
): NodeUpdateOutcome {
  const index = result.nodes.findIndex((node) => node.id === update.nodeId);
  if (index < 0) {
    throw new NotFoundError(`Node ${update.nodeId} not found in dispatch ${result.dispatchId}.`);
  }
  const current = result.nodes[index];
  const status = update.status ?? current.status;

  if (isTerminalNodeStatus(current.status) && status === current.status) {
    if (!repeatsRecordedFields(current, update)) {
      throw new InvalidTransitionError(
        `Node ${current.id} is already ${current.status}; its recorded fields cannot change.`,
        current.status,
        status
      );
    }
    return { result, node: current, previousStatus: result.status };
  }
  assertNodeTransition(current.id, current.status, status);

  const started = status === "RUNNING" || status === "COMPLETED" || status === "FAILED";
  const startTime =
    update.startTime !== undefined ? update.startTime : current.startTime ?? (started ? now : null);
  const endTime =
    update.endTime !== undefined
      ? update.endTime
      : current.endTime ?? (isTerminalNodeStatus(status) ? now : null);

  const node: NodeRecord = {
    ...current,
    status,
    startTime,
    endTime,
    output: update.output !== undefined ? update.output : current.output,
    error: update.error !== undefined ? update.error : current.error,
    stdout: update.stdout ?? current.stdout,
    stderr: update.stderr ?? current.stderr,
    sublatticeResult:
      update.sublatticeResult !== undefined ? update.sublatticeResult : current.sublatticeResult
  };

  const nodes = result.nodes.slice();
  nodes[index] = node;
  return { result: withNodes(result, nodes, now), node, previousStatus: result.status };
}

/** Fails every unfinished node, e.g. when the dispatch never reached the queue. */
export function failDispatch(result: ResultRecord, reason: string, now: string): ResultRecord {
  const nodes = result.nodes.map((node): NodeRecord =>
    isTerminalNodeStatus(node.status)
      ? node
      : { ...node, status: "FAILED", error: reason, endTime: now }
  );
  return { ...withNodes(result, nodes, now), error: reason };
}

export function cancelResult(result: ResultRecord, now: string): ResultRecord {
  if (isTerminalResultStatus(result.status)) {
    throw new InvalidTransitionError(
      `Dispatch ${result.dispatchId} is already ${result.status}.`,
      result.status,
      "CANCELLED"
    );
  }
  const nodes = result.nodes.map((node): NodeRecord =>
    isTerminalNodeStatus(node.status) ? node : { ...node, status: "CANCELLED", endTime: now }
  );
  return withNodes({ ...result, cancelRequested: true }, nodes, now);
}

export function summarizeResult(result: ResultRecord): ResultSummary {
  return {
    dispatchId: result.dispatchId,
    status: result.status,
    resultsDir: result.resultsDir,
    nodeCount: result.nodes.length,
    completedCount: result.nodes.filter((node) => node.status === "COMPLETED").length,
    createdAt: result.createdAt,
    updatedAt: result.updatedAt
  };
}

function isNodeStatus(value: unknown): value is NodeStatus {
  return NODE_STATUSES.some((status) => status === value);
}

function readTimestamp(
  raw: unknown,
  path: string,
  errors: ValidationIssue[]
): string | null | undefined {
  if (raw === undefined || raw === null) return raw;
  if (typeof raw !== "string" || !ISO_TIMESTAMP.test(raw) || Number.isNaN(Date.parse(raw))) {
    errors.push({ path, message: "Timestamp must be ISO-8601." });
    return undefined;
  }
  return new Date(raw).toISOString();
}

/** Validates a runner's update body (snake_case wire keys) into a NodeUpdate. */
export function parseNodeUpdate(input: unknown): NodeUpdate {
  const errors: ValidationIssue[] = [];
  if (!isObject(input)) {
    throw new ValidationError("Invalid node update: body must be an object.", [
      { path: "root", message: "Node update must be an object." }
    ]);
  }
  Object.keys(input).forEach((key) => {
    if (!UPDATE_KEYS.has(key)) {
      errors.push({ path: key, message: `Unknown field '${key}'.` });
    }
  });

  const nodeId = input.node_id;
  if (typeof nodeId !== "number" || !Number.isInteger(nodeId) || nodeId < 0) {
    errors.push({ path: "node_id", message: "node_id must be a non-negative integer." });
  }
  const update: NodeUpdate = { nodeId: typeof nodeId === "number" ? nodeId : -1 };

  if (input.status !== undefined) {
    if (isNodeStatus(input.status)) {
      update.status = input.status;
    } else {
      errors.push({ path: "status", message: `status must be one of ${NODE_STATUSES.join(", ")}.` });
    }
  }
  if (input.output !== undefined) {
    if (isJsonValue(input.output)) {
      update.output = input.output;
    } else {
      errors.push({ path: "output", message: "output must be JSON." });
    }
  }
  if (input.sublattice_result !== undefined) {
    if (isJsonValue(input.sublattice_result)) {
      update.sublatticeResult = input.sublattice_result;
    } else {
      errors.push({ path: "sublattice_result", message: "sublattice_result must be JSON." });
    }
  }
  if (input.error !== undefined) {
    if (input.error === null || typeof input.error === "string") {
      update.error = input.error;
    } else {
      errors.push({ path: "error", message: "error must be a string or null." });
    }
  }
  for (const field of ["stdout", "stderr"] as const) {
    const value = input[field];
    if (value === undefined) continue;
    if (typeof value === "string") {
      update[field] = value;
    } else {
      errors.push({ path: field, message: `${field} must be a string.` });
    }
  }

  const startTime = readTimestamp(input.start_time, "start_time", errors);
  if (startTime !== undefined) update.startTime = startTime;
  const endTime = readTimestamp(input.end_time, "end_time", errors);
  if (endTime !== undefined) update.endTime = endTime;

  if (errors.length > 0) {
    const message = errors.map((error) => `${error.path}: ${error.message}`).join("; ");
    throw new ValidationError(`Invalid node update: ${message}`, errors);
  }
  return update;
}
