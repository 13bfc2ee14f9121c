import { descendantsOf } from "./dag.js";
import { InvalidTransitionError } from "./errors.js";
import type { EdgeRecord, NodeRecord, NodeStatus, ResultStatus } from "./types.js";

const nodeTransitions: Record<NodeStatus, Set<NodeStatus>> = {
  PENDING: new Set(["PENDING", "RUNNING", "COMPLETED", "FAILED", "CANCELLED"]),
  RUNNING: new Set(["RUNNING", "COMPLETED", "FAILED", "CANCELLED"]),
  COMPLETED: new Set(),
  FAILED: new Set(),
  CANCELLED: new Set()
};

const terminalNodeStatuses = new Set<NodeStatus>(["COMPLETED", "FAILED", "CANCELLED"]);
const terminalResultStatuses = new Set<ResultStatus>(["COMPLETED", "FAILED", "CANCELLED"]);

export function isTerminalNodeStatus(status: NodeStatus): boolean {
  return terminalNodeStatuses.has(status);
}

export function isTerminalResultStatus(status: ResultStatus): boolean {
  return terminalResultStatuses.has(status);
}

export function canTransitionNode(from: NodeStatus, to: NodeStatus): boolean {
  return nodeTransitions[from].has(to);
}

export function assertNodeTransition(nodeId: number, from: NodeStatus, to: NodeStatus): void {
  if (!canTransitionNode(from, to)) {
    throw new InvalidTransitionError(`Invalid node ${nodeId} transition: ${from} -> ${to}`, from, to);
  }
}

/**
 * Result status as a pure function of its nodes. A failed dispatch is only
 * FAILED once nothing can still run: no node is RUNNING and every PENDING node
 * sits downstream of a FAILED or CANCELLED node.
 */
export function deriveResultStatus(
  nodes: NodeRecord[],
  edges: EdgeRecord[],
  cancelRequested: boolean
): ResultStatus {
  if (cancelRequested) return "CANCELLED";
  if (nodes.length === 0) return "PENDING";
  if (nodes.every((node) => node.status === "COMPLETED")) return "COMPLETED";
  if (nodes.every((node) => node.status === "PENDING")) return "PENDING";

  if (nodes.some((node) => node.status === "RUNNING")) return "RUNNING";

  const stopped = nodes
    .filter((node) => node.status === "FAILED" || node.status === "CANCELLED")
    .map((node) => node.id);
  const blocked = descendantsOf(edges, stopped);
  if (nodes.some((node) => node.status === "PENDING" && !blocked.has(node.id))) return "RUNNING";

  return nodes.some((node) => node.status === "FAILED") ? "FAILED" : "CANCELLED";
}
