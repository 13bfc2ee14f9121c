import type {
  EdgeRecord,
  NodeRecord,
  ResultRecord,
  ResultSummary
} from "@workflow-dispatch/shared";
import type { UpdateAck } from "../updates.js";

// snake_case wire schema shared by runners and clients

export function toWireNode(node: NodeRecord) {
  return {
    id: node.id,
    name: node.name,
    metadata: node.metadata,
    function_string: node.functionString,
    doc: node.doc,
    kwargs: node.kwargs,
    start_time: node.startTime,
    end_time: node.endTime,
    status: node.status,
    output: node.output,
    error: node.error,
    stdout: node.stdout,
    stderr: node.stderr,
    sublattice_result: node.sublatticeResult
  };
}

export function toWireEdge(edge: EdgeRecord) {
  return {
    source: edge.source,
    target: edge.target,
    edge_name: edge.edgeName,
    param_type: edge.paramType
  };
}

export function toWireResult(result: ResultRecord) {
  return {
    dispatch_id: result.dispatchId,
    results_dir: result.resultsDir,
    status: result.status,
    error: result.error,
    result_blob: result.resultBlob,
    created_at: result.createdAt,
    updated_at: result.updatedAt,
    graph: {
      nodes: result.nodes.map(toWireNode),
      edges: result.edges.map(toWireEdge)
    }
  };
}

export function toWireSummary(summary: ResultSummary) {
  return {
    dispatch_id: summary.dispatchId,
    status: summary.status,
    results_dir: summary.resultsDir,
    node_count: summary.nodeCount,
    completed_count: summary.completedCount,
    created_at: summary.createdAt,
    updated_at: summary.updatedAt
  };
}

export function toWireAck(ack: UpdateAck) {
  return {
    status: ack.status,
    dispatch_id: ack.dispatchId,
    node_id: ack.nodeId,
    node_status: ack.nodeStatus,
    result_status: ack.resultStatus
  };
}
