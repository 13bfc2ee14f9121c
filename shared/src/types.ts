export type NodeStatus = "PENDING" | "RUNNING" | "COMPLETED" | "FAILED" | "CANCELLED";

export type ResultStatus = "PENDING" | "RUNNING" | "COMPLETED" | "FAILED" | "CANCELLED";

export type ParamType = "arg" | "kwarg";

export const NODE_STATUSES: readonly NodeStatus[] = [
  "PENDING",
  "RUNNING",
  "COMPLETED",
  "FAILED",
  "CANCELLED"
];

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export interface NodeMetadata {
  executor: string;
  [key: string]: JsonValue;
}

export interface WorkflowNodeDefinition {
  id: number;
  name: string;
  metadata: NodeMetadata;
  functionString: string;
  doc: string | null;
  kwargs: Record<string, JsonValue> | null;
}

export interface EdgeRecord {
  source: number;
  target: number;
  edgeName: string;
  paramType: ParamType;
}

export interface WorkflowGraph {
  nodes: WorkflowNodeDefinition[];
  edges: EdgeRecord[];
  resultsDir: string | null;
  resultBlob: string | null;
}

export interface NodeRecord extends WorkflowNodeDefinition {
  status: NodeStatus;
  startTime: string | null;
  endTime: string | null;
  output: JsonValue;
  error: string | null;
  stdout: string;
  stderr: string;
  sublatticeResult: JsonValue;
}

export interface ResultRecord {
  dispatchId: string;
  resultsDir: string;
  status: ResultStatus;
  cancelRequested: boolean;
  error: string | null;
  resultBlob: string | null;
  nodes: NodeRecord[];
  edges: EdgeRecord[];
  createdAt: string;
  updatedAt: string;
}

export interface ResultSummary {
  dispatchId: string;
  status: ResultStatus;
  resultsDir: string;
  nodeCount: number;
  completedCount: number;
  createdAt: string;
  updatedAt: string;
}

/** A runner's report for one node; absent fields are left untouched. */
export interface NodeUpdate {
  nodeId: number;
  status?: NodeStatus;
  output?: JsonValue;
  error?: string | null;
  stdout?: string;
  stderr?: string;
  startTime?: string | null;
  endTime?: string | null;
  sublatticeResult?: JsonValue;
}

export interface NodeUpdateOutcome {
  result: ResultRecord;
  node: NodeRecord;
  previousStatus: ResultStatus;
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationIssue[];
}
