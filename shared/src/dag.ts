import { ValidationError } from "./errors.js";
import type {
  EdgeRecord,
  JsonValue,
  NodeMetadata,
  ValidationIssue,
  ValidationResult,
  WorkflowGraph,
  WorkflowNodeDefinition
} from "./types.js";

export const DEFAULT_EXECUTOR = "local";

const ROOT_KEYS = new Set(["nodes", "edges", "results_dir", "result_blob"]);
const NODE_KEYS = new Set(["id", "name", "metadata", "function_string", "doc", "kwargs"]);
const EDGE_KEYS = new Set(["source", "target", "edge_name", "param_type"]);
const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isJsonObject(value: unknown): value is Record<string, JsonValue> {
  return isObject(value) && Object.values(value).every(isJsonValue);
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case "string":
    case "boolean":
      return true;
    case "number":
      return Number.isFinite(value);
    case "object":
      if (Array.isArray(value)) return value.every(isJsonValue);
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

function isNodeId(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

function checkKeys(
  value: Record<string, unknown>,
  allowed: Set<string>,
  path: string,
  errors: ValidationIssue[]
): void {
  Object.keys(value).forEach((key) => {
    if (!allowed.has(key)) {
      errors.push({ path: path ? `${path}.${key}` : key, message: `Unknown field '${key}'.` });
    }
  });
}

function readMetadata(raw: unknown, path: string, errors: ValidationIssue[]): NodeMetadata {
  if (raw === undefined || raw === null) {
    return { executor: DEFAULT_EXECUTOR };
  }
  if (!isObject(raw)) {
    errors.push({ path, message: "metadata must be an object." });
    return { executor: DEFAULT_EXECUTOR };
  }
  const metadata: NodeMetadata = { executor: DEFAULT_EXECUTOR };
  for (const [key, value] of Object.entries(raw)) {
    if (key === "executor") {
      if (typeof value !== "string" || value.length === 0) {
        errors.push({ path: `${path}.executor`, message: "executor must be a non-empty string." });
      } else {
        metadata.executor = value;
      }
      continue;
    }
    if (!isJsonValue(value)) {
      errors.push({ path: `${path}.${key}`, message: "metadata values must be JSON." });
      continue;
    }
    metadata[key] = value;
  }
  return metadata;
}

function readKwargs(
  raw: unknown,
  path: string,
  errors: ValidationIssue[]
): Record<string, JsonValue> | null {
  if (raw === undefined || raw === null) return null;
  if (!isJsonObject(raw)) {
    errors.push({ path, message: "kwargs must be a JSON object." });
    return null;
  }
  return raw;
}

function readNode(
  raw: unknown,
  index: number,
  ids: Set<number>,
  errors: ValidationIssue[]
): WorkflowNodeDefinition | null {
  const path = `nodes[${index}]`;
  if (!isObject(raw)) {
    errors.push({ path, message: "Node must be an object." });
    return null;
  }
  checkKeys(raw, NODE_KEYS, path, errors);

  const id = raw.id;
  if (!isNodeId(id)) {
    errors.push({ path: `${path}.id`, message: "Node id must be a non-negative integer." });
    return null;
  }
  if (ids.has(id)) {
    errors.push({ path: `${path}.id`, message: `Duplicate node id ${id}.` });
    return null;
  }
  ids.add(id);

  const name = raw.name;
  if (typeof name !== "string" || name.trim().length === 0) {
    errors.push({ path: `${path}.name`, message: "Node name is required." });
  }
  const functionString = raw.function_string ?? "";
  if (typeof functionString !== "string") {
    errors.push({ path: `${path}.function_string`, message: "function_string must be a string." });
  }
  const doc = raw.doc ?? null;
  if (doc !== null && typeof doc !== "string") {
    errors.push({ path: `${path}.doc`, message: "doc must be a string or null." });
  }

  return {
    id,
    name: typeof name === "string" ? name.trim() : "",
    metadata: readMetadata(raw.metadata, `${path}.metadata`, errors),
    functionString: typeof functionString === "string" ? functionString : "",
    doc: typeof doc === "string" ? doc : null,
    kwargs: readKwargs(raw.kwargs, `${path}.kwargs`, errors)
  };
}

function readEdge(
  raw: unknown,
  index: number,
  ids: Set<number>,
  errors: ValidationIssue[]
): EdgeRecord | null {
  const path = `edges[${index}]`;
  if (!isObject(raw)) {
    errors.push({ path, message: "Edge must be an object." });
    return null;
  }
  checkKeys(raw, EDGE_KEYS, path, errors);

  const { source, target } = raw;
  let valid = true;
  for (const [field, value] of [
    ["source", source],
    ["target", target]
  ] as const) {
    if (!isNodeId(value)) {
      errors.push({ path: `${path}.${field}`, message: `${field} must be a node id.` });
      valid = false;
    } else if (!ids.has(value)) {
      errors.push({ path: `${path}.${field}`, message: `Unknown node ${value}.` });
      valid = false;
    }
  }
  if (!valid || !isNodeId(source) || !isNodeId(target)) return null;
  if (source === target) {
    errors.push({ path, message: "Node cannot depend on itself." });
    return null;
  }

  const edgeName = raw.edge_name ?? "";
  if (typeof edgeName !== "string") {
    errors.push({ path: `${path}.edge_name`, message: "edge_name must be a string." });
  }
  const paramType = raw.param_type ?? "arg";
  if (paramType !== "arg" && paramType !== "kwarg") {
    errors.push({ path: `${path}.param_type`, message: "param_type must be 'arg' or 'kwarg'." });
  }

  return {
    source,
    target,
    edgeName: typeof edgeName === "string" ? edgeName : "",
    paramType: paramType === "kwarg" ? "kwarg" : "arg"
  };
}

function readGraph(input: unknown): { graph: WorkflowGraph | null; errors: ValidationIssue[] } {
  const errors: ValidationIssue[] = [];

  if (!isObject(input)) {
    return {
      graph: null,
      errors: [{ path: "root", message: "Workflow payload must be an object." }]
    };
  }
  checkKeys(input, ROOT_KEYS, "", errors);

  const rawNodes = input.nodes;
  if (!Array.isArray(rawNodes) || rawNodes.length === 0) {
    errors.push({ path: "nodes", message: "Nodes must be a non-empty array." });
    return { graph: null, errors };
  }
  const rawEdges = input.edges ?? [];
  if (!Array.isArray(rawEdges)) {
    errors.push({ path: "edges", message: "Edges must be an array." });
    return { graph: null, errors };
  }

  const ids = new Set<number>();
  const nodes = rawNodes.flatMap((raw, index) => {
    const node = readNode(raw, index, ids, errors);
    return node ? [node] : [];
  });
  const edges = rawEdges.flatMap((raw, index) => {
    const edge = readEdge(raw, index, ids, errors);
    return edge ? [edge] : [];
  });

  const resultsDir = input.results_dir ?? null;
  if (resultsDir !== null && (typeof resultsDir !== "string" || resultsDir.trim().length === 0)) {
    errors.push({ path: "results_dir", message: "results_dir must be a non-empty string." });
  }
  const resultBlob = input.result_blob ?? null;
  if (resultBlob !== null && (typeof resultBlob !== "string" || !BASE64.test(resultBlob))) {
    errors.push({ path: "result_blob", message: "result_blob must be a base64 string." });
  }

  if (errors.length > 0) {
    return { graph: null, errors };
  }

  if (hasCycle(ids, edges)) {
    errors.push({ path: "edges", message: "Workflow graph must be acyclic." });
    return { graph: null, errors };
  }

  return {
    graph: {
      nodes,
      edges,
      resultsDir: typeof resultsDir === "string" ? resultsDir.trim() : null,
      resultBlob: typeof resultBlob === "string" ? resultBlob : null
    },
    errors
  };
}

export function validateWorkflowGraph(input: unknown): ValidationResult {
  const { errors } = readGraph(input);
  return { valid: errors.length === 0, errors };
}

export function parseWorkflowGraph(input: unknown): WorkflowGraph {
  const { graph, errors } = readGraph(input);
  if (!graph) {
    const message = errors.map((error) => `${error.path}: ${error.message}`).join("; ");
    throw new ValidationError(`Invalid workflow graph: ${message}`, errors);
  }
  return graph;
}

function hasCycle(ids: Set<number>, edges: EdgeRecord[]): boolean {
  const inDegree = new Map<number, number>();
  const dependents = new Map<number, number[]>();

  ids.forEach((id) => inDegree.set(id, 0));
  edges.forEach((edge) => {
    inDegree.set(edge.target, (inDegree.get(edge.target) ?? 0) + 1);
    const list = dependents.get(edge.source) ?? [];
    list.push(edge.target);
    dependents.set(edge.source, list);
  });

  const queue: number[] = [];
  for (const [node, degree] of inDegree.entries()) {
    if (degree === 0) queue.push(node);
  }

  let visited = 0;
  for (let head = 0; head < queue.length; head += 1) {
    visited += 1;
    (dependents.get(queue[head]) ?? []).forEach((dependent) => {
      const nextDegree = (inDegree.get(dependent) ?? 0) - 1;
      inDegree.set(dependent, nextDegree);
      if (nextDegree === 0) queue.push(dependent);
    });
  }

  return visited !== ids.size;
}

/** Ids of every node reachable from `roots`, the roots themselves excluded. */
export function descendantsOf(
  edges: EdgeRecord[],
  roots: Iterable<number>
): Set<number> {
  const children = new Map<number, number[]>();
  edges.forEach((edge) => {
    const list = children.get(edge.source) ?? [];
    list.push(edge.target);
    children.set(edge.source, list);
  });

  const seen = new Set<number>();
  const stack = [...roots];
  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined) break;
    for (const child of children.get(current) ?? []) {
      if (seen.has(child)) continue;
      seen.add(child);
      stack.push(child);
    }
  }
  return seen;
}
