import {
  AlreadyExistsError,
  NotFoundError,
  applyNodeUpdate,
  cancelResult,
  failDispatch,
  type EdgeRecord,
  type JsonValue,
  type NodeMetadata,
  type NodeRecord,
  type NodeStatus,
  type NodeUpdate,
  type NodeUpdateOutcome,
  type ParamType,
  type ResultRecord,
  type ResultStatus,
  type ResultSummary
} from "@workflow-dispatch/shared";
import type { Pool, PoolClient } from "pg";
import { validate as isUuid } from "uuid";
import { withTransaction } from "../db.js";
import { LIST_LIMIT, type ResultStore } from "./types.js";

type ResultRow = {
  dispatch_id: string;
  results_dir: string;
  status: ResultStatus;
  cancel_requested: boolean;
  error: string | null;
  result_blob: string | null;
  created_at: Date;
  updated_at: Date;
};

type NodeRow = {
  node_id: number;
  name: string;
  metadata: NodeMetadata;
  function_string: string;
  doc: string | null;
  kwargs: Record<string, JsonValue> | null;
  status: NodeStatus;
  start_time: Date | null;
  end_time: Date | null;
  output: JsonValue;
  error: string | null;
  stdout: string;
  stderr: string;
  sublattice_result: JsonValue;
};

type EdgeRow = {
  source: number;
  target: number;
  edge_name: string;
  param_type: ParamType;
};

type SummaryRow = ResultRow & {
  node_count: string;
  completed_count: string;
};

function toJson(value: JsonValue): string | null {
  return value === null ? null : JSON.stringify(value);
}

export class PostgresResultStore implements ResultStore {
  constructor(private readonly pool: Pool) {}

  async create(result: ResultRecord): Promise<void> {
    await withTransaction(this.pool, async (client) => {
      const inserted = await client.query<{ dispatch_id: string }>(
        `INSERT INTO results (
           dispatch_id,
           results_dir,
           status,
           cancel_requested,
           error,
           result_blob,
           created_at,
           updated_at
         ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
         ON CONFLICT (dispatch_id) DO NOTHING
         RETURNING dispatch_id`,
        [
          result.dispatchId,
          result.resultsDir,
          result.status,
          result.cancelRequested,
          result.error,
          result.resultBlob,
          result.createdAt,
          result.updatedAt
        ]
      );
      if (!inserted.rows[0]) {
        throw new AlreadyExistsError(`Dispatch ${result.dispatchId} already exists.`);
      }

      for (const node of result.nodes) {
        await client.query(
          `INSERT INTO nodes (
             dispatch_id,
             node_id,
             name,
             metadata,
             function_string,
             doc,
             kwargs,
             status,
             start_time,
             end_time,
             output,
             error,
             stdout,
             stderr,
             sublattice_result
           ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15)`,
          [
            result.dispatchId,
            node.id,
            node.name,
            JSON.stringify(node.metadata),
            node.functionString,
            node.doc,
            toJson(node.kwargs),
            node.status,
            node.startTime,
            node.endTime,
            toJson(node.output),
            node.error,
            node.stdout,
            node.stderr,
            toJson(node.sublatticeResult)
          ]
        );
      }

      for (const [position, edge] of result.edges.entries()) {
        await client.query(
          `INSERT INTO edges (dispatch_id, position, source, target, edge_name, param_type)
           VALUES ($1, $2, $3, $4, $5, $6)`,
          [result.dispatchId, position, edge.source, edge.target, edge.edgeName, edge.paramType]
        );
      }
    });
  }

  async get(dispatchId: string): Promise<ResultRecord> {
    return withTransaction(this.pool, async (client) => {
      await client.query("SET TRANSACTION ISOLATION LEVEL REPEATABLE READ");
      return this.load(client, dispatchId, false);
    });
  }

  async updateNode(dispatchId: string, update: NodeUpdate): Promise<NodeUpdateOutcome> {
    return withTransaction(this.pool, async (client) => {
      const current = await this.load(client, dispatchId, true);
      const outcome = applyNodeUpdate(current, update, new Date().toISOString());
      await this.persist(client, current, outcome.result);
      return outcome;
    });
  }

  async failDispatch(dispatchId: string, reason: string): Promise<ResultRecord> {
    return withTransaction(this.pool, async (client) => {
      const current = await this.load(client, dispatchId, true);
      const failed = failDispatch(current, reason, new Date().toISOString());
      await this.persist(client, current, failed);
      return failed;
    });
  }

  async cancel(dispatchId: string): Promise<ResultRecord> {
    return withTransaction(this.pool, async (client) => {
      const current = await this.load(client, dispatchId, true);
      const cancelled = cancelResult(current, new Date().toISOString());
      await this.persist(client, current, cancelled);
      return cancelled;
    });
  }

  async list(): Promise<ResultSummary[]> {
    const result = await this.pool.query<SummaryRow>(
      `SELECT
         r.*,
         COUNT(n.node_id)::text AS node_count,
         COUNT(n.node_id) FILTER (WHERE n.status = 'COMPLETED')::text AS completed_count
       FROM results r
       LEFT JOIN nodes n ON n.dispatch_id = r.dispatch_id
       GROUP BY r.dispatch_id
       ORDER BY r.created_at DESC
       LIMIT $1`,
      [LIST_LIMIT]
    );
    return result.rows.map(toResultSummary);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async load(client: PoolClient, dispatchId: string, forUpdate: boolean): Promise<ResultRecord> {
    if (!isUuid(dispatchId)) {
      throw new NotFoundError(`Dispatch ${dispatchId} not found.`);
    }
    const results = await client.query<ResultRow>(
      `SELECT * FROM results WHERE dispatch_id = $1${forUpdate ? " FOR UPDATE" : ""}`,
      [dispatchId]
    );
    const row = results.rows[0];
    if (!row) {
      throw new NotFoundError(`Dispatch ${dispatchId} not found.`);
    }
    const nodes = await client.query<NodeRow>(
      "SELECT * FROM nodes WHERE dispatch_id = $1 ORDER BY node_id ASC",
      [dispatchId]
    );
    const edges = await client.query<EdgeRow>(
      "SELECT * FROM edges WHERE dispatch_id = $1 ORDER BY position ASC",
      [dispatchId]
    );
    return toResultRecord(row, nodes.rows.map(toNodeRecord), edges.rows.map(toEdgeRecord));
  }

  /** Writes the nodes that changed between two snapshots plus the result row. */
  private async persist(client: PoolClient, before: ResultRecord, after: ResultRecord): Promise<void> {
    if (before === after) return;

    for (const [index, node] of after.nodes.entries()) {
      if (before.nodes[index] === node) continue;
      await client.query(
        `UPDATE nodes
         SET status = $3,
             start_time = $4,
             end_time = $5,
             output = $6,
             error = $7,
             stdout = $8,
             stderr = $9,
             sublattice_result = $10
         WHERE dispatch_id = $1
           AND node_id = $2`,
        [
          after.dispatchId,
          node.id,
          node.status,
          node.startTime,
          node.endTime,
          toJson(node.output),
          node.error,
          node.stdout,
          node.stderr,
          toJson(node.sublatticeResult)
        ]
      );
    }

    await client.query(
      `UPDATE results
       SET status = $2,
           cancel_requested = $3,
           error = $4,
           updated_at = $5
       WHERE dispatch_id = $1`,
      [after.dispatchId, after.status, after.cancelRequested, after.error, after.updatedAt]
    );
  }
}

function toNodeRecord(row: NodeRow): NodeRecord {
  return {
    id: row.node_id,
    name: row.name,
    metadata: row.metadata,
    functionString: row.function_string,
    doc: row.doc,
    kwargs: row.kwargs,
    status: row.status,
    startTime: row.start_time ? row.start_time.toISOString() : null,
    endTime: row.end_time ? row.end_time.toISOString() : null,
    output: row.output,
    error: row.error,
    stdout: row.stdout,
    stderr: row.stderr,
    sublatticeResult: row.sublattice_result
  };
}

function toEdgeRecord(row: EdgeRow): EdgeRecord {
  return {
    source: row.source,
    target: row.target,
    edgeName: row.edge_name,
    paramType: row.param_type
  };
}

function toResultRecord(row: ResultRow, nodes: NodeRecord[], edges: EdgeRecord[]): ResultRecord {
  return {
    dispatchId: row.dispatch_id,
    resultsDir: row.results_dir,
    status: row.status,
    cancelRequested: row.cancel_requested,
    error: row.error,
    resultBlob: row.result_blob,
    nodes,
    edges,
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString()
  };
}

function toResultSummary(row: SummaryRow): ResultSummary {
  return {
    dispatchId: row.dispatch_id,
    status: row.status,
    resultsDir: row.results_dir,
    nodeCount: Number.parseInt(row.node_count, 10),
    completedCount: Number.parseInt(row.completed_count, 10),
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString()
  };
}
