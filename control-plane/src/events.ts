import { EventEmitter } from "node:events";
import type { NodeStatus, ResultStatus } from "@workflow-dispatch/shared";

export type DispatchEvent =
  | { type: "dispatch.accepted"; dispatchId: string }
  | { type: "dispatch.failed"; dispatchId: string; error: string }
  | { type: "node.updated"; dispatchId: string; nodeId: number; status: NodeStatus }
  | { type: "result.updated"; dispatchId: string; status: ResultStatus }
  | { type: "result.completed"; dispatchId: string; status: ResultStatus; completedAt: string };

export class DispatchEvents extends EventEmitter {
  emitEvent(event: DispatchEvent): void {
    this.emit("event", event);
  }

  onEvent(listener: (event: DispatchEvent) => void): () => void {
    this.on("event", listener);
    return () => {
      this.off("event", listener);
    };
  }
}
