import type { DashboardSnapshotV1, LogRecordV1, PriorityRequestV1 } from "@lanewatch/contracts";

// Output boundaries of the engine. Adapters live in the service; a sink may
// be synchronous or return a promise, and may throw.

export interface DashboardSink {
  publish(snapshot: DashboardSnapshotV1): void | Promise<void>;
}

export interface LogSink {
  write(record: LogRecordV1): void | Promise<void>;
}

export interface SignalSink {
  requestPriority(request: PriorityRequestV1): void | Promise<void>;
}

export type EngineSinks = {
  dashboard?: DashboardSink;
  log?: LogSink;
  signal?: SignalSink;
};
