import type { LogRecordType, LogRecordV1 } from "@lanewatch/contracts";

export type StoredEvent = {
  seq: number;
  record: LogRecordV1;
};

export type ListEventsQuery = {
  type?: LogRecordType;
  limit: number;
};

// Append-only log of engine records. Rows come back newest first.
export interface EventStore {
  readonly kind: "sqlite" | "postgres";
  init(): Promise<void>;
  ping(): Promise<void>; // throws when the backend is unreachable
  insert(record: LogRecordV1): Promise<void>;
  listRecent(q: ListEventsQuery): Promise<StoredEvent[]>;
  close(): Promise<void>;
}

export type EventIndexColumns = {
  lane_id: string | null;
  track_id: number | null;
};

// Lane and track ids are lifted out of the payload so both stores can filter on them.
export function indexColumns(r: LogRecordV1): EventIndexColumns {
  switch (r.type) {
    case "speed_sample_v1":
    case "speed_violation_v1":
      return { lane_id: r.lane_id, track_id: r.track_id };
    case "incident_opened_v1":
    case "incident_closed_v1":
      return { lane_id: r.incident.lane_id, track_id: r.incident.track_id };
    case "lane_metrics_v1":
      return { lane_id: r.metrics.lane_id, track_id: null };
    case "priority_request_v1":
      return { lane_id: r.request.lane_id, track_id: r.request.reason_track_id };
  }
}
