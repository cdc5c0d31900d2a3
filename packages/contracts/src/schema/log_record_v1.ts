import { z } from "zod";
import { IncidentV1Schema } from "./incident_v1";
import { LaneWindowMetricsV1Schema } from "./lane_window_metrics_v1";
import { PriorityRequestV1Schema } from "./priority_request_v1";

/**
 * LogRecordV1Schema
 *
 * Typed rows handed to the logging sink. Every variant carries ts_ms so the
 * store can order rows without opening the payload.
 */
export const LogRecordV1Schema = z.discriminatedUnion("type", [
  z
    .object({
      type: z.literal("speed_sample_v1"),
      ts_ms: z.number().finite(),
      track_id: z.number().int().nonnegative(),
      lane_id: z.string().min(1).nullable(),
      class_label: z.string().min(1),
      speed_kmh: z.number().finite().nonnegative(),
    })
    .strict(),
  z
    .object({
      type: z.literal("speed_violation_v1"),
      ts_ms: z.number().finite(),
      track_id: z.number().int().nonnegative(),
      lane_id: z.string().min(1).nullable(),
      class_label: z.string().min(1),
      speed_kmh: z.number().finite().nonnegative(),
      limit_kmh: z.number().finite().nonnegative(),
    })
    .strict(),
  z
    .object({
      type: z.literal("incident_opened_v1"),
      ts_ms: z.number().finite(),
      incident: IncidentV1Schema,
    })
    .strict(),
  z
    .object({
      type: z.literal("incident_closed_v1"),
      ts_ms: z.number().finite(),
      incident: IncidentV1Schema,
    })
    .strict(),
  z
    .object({
      type: z.literal("lane_metrics_v1"),
      ts_ms: z.number().finite(),
      metrics: LaneWindowMetricsV1Schema,
    })
    .strict(),
  z
    .object({
      type: z.literal("priority_request_v1"),
      ts_ms: z.number().finite(),
      request: PriorityRequestV1Schema,
    })
    .strict(),
]);

export type LogRecordV1 = z.infer<typeof LogRecordV1Schema>;
export type LogRecordType = LogRecordV1["type"];

export const LOG_RECORD_TYPES: readonly LogRecordType[] = [
  "speed_sample_v1",
  "speed_violation_v1",
  "incident_opened_v1",
  "incident_closed_v1",
  "lane_metrics_v1",
  "priority_request_v1",
];

export function isLogRecordType(x: unknown): x is LogRecordType {
  return LOG_RECORD_TYPES.some((t) => t === x);
}
