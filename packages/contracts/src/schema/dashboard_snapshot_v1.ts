import { z } from "zod";
import { HeatmapSnapshotV1Schema } from "./history_bucket_v1";
import { IncidentV1Schema } from "./incident_v1";
import { LaneWindowMetricsV1Schema } from "./lane_window_metrics_v1";
import { SignalPlanV1Schema } from "./signal_plan_v1";
import { LaneTrendV1Schema } from "./trend_v1";

export const SessionStatsV1Schema = z
  .object({
    started_at_ms: z.number().finite().nullable(),
    last_frame_ms: z.number().finite().nullable(),
    frames_processed: z.number().int().nonnegative(),
    ticks: z.number().int().nonnegative(),
    observations_accepted: z.number().int().nonnegative(),
    observations_rejected: z
      .object({
        malformed: z.number().int().nonnegative(),
        out_of_order: z.number().int().nonnegative(),
      })
      .strict(),
    tracks_created: z.number().int().nonnegative(),
    active_tracks: z.number().int().nonnegative(),
    peak_vehicle_count: z.number().int().nonnegative(),
    peak_at_ms: z.number().finite().nullable(),
    incidents_opened: z.number().int().nonnegative(),
    violations: z.number().int().nonnegative(),
    priority_requests: z.number().int().nonnegative(),
  })
  .strict();

export const DashboardSnapshotV1Schema = z
  .object({
    tick_ms: z.number().finite(),
    window: z.object({ start_ms: z.number().finite(), end_ms: z.number().finite() }).strict(),
    lanes: z.array(LaneWindowMetricsV1Schema),
    trends: z.array(LaneTrendV1Schema),
    active_incidents: z.array(IncidentV1Schema),
    emergency_lanes: z.array(z.string().min(1)),
    signal_plan: SignalPlanV1Schema,
    heatmap: HeatmapSnapshotV1Schema,
    stats: SessionStatsV1Schema,
  })
  .strict();

export type SessionStatsV1 = z.infer<typeof SessionStatsV1Schema>;
export type DashboardSnapshotV1 = z.infer<typeof DashboardSnapshotV1Schema>;
