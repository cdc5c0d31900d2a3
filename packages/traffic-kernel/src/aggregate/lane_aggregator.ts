import type { LaneV1, LaneWindowMetricsV1, LosConfigV1 } from "@lanewatch/contracts";
import type { TrackSnapshot } from "../tracks/track_state_manager";
import { laneLos } from "./los";

export type LaneAggregatorOptions = {
  flow_window_ms: number;
  stationary_kmh: number;
  los: LosConfigV1;
};

export type AggregationWindow = { start_ms: number; end_ms: number };

type Entry = { track_id: number; at_ms: number };

const MS_PER_MIN = 60_000;

/**
 * Turns one frozen track snapshot into per-lane window metrics.
 *
 * The only state kept between ticks is the per-lane entry log behind
 * flow_rate_vpm: entries older than the flow window are pruned on every call.
 */
export class LaneAggregator {
  private readonly entryLog = new Map<string, Entry[]>();

  constructor(
    private readonly lanes: ReadonlyArray<LaneV1>,
    private readonly options: LaneAggregatorOptions
  ) {}

  aggregate(
    tracks: ReadonlyArray<TrackSnapshot>,
    entries: ReadonlyMap<string, ReadonlyArray<number>>,
    window: AggregationWindow
  ): LaneWindowMetricsV1[] {
    const now = window.end_ms;
    const byLane = new Map<string, TrackSnapshot[]>();
    for (const t of tracks) {
      if (t.lane_id === null) continue;
      const list = byLane.get(t.lane_id);
      if (list) list.push(t);
      else byLane.set(t.lane_id, [t]);
    }

    return this.lanes.map((lane) => {
      const inLane = byLane.get(lane.lane_id) ?? [];
      const newEntries = entries.get(lane.lane_id) ?? [];
      const flow = this.recordFlow(lane.lane_id, newEntries, now);

      const class_counts: Record<string, number> = {};
      let queue = 0;
      let stationary = 0;
      let speedSum = 0;
      let speedN = 0;
      let emergency = false;
      for (const t of inLane) {
        class_counts[t.class_label] = (class_counts[t.class_label] ?? 0) + 1;
        if (t.incident_state === "stopped") queue++;
        if (t.speed_kmh !== null) {
          speedSum += t.speed_kmh;
          speedN++;
          if (t.speed_kmh <= this.options.stationary_kmh) stationary++;
        }
        if (t.emergency) emergency = true;
      }

      const { density, los } = laneLos(inLane.length, lane.capacity, this.options.los);
      return {
        lane_id: lane.lane_id,
        window_start_ms: window.start_ms,
        window_end_ms: window.end_ms,
        vehicle_count: inLane.length,
        class_counts,
        entries: new Set(newEntries).size,
        flow_rate_vpm: flow,
        queue_length: queue,
        stationary_count: stationary,
        mean_speed_kmh: speedN ? speedSum / speedN : null,
        density,
        los,
        emergency_present: emergency,
      };
    });
  }

  // Distinct tracks entering during (now - flow_window_ms, now], per minute.
  private recordFlow(laneId: string, newEntries: ReadonlyArray<number>, now: number): number {
    const log = (this.entryLog.get(laneId) ?? []).filter((e) => now - e.at_ms < this.options.flow_window_ms);
    for (const track_id of newEntries) log.push({ track_id, at_ms: now });
    this.entryLog.set(laneId, log);

    const distinct = new Set(log.map((e) => e.track_id)).size;
    return distinct / (this.options.flow_window_ms / MS_PER_MIN);
  }
}
