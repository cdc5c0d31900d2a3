import type { AnalyticsConfigV1, IncidentV1, LaneV1, ObservationV1, PointV1 } from "@lanewatch/contracts";
import { referencePoint } from "../lanes/geometry";
import {
  INITIAL_INCIDENT_STATE,
  closeOnTrackLost,
  currentDwellMs,
  stepIncident,
  type IncidentDetectorOptions,
  type IncidentState,
  type IncidentStateName,
} from "../incidents/incident_detector";
import { estimateSpeed, violationBucket, type PositionSample, type SpeedEstimateStatus } from "../speed/speed_estimator";
import { RingBuffer } from "../util/ring_buffer";

export type TrackState = {
  track_id: number;
  class_label: string;
  lane_id: string | null;
  first_seen_ms: number;
  last_seen_ms: number;
  last_frame_index: number;
  history: RingBuffer<PositionSample>;
  speed_kmh: number | null;
  speed_status: SpeedEstimateStatus;
  emergency: boolean;
  incident: IncidentState;
  stationary_total_ms: number; // finished stops only; add currentDwellMs for the live one
  violation_bucket: number | null;
};

export type TrackSnapshot = Readonly<{
  track_id: number;
  class_label: string;
  lane_id: string | null;
  position: PointV1;
  first_seen_ms: number;
  last_seen_ms: number;
  speed_kmh: number | null;
  emergency: boolean;
  incident_state: IncidentStateName;
  dwell_ms: number;
  stationary_total_ms: number;
  open_incident: IncidentV1 | null;
}>;

export type TrackEvent =
  | { type: "incident_opened"; ts_ms: number; incident: IncidentV1 }
  | { type: "incident_cleared"; ts_ms: number; incident: IncidentV1 }
  | {
      type: "speed_violation";
      ts_ms: number;
      track_id: number;
      lane_id: string | null;
      class_label: string;
      speed_kmh: number;
      limit_kmh: number;
    };

export type TrackUpdateResult =
  | { ok: true; created: boolean; track: TrackSnapshot; speed_status: SpeedEstimateStatus; events: TrackEvent[] }
  | { ok: false; reason: "OUT_OF_ORDER"; track_id: number; last_seen_ms: number };

export type EvictedTrack = {
  track_id: number;
  lane_id: string | null;
  last_seen_ms: number;
  closed_incident: IncidentV1 | null;
};

export type TrackStateManagerOptions = {
  eviction_timeout_ms: number;
  history_max_samples: number;
  history_window_ms: number;
  retain_last_lane: boolean;
  speed: { smoothing: number; min_elapsed_ms: number; violation_kmh: number };
  incident: IncidentDetectorOptions;
  emergency: { class_labels: ReadonlyArray<string>; min_speed_kmh: number | null };
};

export function trackOptionsFromConfig(config: AnalyticsConfigV1): TrackStateManagerOptions {
  return {
    eviction_timeout_ms: config.tracks.eviction_timeout_ms,
    history_max_samples: config.tracks.history_max_samples,
    history_window_ms: config.tracks.history_window_ms,
    retain_last_lane: config.tracks.retain_last_lane,
    speed: config.speed,
    incident: config.incident,
    emergency: config.emergency,
  };
}

export class TrackStateManager {
  private readonly tracks = new Map<number, TrackState>();
  private readonly lanesById: Map<string, LaneV1>;
  private readonly emergencyLabels: Set<string>;
  private pendingEntries = new Map<string, Set<number>>();
  private created = 0;

  constructor(lanes: ReadonlyArray<LaneV1>, private readonly options: TrackStateManagerOptions) {
    this.lanesById = new Map(lanes.map((l) => [l.lane_id, l]));
    this.emergencyLabels = new Set(options.emergency.class_labels);
  }

  get size(): number {
    return this.tracks.size;
  }

  get tracksCreated(): number {
    return this.created;
  }

  has(trackId: number): boolean {
    return this.tracks.has(trackId);
  }

  get(trackId: number): TrackSnapshot | null {
    const t = this.tracks.get(trackId);
    return t ? freeze(t) : null;
  }

  update(observation: ObservationV1, assignedLaneId: string | null): TrackUpdateResult {
    const now = observation.timestamp_ms;
    const existing = this.tracks.get(observation.track_id);
    if (existing && now < existing.last_seen_ms) {
      return { ok: false, reason: "OUT_OF_ORDER", track_id: existing.track_id, last_seen_ms: existing.last_seen_ms };
    }

    const created = !existing;
    const track: TrackState = existing ?? {
      track_id: observation.track_id,
      class_label: observation.class_label,
      lane_id: null,
      first_seen_ms: now,
      last_seen_ms: now,
      last_frame_index: observation.frame_index,
      history: new RingBuffer<PositionSample>(this.options.history_max_samples),
      speed_kmh: null,
      speed_status: "insufficient-samples",
      emergency: false,
      incident: INITIAL_INCIDENT_STATE,
      stationary_total_ms: 0,
      violation_bucket: null,
    };
    if (created) {
      this.tracks.set(track.track_id, track);
      this.created += 1;
    }

    const prior = track.history.toArray();
    const ref = referencePoint(observation.bbox);
    const sample: PositionSample = { x: ref.x, y: ref.y, timestamp_ms: now };
    track.history.push(sample);
    // Keep at least the two newest samples so a speed can still be derived after a gap.
    track.history.dropWhile((s) => now - s.timestamp_ms > this.options.history_window_ms, 2);

    track.class_label = observation.class_label;
    track.last_seen_ms = now;
    track.last_frame_index = observation.frame_index;

    const laneId = assignedLaneId ?? (this.options.retain_last_lane ? track.lane_id : null);
    if (laneId !== null && laneId !== track.lane_id) this.recordEntry(laneId, track.track_id);
    track.lane_id = laneId;

    const events: TrackEvent[] = [];

    const calibration = laneId === null ? null : this.lanesById.get(laneId)?.calibration ?? null;
    const estimate = estimateSpeed(track.history.toArray(), calibration, track.speed_kmh, this.options.speed);
    track.speed_kmh = estimate.speed_kmh;
    track.speed_status = estimate.status;
    track.emergency = this.isEmergency(track);

    const limit = this.options.speed.violation_kmh;
    if (track.speed_kmh !== null && track.speed_kmh > limit) {
      const bucket = violationBucket(track.speed_kmh);
      if (bucket !== track.violation_bucket) {
        track.violation_bucket = bucket;
        events.push({
          type: "speed_violation",
          ts_ms: now,
          track_id: track.track_id,
          lane_id: track.lane_id,
          class_label: track.class_label,
          speed_kmh: track.speed_kmh,
          limit_kmh: limit,
        });
      }
    } else if (track.speed_kmh !== null) {
      track.violation_bucket = null;
    }

    const step = stepIncident(
      track.incident,
      { track_id: track.track_id, lane_id: track.lane_id, history: prior, sample },
      this.options.incident
    );
    track.incident = step.next;
    switch (step.transition.kind) {
      case "opened":
        events.push({ type: "incident_opened", ts_ms: now, incident: step.transition.incident });
        break;
      case "cleared":
        track.stationary_total_ms += step.transition.stationary_ms;
        events.push({ type: "incident_cleared", ts_ms: now, incident: step.transition.incident });
        break;
      case "candidate-aborted":
        track.stationary_total_ms += step.transition.stationary_ms;
        break;
      default:
        break;
    }

    return { ok: true, created, track: freeze(track), speed_status: estimate.status, events };
  }

  /** Removes tracks unseen for longer than `timeoutMs`; open incidents close as track-lost at `now`. */
  evictStale(now: number, timeoutMs: number = this.options.eviction_timeout_ms): EvictedTrack[] {
    const evicted: EvictedTrack[] = [];
    for (const track of this.tracks.values()) {
      if (now - track.last_seen_ms <= timeoutMs) continue;
      evicted.push({
        track_id: track.track_id,
        lane_id: track.lane_id,
        last_seen_ms: track.last_seen_ms,
        closed_incident: closeOnTrackLost(track.incident, now),
      });
    }
    for (const e of evicted) this.tracks.delete(e.track_id);
    return evicted;
  }

  /** Lane entries recorded since the previous drain, track ids ascending. */
  drainEntries(): Map<string, number[]> {
    const out = new Map<string, number[]>();
    for (const [laneId, ids] of this.pendingEntries) {
      out.set(laneId, [...ids].sort((a, b) => a - b));
    }
    this.pendingEntries = new Map();
    return out;
  }

  /** Frozen copies of every active track, ordered by track id. */
  snapshot(): TrackSnapshot[] {
    return [...this.tracks.values()].sort((a, b) => a.track_id - b.track_id).map(freeze);
  }

  private recordEntry(laneId: string, trackId: number): void {
    let ids = this.pendingEntries.get(laneId);
    if (!ids) {
      ids = new Set();
      this.pendingEntries.set(laneId, ids);
    }
    ids.add(trackId);
  }

  private isEmergency(track: TrackState): boolean {
    if (!this.emergencyLabels.has(track.class_label)) return false;
    const min = this.options.emergency.min_speed_kmh;
    if (min === null) return true;
    return track.speed_kmh !== null && track.speed_kmh > min;
  }
}

function freeze(t: TrackState): TrackSnapshot {
  const newest = t.history.peekNewest();
  const dwell = currentDwellMs(t.incident);
  return Object.freeze({
    track_id: t.track_id,
    class_label: t.class_label,
    lane_id: t.lane_id,
    position: newest ? { x: newest.x, y: newest.y } : { x: 0, y: 0 },
    first_seen_ms: t.first_seen_ms,
    last_seen_ms: t.last_seen_ms,
    speed_kmh: t.speed_kmh,
    emergency: t.emergency,
    incident_state: t.incident.state,
    dwell_ms: dwell,
    stationary_total_ms: t.stationary_total_ms + dwell,
    open_incident: t.incident.state === "stopped" ? t.incident.incident : null,
  });
}
