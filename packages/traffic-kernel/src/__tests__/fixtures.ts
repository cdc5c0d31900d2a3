// Shared fixtures for traffic-kernel tests.
//
// Two side-by-side lanes on a 640x480 frame, split at x = 320, both calibrated
// at 10 px per meter: 10 px per second is 1 m/s = 3.6 km/h.

import {
  AnalyticsConfigV1Schema,
  type AnalyticsConfigV1,
  type AnalyticsConfigV1Input,
  type FrameBatchV1,
  type ObservationV1,
} from "@lanewatch/contracts";
import type { TrackSnapshot } from "../tracks/track_state_manager";

export const LANE_L1 = {
  lane_id: "L1",
  polygon: [
    { x: 0, y: 0 },
    { x: 320, y: 0 },
    { x: 320, y: 480 },
    { x: 0, y: 480 },
  ],
  capacity: 20,
  calibration: { kind: "scale" as const, pixels_per_meter: 10 },
};

export const LANE_L2 = {
  lane_id: "L2",
  polygon: [
    { x: 320, y: 0 },
    { x: 640, y: 0 },
    { x: 640, y: 480 },
    { x: 320, y: 480 },
  ],
  capacity: 20,
  calibration: { kind: "scale" as const, pixels_per_meter: 10 },
};

export function makeConfig(overrides: Partial<AnalyticsConfigV1Input> = {}): AnalyticsConfigV1 {
  return AnalyticsConfigV1Schema.parse({
    schema_version: "1.0.0",
    frame: { width: 640, height: 480 },
    lanes: [LANE_L1, LANE_L2],
    ...overrides,
  });
}

/** Observation whose bottom-center reference point lands exactly on (x, y). */
export function obs(trackId: number, x: number, y: number, t: number, classLabel = "car"): ObservationV1 {
  return {
    track_id: trackId,
    class_label: classLabel,
    bbox: { x: x - 10, y: y - 20, w: 20, h: 20 },
    timestamp_ms: t,
    frame_index: Math.floor(t / 100),
  };
}

export function batch(t: number, observations: unknown[]): FrameBatchV1 {
  return { frame_index: Math.floor(t / 100), timestamp_ms: t, observations };
}

export function snap(partial: Partial<TrackSnapshot> & { track_id: number }): TrackSnapshot {
  return {
    class_label: "car",
    lane_id: "L1",
    position: { x: 100, y: 100 },
    first_seen_ms: 0,
    last_seen_ms: 0,
    speed_kmh: null,
    emergency: false,
    incident_state: "moving",
    dwell_ms: 0,
    stationary_total_ms: 0,
    open_incident: null,
    ...partial,
  };
}
