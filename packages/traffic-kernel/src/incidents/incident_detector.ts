/**
 * Stopped-vehicle incident state machine (one instance per track).
 *
 *   moving ──still──▶ candidate-stopped ──dwell reached──▶ stopped ──moved──▶ cleared
 *     ▲                    │ moved                                            │
 *     └────────────────────┴───────────── next observation ◀──────────────────┘
 *
 * A stop starts only when the track has moved at most `min_motion_px` since
 * its newest sample at least `still_window_ms` old. From there stillness
 * is measured against an anchor (that older position), so slow creep beyond
 * `min_motion_px` resets the clock instead of drifting. Tracks outside every
 * lane never start a stop. Alerts are edge-triggered: "opened" fires on the
 * candidate -> stopped transition only.
 *
 * Pure: callers own the state value and feed it back on the next sample.
 */

import type { IncidentV1, PointV1 } from "@lanewatch/contracts";
import { distance } from "../lanes/geometry";
import type { PositionSample } from "../speed/speed_estimator";

export type IncidentState =
  | { state: "moving" }
  | { state: "candidate-stopped"; since_ms: number; last_still_ms: number; anchor: PointV1 }
  | { state: "stopped"; since_ms: number; last_still_ms: number; anchor: PointV1; incident: IncidentV1 }
  | { state: "cleared"; at_ms: number; incident: IncidentV1 };

export type IncidentStateName = IncidentState["state"];

export type IncidentTransition =
  | { kind: "none" }
  | { kind: "candidate" }
  | { kind: "candidate-aborted"; stationary_ms: number }
  | { kind: "opened"; incident: IncidentV1 }
  | { kind: "cleared"; incident: IncidentV1; stationary_ms: number };

export type IncidentDetectorOptions = {
  dwell_ms: number;
  min_motion_px: number;
  still_window_ms: number;
};

export type IncidentStepInput = {
  track_id: number;
  lane_id: string | null;
  history: ReadonlyArray<PositionSample>; // samples before `sample`, oldest first
  sample: PositionSample;
};

export type IncidentStep = { next: IncidentState; transition: IncidentTransition };

export const INITIAL_INCIDENT_STATE: IncidentState = Object.freeze({ state: "moving" });

export function incidentId(trackId: number, sinceMs: number): string {
  return `inc_${trackId}_${Math.round(sinceMs)}`;
}

/** Newest sample at least `windowMs` older than `nowMs`, or null while the track is younger than that. */
export function stillReference(
  history: ReadonlyArray<PositionSample>,
  nowMs: number,
  windowMs: number
): PositionSample | null {
  for (let i = history.length - 1; i >= 0; i--) {
    if (nowMs - history[i].timestamp_ms >= windowMs) return history[i];
  }
  return null;
}

function promote(
  candidate: Extract<IncidentState, { state: "candidate-stopped" }>,
  input: IncidentStepInput,
  options: IncidentDetectorOptions,
  wasCandidate: boolean
): IncidentStep {
  const now = input.sample.timestamp_ms;
  const dwell = now - candidate.since_ms;
  if (dwell < options.dwell_ms) {
    return { next: candidate, transition: wasCandidate ? { kind: "none" } : { kind: "candidate" } };
  }

  const incident: IncidentV1 = {
    incident_id: incidentId(input.track_id, candidate.since_ms),
    track_id: input.track_id,
    lane_id: input.lane_id,
    stationary_since_ms: candidate.since_ms,
    start_ms: now,
    end_ms: null,
    peak_stationary_ms: dwell,
    status: "open",
  };
  return {
    next: { state: "stopped", since_ms: candidate.since_ms, last_still_ms: now, anchor: candidate.anchor, incident },
    transition: { kind: "opened", incident },
  };
}

export function stepIncident(
  current: IncidentState,
  input: IncidentStepInput,
  options: IncidentDetectorOptions
): IncidentStep {
  const { sample } = input;
  const now = sample.timestamp_ms;

  switch (current.state) {
    case "moving":
    case "cleared": {
      if (input.lane_id === null) return { next: INITIAL_INCIDENT_STATE, transition: { kind: "none" } };
      const ref = stillReference(input.history, now, options.still_window_ms);
      if (!ref || distance(ref, sample) > options.min_motion_px) {
        return { next: INITIAL_INCIDENT_STATE, transition: { kind: "none" } };
      }
      const candidate = {
        state: "candidate-stopped" as const,
        since_ms: ref.timestamp_ms,
        last_still_ms: now,
        anchor: { x: ref.x, y: ref.y },
      };
      return promote(candidate, input, options, false);
    }

    case "candidate-stopped": {
      if (input.lane_id === null || distance(current.anchor, sample) > options.min_motion_px) {
        return {
          next: INITIAL_INCIDENT_STATE,
          transition: { kind: "candidate-aborted", stationary_ms: current.last_still_ms - current.since_ms },
        };
      }
      return promote({ ...current, last_still_ms: now }, input, options, true);
    }

    case "stopped": {
      if (distance(current.anchor, sample) <= options.min_motion_px) {
        const peak = Math.max(current.incident.peak_stationary_ms, now - current.since_ms);
        return {
          next: { ...current, last_still_ms: now, incident: { ...current.incident, peak_stationary_ms: peak } },
          transition: { kind: "none" },
        };
      }
      const closed: IncidentV1 = { ...current.incident, end_ms: now, status: "resolved" };
      return {
        next: { state: "cleared", at_ms: now, incident: closed },
        transition: { kind: "cleared", incident: closed, stationary_ms: current.last_still_ms - current.since_ms },
      };
    }
  }
}

/** Force-closes an open incident when its track is evicted. */
export function closeOnTrackLost(current: IncidentState, atMs: number): IncidentV1 | null {
  if (current.state !== "stopped") return null;
  return { ...current.incident, end_ms: atMs, status: "track-lost" };
}

/** Continuous stationary time of the current stop, 0 while moving. */
export function currentDwellMs(current: IncidentState): number {
  if (current.state === "candidate-stopped" || current.state === "stopped") {
    return Math.max(0, current.last_still_ms - current.since_ms);
  }
  return 0;
}
