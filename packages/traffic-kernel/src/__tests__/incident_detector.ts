import { test } from "node:test";
import assert from "node:assert/strict";

import {
  INITIAL_INCIDENT_STATE,
  closeOnTrackLost,
  currentDwellMs,
  stepIncident,
  stillReference,
  type IncidentState,
  type IncidentTransition,
} from "../incidents/incident_detector";
import type { PositionSample } from "../speed/speed_estimator";

const options = { dwell_ms: 5000, min_motion_px: 15, still_window_ms: 1000 };

type Run = { state: IncidentState; transitions: Array<[number, IncidentTransition["kind"]]> };

function run(samples: PositionSample[], laneId: string | null = "L1"): Run {
  let state: IncidentState = INITIAL_INCIDENT_STATE;
  const history: PositionSample[] = [];
  const transitions: Run["transitions"] = [];
  for (const sample of samples) {
    const step = stepIncident(state, { track_id: 1, lane_id: laneId, history: [...history], sample }, options);
    state = step.next;
    if (step.transition.kind !== "none") transitions.push([sample.timestamp_ms, step.transition.kind]);
    history.push(sample);
  }
  return { state, transitions };
}

// Jitters by under a pixel around (100, 200), one sample per second.
function stillFor(seconds: number): PositionSample[] {
  return Array.from({ length: seconds + 1 }, (_, i) => ({ x: 100 + (i % 2) * 0.5, y: 200, timestamp_ms: i * 1000 }));
}

test("a vehicle held still opens exactly one incident once dwell is reached", () => {
  const { state, transitions } = run(stillFor(10));
  assert.deepEqual(transitions, [
    [1000, "candidate"],
    [5000, "opened"],
  ]);
  assert.equal(state.state, "stopped");
  if (state.state !== "stopped") return;
  assert.deepEqual(state.incident, {
    incident_id: "inc_1_0",
    track_id: 1,
    lane_id: "L1",
    stationary_since_ms: 0,
    start_ms: 5000,
    end_ms: null,
    peak_stationary_ms: 10000,
    status: "open",
  });
  assert.equal(currentDwellMs(state), 10000);
});

test("no incident before the dwell time", () => {
  const { state, transitions } = run(stillFor(4));
  assert.equal(state.state, "candidate-stopped");
  assert.deepEqual(transitions, [[1000, "candidate"]]);
});

test("moving away resolves the incident with end_ms at the moving sample", () => {
  const samples = [...stillFor(6), { x: 160, y: 200, timestamp_ms: 7000 }];
  const { state, transitions } = run(samples);
  assert.deepEqual(transitions.at(-1), [7000, "cleared"]);
  assert.equal(state.state, "cleared");
  if (state.state !== "cleared") return;
  assert.equal(state.incident.status, "resolved");
  assert.equal(state.incident.end_ms, 7000);
  assert.equal(state.incident.peak_stationary_ms, 6000);
});

test("cleared re-enters the machine on the next observation", () => {
  const samples = [...stillFor(6), { x: 160, y: 200, timestamp_ms: 7000 }, { x: 220, y: 200, timestamp_ms: 8000 }];
  assert.equal(run(samples).state.state, "moving");

  const stopAgain = [...stillFor(6), { x: 160, y: 200, timestamp_ms: 7000 }, { x: 161, y: 200, timestamp_ms: 8000 }];
  const { state, transitions } = run(stopAgain);
  assert.equal(state.state, "candidate-stopped");
  assert.deepEqual(transitions.at(-1), [8000, "candidate"]);
});

test("slow creep measured against the anchor never opens an incident", () => {
  const creep = Array.from({ length: 12 }, (_, i) => ({ x: 100 + i * 10, y: 200, timestamp_ms: i * 1000 }));
  const { transitions } = run(creep);
  assert.ok(transitions.every(([, kind]) => kind !== "opened"));
  assert.deepEqual(transitions.slice(0, 2), [
    [1000, "candidate"],
    [2000, "candidate-aborted"],
  ]);
});

test("a long gap between two still samples goes straight to stopped", () => {
  const { state, transitions } = run([
    { x: 50, y: 50, timestamp_ms: 0 },
    { x: 51, y: 50, timestamp_ms: 6000 },
  ]);
  assert.deepEqual(transitions, [[6000, "opened"]]);
  assert.equal(state.state, "stopped");
});

test("track loss force-closes an open incident", () => {
  const { state } = run(stillFor(6));
  const closed = closeOnTrackLost(state, 9000);
  assert.equal(closed?.status, "track-lost");
  assert.equal(closed?.end_ms, 9000);
  assert.equal(closeOnTrackLost(INITIAL_INCIDENT_STATE, 9000), null);
});

test("a vehicle cruising at 6 px per 100 ms never becomes a stop candidate", () => {
  const cruise = Array.from({ length: 51 }, (_, i) => ({ x: 50, y: 20 + 6 * i, timestamp_ms: 100 * i }));
  const { state, transitions } = run(cruise);
  assert.deepEqual(transitions, []);
  assert.equal(state.state, "moving");
});

test("a track younger than the still window cannot start a stop", () => {
  const { state, transitions } = run([
    { x: 100, y: 200, timestamp_ms: 0 },
    { x: 100, y: 200, timestamp_ms: 400 },
    { x: 100, y: 200, timestamp_ms: 800 },
  ]);
  assert.deepEqual(transitions, []);
  assert.equal(state.state, "moving");
});

test("tracks outside every lane never open an incident", () => {
  const { state, transitions } = run(stillFor(8), null);
  assert.deepEqual(transitions, []);
  assert.equal(state.state, "moving");
});

test("the still reference is the newest sample at least one window old", () => {
  const history = [0, 300, 600, 900, 1200].map((t) => ({ x: t, y: 0, timestamp_ms: t }));
  assert.equal(stillReference(history, 1500, 1000)?.timestamp_ms, 300);
  assert.equal(stillReference(history, 1000, 1000)?.timestamp_ms, 0);
  assert.equal(stillReference(history, 999, 1000), null);
});
