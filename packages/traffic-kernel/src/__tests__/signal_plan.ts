import { test } from "node:test";
import assert from "node:assert/strict";

import {
  SignalPlanConfigV1Schema,
  type LaneTrendV1,
  type LaneWindowMetricsV1,
  type SignalPlanV1,
} from "@lanewatch/contracts";
import { SignalPlanner, greenTimeS, trendSlope } from "../priority/signal_plan";

const options = SignalPlanConfigV1Schema.parse({});

function metrics(laneId: string, vehicleCount: number, emergency = false): LaneWindowMetricsV1 {
  return {
    lane_id: laneId,
    window_start_ms: 0,
    window_end_ms: 0,
    vehicle_count: vehicleCount,
    class_counts: {},
    entries: 0,
    flow_rate_vpm: 0,
    queue_length: 0,
    stationary_count: 0,
    mean_speed_kmh: null,
    density: 0,
    los: "A",
    emergency_present: emergency,
  };
}

function rising(laneId: string, slope: number): LaneTrendV1 {
  const flat = { status: "insufficient-data" as const, samples: 1 };
  return {
    lane_id: laneId,
    vehicle_count: { status: "ok", samples: 3, slope, intercept: 0, predicted_next: 0, direction: "rising" },
    flow_rate_vpm: flat,
  };
}

// counts: A, B, C
function step(
  planner: SignalPlanner,
  now: number,
  counts: [number, number, number] = [0, 0, 0],
  opts: { emergency?: string; trends?: LaneTrendV1[] } = {}
): SignalPlanV1 {
  const lanes = ["A", "B", "C"].map((id, i) => metrics(id, counts[i], opts.emergency === id));
  return planner.step({ now, lanes, trends: opts.trends ?? [] });
}

function planner(): SignalPlanner {
  return new SignalPlanner(["A", "B", "C"], options);
}

// Serves A, then B and C (both never green), then A again at 45 s.
function rotate(p: SignalPlanner): SignalPlanV1[] {
  return [0, 15_000, 30_000, 45_000].map((t) => step(p, t));
}

test("green time grows with the queue and the trend, within the min and max", () => {
  assert.equal(greenTimeS(0, 0, options), 15);
  assert.equal(greenTimeS(10, 0, options), 30);
  assert.equal(greenTimeS(10, 1.6, options), 36);
  assert.equal(greenTimeS(40, 0, options), 90);
  assert.equal(greenTimeS(2, -3, options), 15);

  assert.equal(trendSlope(rising("A", 0.5)), 0.5);
  assert.equal(
    trendSlope({ lane_id: "A", vehicle_count: { status: "insufficient-data", samples: 1 }, flow_rate_vpm: { status: "insufficient-data", samples: 1 } }),
    0
  );
  assert.equal(trendSlope(undefined), 0);
});

test("the first step opens a phase on the first lane and estimates red times in order", () => {
  const plan = step(planner(), 0, [5, 0, 0]);

  assert.equal(plan.phase_lane_id, "A");
  assert.equal(plan.phase_started_ms, 0);
  assert.equal(plan.green_s, 15);
  assert.equal(plan.remaining_s, 15);
  assert.equal(plan.switched, false);
  assert.equal(plan.adjustment, null);
  assert.equal(plan.next_lane_id, "B");
  assert.deepEqual(
    plan.lanes.map((l) => [l.lane_id, l.waited_s, l.forced, l.estimated_red_s]),
    [
      ["A", 0, false, null],
      ["B", 120, true, 15],
      ["C", 120, true, 30],
    ]
  );
});

test("lanes never served go first, then the longest wait wins among empty lanes", () => {
  const plans = rotate(planner());

  assert.deepEqual(
    plans.map((p) => [p.phase_lane_id, p.phase_started_ms, p.switched]),
    [
      ["A", 0, false],
      ["B", 15_000, true],
      ["C", 30_000, true],
      ["A", 45_000, true],
    ]
  );
  // at 30 s: A waited 30 s, B 15 s, C just turned green
  assert.deepEqual(
    plans[2].lanes.map((l) => [l.lane_id, l.score]),
    [
      ["A", 6],
      ["B", 3],
      ["C", 0],
    ]
  );
});

test("a queue outranks a longer wait, and a rising trend can tip the choice back", () => {
  const byCount = planner();
  rotate(byCount);
  // C: 4 + 30 / 5 = 10, B: 0 + 45 / 5 = 9
  assert.equal(step(byCount, 60_000, [0, 0, 4]).phase_lane_id, "C");

  const byTrend = planner();
  rotate(byTrend);
  // B: 0 + 1 * 2 + 9 = 11
  const plan = step(byTrend, 60_000, [0, 0, 4], { trends: [rising("B", 1)] });
  assert.equal(plan.phase_lane_id, "B");
  assert.equal(plan.green_s, 15);
});

test("an emergency vehicle on a red lane trims the green, once per cooldown", () => {
  const p = planner();
  assert.equal(step(p, 0, [20, 0, 0]).green_s, 60);

  const first = step(p, 1000, [20, 0, 0], { emergency: "B" });
  assert.deepEqual(first.adjustment, { kind: "emergency", lane_id: "B", trimmed_s: 20, at_ms: 1000 });
  assert.equal(first.remaining_s, 39);
  assert.equal(first.green_s, 40);

  const cooling = step(p, 2000, [20, 0, 0], { emergency: "B" });
  assert.equal(cooling.adjustment, null);
  assert.equal(cooling.remaining_s, 38);

  const again = step(p, 26_000, [20, 0, 0], { emergency: "B" });
  assert.deepEqual(again.adjustment, { kind: "emergency", lane_id: "B", trimmed_s: 4, at_ms: 26_000 });
  assert.equal(again.remaining_s, 10);
  assert.equal(again.phase_lane_id, "A");
});

test("an emergency vehicle already on green changes nothing", () => {
  const p = planner();
  step(p, 0, [20, 0, 0]);
  const plan = step(p, 1000, [20, 0, 0], { emergency: "A" });
  assert.equal(plan.adjustment, null);
  assert.equal(plan.remaining_s, 59);
});

test("a cleared green lane with a long queue elsewhere is cut short after the hold time", () => {
  const p = planner();
  step(p, 0, [20, 0, 0]);

  assert.equal(step(p, 5000, [1, 0, 12]).adjustment, null);

  const trimmed = step(p, 10_000, [1, 0, 12]);
  assert.deepEqual(trimmed.adjustment, { kind: "congestion", lane_id: null, trimmed_s: 10, at_ms: 10_000 });
  assert.equal(trimmed.remaining_s, 40);
  assert.equal(trimmed.green_s, 50);
});

test("a green lane still holding three vehicles is not cut short", () => {
  const p = planner();
  step(p, 0, [20, 0, 0]);
  const plan = step(p, 10_000, [3, 0, 12]);
  assert.equal(plan.adjustment, null);
  assert.equal(plan.remaining_s, 50);
});

test("a single lane gets green again when its phase ends", () => {
  const p = new SignalPlanner(["A"], options);
  p.step({ now: 0, lanes: [metrics("A", 0)], trends: [] });
  const plan = p.step({ now: 15_000, lanes: [metrics("A", 0)], trends: [] });

  assert.equal(plan.switched, true);
  assert.equal(plan.phase_lane_id, "A");
  assert.equal(plan.phase_started_ms, 15_000);
  assert.equal(plan.next_lane_id, "A");
  assert.equal(p.currentLaneId(), "A");
});

test("a plan needs at least one lane", () => {
  assert.throws(() => new SignalPlanner([], options), /at least one lane/);
});
