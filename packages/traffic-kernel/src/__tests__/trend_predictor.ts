import { test } from "node:test";
import assert from "node:assert/strict";

import type { LaneWindowMetricsV1 } from "@lanewatch/contracts";
import { TrendPredictor, fitTrend } from "../trend/trend_predictor";

const opts = { window_size: 20, min_samples: 3, flat_tolerance: 0.15 };

function metrics(lane_id: string, vehicle_count: number, flow_rate_vpm: number): LaneWindowMetricsV1 {
  return {
    lane_id,
    window_start_ms: 0,
    window_end_ms: 1000,
    vehicle_count,
    class_counts: {},
    entries: 0,
    flow_rate_vpm,
    queue_length: 0,
    stationary_count: 0,
    mean_speed_kmh: null,
    density: 0,
    los: "A",
    emergency_present: false,
  };
}

test("counts 1..5 trend upward with slope 1", () => {
  assert.deepEqual(fitTrend([1, 2, 3, 4, 5], opts), {
    status: "ok",
    samples: 5,
    slope: 1,
    intercept: 1,
    predicted_next: 6,
    direction: "rising",
  });
});

test("a falling series and a near-flat series", () => {
  const down = fitTrend([5, 4, 3, 2, 1], opts);
  assert.equal(down.status === "ok" && down.direction, "falling");

  const flat = fitTrend([2, 2, 2.1], opts);
  assert.ok(flat.status === "ok");
  assert.ok(Math.abs(flat.slope - 0.05) < 1e-9);
  assert.equal(flat.direction, "flat");
});

test("too few samples is reported, not guessed", () => {
  assert.deepEqual(fitTrend([1, 2], opts), { status: "insufficient-data", samples: 2 });
  assert.deepEqual(fitTrend([], opts), { status: "insufficient-data", samples: 0 });
});

test("the predictor only fits the most recent window", () => {
  const predictor = new TrendPredictor(["L1", "L2"], { ...opts, window_size: 3 });
  for (const n of [9, 1, 3, 4, 5]) predictor.observe([metrics("L1", n, n * 2)]);

  const [l1, l2] = predictor.predict();
  assert.equal(l1.lane_id, "L1");
  assert.deepEqual(l1.vehicle_count, {
    status: "ok",
    samples: 3,
    slope: 1,
    intercept: 3,
    predicted_next: 6,
    direction: "rising",
  });
  assert.ok(l1.flow_rate_vpm.status === "ok");
  assert.equal(l1.flow_rate_vpm.slope, 2);
  assert.deepEqual(l2.vehicle_count, { status: "insufficient-data", samples: 0 });
});
