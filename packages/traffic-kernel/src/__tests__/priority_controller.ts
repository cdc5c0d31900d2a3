import { test } from "node:test";
import assert from "node:assert/strict";

import { PriorityController } from "../priority/priority_controller";
import { LANE_L1, LANE_L2, snap } from "./fixtures";

function controller(): PriorityController {
  return new PriorityController([LANE_L1, LANE_L2], { extension_s: 20, cooldown_ms: 25_000 });
}

test("an emergency vehicle yields one request, then the lane cools down", () => {
  const pc = controller();
  const tracks = [snap({ track_id: 7, lane_id: "L2", class_label: "ambulance", emergency: true })];

  assert.deepEqual(pc.evaluate(tracks, 0), [
    { request_id: "prq_L2_0", lane_id: "L2", requested_extension_s: 20, reason_track_id: 7, issued_at_ms: 0 },
  ]);
  assert.deepEqual(pc.evaluate(tracks, 1000), []);
  assert.equal(pc.cooldownRemainingMs("L2", 1000), 24_000);
  assert.equal(pc.evaluate(tracks, 24_999).length, 0);
  assert.equal(pc.evaluate(tracks, 25_000).length, 1);
});

test("lanes cool down independently", () => {
  const pc = controller();
  pc.evaluate([snap({ track_id: 7, lane_id: "L2", emergency: true })], 0);
  const out = pc.evaluate(
    [snap({ track_id: 7, lane_id: "L2", emergency: true }), snap({ track_id: 8, lane_id: "L1", emergency: true })],
    1000
  );
  assert.deepEqual(
    out.map((r) => r.lane_id),
    ["L1"]
  );
});

test("the lowest emergency track id is the reason", () => {
  const out = controller().evaluate(
    [
      snap({ track_id: 9, lane_id: "L1", emergency: true }),
      snap({ track_id: 4, lane_id: "L1", emergency: true }),
      snap({ track_id: 2, lane_id: "L1", emergency: false }),
    ],
    0
  );
  assert.equal(out.length, 1);
  assert.equal(out[0].reason_track_id, 4);
});

test("no emergency, no request", () => {
  assert.deepEqual(controller().evaluate([snap({ track_id: 1 })], 0), []);
});
