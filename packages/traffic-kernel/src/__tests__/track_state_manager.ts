import { test } from "node:test";
import assert from "node:assert/strict";

import { TrackStateManager, trackOptionsFromConfig } from "../tracks/track_state_manager";
import { makeConfig, obs } from "./fixtures";

function manager(overrides: Parameters<typeof makeConfig>[0] = {}): TrackStateManager {
  const config = makeConfig(overrides);
  return new TrackStateManager(config.lanes, trackOptionsFromConfig(config));
}

test("creates a track, then rejects observations older than its last sighting", () => {
  const tsm = manager();

  const first = tsm.update(obs(1, 100, 100, 0), "L1");
  assert.ok(first.ok);
  assert.equal(first.created, true);
  assert.equal(first.speed_status, "insufficient-samples");
  assert.equal(first.track.speed_kmh, null);

  const second = tsm.update(obs(1, 110, 100, 1000), "L1");
  assert.ok(second.ok);
  assert.equal(second.created, false);
  assert.equal(second.speed_status, "updated");
  assert.ok(second.track.speed_kmh !== null && Math.abs(second.track.speed_kmh - 3.6) < 1e-9);

  const late = tsm.update(obs(1, 120, 100, 500), "L1");
  assert.deepEqual(late, { ok: false, reason: "OUT_OF_ORDER", track_id: 1, last_seen_ms: 1000 });
  assert.equal(tsm.tracksCreated, 1);
});

test("an equal timestamp is accepted but does not update speed", () => {
  const tsm = manager();
  tsm.update(obs(1, 100, 100, 0), "L1");
  tsm.update(obs(1, 110, 100, 1000), "L1");

  const dup = tsm.update(obs(1, 150, 100, 1000), "L1");
  assert.ok(dup.ok);
  assert.equal(dup.speed_status, "skipped");
  assert.ok(dup.track.speed_kmh !== null && Math.abs(dup.track.speed_kmh - 3.6) < 1e-9);
  assert.deepEqual(dup.track.position, { x: 150, y: 100 });
});

test("speed violations re-report only on a new bucket and re-arm under the limit", () => {
  const tsm = manager();
  const path: Array<[number, number]> = [
    [20, 0], // first sample
    [220, 1000], // 72 km/h -> violation
    [420, 2000], // still 72 km/h, same bucket
    [420, 3000], // stops: 46.8 km/h smoothed, re-armed
    [220, 4000], // 55.6 km/h -> violation again
  ];
  const violations: number[] = [];
  for (const [y, t] of path) {
    const r = tsm.update(obs(2, 100, y, t), "L1");
    assert.ok(r.ok);
    for (const ev of r.events) if (ev.type === "speed_violation") violations.push(Math.floor(ev.speed_kmh));
  }
  assert.deepEqual(violations, [72, 55]);
});

test("lane entries are drained once and re-recorded on lane change", () => {
  const tsm = manager();
  tsm.update(obs(2, 100, 100, 0), "L1");
  tsm.update(obs(1, 110, 100, 0), "L1");
  tsm.update(obs(3, 400, 100, 0), "L2");
  tsm.update(obs(1, 112, 100, 100), "L1");

  assert.deepEqual(
    [...tsm.drainEntries()],
    [
      ["L1", [1, 2]],
      ["L2", [3]],
    ]
  );
  assert.equal(tsm.drainEntries().size, 0);

  tsm.update(obs(1, 400, 100, 200), "L2");
  assert.deepEqual([...tsm.drainEntries()], [["L2", [1]]]);
});

test("leaving every lane unassigns the track unless retain_last_lane is set", () => {
  const plain = manager();
  plain.update(obs(1, 100, 100, 0), "L1");
  plain.update(obs(1, 100, 100, 100), null);
  assert.equal(plain.get(1)?.lane_id, null);

  const retaining = manager({ tracks: { retain_last_lane: true } });
  retaining.update(obs(1, 100, 100, 0), "L1");
  retaining.drainEntries();
  retaining.update(obs(1, 100, 100, 100), null);
  assert.equal(retaining.get(1)?.lane_id, "L1");
  assert.equal(retaining.drainEntries().size, 0);
});

test("stale tracks are evicted and their open incidents close as track-lost", () => {
  const tsm = manager();
  let opened = 0;
  for (let t = 0; t <= 5000; t += 1000) {
    const r = tsm.update(obs(5, 100, 100, t), "L1");
    assert.ok(r.ok);
    opened += r.events.filter((e) => e.type === "incident_opened").length;
  }
  tsm.update(obs(6, 200, 100, 7000), "L1");
  assert.equal(opened, 1);
  assert.equal(tsm.get(5)?.incident_state, "stopped");

  const evicted = tsm.evictStale(8000);
  assert.equal(evicted.length, 1);
  assert.equal(evicted[0].track_id, 5);
  assert.equal(evicted[0].closed_incident?.status, "track-lost");
  assert.equal(evicted[0].closed_incident?.end_ms, 8000);
  assert.equal(evicted[0].closed_incident?.incident_id, "inc_5_0");
  assert.equal(tsm.has(5), false);
  assert.equal(tsm.size, 1);
});

test("emergency flag follows the class label and the optional speed floor", () => {
  const tsm = manager();
  tsm.update(obs(1, 100, 100, 0, "ambulance"), "L1");
  tsm.update(obs(2, 120, 100, 0, "car"), "L1");
  assert.equal(tsm.get(1)?.emergency, true);
  assert.equal(tsm.get(2)?.emergency, false);

  const gated = manager({ emergency: { min_speed_kmh: 30 } });
  gated.update(obs(1, 100, 0, 0, "ambulance"), "L1");
  gated.update(obs(1, 100, 1, 1000, "ambulance"), "L1");
  assert.equal(gated.get(1)?.emergency, false);
  gated.update(obs(1, 100, 401, 2000, "ambulance"), "L1");
  assert.equal(gated.get(1)?.emergency, true);
});

test("snapshot returns frozen copies ordered by track id", () => {
  const tsm = manager();
  tsm.update(obs(9, 100, 100, 0), "L1");
  tsm.update(obs(3, 400, 100, 0), "L2");
  const snap = tsm.snapshot();
  assert.deepEqual(
    snap.map((t) => t.track_id),
    [3, 9]
  );
  assert.equal(Object.isFrozen(snap[0]), true);
});

test("steady motion at city speed keeps a track moving with no stationary time", () => {
  const tsm = manager();
  const states = new Set<string>();
  for (let i = 0; i <= 50; i++) {
    const r = tsm.update(obs(1, 50, 20 + 6 * i, 100 * i), "L1");
    assert.ok(r.ok);
    states.add(r.track.incident_state);
  }
  assert.deepEqual([...states], ["moving"]);
  assert.equal(tsm.get(1)?.stationary_total_ms, 0);
  assert.equal(tsm.get(1)?.dwell_ms, 0);
});

test("a vehicle stopped outside every lane raises no incident", () => {
  const tsm = manager();
  let opened = 0;
  for (let t = 0; t <= 8000; t += 1000) {
    const r = tsm.update(obs(4, 100, 100, t), null);
    assert.ok(r.ok);
    opened += r.events.filter((e) => e.type === "incident_opened").length;
  }
  assert.equal(opened, 0);
  assert.equal(tsm.get(4)?.incident_state, "moving");
  assert.equal(tsm.get(4)?.stationary_total_ms, 0);
});
