import type { LaneV1, PriorityRequestV1 } from "@lanewatch/contracts";
import type { TrackSnapshot } from "../tracks/track_state_manager";

export type PriorityOptions = {
  extension_s: number;
  cooldown_ms: number;
};

/**
 * Emergency green-extension requests, at most one per lane per cooldown.
 * Lanes are independent: a request on one lane never suppresses another.
 */
export class PriorityController {
  private readonly cooldownUntil = new Map<string, number>();

  constructor(
    private readonly lanes: ReadonlyArray<LaneV1>,
    private readonly options: PriorityOptions
  ) {}

  evaluate(tracks: ReadonlyArray<TrackSnapshot>, now: number): PriorityRequestV1[] {
    const requests: PriorityRequestV1[] = [];
    for (const lane of this.lanes) {
      let reason: number | null = null;
      for (const t of tracks) {
        if (!t.emergency || t.lane_id !== lane.lane_id) continue;
        if (reason === null || t.track_id < reason) reason = t.track_id;
      }
      if (reason === null) continue;
      if (now < (this.cooldownUntil.get(lane.lane_id) ?? Number.NEGATIVE_INFINITY)) continue;

      requests.push({
        request_id: `prq_${lane.lane_id}_${Math.round(now)}`,
        lane_id: lane.lane_id,
        requested_extension_s: this.options.extension_s,
        reason_track_id: reason,
        issued_at_ms: now,
      });
      this.cooldownUntil.set(lane.lane_id, now + this.options.cooldown_ms);
    }
    return requests;
  }

  cooldownRemainingMs(laneId: string, now: number): number {
    return Math.max(0, (this.cooldownUntil.get(laneId) ?? now) - now);
  }
}
