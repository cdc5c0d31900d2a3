import type {
  LaneTrendV1,
  LaneWindowMetricsV1,
  SignalAdjustmentV1,
  SignalLanePlanV1,
  SignalPlanConfigV1,
  SignalPlanV1,
} from "@lanewatch/contracts";

export type SignalPlanInput = {
  now: number;
  lanes: ReadonlyArray<LaneWindowMetricsV1>;
  trends: ReadonlyArray<LaneTrendV1>;
};

type Phase = {
  index: number;
  started_ms: number;
  planned_ms: number;
  last_adjust_ms: number | null; // null until the first trim of the phase
};

/** Vehicle-count slope of a lane, 0 until the trend window has enough samples. */
export function trendSlope(trend: LaneTrendV1 | undefined): number {
  return trend && trend.vehicle_count.status === "ok" ? trend.vehicle_count.slope : 0;
}

export function greenTimeS(vehicleCount: number, slope: number, o: SignalPlanConfigV1): number {
  const wanted = vehicleCount * o.per_vehicle_s + Math.trunc(slope * o.trend_gain_s);
  return Math.min(o.max_green_s, Math.max(o.min_green_s, wanted));
}

/**
 * Adaptive round of green phases over the configured lanes.
 *
 * Each tick:
 * 1) the first call opens a phase on the first declared lane;
 * 2) an emergency vehicle on a red lane trims the running green, otherwise a
 *    cleared green lane with a long queue elsewhere trims it (one trim per cooldown);
 * 3) an expired phase hands green to the best-scoring red lane.
 *
 * Advisory only: the plan is reported, nothing is actuated.
 */
export class SignalPlanner {
  private phase: Phase | null = null;
  private readonly lastGreenMs = new Map<string, number>();

  constructor(
    private readonly laneIds: ReadonlyArray<string>,
    private readonly options: SignalPlanConfigV1
  ) {
    if (laneIds.length === 0) throw new Error("signal plan needs at least one lane");
  }

  step(input: SignalPlanInput): SignalPlanV1 {
    const o = this.options;
    const { now } = input;
    const view = this.laneView(input);

    const phase = this.phase ?? this.startPhase(0, now, view);
    const currentId = this.laneIds[phase.index];

    const elapsed = now - phase.started_ms;
    let remaining = remainingS(phase, now);
    let adjustment: SignalAdjustmentV1 | null = null;

    const cooled = phase.last_adjust_ms === null || now - phase.last_adjust_ms >= o.adjust_cooldown_ms;
    const emergency = input.lanes.find((l) => l.emergency_present && l.lane_id !== currentId);

    if (emergency && cooled) {
      const next = Math.max(o.emergency_min_s, remaining - o.emergency_trim_s);
      if (next < remaining) {
        adjustment = { kind: "emergency", lane_id: emergency.lane_id, trimmed_s: remaining - next, at_ms: now };
      }
    } else if (cooled && elapsed >= o.congestion_hold_s * 1000 && remaining > o.congestion_min_s) {
      const maxWaiting = Math.max(0, ...this.laneIds.filter((id) => id !== currentId).map((id) => view.count(id)));
      if (view.count(currentId) <= o.congestion_clear_max && maxWaiting >= o.congestion_waiting_min) {
        const next = Math.max(o.congestion_min_s, remaining - o.congestion_trim_s);
        if (next < remaining) {
          adjustment = { kind: "congestion", lane_id: null, trimmed_s: remaining - next, at_ms: now };
        }
      }
    }
    if (adjustment) {
      remaining -= adjustment.trimmed_s;
      phase.planned_ms = elapsed + remaining * 1000;
      phase.last_adjust_ms = now;
    }

    let current = phase;
    let switched = false;
    if (elapsed >= phase.planned_ms) {
      current = this.startPhase(this.nextIndex(phase.index, now, view), now, view);
      switched = true;
    }

    return this.report(current, now, view, switched, adjustment);
  }

  currentLaneId(): string | null {
    return this.phase ? this.laneIds[this.phase.index] : null;
  }

  private startPhase(index: number, now: number, view: LaneView): Phase {
    const laneId = this.laneIds[index];
    this.lastGreenMs.set(laneId, now);
    this.phase = {
      index,
      started_ms: now,
      planned_ms: view.green(laneId) * 1000,
      last_adjust_ms: null,
    };
    return this.phase;
  }

  private waitedS(laneId: string, now: number): number {
    const since = this.lastGreenMs.get(laneId) ?? now - this.options.max_wait_s * 1000;
    return (now - since) / 1000;
  }

  private score(laneId: string, now: number, view: LaneView): number {
    return view.count(laneId) + view.slope(laneId) * this.options.trend_weight + this.waitedS(laneId, now) / this.options.wait_scale_s;
  }

  // First starved lane in declaration order, else the highest score (first wins ties).
  private nextIndex(currentIndex: number, now: number, view: LaneView): number {
    let best: number | null = null;
    let bestScore = Number.NEGATIVE_INFINITY;
    for (let i = 0; i < this.laneIds.length; i++) {
      if (i === currentIndex) continue;
      const id = this.laneIds[i];
      if (this.waitedS(id, now) >= this.options.max_wait_s) return i;
      const s = this.score(id, now, view);
      if (best === null || s > bestScore) {
        best = i;
        bestScore = s;
      }
    }
    return best ?? (currentIndex + 1) % this.laneIds.length;
  }

  private report(
    phase: Phase,
    now: number,
    view: LaneView,
    switched: boolean,
    adjustment: SignalAdjustmentV1 | null
  ): SignalPlanV1 {
    const n = this.laneIds.length;
    const remaining = remainingS(phase, now);

    const lanes: SignalLanePlanV1[] = this.laneIds.map((laneId, i) => {
      const waited = this.waitedS(laneId, now);
      let red: number | null = null;
      if (i !== phase.index) {
        // lanes strictly between the green lane and this one get their greens first
        red = remaining;
        for (let k = (phase.index + 1) % n; k !== i; k = (k + 1) % n) red += view.green(this.laneIds[k]);
      }
      return {
        lane_id: laneId,
        vehicle_count: view.count(laneId),
        trend_slope: view.slope(laneId),
        green_s: view.green(laneId),
        waited_s: waited,
        forced: i !== phase.index && waited >= this.options.max_wait_s,
        score: this.score(laneId, now, view),
        estimated_red_s: red,
      };
    });

    return {
      phase_lane_id: this.laneIds[phase.index],
      phase_started_ms: phase.started_ms,
      green_s: phase.planned_ms / 1000,
      remaining_s: remaining,
      switched,
      adjustment,
      next_lane_id: this.laneIds[this.nextIndex(phase.index, now, view)],
      lanes,
    };
  }

  private laneView(input: SignalPlanInput): LaneView {
    const counts = new Map(input.lanes.map((l) => [l.lane_id, l.vehicle_count]));
    const slopes = new Map(input.trends.map((t) => [t.lane_id, trendSlope(t)]));
    const count = (id: string) => counts.get(id) ?? 0;
    const slope = (id: string) => slopes.get(id) ?? 0;
    return { count, slope, green: (id) => greenTimeS(count(id), slope(id), this.options) };
  }
}

type LaneView = {
  count(laneId: string): number;
  slope(laneId: string): number;
  green(laneId: string): number;
};

function remainingS(phase: Phase, now: number): number {
  return Math.max(0, Math.floor((phase.planned_ms - (now - phase.started_ms)) / 1000));
}
