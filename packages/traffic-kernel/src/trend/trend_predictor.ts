import type { LaneTrendV1, LaneWindowMetricsV1, TrendEstimateV1 } from "@lanewatch/contracts";
import { RingBuffer } from "../util/ring_buffer";

export type TrendOptions = {
  window_size: number;
  min_samples: number;
  flat_tolerance: number;
};

/** Ordinary least squares over x = 0..n-1; predicted_next is the fitted value at x = n. */
export function fitTrend(values: ReadonlyArray<number>, options: TrendOptions): TrendEstimateV1 {
  const n = values.length;
  if (n < options.min_samples || n < 2) return { status: "insufficient-data", samples: n };

  const meanX = (n - 1) / 2;
  let meanY = 0;
  for (const v of values) meanY += v;
  meanY /= n;

  let sxy = 0;
  let sxx = 0;
  for (let i = 0; i < n; i++) {
    sxy += (i - meanX) * (values[i] - meanY);
    sxx += (i - meanX) * (i - meanX);
  }
  const slope = sxy / sxx;
  const intercept = meanY - slope * meanX;

  let direction: "rising" | "falling" | "flat" = "flat";
  if (slope > options.flat_tolerance) direction = "rising";
  else if (slope < -options.flat_tolerance) direction = "falling";

  return { status: "ok", samples: n, slope, intercept, predicted_next: intercept + slope * n, direction };
}

type LaneSeries = { count: RingBuffer<number>; flow: RingBuffer<number> };

export class TrendPredictor {
  private readonly series = new Map<string, LaneSeries>();

  constructor(
    private readonly laneIds: ReadonlyArray<string>,
    private readonly options: TrendOptions
  ) {
    for (const id of laneIds) {
      this.series.set(id, {
        count: new RingBuffer<number>(options.window_size),
        flow: new RingBuffer<number>(options.window_size),
      });
    }
  }

  observe(metrics: ReadonlyArray<LaneWindowMetricsV1>): void {
    for (const m of metrics) {
      const s = this.series.get(m.lane_id);
      if (!s) continue;
      s.count.push(m.vehicle_count);
      s.flow.push(m.flow_rate_vpm);
    }
  }

  predict(): LaneTrendV1[] {
    return this.laneIds.map((lane_id) => {
      const s = this.series.get(lane_id);
      return {
        lane_id,
        vehicle_count: fitTrend(s ? s.count.toArray() : [], this.options),
        flow_rate_vpm: fitTrend(s ? s.flow.toArray() : [], this.options),
      };
    });
  }
}
