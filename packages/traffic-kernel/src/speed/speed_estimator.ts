import type { LaneCalibrationV1, PointV1 } from "@lanewatch/contracts";

export type PositionSample = { x: number; y: number; timestamp_ms: number };

export type SpeedEstimateStatus = "updated" | "skipped" | "insufficient-samples" | "uncalibrated";

// speed_kmh === null means "unknown"; 0 is a real, stopped vehicle.
export type SpeedEstimate = {
  speed_kmh: number | null;
  instantaneous_kmh: number | null;
  status: SpeedEstimateStatus;
};

export type SpeedEstimatorOptions = {
  smoothing: number; // weight of the newest sample, 0..1
  min_elapsed_ms: number;
};

const MS_PER_S = 1000;
const MPS_TO_KMH = 3.6;

/** Projects an image point onto the ground plane (meters); null when the point maps to infinity. */
export function projectHomography(matrix: ReadonlyArray<number>, p: PointV1): PointV1 | null {
  const [a, b, c, d, e, f, g, h, i] = matrix;
  const w = g * p.x + h * p.y + i;
  if (!Number.isFinite(w) || Math.abs(w) < 1e-12) return null;
  return { x: (a * p.x + b * p.y + c) / w, y: (d * p.x + e * p.y + f) / w };
}

export function groundDistanceMeters(calibration: LaneCalibrationV1, from: PointV1, to: PointV1): number | null {
  if (calibration.kind === "scale") {
    return Math.hypot(to.x - from.x, to.y - from.y) / calibration.pixels_per_meter;
  }
  const a = projectHomography(calibration.matrix, from);
  const b = projectHomography(calibration.matrix, to);
  if (!a || !b) return null;
  return Math.hypot(b.x - a.x, b.y - a.y);
}

/**
 * Speed from the most recent displacement, exponentially smoothed against
 * the previous estimate.
 *
 * @param history - oldest -> newest reference-point samples of one track
 * @param previous - last smoothed estimate, null when unknown
 */
export function estimateSpeed(
  history: ReadonlyArray<PositionSample>,
  calibration: LaneCalibrationV1 | null,
  previous: number | null,
  options: SpeedEstimatorOptions
): SpeedEstimate {
  if (!calibration) {
    return { speed_kmh: null, instantaneous_kmh: null, status: "uncalibrated" };
  }
  if (history.length < 2) {
    return { speed_kmh: null, instantaneous_kmh: null, status: "insufficient-samples" };
  }

  const last = history[history.length - 1];
  const prev = history[history.length - 2];
  const elapsedMs = last.timestamp_ms - prev.timestamp_ms;
  if (elapsedMs <= options.min_elapsed_ms) {
    return { speed_kmh: previous, instantaneous_kmh: null, status: "skipped" };
  }

  const meters = groundDistanceMeters(calibration, prev, last);
  if (meters === null) {
    return { speed_kmh: null, instantaneous_kmh: null, status: "uncalibrated" };
  }

  const instant = (meters / (elapsedMs / MS_PER_S)) * MPS_TO_KMH;
  const alpha = Math.min(1, Math.max(0, options.smoothing));
  const smoothed = previous === null ? instant : alpha * instant + (1 - alpha) * previous;

  return { speed_kmh: Math.max(0, smoothed), instantaneous_kmh: Math.max(0, instant), status: "updated" };
}

/** 10 km/h buckets: a speeding track is re-reported only when its bucket changes. */
export function violationBucket(speedKmh: number): number {
  return Math.floor(speedKmh / 10);
}
