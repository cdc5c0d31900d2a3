// Startup admission for lane geometry.
//
// Contract:
// - Collects every problem before failing, so one run reports the whole config.
// - Throws LaneConfigError; callers must not start processing after it.
// - Pure: no IO.

import type { LaneV1 } from "@lanewatch/contracts";
import { distance, segmentsIntersect, signedArea } from "./geometry";

export type LaneConfigIssue = {
  code:
    | "DUPLICATE_LANE_ID"
    | "TOO_FEW_VERTICES"
    | "DEGENERATE_POLYGON"
    | "SELF_INTERSECTING_POLYGON"
    | "INVALID_CAPACITY"
    | "INVALID_CALIBRATION"
    | "NO_LANES";
  lane_id: string | null;
  message: string;
};

export class LaneConfigError extends Error {
  public readonly issues: LaneConfigIssue[];

  constructor(issues: LaneConfigIssue[]) {
    super(issues.map((i) => `${i.code}:${i.lane_id ?? "-"}`).join(","));
    this.name = "LaneConfigError";
    this.issues = issues;
  }
}

const MIN_AREA_PX2 = 1;

function adjacent(i: number, j: number, n: number): boolean {
  return i === j || (i + 1) % n === j || (j + 1) % n === i;
}

export function laneIssues(lane: LaneV1): LaneConfigIssue[] {
  const issues: LaneConfigIssue[] = [];
  const id = lane.lane_id;
  const poly = lane.polygon;

  if (poly.length < 3) {
    issues.push({ code: "TOO_FEW_VERTICES", lane_id: id, message: `polygon has ${poly.length} vertices (need >= 3)` });
    return issues;
  }

  const zeroEdge = poly.some((p, i) => distance(p, poly[(i + 1) % poly.length]) === 0);
  if (zeroEdge || Math.abs(signedArea(poly)) < MIN_AREA_PX2) {
    issues.push({ code: "DEGENERATE_POLYGON", lane_id: id, message: "polygon has zero area or repeated vertices" });
  } else {
    const n = poly.length;
    outer: for (let i = 0; i < n; i++) {
      for (let j = i + 1; j < n; j++) {
        if (adjacent(i, j, n)) continue;
        if (segmentsIntersect(poly[i], poly[(i + 1) % n], poly[j], poly[(j + 1) % n])) {
          issues.push({
            code: "SELF_INTERSECTING_POLYGON",
            lane_id: id,
            message: `edges ${i} and ${j} intersect`,
          });
          break outer;
        }
      }
    }
  }

  if (!(lane.capacity > 0)) {
    issues.push({ code: "INVALID_CAPACITY", lane_id: id, message: "capacity must be > 0" });
  }

  const cal = lane.calibration;
  if (cal?.kind === "scale" && !(cal.pixels_per_meter > 0)) {
    issues.push({ code: "INVALID_CALIBRATION", lane_id: id, message: "pixels_per_meter must be > 0" });
  }
  if (cal?.kind === "homography" && (cal.matrix.length !== 9 || !cal.matrix.every(Number.isFinite))) {
    issues.push({ code: "INVALID_CALIBRATION", lane_id: id, message: "homography needs 9 finite entries" });
  }

  return issues;
}

export function validateLanes(lanes: ReadonlyArray<LaneV1>): void {
  const issues: LaneConfigIssue[] = [];
  if (lanes.length === 0) {
    issues.push({ code: "NO_LANES", lane_id: null, message: "at least one lane is required" });
  }

  const seen = new Set<string>();
  for (const lane of lanes) {
    if (seen.has(lane.lane_id)) {
      issues.push({ code: "DUPLICATE_LANE_ID", lane_id: lane.lane_id, message: "lane_id declared more than once" });
    }
    seen.add(lane.lane_id);
    issues.push(...laneIssues(lane));
  }

  if (issues.length) throw new LaneConfigError(issues);
}
