import type { LaneV1, ObservationV1, PointV1 } from "@lanewatch/contracts";
import { pointInPolygon, referencePoint } from "./geometry";

/**
 * Returns the first lane (declaration order) whose polygon contains `point`,
 * or null when the point lies outside every lane.
 */
export function laneForPoint(point: PointV1, lanes: ReadonlyArray<LaneV1>): LaneV1 | null {
  for (const lane of lanes) {
    if (pointInPolygon(point, lane.polygon)) return lane;
  }
  return null;
}

export function assignLane(observation: ObservationV1, lanes: ReadonlyArray<LaneV1>): string | null {
  return laneForPoint(referencePoint(observation.bbox), lanes)?.lane_id ?? null;
}
