import { LOS_GRADES, type LosConfigV1, type LosGrade } from "@lanewatch/contracts";

/**
 * Level of service for `value` against five strictly increasing upper bounds:
 * A = [0, b0], B = (b0, b1], ... E = (b3, b4], F = (b4, inf).
 */
export function losGrade(value: number, upperBounds: ReadonlyArray<number>): LosGrade {
  for (let i = 0; i < upperBounds.length && i < LOS_GRADES.length - 1; i++) {
    if (value <= upperBounds[i]) return LOS_GRADES[i];
  }
  return "F";
}

export function laneLos(vehicleCount: number, capacity: number, los: LosConfigV1): { density: number; los: LosGrade } {
  const density = vehicleCount / capacity;
  const basis = los.basis === "count" ? vehicleCount : density;
  return { density, los: losGrade(basis, los.upper_bounds) };
}
