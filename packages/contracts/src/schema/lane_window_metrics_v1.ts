import { z } from "zod";

export const LOS_GRADES = ["A", "B", "C", "D", "E", "F"] as const;

export const LosGradeV1Schema = z.enum(LOS_GRADES);

export const LaneWindowMetricsV1Schema = z
  .object({
    lane_id: z.string().min(1),
    window_start_ms: z.number().finite(),
    window_end_ms: z.number().finite(),
    vehicle_count: z.number().int().nonnegative(),
    class_counts: z.record(z.string(), z.number().int().nonnegative()),
    entries: z.number().int().nonnegative(), // distinct tracks entering since the previous tick
    flow_rate_vpm: z.number().finite().nonnegative(),
    queue_length: z.number().int().nonnegative(), // tracks in the "stopped" incident state
    stationary_count: z.number().int().nonnegative(),
    mean_speed_kmh: z.number().finite().nonnegative().nullable(),
    density: z.number().finite().nonnegative(),
    los: LosGradeV1Schema,
    emergency_present: z.boolean(),
  })
  .strict();

export type LosGrade = z.infer<typeof LosGradeV1Schema>;
export type LaneWindowMetricsV1 = z.infer<typeof LaneWindowMetricsV1Schema>;

export function isLosGrade(x: unknown): x is LosGrade {
  return LOS_GRADES.some((g) => g === x);
}
