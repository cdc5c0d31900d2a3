import { z } from "zod";

/**
 * SignalPlanV1Schema
 *
 * Advisory green-phase plan recomputed every tick from lane counts and count
 * trends. Nothing here drives hardware; a signal controller may follow it.
 */
export const SignalAdjustmentV1Schema = z
  .object({
    kind: z.enum(["emergency", "congestion"]),
    lane_id: z.string().min(1).nullable(), // lane holding the emergency vehicle
    trimmed_s: z.number().int().positive(),
    at_ms: z.number().finite(),
  })
  .strict();

export const SignalLanePlanV1Schema = z
  .object({
    lane_id: z.string().min(1),
    vehicle_count: z.number().int().nonnegative(),
    trend_slope: z.number().finite(),
    green_s: z.number().int().positive(), // green this lane would get if its phase started now
    waited_s: z.number().finite().nonnegative(),
    forced: z.boolean(), // starvation guard reached
    score: z.number().finite(),
    estimated_red_s: z.number().int().nonnegative().nullable(), // null for the lane on green
  })
  .strict();

export const SignalPlanV1Schema = z
  .object({
    phase_lane_id: z.string().min(1),
    phase_started_ms: z.number().finite(),
    green_s: z.number().finite().positive(),
    remaining_s: z.number().int().nonnegative(),
    switched: z.boolean(), // phase changed on this tick
    adjustment: SignalAdjustmentV1Schema.nullable(),
    next_lane_id: z.string().min(1),
    lanes: z.array(SignalLanePlanV1Schema),
  })
  .strict();

export type SignalAdjustmentV1 = z.infer<typeof SignalAdjustmentV1Schema>;
export type SignalLanePlanV1 = z.infer<typeof SignalLanePlanV1Schema>;
export type SignalPlanV1 = z.infer<typeof SignalPlanV1Schema>;
