import { z } from "zod";

export const TrendDirectionV1Schema = z.enum(["rising", "falling", "flat"]);

export const TrendEstimateV1Schema = z.discriminatedUnion("status", [
  z
    .object({
      status: z.literal("insufficient-data"),
      samples: z.number().int().nonnegative(),
    })
    .strict(),
  z
    .object({
      status: z.literal("ok"),
      samples: z.number().int().positive(),
      slope: z.number().finite(),
      intercept: z.number().finite(),
      predicted_next: z.number().finite(),
      direction: TrendDirectionV1Schema,
    })
    .strict(),
]);

export const LaneTrendV1Schema = z
  .object({
    lane_id: z.string().min(1),
    vehicle_count: TrendEstimateV1Schema,
    flow_rate_vpm: TrendEstimateV1Schema,
  })
  .strict();

export type TrendDirectionV1 = z.infer<typeof TrendDirectionV1Schema>;
export type TrendEstimateV1 = z.infer<typeof TrendEstimateV1Schema>;
export type LaneTrendV1 = z.infer<typeof LaneTrendV1Schema>;
