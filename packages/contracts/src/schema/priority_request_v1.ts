import { z } from "zod";

export const PriorityRequestV1Schema = z
  .object({
    request_id: z.string().min(1),
    lane_id: z.string().min(1),
    requested_extension_s: z.number().finite().positive(),
    reason_track_id: z.number().int().nonnegative(),
    issued_at_ms: z.number().finite(),
  })
  .strict();

export type PriorityRequestV1 = z.infer<typeof PriorityRequestV1Schema>;
