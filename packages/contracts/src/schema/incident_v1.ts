import { z } from "zod";

// "track-lost" marks incidents force-closed by eviction, kept apart from
// incidents the vehicle resolved by moving again.
export const IncidentStatusV1Schema = z.enum(["open", "resolved", "track-lost"]);

export const IncidentV1Schema = z
  .object({
    incident_id: z.string().min(1),
    track_id: z.number().int().nonnegative(),
    lane_id: z.string().min(1).nullable(),
    stationary_since_ms: z.number().finite(),
    start_ms: z.number().finite(),
    end_ms: z.number().finite().nullable(),
    peak_stationary_ms: z.number().finite().nonnegative(),
    status: IncidentStatusV1Schema,
  })
  .strict()
  .refine((v) => (v.status === "open") === (v.end_ms === null), {
    message: "end_ms must be null exactly while the incident is open",
  });

export type IncidentStatusV1 = z.infer<typeof IncidentStatusV1Schema>;
export type IncidentV1 = z.infer<typeof IncidentV1Schema>;
