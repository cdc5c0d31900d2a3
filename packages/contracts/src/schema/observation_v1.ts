import { z } from "zod";

/**
 * BBoxV1Schema
 *
 * Pixel-space box, origin top-left. Zero or negative extents are malformed:
 * the tracker never emits them for a real detection.
 */
export const BBoxV1Schema = z
  .object({
    x: z.number().finite(),
    y: z.number().finite(),
    w: z.number().finite().positive(),
    h: z.number().finite().positive(),
  })
  .strict();

export const ObservationV1Schema = z
  .object({
    track_id: z.number().int().nonnegative(),
    class_label: z.string().min(1),
    bbox: BBoxV1Schema,
    timestamp_ms: z.number().finite().nonnegative(),
    frame_index: z.number().int().nonnegative(),
  })
  .strict();

/**
 * FrameBatchV1Schema
 *
 * One batch per processed video frame. Observations stay `unknown` at the
 * envelope level; each one is admitted separately so a single bad item never
 * rejects the frame.
 */
export const FrameBatchV1Schema = z
  .object({
    frame_index: z.number().int().nonnegative(),
    timestamp_ms: z.number().finite().nonnegative(),
    observations: z.array(z.unknown()),
  })
  .strict();

export type BBoxV1 = z.infer<typeof BBoxV1Schema>;
export type ObservationV1 = z.infer<typeof ObservationV1Schema>;
export type FrameBatchV1 = z.infer<typeof FrameBatchV1Schema>;

export function parseFrameBatchV1(input: unknown): FrameBatchV1 {
  return FrameBatchV1Schema.parse(input);
}
