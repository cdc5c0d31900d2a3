import { z } from "zod";

export const PointV1Schema = z
  .object({
    x: z.number().finite(),
    y: z.number().finite(),
  })
  .strict();

// scale: ground distance = pixel distance / pixels_per_meter.
// homography: row-major 3x3 mapping image pixels onto the ground plane in meters.
export const LaneCalibrationV1Schema = z.discriminatedUnion("kind", [
  z
    .object({
      kind: z.literal("scale"),
      pixels_per_meter: z.number().finite().positive(),
    })
    .strict(),
  z
    .object({
      kind: z.literal("homography"),
      matrix: z.array(z.number().finite()).length(9),
    })
    .strict(),
]);

export const LaneV1Schema = z
  .object({
    lane_id: z.string().min(1),
    label: z.string().min(1).optional(),
    polygon: z.array(PointV1Schema).min(3),
    capacity: z.number().finite().positive(), // vehicles the lane region holds at jam density
    calibration: LaneCalibrationV1Schema.nullable().default(null),
  })
  .strict();

export type PointV1 = z.infer<typeof PointV1Schema>;
export type LaneCalibrationV1 = z.infer<typeof LaneCalibrationV1Schema>;
export type LaneV1 = z.infer<typeof LaneV1Schema>;
