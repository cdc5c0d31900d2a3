import { z } from "zod";
import { LaneWindowMetricsV1Schema } from "./lane_window_metrics_v1";

export const HistoryBucketV1Schema = z
  .object({
    ts_ms: z.number().finite(),
    lanes: z.array(LaneWindowMetricsV1Schema),
  })
  .strict();

export const HeatmapSnapshotV1Schema = z
  .object({
    cols: z.number().int().positive(),
    rows: z.number().int().positive(),
    cell_size_px: z.number().int().positive(),
    max_value: z.number().finite().nonnegative(),
    cells: z.array(z.number().finite().nonnegative()), // row-major, rows * cols
  })
  .strict()
  .refine((v) => v.cells.length === v.rows * v.cols, { message: "cells.length must equal rows * cols" });

export type HistoryBucketV1 = z.infer<typeof HistoryBucketV1Schema>;
export type HeatmapSnapshotV1 = z.infer<typeof HeatmapSnapshotV1Schema>;
