import { z } from "zod";
import { LaneV1Schema } from "./lane_v1";

/**
 * AnalyticsConfigV1Schema
 *
 * Runtime schema for config/analytics/*.json. Every threshold the engine
 * applies lives here; omitted sections fall back to the defaults below.
 */

const positiveMs = z.number().int().positive();

// Upper density (or count) bound for grades A..E; anything above the last is F.
export const LosConfigV1Schema = z
  .object({
    basis: z.enum(["density", "count"]).default("density"),
    upper_bounds: z
      .array(z.number().finite().nonnegative())
      .length(5)
      .default([0.125, 0.25, 0.42, 0.625, 0.92]),
  })
  .strict()
  .superRefine((v, ctx) => {
    for (let i = 1; i < v.upper_bounds.length; i++) {
      if (!(v.upper_bounds[i] > v.upper_bounds[i - 1])) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `upper_bounds must be strictly increasing (index ${i})`,
          path: ["upper_bounds", i],
        });
      }
    }
  });

const seconds = z.number().int().nonnegative();

// Adaptive green timing: green = clamp(min, max, count * per_vehicle + trunc(slope * trend_gain)).
// Next lane = highest count + slope * trend_weight + waited / wait_scale; waits >= max_wait go first.
export const SignalPlanConfigV1Schema = z
  .object({
    min_green_s: z.number().int().positive().default(15),
    max_green_s: z.number().int().positive().default(90),
    per_vehicle_s: seconds.default(3),
    trend_gain_s: z.number().finite().nonnegative().default(4),
    trend_weight: z.number().finite().nonnegative().default(2),
    wait_scale_s: z.number().finite().positive().default(5),
    max_wait_s: z.number().int().positive().default(120),
    adjust_cooldown_ms: positiveMs.default(25_000),
    emergency_trim_s: seconds.default(20),
    emergency_min_s: seconds.default(10),
    congestion_trim_s: seconds.default(10),
    congestion_min_s: seconds.default(15),
    congestion_hold_s: seconds.default(10),
    congestion_clear_max: seconds.default(2), // vehicles left on green for it to count as cleared
    congestion_waiting_min: seconds.default(10), // vehicles queued on some red lane
  })
  .strict()
  .superRefine((v, ctx) => {
    if (v.min_green_s > v.max_green_s) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "min_green_s must not exceed max_green_s",
        path: ["min_green_s"],
      });
    }
  });

export const AnalyticsConfigV1Schema = z
  .object({
    schema_version: z.string().regex(/^\d+\.\d+\.\d+$/),
    frame: z
      .object({
        width: z.number().int().positive(),
        height: z.number().int().positive(),
      })
      .strict(),
    lanes: z.array(LaneV1Schema).min(1),
    aggregation: z
      .object({
        tick_interval_ms: positiveMs.default(1000),
        flow_window_ms: positiveMs.default(60_000),
      })
      .strict()
      .default({}),
    tracks: z
      .object({
        eviction_timeout_ms: positiveMs.default(2000),
        history_max_samples: z.number().int().min(2).default(64),
        history_window_ms: positiveMs.default(3000),
        retain_last_lane: z.boolean().default(false),
      })
      .strict()
      .default({}),
    speed: z
      .object({
        smoothing: z.number().min(0).max(1).default(0.35),
        min_elapsed_ms: z.number().finite().nonnegative().default(1),
        violation_kmh: z.number().finite().positive().default(50),
        stationary_kmh: z.number().finite().nonnegative().default(3),
      })
      .strict()
      .default({}),
    incident: z
      .object({
        dwell_ms: positiveMs.default(5000),
        min_motion_px: z.number().finite().nonnegative().default(15),
        still_window_ms: positiveMs.default(1000), // displacement horizon for starting a stop
      })
      .strict()
      .default({}),
    los: LosConfigV1Schema.default({}),
    emergency: z
      .object({
        class_labels: z.array(z.string().min(1)).default(["ambulance", "fire_truck", "police"]),
        min_speed_kmh: z.number().finite().nonnegative().nullable().default(null),
      })
      .strict()
      .default({}),
    priority: z
      .object({
        extension_s: z.number().finite().positive().default(20),
        cooldown_ms: positiveMs.default(25_000),
      })
      .strict()
      .default({}),
    signal_plan: SignalPlanConfigV1Schema.default({}),
    trend: z
      .object({
        window_size: z.number().int().min(2).default(20),
        min_samples: z.number().int().min(2).default(3),
        flat_tolerance: z.number().finite().nonnegative().default(0.15),
      })
      .strict()
      .default({}),
    history: z
      .object({
        duration_ms: positiveMs.default(120_000),
      })
      .strict()
      .default({}),
    heatmap: z
      .object({
        cell_size_px: z.number().int().positive().default(16),
        weight: z.number().finite().positive().default(1),
        decay: z.number().gt(0).lt(1).default(0.98),
      })
      .strict()
      .default({}),
    sinks: z
      .object({
        queue_capacity: z.number().int().positive().default(1000),
      })
      .strict()
      .default({}),
  })
  .strict()
  .superRefine((v, ctx) => {
    if (v.history.duration_ms < v.aggregation.tick_interval_ms) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "history.duration_ms must cover at least one tick interval",
        path: ["history", "duration_ms"],
      });
    }
    if (v.incident.still_window_ms > v.tracks.history_window_ms) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "incident.still_window_ms must not exceed tracks.history_window_ms",
        path: ["incident", "still_window_ms"],
      });
    }
    if (v.trend.min_samples > v.trend.window_size) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "trend.min_samples must not exceed trend.window_size",
        path: ["trend", "min_samples"],
      });
    }
  });

export type LosConfigV1 = z.infer<typeof LosConfigV1Schema>;
export type SignalPlanConfigV1 = z.infer<typeof SignalPlanConfigV1Schema>;
export type AnalyticsConfigV1 = z.infer<typeof AnalyticsConfigV1Schema>;
export type AnalyticsConfigV1Input = z.input<typeof AnalyticsConfigV1Schema>;
