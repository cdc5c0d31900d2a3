import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { FrameBatchV1Schema, isLogRecordType, type LogRecordType } from "@lanewatch/contracts";

import type { AnalyticsRuntime } from "./runtime";

export const EVENTS_LIMIT_MAX = 500;

const HistoryQuerySchema = z
  .object({
    since_ms: z.coerce.number().finite().optional(),
  })
  .strict();

const EventsQuerySchema = z
  .object({
    type: z.custom<LogRecordType>((v) => isLogRecordType(v), { message: "unknown event type" }).optional(),
    limit: z.coerce.number().int().default(100),
  })
  .strict();

function issuesOf(err: z.ZodError): Array<{ path: string; message: string }> {
  return err.issues.map((i) => ({ path: i.path.length ? i.path.join(".") : "(root)", message: i.message }));
}

export function registerAnalyticsRoutes(app: FastifyInstance, runtime: AnalyticsRuntime): void {
  app.get("/api/healthz", async (_req, reply) => {
    await runtime.store.ping();
    return reply.send({ ok: true, store: runtime.store.kind });
  });

  app.post("/api/frames", async (req, reply) => {
    const parsed = FrameBatchV1Schema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return reply.code(400).send({ ok: false, errors: issuesOf(parsed.error) });
    }

    const report = runtime.ingest(parsed.data);
    return reply.send({
      ok: true,
      frame_index: report.frame_index,
      accepted: report.accepted,
      rejected: report.rejected,
      events: report.events.length,
      tick_ms: report.tick?.tick_ms ?? null,
    });
  });

  app.get("/api/stats", async (_req, reply) => {
    return reply.send({ ok: true, stats: runtime.view.stats(), sinks: runtime.engine.sinkStats() });
  });

  app.get("/api/history", async (req, reply) => {
    const q = HistoryQuerySchema.safeParse(req.query ?? {});
    if (!q.success) return reply.code(400).send({ ok: false, errors: issuesOf(q.error) });
    return reply.send({ ok: true, buckets: runtime.engine.history(q.data.since_ms) });
  });

  app.get("/api/signal-plan", async (_req, reply) => {
    return reply.send({ ok: true, plan: runtime.view.signalPlan() });
  });

  app.get("/api/incidents", async (_req, reply) => {
    return reply.send({ ok: true, incidents: runtime.view.incidents() });
  });

  app.get("/api/heatmap", async (_req, reply) => {
    return reply.send({ ok: true, heatmap: runtime.view.heatmap() });
  });

  app.get("/api/trends", async (_req, reply) => {
    return reply.send({ ok: true, trends: runtime.view.trends() });
  });

  app.get("/api/events", async (req, reply) => {
    const q = EventsQuerySchema.safeParse(req.query ?? {});
    if (!q.success) return reply.code(400).send({ ok: false, errors: issuesOf(q.error) });

    const limit = Math.max(1, Math.min(q.data.limit, EVENTS_LIMIT_MAX));
    const events = await runtime.listEvents({ type: q.data.type, limit });
    return reply.send({ ok: true, events });
  });

  app.get("/api/config", async (_req, reply) => {
    return reply.send({
      ok: true,
      config_hash: runtime.configHash,
      source: runtime.configSource,
      config: runtime.config,
    });
  });

  app.get("/api/lanes", async (_req, reply) => {
    return reply.send({
      ok: true,
      lanes: runtime.config.lanes.map((l) => ({
        lane_id: l.lane_id,
        label: l.label ?? null,
        capacity: l.capacity,
        calibrated: l.calibration !== null,
        polygon: l.polygon,
      })),
    });
  });
}
