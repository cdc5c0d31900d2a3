// Traffic engine - single-writer frame ingestion and tick pipeline.
//
// processFrame(batch):
// 1) Admits every observation of the batch (schema, then per-track ordering).
// 2) Ticks once when the batch reaches the next tick boundary:
//    evict -> aggregate -> trend -> signal plan -> history -> heatmap decay -> priority -> emit.
//
// Sink delivery is queued through SinkDispatcher; nothing here awaits a sink.

import {
  ObservationV1Schema,
  type AnalyticsConfigV1,
  type DashboardSnapshotV1,
  type FrameBatchV1,
  type HeatmapSnapshotV1,
  type HistoryBucketV1,
  type IncidentV1,
  type LaneTrendV1,
  type LaneWindowMetricsV1,
  type PriorityRequestV1,
  type SessionStatsV1,
  type SignalPlanV1,
} from "@lanewatch/contracts";
import { LaneAggregator, type AggregationWindow } from "./aggregate/lane_aggregator";
import { HeatmapAccumulator } from "./history/heatmap_accumulator";
import { HistoryBuffer } from "./history/history_buffer";
import { referencePoint } from "./lanes/geometry";
import { laneForPoint } from "./lanes/lane_assigner";
import { validateLanes } from "./lanes/lane_validation";
import { PriorityController } from "./priority/priority_controller";
import { SignalPlanner } from "./priority/signal_plan";
import { SinkDispatcher, type SinkQueueStats } from "./sinks/sink_dispatcher";
import type { EngineSinks } from "./sinks/sinks";
import { SessionStats, type RejectReason } from "./stats/session_stats";
import {
  TrackStateManager,
  trackOptionsFromConfig,
  type EvictedTrack,
  type TrackEvent,
} from "./tracks/track_state_manager";
import { TrendPredictor } from "./trend/trend_predictor";
import { createKernelLogger, type KernelLogger } from "./util/logger";

export type RejectedObservation = {
  index: number;
  track_id: number | null;
  reason: RejectReason;
  detail: string;
};

export type TickResult = {
  tick_ms: number;
  window: AggregationWindow;
  lanes: LaneWindowMetricsV1[];
  trends: LaneTrendV1[];
  signal_plan: SignalPlanV1;
  evicted: EvictedTrack[];
  priority_requests: PriorityRequestV1[];
};

export type FrameReport = {
  frame_index: number;
  timestamp_ms: number;
  accepted: number;
  rejected: RejectedObservation[];
  events: TrackEvent[];
  tick: TickResult | null;
};

export type TrafficEngineDeps = {
  sinks?: EngineSinks;
  logger?: KernelLogger;
};

export class TrafficEngine {
  readonly config: AnalyticsConfigV1;

  private readonly log: KernelLogger;
  private readonly tracks: TrackStateManager;
  private readonly aggregator: LaneAggregator;
  private readonly trend: TrendPredictor;
  private readonly historyBuffer: HistoryBuffer;
  private readonly heat: HeatmapAccumulator;
  private readonly priority: PriorityController;
  private readonly signals: SignalPlanner;
  private readonly dispatcher: SinkDispatcher;
  private readonly session = new SessionStats();

  private lastTickMs: number | null = null;
  private nextTickMs: number | null = null;
  private latest: DashboardSnapshotV1 | null = null;

  constructor(config: AnalyticsConfigV1, deps: TrafficEngineDeps = {}) {
    validateLanes(config.lanes);
    this.config = config;
    this.log = deps.logger ?? createKernelLogger();

    this.tracks = new TrackStateManager(config.lanes, trackOptionsFromConfig(config));
    this.aggregator = new LaneAggregator(config.lanes, {
      flow_window_ms: config.aggregation.flow_window_ms,
      stationary_kmh: config.speed.stationary_kmh,
      los: config.los,
    });
    this.trend = new TrendPredictor(
      config.lanes.map((l) => l.lane_id),
      config.trend
    );
    this.historyBuffer = new HistoryBuffer(config.history.duration_ms, config.aggregation.tick_interval_ms);
    this.heat = new HeatmapAccumulator({
      frame_width: config.frame.width,
      frame_height: config.frame.height,
      ...config.heatmap,
    });
    this.priority = new PriorityController(config.lanes, config.priority);
    this.signals = new SignalPlanner(
      config.lanes.map((l) => l.lane_id),
      config.signal_plan
    );
    this.dispatcher = new SinkDispatcher(deps.sinks ?? {}, config.sinks.queue_capacity, this.log);
  }

  processFrame(batch: FrameBatchV1): FrameReport {
    this.session.recordFrame(batch.timestamp_ms);

    const rejected: RejectedObservation[] = [];
    const events: TrackEvent[] = [];
    let accepted = 0;

    batch.observations.forEach((raw, index) => {
      const parsed = ObservationV1Schema.safeParse(raw);
      if (!parsed.success) {
        const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
        this.reject(rejected, { index, track_id: null, reason: "MALFORMED", detail }, batch.frame_index);
        return;
      }

      const obs = parsed.data;
      const ref = referencePoint(obs.bbox);
      const lane = laneForPoint(ref, this.config.lanes);
      const result = this.tracks.update(obs, lane?.lane_id ?? null);
      if (!result.ok) {
        const detail = `timestamp ${obs.timestamp_ms} precedes last seen ${result.last_seen_ms}`;
        this.reject(rejected, { index, track_id: obs.track_id, reason: "OUT_OF_ORDER", detail }, batch.frame_index);
        return;
      }

      accepted++;
      this.session.recordAccepted();
      this.heat.add(ref);
      for (const ev of result.events) this.emitTrackEvent(ev);
      events.push(...result.events);
    });

    let tick: TickResult | null = null;
    if (this.nextTickMs === null || batch.timestamp_ms >= this.nextTickMs) {
      tick = this.tick(batch.timestamp_ms);
    }

    return { frame_index: batch.frame_index, timestamp_ms: batch.timestamp_ms, accepted, rejected, events, tick };
  }

  tick(now: number): TickResult {
    const interval = this.config.aggregation.tick_interval_ms;
    const window: AggregationWindow = { start_ms: this.lastTickMs ?? now - interval, end_ms: now };

    const evicted = this.tracks.evictStale(now);
    for (const e of evicted) {
      if (!e.closed_incident) continue;
      this.log.info({ incident_id: e.closed_incident.incident_id, track_id: e.track_id }, "incident closed: track lost");
      this.dispatcher.writeLog({ type: "incident_closed_v1", ts_ms: now, incident: e.closed_incident });
    }

    const snapshot = this.tracks.snapshot();
    const lanes = this.aggregator.aggregate(snapshot, this.tracks.drainEntries(), window);

    this.trend.observe(lanes);
    const trends = this.trend.predict();

    const plan = this.signals.step({ now, lanes, trends });
    if (plan.adjustment) {
      this.log.info(
        { kind: plan.adjustment.kind, lane_id: plan.adjustment.lane_id, trimmed_s: plan.adjustment.trimmed_s },
        "signal green trimmed"
      );
    }
    if (plan.switched) {
      this.log.info({ lane_id: plan.phase_lane_id, green_s: plan.green_s }, "signal phase changed");
    }

    this.historyBuffer.append({ ts_ms: now, lanes });
    this.heat.decay();

    const requests = this.priority.evaluate(snapshot, now);

    this.session.recordTick(now, lanes);
    this.session.recordPriorityRequests(requests.length);

    for (const metrics of lanes) {
      this.dispatcher.writeLog({ type: "lane_metrics_v1", ts_ms: now, metrics });
    }
    for (const t of snapshot) {
      if (t.speed_kmh === null) continue;
      this.dispatcher.writeLog({
        type: "speed_sample_v1",
        ts_ms: now,
        track_id: t.track_id,
        lane_id: t.lane_id,
        class_label: t.class_label,
        speed_kmh: t.speed_kmh,
      });
    }
    for (const request of requests) {
      this.log.info(
        { lane_id: request.lane_id, reason_track_id: request.reason_track_id, extension_s: request.requested_extension_s },
        "priority requested"
      );
      this.dispatcher.requestPriority(request);
      this.dispatcher.writeLog({ type: "priority_request_v1", ts_ms: now, request });
    }

    this.latest = {
      tick_ms: now,
      window,
      lanes,
      trends,
      active_incidents: snapshot.flatMap((t) => (t.open_incident ? [t.open_incident] : [])),
      emergency_lanes: lanes.filter((l) => l.emergency_present).map((l) => l.lane_id),
      signal_plan: plan,
      heatmap: this.heat.snapshot(),
      stats: this.stats(),
    };
    this.dispatcher.publishSnapshot(this.latest);

    this.lastTickMs = now;
    this.nextTickMs = (Math.floor(now / interval) + 1) * interval;

    return { tick_ms: now, window, lanes, trends, signal_plan: plan, evicted, priority_requests: requests };
  }

  /** Waits until every queued sink message has been delivered (or failed). */
  async flush(): Promise<void> {
    await this.dispatcher.flush();
  }

  latestSnapshot(): DashboardSnapshotV1 | null {
    return this.latest;
  }

  history(sinceMs?: number): HistoryBucketV1[] {
    return this.historyBuffer.list(sinceMs);
  }

  activeIncidents(): IncidentV1[] {
    return this.tracks.snapshot().flatMap((t) => (t.open_incident ? [t.open_incident] : []));
  }

  heatmap(): HeatmapSnapshotV1 {
    return this.heat.snapshot();
  }

  trends(): LaneTrendV1[] {
    return this.trend.predict();
  }

  stats(): SessionStatsV1 {
    return this.session.snapshot(this.tracks.tracksCreated, this.tracks.size);
  }

  sinkStats(): SinkQueueStats[] {
    return this.dispatcher.stats();
  }

  private reject(into: RejectedObservation[], r: RejectedObservation, frameIndex: number): void {
    into.push(r);
    this.session.recordRejected(r.reason);
    this.log.debug({ frame_index: frameIndex, index: r.index, track_id: r.track_id, reason: r.reason }, r.detail);
  }

  private emitTrackEvent(ev: TrackEvent): void {
    switch (ev.type) {
      case "incident_opened":
        this.session.recordIncidentOpened();
        this.log.info(
          { incident_id: ev.incident.incident_id, track_id: ev.incident.track_id, lane_id: ev.incident.lane_id },
          "incident opened"
        );
        this.dispatcher.writeLog({ type: "incident_opened_v1", ts_ms: ev.ts_ms, incident: ev.incident });
        break;
      case "incident_cleared":
        this.log.info({ incident_id: ev.incident.incident_id, track_id: ev.incident.track_id }, "incident resolved");
        this.dispatcher.writeLog({ type: "incident_closed_v1", ts_ms: ev.ts_ms, incident: ev.incident });
        break;
      case "speed_violation":
        this.session.recordViolation();
        this.dispatcher.writeLog({
          type: "speed_violation_v1",
          ts_ms: ev.ts_ms,
          track_id: ev.track_id,
          lane_id: ev.lane_id,
          class_label: ev.class_label,
          speed_kmh: ev.speed_kmh,
          limit_kmh: ev.limit_kmh,
        });
        break;
    }
  }
}
