import type { AnalyticsConfigV1, FrameBatchV1 } from "@lanewatch/contracts";
import { TrafficEngine, type FrameReport, type KernelLogger, type SignalSink } from "@lanewatch/traffic-kernel";

import type { LoadedConfig } from "./config";
import { DashboardView } from "./sinks/dashboard_view";
import type { EventStore, ListEventsQuery, StoredEvent } from "./store/event_store";

export type AnalyticsRuntimeDeps = {
  loaded: LoadedConfig;
  store: EventStore;
  logger: KernelLogger;
  signal?: SignalSink;
};

// Wires one engine to the app-side sinks. The engine stays the single writer;
// routes read from the view, the store and the engine's history.
export class AnalyticsRuntime {
  readonly engine: TrafficEngine;
  readonly view: DashboardView;
  readonly store: EventStore;
  readonly config: AnalyticsConfigV1;
  readonly configHash: string;
  readonly configSource: string;

  constructor(deps: AnalyticsRuntimeDeps) {
    const { config } = deps.loaded;
    this.config = config;
    this.configHash = deps.loaded.config_hash;
    this.configSource = deps.loaded.source;
    this.store = deps.store;
    this.view = new DashboardView();

    const store = deps.store;
    this.engine = new TrafficEngine(config, {
      logger: deps.logger,
      sinks: {
        dashboard: this.view,
        log: { write: (record) => store.insert(record) },
        signal: deps.signal,
      },
    });
  }

  ingest(batch: FrameBatchV1): FrameReport {
    return this.engine.processFrame(batch);
  }

  listEvents(q: ListEventsQuery): Promise<StoredEvent[]> {
    return this.store.listRecent(q);
  }

  async flush(): Promise<void> {
    await this.engine.flush();
  }

  async close(): Promise<void> {
    await this.engine.flush();
    await this.store.close();
  }
}
