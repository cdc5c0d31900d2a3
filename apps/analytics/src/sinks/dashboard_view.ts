import type {
  DashboardSnapshotV1,
  HeatmapSnapshotV1,
  IncidentV1,
  LaneTrendV1,
  SessionStatsV1,
  SignalPlanV1,
} from "@lanewatch/contracts";
import type { DashboardSink } from "@lanewatch/traffic-kernel";

/**
 * Read model behind the dashboard routes: the newest published snapshot.
 * Rolling history stays in the engine.
 */
export class DashboardView implements DashboardSink {
  private latest: DashboardSnapshotV1 | null = null;

  publish(snapshot: DashboardSnapshotV1): void {
    this.latest = snapshot;
  }

  snapshot(): DashboardSnapshotV1 | null {
    return this.latest;
  }

  stats(): SessionStatsV1 | null {
    return this.latest?.stats ?? null;
  }

  incidents(): IncidentV1[] {
    return this.latest?.active_incidents ?? [];
  }

  heatmap(): HeatmapSnapshotV1 | null {
    return this.latest?.heatmap ?? null;
  }

  signalPlan(): SignalPlanV1 | null {
    return this.latest?.signal_plan ?? null;
  }

  trends(): LaneTrendV1[] {
    return this.latest?.trends ?? [];
  }
}
