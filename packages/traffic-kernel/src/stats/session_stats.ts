import type { LaneWindowMetricsV1, SessionStatsV1 } from "@lanewatch/contracts";

export type RejectReason = "MALFORMED" | "OUT_OF_ORDER";

/** Running totals for one engine session, reported with every dashboard snapshot. */
export class SessionStats {
  private startedAt: number | null = null;
  private lastFrame: number | null = null;
  private frames = 0;
  private ticks = 0;
  private accepted = 0;
  private malformed = 0;
  private outOfOrder = 0;
  private peakCount = 0;
  private peakAt: number | null = null;
  private incidents = 0;
  private violations = 0;
  private priority = 0;

  recordFrame(timestampMs: number): void {
    if (this.startedAt === null) this.startedAt = timestampMs;
    this.lastFrame = timestampMs;
    this.frames++;
  }

  recordAccepted(): void {
    this.accepted++;
  }

  recordRejected(reason: RejectReason): void {
    if (reason === "MALFORMED") this.malformed++;
    else this.outOfOrder++;
  }

  recordIncidentOpened(): void {
    this.incidents++;
  }

  recordViolation(): void {
    this.violations++;
  }

  recordPriorityRequests(n: number): void {
    this.priority += n;
  }

  // Peak is the total across lanes at one tick; the first tick reaching it wins.
  recordTick(tickMs: number, lanes: ReadonlyArray<LaneWindowMetricsV1>): void {
    this.ticks++;
    const total = lanes.reduce((sum, l) => sum + l.vehicle_count, 0);
    if (total > this.peakCount) {
      this.peakCount = total;
      this.peakAt = tickMs;
    }
  }

  snapshot(tracksCreated: number, activeTracks: number): SessionStatsV1 {
    return {
      started_at_ms: this.startedAt,
      last_frame_ms: this.lastFrame,
      frames_processed: this.frames,
      ticks: this.ticks,
      observations_accepted: this.accepted,
      observations_rejected: { malformed: this.malformed, out_of_order: this.outOfOrder },
      tracks_created: tracksCreated,
      active_tracks: activeTracks,
      peak_vehicle_count: this.peakCount,
      peak_at_ms: this.peakAt,
      incidents_opened: this.incidents,
      violations: this.violations,
      priority_requests: this.priority,
    };
  }
}
