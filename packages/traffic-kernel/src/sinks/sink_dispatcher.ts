import type { DashboardSnapshotV1, LogRecordV1, PriorityRequestV1 } from "@lanewatch/contracts";
import type { KernelLogger } from "../util/logger";
import type { EngineSinks } from "./sinks";

export type SinkName = "dashboard" | "log" | "signal";

export type SinkQueueStats = {
  sink: SinkName;
  queued: number;
  delivered: number;
  failed: number;
  dropped: number;
};

/**
 * Bounded FIFO in front of one sink. Delivery starts on a microtask, one
 * message at a time, so the producer never waits on the sink. When full,
 * the oldest queued message is dropped.
 */
class SinkQueue<M> {
  private queue: M[] = [];
  private draining: Promise<void> | null = null;
  private delivered = 0;
  private failed = 0;
  private dropped = 0;

  constructor(
    readonly sink: SinkName,
    private readonly deliver: (message: M) => void | Promise<void>,
    private readonly capacity: number,
    private readonly log: KernelLogger
  ) {}

  enqueue(message: M): void {
    if (this.queue.length >= this.capacity) {
      this.queue.shift();
      this.dropped++;
      this.log.warn({ sink: this.sink, capacity: this.capacity, dropped: this.dropped }, "sink queue full; dropped oldest message");
    }
    this.queue.push(message);
    this.schedule();
  }

  async flush(): Promise<void> {
    while (this.draining) await this.draining;
  }

  stats(): SinkQueueStats {
    return {
      sink: this.sink,
      queued: this.queue.length,
      delivered: this.delivered,
      failed: this.failed,
      dropped: this.dropped,
    };
  }

  private schedule(): void {
    if (this.draining) return;
    this.draining = Promise.resolve()
      .then(() => this.drain())
      .finally(() => {
        this.draining = null;
        if (this.queue.length) this.schedule();
      });
  }

  private async drain(): Promise<void> {
    let next = this.queue.shift();
    while (next !== undefined) {
      try {
        await this.deliver(next);
        this.delivered++;
      } catch (err) {
        this.failed++;
        this.log.warn({ sink: this.sink, err }, "sink delivery failed");
      }
      next = this.queue.shift();
    }
  }
}

export class SinkDispatcher {
  private readonly dashboard: SinkQueue<DashboardSnapshotV1> | null;
  private readonly log: SinkQueue<LogRecordV1> | null;
  private readonly signal: SinkQueue<PriorityRequestV1> | null;

  constructor(sinks: EngineSinks, queueCapacity: number, logger: KernelLogger) {
    const { dashboard, log, signal } = sinks;
    this.dashboard = dashboard
      ? new SinkQueue("dashboard", (s: DashboardSnapshotV1) => dashboard.publish(s), queueCapacity, logger)
      : null;
    this.log = log ? new SinkQueue("log", (r: LogRecordV1) => log.write(r), queueCapacity, logger) : null;
    this.signal = signal
      ? new SinkQueue("signal", (r: PriorityRequestV1) => signal.requestPriority(r), queueCapacity, logger)
      : null;
  }

  publishSnapshot(snapshot: DashboardSnapshotV1): void {
    this.dashboard?.enqueue(snapshot);
  }

  writeLog(record: LogRecordV1): void {
    this.log?.enqueue(record);
  }

  requestPriority(request: PriorityRequestV1): void {
    this.signal?.enqueue(request);
  }

  /** Resolves once every queue is empty and no delivery is in flight. */
  async flush(): Promise<void> {
    await Promise.all(this.queues().map((q) => q.flush()));
  }

  stats(): SinkQueueStats[] {
    return this.queues().map((q) => q.stats());
  }

  private queues(): Array<{ flush(): Promise<void>; stats(): SinkQueueStats }> {
    const out: Array<{ flush(): Promise<void>; stats(): SinkQueueStats }> = [];
    if (this.dashboard) out.push(this.dashboard);
    if (this.log) out.push(this.log);
    if (this.signal) out.push(this.signal);
    return out;
  }
}
