import type { HistoryBucketV1 } from "@lanewatch/contracts";
import { RingBuffer } from "../util/ring_buffer";

/**
 * Rolling per-tick history. Capacity is floor(duration / tick interval);
 * buckets older than newest - duration are dropped as well, so a gap in the
 * feed never leaves stale buckets behind.
 */
export class HistoryBuffer {
  private readonly buckets: RingBuffer<HistoryBucketV1>;

  constructor(private readonly durationMs: number, tickIntervalMs: number) {
    this.buckets = new RingBuffer(Math.max(1, Math.floor(durationMs / tickIntervalMs)));
  }

  get capacity(): number {
    return this.buckets.capacity;
  }

  get length(): number {
    return this.buckets.length;
  }

  append(bucket: HistoryBucketV1): void {
    this.buckets.push(bucket);
    this.buckets.dropWhile((b) => bucket.ts_ms - b.ts_ms > this.durationMs, 1);
  }

  /** Oldest -> newest; `sinceMs` keeps buckets at or after that time. */
  list(sinceMs?: number): HistoryBucketV1[] {
    const all = this.buckets.toArray();
    return sinceMs === undefined ? all : all.filter((b) => b.ts_ms >= sinceMs);
  }

  latest(): HistoryBucketV1 | null {
    return this.buckets.peekNewest() ?? null;
  }
}
