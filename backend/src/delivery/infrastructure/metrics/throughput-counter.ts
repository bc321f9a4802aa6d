/**
 * @file throughput-counter.ts
 * @description
 * In-memory points-per-minute counters over a sliding window of time buckets.
 *
 * @remarks
 * - Time is cut into buckets of {@link BUCKET_MS} ms (5 s); a window of
 *   {@link WINDOW_MS} ms holds {@link BUCKETS_IN_WINDOW} of them (12).
 * - `record` adds to the bucket `floor(now / BUCKET_MS)` of a stream and
 *   prunes buckets that left the window. O(1) per call.
 * - Since the window is exactly one minute, the sum of its buckets is the
 *   per-minute rate.
 *
 * Streams are free-form keys (`written`, `replayed`, `overflowed`).
 */

const BUCKET_MS = 5_000;

const WINDOW_MS = 60_000;

const BUCKETS_IN_WINDOW = WINDOW_MS / BUCKET_MS;

type Buckets = Map<number, number>;

export type ThroughputSnapshot = Record<string, { perMinute: number; series: number[] }>;

export class ThroughputCounter {
  private readonly streams = new Map<string, Buckets>();

  constructor(private readonly now: () => number = Date.now) {}

  record(stream: string, n = 1): void {
    if (!stream || n <= 0) return;
    let buckets = this.streams.get(stream);
    if (!buckets) {
      buckets = new Map();
      this.streams.set(stream, buckets);
    }
    const idx = this.bucketIdx();
    buckets.set(idx, (buckets.get(idx) ?? 0) + n);
    this.prune(buckets, idx);
  }

  perMinute(stream: string): number {
    const buckets = this.streams.get(stream);
    if (!buckets) return 0;
    const idx = this.bucketIdx();
    this.prune(buckets, idx);

    let sum = 0;
    for (const count of buckets.values()) sum += count;
    return sum;
  }

  /**
   * Last `points` buckets of a stream, oldest first, each scaled to a
   * per-minute rate (count × 12).
   */
  series(stream: string, points = BUCKETS_IN_WINDOW): number[] {
    const buckets = this.streams.get(stream);
    const idx = this.bucketIdx();
    const out: number[] = [];
    for (let i = idx - points + 1; i <= idx; i++) {
      out.push((buckets?.get(i) ?? 0) * (WINDOW_MS / BUCKET_MS));
    }
    return out;
  }

  snapshot(): ThroughputSnapshot {
    const out: ThroughputSnapshot = {};
    for (const stream of this.streams.keys()) {
      out[stream] = { perMinute: this.perMinute(stream), series: this.series(stream) };
    }
    return out;
  }

  private bucketIdx(): number {
    return Math.floor(this.now() / BUCKET_MS);
  }

  private prune(buckets: Buckets, currentIdx: number): void {
    const minIdx = currentIdx - BUCKETS_IN_WINDOW + 1;
    for (const k of buckets.keys()) {
      if (k < minIdx) buckets.delete(k);
    }
  }
}
