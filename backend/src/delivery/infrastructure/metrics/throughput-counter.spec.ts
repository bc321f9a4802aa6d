import { ThroughputCounter } from './throughput-counter.js';

describe('ThroughputCounter', () => {
  let now: number;
  let counter: ThroughputCounter;

  beforeEach(() => {
    now = 1_000_000_000;
    counter = new ThroughputCounter(() => now);
  });

  it('sums the points recorded within the last minute', () => {
    counter.record('written', 20);
    now += 30_000;
    counter.record('written', 10);

    expect(counter.perMinute('written')).toBe(30);
    expect(counter.perMinute('replayed')).toBe(0);
  });

  it('forgets buckets that left the window', () => {
    counter.record('written', 20);
    now += 60_000;
    counter.record('written', 5);

    expect(counter.perMinute('written')).toBe(5);
  });

  it('ignores empty stream names and non-positive counts', () => {
    counter.record('', 5);
    counter.record('written', 0);

    expect(counter.snapshot()).toEqual({});
  });

  it('reports a per-bucket series scaled to points per minute', () => {
    counter.record('written', 2);
    now += 5_000;
    counter.record('written', 1);

    expect(counter.series('written', 3)).toEqual([0, 24, 12]);
    expect(counter.snapshot().written.perMinute).toBe(3);
  });
});
