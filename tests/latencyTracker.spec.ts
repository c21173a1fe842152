import { describe, it, expect } from 'vitest';
import { LatencyTracker } from '../src/perf/LatencyTracker';

describe('LatencyTracker', () => {
  it('summarizes percentiles per phase', () => {
    const tracker = new LatencyTracker();
    for (const totalMs of [10, 20, 30, 40]) {
      tracker.push({ deleteMs: 1, typeMs: 2, switchMs: 3, totalMs });
    }

    const summary = tracker.summarize();

    expect(summary.replacements).toBe(4);
    expect(summary.totalMs).toEqual({ p50: 20, p95: 40, max: 40, avg: 25 });
    expect(summary.deleteMs).toEqual({ p50: 1, p95: 1, max: 1, avg: 1 });
  });

  it('keeps only the most recent samples', () => {
    const tracker = new LatencyTracker(2);
    tracker.push({ deleteMs: 0, typeMs: 0, switchMs: 0, totalMs: 100 });
    tracker.push({ deleteMs: 0, typeMs: 0, switchMs: 0, totalMs: 5 });
    tracker.push({ deleteMs: 0, typeMs: 0, switchMs: 0, totalMs: 7 });

    expect(tracker.summarize().totalMs.max).toBe(7);
    expect(tracker.summarize().replacements).toBe(2);
  });

  it('reports zeros when empty', () => {
    expect(new LatencyTracker().summarize().typeMs).toEqual({ p50: 0, p95: 0, max: 0, avg: 0 });
  });
});
