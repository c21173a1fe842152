export interface ReplacementLatencySample {
  deleteMs: number;
  typeMs: number;
  switchMs: number;
  totalMs: number;
}

interface PercentileSummary {
  p50: number;
  p95: number;
  max: number;
  avg: number;
}

export interface LatencySummary {
  replacements: number;
  deleteMs: PercentileSummary;
  typeMs: PercentileSummary;
  switchMs: PercentileSummary;
  totalMs: PercentileSummary;
}

const asSummary = (values: number[]): PercentileSummary => {
  if (values.length === 0) {
    return { p50: 0, p95: 0, max: 0, avg: 0 };
  }

  const sorted = [...values].sort((a, b) => a - b);
  const pick = (pct: number): number => {
    const index = Math.min(sorted.length - 1, Math.max(0, Math.ceil(sorted.length * pct) - 1));
    return sorted[index];
  };
  const total = sorted.reduce((sum, value) => sum + value, 0);

  return {
    p50: Math.round(pick(0.5)),
    p95: Math.round(pick(0.95)),
    max: Math.round(sorted[sorted.length - 1]),
    avg: Math.round(total / sorted.length)
  };
};

/** Rolling window of replacement timings; older samples fall off past `capacity`. */
export class LatencyTracker {
  private samples: ReplacementLatencySample[] = [];

  public constructor(private readonly capacity = 500) {}

  public reset(): void {
    this.samples = [];
  }

  public push(sample: ReplacementLatencySample): void {
    this.samples.push(sample);
    if (this.samples.length > this.capacity) {
      this.samples.splice(0, this.samples.length - this.capacity);
    }
  }

  public summarize(): LatencySummary {
    return {
      replacements: this.samples.length,
      deleteMs: asSummary(this.samples.map((sample) => sample.deleteMs)),
      typeMs: asSummary(this.samples.map((sample) => sample.typeMs)),
      switchMs: asSummary(this.samples.map((sample) => sample.switchMs)),
      totalMs: asSummary(this.samples.map((sample) => sample.totalMs))
    };
  }
}
