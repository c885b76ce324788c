export type MetricLabels = Record<string, string>;

/**
 * Latency histogram: cumulative counts per upper bound (ms).
 */
export interface HistogramValue {
  count: number;
  sum: number;
  buckets: Map<number, number>;
}

const LATENCY_BUCKETS_MS = [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000] as const;

/**
 * In-process counters for the agent loop, plus the tool latency histogram.
 * Series are keyed by name and sorted labels.
 */
export class Metrics {
  private readonly counters = new Map<string, number>();
  private readonly histograms = new Map<string, HistogramValue>();

  /** One completed loop iteration, by action type. */
  recordStep(actionType: string): void {
    this.increment("steps_total", { action: actionType });
  }

  /** One executed tool call (allowed calls only). */
  recordInvocation(toolName: string, ok: boolean, durationMs: number): void {
    this.increment("tool_invocations_total", { toolName, ok: String(ok) });
    this.observeLatency(toolName, durationMs);
  }

  recordPolicyDecision(toolName: string, allowed: boolean, reason?: string): void {
    this.increment("policy_decisions_total", {
      toolName,
      allowed: String(allowed),
      ...(reason ? { reason } : {}),
    });
  }

  recordDecisionRetry(): void {
    this.increment("decision_retries_total");
  }

  recordSession(status: string, reason: string): void {
    this.increment("sessions_total", { status, reason });
  }

  getCounter(name: string, labels: MetricLabels = {}): number {
    return this.counters.get(seriesKey(name, labels)) ?? 0;
  }

  /** Latency of one tool's calls, or undefined before its first call. */
  getLatency(toolName: string): HistogramValue | undefined {
    const hist = this.histograms.get(seriesKey("tool_latency_ms", { toolName }));
    return hist ? { ...hist, buckets: new Map(hist.buckets) } : undefined;
  }

  reset(): void {
    this.counters.clear();
    this.histograms.clear();
  }

  private increment(name: string, labels: MetricLabels = {}): void {
    const key = seriesKey(name, labels);
    this.counters.set(key, (this.counters.get(key) ?? 0) + 1);
  }

  private observeLatency(toolName: string, durationMs: number): void {
    const key = seriesKey("tool_latency_ms", { toolName });
    let hist = this.histograms.get(key);
    if (!hist) {
      hist = { count: 0, sum: 0, buckets: new Map(LATENCY_BUCKETS_MS.map((b) => [b, 0])) };
      this.histograms.set(key, hist);
    }
    hist.count++;
    hist.sum += durationMs;
    for (const bound of LATENCY_BUCKETS_MS) {
      if (durationMs <= bound) hist.buckets.set(bound, (hist.buckets.get(bound) ?? 0) + 1);
    }
  }
}

function seriesKey(name: string, labels: MetricLabels): string {
  const parts = Object.entries(labels)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([k, v]) => `${k}=${v}`);
  return `${name}{${parts.join(",")}}`;
}
