import { METRIC_COUNTER_NAMES, METRIC_TIMER_NAMES, MetricCounterName, MetricTimerName } from "./types";

export interface TimerSummary {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
  avgMs: number;
}

export interface MetricsSnapshot {
  counters: Partial<Record<MetricCounterName, number>>;
  timers: Partial<Record<MetricTimerName, TimerSummary>>;
}

const EMPTY_SUMMARY: TimerSummary = { count: 0, totalMs: 0, minMs: 0, maxMs: 0, avgMs: 0 };

/** Per-run counters and durations; logged once as `metrics_summary` when a command ends. */
export class MetricsRegistry {
  private readonly counters = new Map<MetricCounterName, number>();
  private readonly durations = new Map<MetricTimerName, number[]>();

  incrementCounter(name: MetricCounterName, value = 1): void {
    this.counters.set(name, this.getCounter(name) + value);
  }

  getCounter(name: MetricCounterName): number {
    return this.counters.get(name) ?? 0;
  }

  startTimer(name: MetricTimerName): () => number {
    const startedAt = Date.now();
    return () => {
      const durationMs = Date.now() - startedAt;
      const recorded = this.durations.get(name);
      if (recorded) {
        recorded.push(durationMs);
      } else {
        this.durations.set(name, [durationMs]);
      }
      return durationMs;
    };
  }

  summarizeTimer(name: MetricTimerName): TimerSummary {
    const values = this.durations.get(name);
    if (!values || values.length === 0) {
      return { ...EMPTY_SUMMARY };
    }

    const totalMs = values.reduce((acc, value) => acc + value, 0);
    return {
      count: values.length,
      totalMs,
      minMs: Math.min(...values),
      maxMs: Math.max(...values),
      avgMs: Number((totalMs / values.length).toFixed(2)),
    };
  }

  snapshot(): MetricsSnapshot {
    const snapshot: MetricsSnapshot = { counters: {}, timers: {} };
    for (const name of METRIC_COUNTER_NAMES) {
      snapshot.counters[name] = this.getCounter(name);
    }
    for (const name of METRIC_TIMER_NAMES) {
      snapshot.timers[name] = this.summarizeTimer(name);
    }
    return snapshot;
  }
}
