import type { AnalyticsRecord, AnalyticsSummary, RunLogRecord } from '../types';

export const RETENTION_SECONDS = 6 * 60 * 60;
export const SERIES_LIMIT = 200;

export interface TimingSeries {
  latency: number[];
  inference: number[];
}

function mean(values: number[]): number | undefined {
  if (values.length === 0) return undefined;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

function present(values: Array<number | undefined>): number[] {
  return values.filter((v): v is number => v !== undefined);
}

/** Current time in epoch seconds */
export function epochSeconds(): number {
  return Date.now() / 1000;
}

/**
 * Request records for one session, kept for six hours.
 * Reads prune first, so memory stays bounded without a background timer.
 */
export class AnalyticsRing {
  private records: AnalyticsRecord[] = [];
  private runLogRecords: RunLogRecord[] = [];

  record(entry: AnalyticsRecord): void {
    this.records.push(entry);
  }

  recordRunLog(entry: RunLogRecord): void {
    this.runLogRecords.push(entry);
  }

  prune(now: number = epochSeconds()): void {
    const cutoff = now - RETENTION_SECONDS;
    this.records = this.records.filter(r => r.timestamp >= cutoff);
  }

  summary(now: number = epochSeconds()): AnalyticsSummary {
    this.prune(now);

    const latencies = present(this.records.map(r => r.latencySeconds));
    const inferences = present(this.records.map(r => r.inferenceSeconds));
    const networks = present(this.records.map(r => r.networkSeconds));

    return {
      count: this.records.length,
      errors: this.records.filter(r => r.error !== undefined).length,
      lastLatency: latencies.length > 0 ? latencies[latencies.length - 1] : undefined,
      avgLatency: mean(latencies),
      avgInference: mean(inferences),
      avgNetwork: mean(networks),
    };
  }

  /** Requests per minute over the trailing window */
  throughput(windowSeconds: number, now: number = epochSeconds()): number {
    this.prune(now);
    const cutoff = now - windowSeconds;
    const count = this.records.filter(r => r.timestamp >= cutoff).length;
    return (count * 60) / windowSeconds;
  }

  series(limit: number = SERIES_LIMIT): TimingSeries {
    return {
      latency: present(this.records.map(r => r.latencySeconds)).slice(-limit),
      inference: present(this.records.map(r => r.inferenceSeconds)).slice(-limit),
    };
  }

  get entries(): readonly AnalyticsRecord[] {
    return this.records;
  }

  get runLogs(): readonly RunLogRecord[] {
    return this.runLogRecords;
  }

  reset(): void {
    this.records = [];
    this.runLogRecords = [];
  }
}
