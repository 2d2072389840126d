/**
 * Request Metrics
 * One instance per app; handlers receive it instead of touching module state
 */

export interface MetricsSnapshot {
  requests: number;
  errors: number;
  avg_latency_seconds: number;
}

export class RequestMetrics {
  private requests = 0;
  private errors = 0;
  private avgLatencySeconds = 0;
  private readonly startedAt: number;

  constructor(private readonly now: () => number = Date.now) {
    this.startedAt = now();
  }

  observe(latencySeconds: number): void {
    this.requests += 1;
    // running mean
    this.avgLatencySeconds += (Math.max(0, latencySeconds) - this.avgLatencySeconds) / this.requests;
  }

  recordError(): void {
    this.errors += 1;
  }

  uptimeSeconds(): number {
    return Math.round((this.now() - this.startedAt) / 10) / 100;
  }

  snapshot(): MetricsSnapshot {
    return {
      requests: this.requests,
      errors: this.errors,
      avg_latency_seconds: Math.round(this.avgLatencySeconds * 100000) / 100000,
    };
  }

  /**
   * Prometheus text exposition format
   */
  toPrometheus(): string {
    const lines = [
      '# HELP hha_requests_total Total requests',
      '# TYPE hha_requests_total counter',
      `hha_requests_total ${this.requests}`,
      '# HELP hha_errors_total Total errors',
      '# TYPE hha_errors_total counter',
      `hha_errors_total ${this.errors}`,
      '# HELP hha_latency_seconds_avg Average latency (s)',
      '# TYPE hha_latency_seconds_avg gauge',
      `hha_latency_seconds_avg ${this.avgLatencySeconds}`,
      '# HELP hha_uptime_seconds Uptime (s)',
      '# TYPE hha_uptime_seconds gauge',
      `hha_uptime_seconds ${this.uptimeSeconds()}`,
    ];
    return `${lines.join('\n')}\n`;
  }
}
