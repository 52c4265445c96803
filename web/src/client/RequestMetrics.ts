/**
 * RequestMetrics
 * In-memory counters for outbound requests (reset on reload).
 */

export interface RequestMetricsSnapshot {
  requestCount: number;
  successCount: number;
  errorCount: number;
  activeRequests: number;
  averageResponseTime: number;
  /** Percentages, 0 when nothing was recorded */
  successRate: number;
  errorRate: number;
  requestsByEndpoint: Record<string, number>;
  errorsByEndpoint: Record<string, number>;
}

export class RequestMetrics {
  private requestCount = 0;
  private successCount = 0;
  private errorCount = 0;
  private activeRequests = 0;
  private totalResponseTime = 0;
  private requestsByEndpoint = new Map<string, number>();
  private errorsByEndpoint = new Map<string, number>();

  begin(): () => void {
    this.activeRequests += 1;
    let ended = false;
    return () => {
      if (ended) return;
      ended = true;
      this.activeRequests -= 1;
    };
  }

  record(endpoint: string, responseTimeMs: number, success: boolean): void {
    this.requestCount += 1;
    this.totalResponseTime += responseTimeMs;
    this.requestsByEndpoint.set(endpoint, (this.requestsByEndpoint.get(endpoint) ?? 0) + 1);

    if (success) {
      this.successCount += 1;
    } else {
      this.errorCount += 1;
      this.errorsByEndpoint.set(endpoint, (this.errorsByEndpoint.get(endpoint) ?? 0) + 1);
    }
  }

  getSnapshot(): RequestMetricsSnapshot {
    const total = this.requestCount;
    return {
      requestCount: total,
      successCount: this.successCount,
      errorCount: this.errorCount,
      activeRequests: this.activeRequests,
      averageResponseTime: total > 0 ? this.totalResponseTime / total : 0,
      successRate: total > 0 ? (this.successCount / total) * 100 : 0,
      errorRate: total > 0 ? (this.errorCount / total) * 100 : 0,
      requestsByEndpoint: Object.fromEntries(this.requestsByEndpoint),
      errorsByEndpoint: Object.fromEntries(this.errorsByEndpoint),
    };
  }

  reset(): void {
    this.requestCount = 0;
    this.successCount = 0;
    this.errorCount = 0;
    this.totalResponseTime = 0;
    this.requestsByEndpoint.clear();
    this.errorsByEndpoint.clear();
  }
}
