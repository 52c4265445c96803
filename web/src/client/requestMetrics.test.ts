import { describe, it, expect } from 'vitest';
import { RequestMetrics } from './RequestMetrics';

describe('RequestMetrics', () => {
  it('should aggregate counts, rates and latency', () => {
    const metrics = new RequestMetrics();
    metrics.record('/api/v1/feedback', 100, true);
    metrics.record('/api/v1/feedback', 300, false);
    metrics.record('/api/v1/members', 200, true);
    metrics.record('/api/v1/members', 400, true);

    const snapshot = metrics.getSnapshot();
    expect(snapshot.requestCount).toBe(4);
    expect(snapshot.averageResponseTime).toBe(250);
    expect(snapshot.successRate).toBe(75);
    expect(snapshot.errorRate).toBe(25);
    expect(snapshot.requestsByEndpoint).toEqual({ '/api/v1/feedback': 2, '/api/v1/members': 2 });
    expect(snapshot.errorsByEndpoint).toEqual({ '/api/v1/feedback': 1 });
  });

  it('should count active requests once per end call', () => {
    const metrics = new RequestMetrics();
    const end = metrics.begin();
    metrics.begin();
    end();
    end();
    expect(metrics.getSnapshot().activeRequests).toBe(1);
  });

  it('should report zero rates when empty', () => {
    const metrics = new RequestMetrics();
    metrics.record('/x', 10, true);
    metrics.reset();
    expect(metrics.getSnapshot()).toMatchObject({ requestCount: 0, successRate: 0, averageResponseTime: 0 });
  });
});
