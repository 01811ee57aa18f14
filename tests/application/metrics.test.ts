import { describe, it, expect } from 'vitest';
import { CounterMetrics, METRIC_NAMES, noopMetrics } from '../../src/application/metrics.js';

describe('CounterMetrics', () => {
  it('reads 0 for a metric never touched', () => {
    expect(new CounterMetrics().get('batches_sent')).toBe(0);
  });

  it('accumulates counters', () => {
    const metrics = new CounterMetrics();
    metrics.increment('messages_sent', 3);
    metrics.increment('messages_sent');
    expect(metrics.get('messages_sent')).toBe(4);
  });

  it('keeps the last gauge value', () => {
    const metrics = new CounterMetrics();
    metrics.gauge('queue_length', 12);
    metrics.gauge('queue_length', 5);
    expect(metrics.snapshot()).toEqual({ queue_length: 5 });
  });
});

describe('noopMetrics', () => {
  it('accepts every known metric name', () => {
    for (const name of METRIC_NAMES) {
      expect(() => noopMetrics.increment(name)).not.toThrow();
    }
  });
});
