export const METRIC_NAMES = [
  'queue_length',
  'queue_overflow',
  'responses_dropped',
  'events_oversize',
  'events_encode_failed',
  'overflow_deferred',
  'batches_sent',
  'messages_sent',
  'send_errors',
  'response_decode_errors',
  'response_20x',
  'response_errors',
] as const;

export type MetricName = (typeof METRIC_NAMES)[number];

/**
 * Sink for engine counters and gauges.
 *
 * Applications plug in their own exporter; the engine only ever calls
 * these two methods.
 */
export interface TransmissionMetrics {
  increment(name: MetricName, by?: number): void;
  gauge(name: MetricName, value: number): void;
}

export const noopMetrics: TransmissionMetrics = {
  increment: () => {},
  gauge: () => {},
};

/**
 * In-memory metrics. Counters accumulate; gauges hold the last value.
 */
export class CounterMetrics implements TransmissionMetrics {
  private readonly values = new Map<MetricName, number>();

  increment(name: MetricName, by = 1): void {
    this.values.set(name, (this.values.get(name) ?? 0) + by);
  }

  gauge(name: MetricName, value: number): void {
    this.values.set(name, value);
  }

  get(name: MetricName): number {
    return this.values.get(name) ?? 0;
  }

  /** Point-in-time copy of every recorded value. */
  snapshot(): Partial<Record<MetricName, number>> {
    return Object.fromEntries(this.values);
  }
}
