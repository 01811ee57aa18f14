export { BoundedQueue } from './bounded-queue.js';
export { ResponseChannel } from './response-channel.js';
export type { ResponseChannelOptions } from './response-channel.js';
export { OverflowStore } from './overflow-store.js';
export { BatchAggregator, groupByDestination } from './batch-aggregator.js';
export type { AggregatorDeps, BatchLimits } from './batch-aggregator.js';
export { systemClock } from './clock.js';
export type { Clock } from './clock.js';
export { CounterMetrics, noopMetrics, METRIC_NAMES } from './metrics.js';
export type { MetricName, TransmissionMetrics } from './metrics.js';
export { toWireEvent, encodeEvent, encodeEventData, encodeWriterLine, encodeBatch, byteLength, formatTime } from './wire-format.js';
export type { WireEvent, WriterLine } from './wire-format.js';
export type { Sender, BatchSender } from './sender.js';
