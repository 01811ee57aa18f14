/**
 * telemetry-transmission
 *
 * Batches, compresses and delivers telemetry events to an ingestion
 * API, reporting one response per event without blocking the producer.
 *
 * @example
 * ```typescript
 * import { Transmission } from 'telemetry-transmission';
 *
 * const tx = new Transmission({ pendingWorkCapacity: 1000 });
 * tx.start();
 *
 * await tx.add({
 *   apiHost: 'https://ingest.example.com',
 *   writeKey: 'test-write-key',
 *   dataset: 'requests',
 *   sampleRate: 1,
 *   metadata: { requestId: 'r-1' },
 *   data: { route: '/home', durationMs: 12 },
 * });
 *
 * for await (const response of tx.responses()) {
 *   if (response.error) console.error(response.metadata, response.error.message);
 * }
 * ```
 */

export { Transmission } from './transmission.js';
export type { TransmissionOptions } from './transmission.js';
export { VERSION } from './version.js';

export * from './domain/index.js';
export * from './application/index.js';
export * from './infrastructure/index.js';
