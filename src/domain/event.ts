/**
 * Core domain types for the transmission event model.
 *
 * These types define the shape of an event as it flows from the
 * producer through batching and back out as a response. They carry
 * no framework dependencies.
 */

/** Free-form key/value payload transmitted for every event. */
export type EventData = Record<string, unknown>;

/**
 * Canonical Event entity, built by the producer and owned by the
 * engine from `add()` until its response is emitted.
 *
 * `metadata` is opaque: the engine never inspects it and copies the
 * reference into the matching response.
 */
export interface Event {
  readonly apiHost: string;
  readonly writeKey: string;
  readonly dataset: string;
  /** Integer >= 1. A rate of 1 means "unsampled" and is omitted on the wire. */
  readonly sampleRate: number;
  readonly timestamp?: Date | undefined;
  readonly metadata?: unknown;
  readonly data: EventData;
}

/**
 * Per-event outcome delivered back to the producer.
 *
 * `statusCode` is 0 when the event never reached the network.
 * `body` is only set when the whole batch failed with a readable reply.
 */
export interface EventResponse {
  readonly statusCode: number;
  readonly body?: Buffer | undefined;
  readonly durationMs: number;
  readonly metadata: unknown;
  readonly error?: Error | undefined;
}

/** Identifies which events may share one wire batch. */
export type DestinationKey = string;

/**
 * Derives the destination key from host, credential and dataset.
 * Encoded as a JSON tuple so that no two destinations share a key.
 */
export function destinationKey(event: Event): DestinationKey {
  return JSON.stringify([event.apiHost, event.writeKey, event.dataset]);
}

/** Builds a response for an event that never reached the network. */
export function localFailure(event: Event, error: Error): EventResponse {
  return {
    statusCode: 0,
    durationMs: 0,
    metadata: event.metadata,
    error,
  };
}
