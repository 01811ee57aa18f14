import type { Event, EventResponse } from '../domain/index.js';
import type { ResponseChannel } from './response-channel.js';

/**
 * Producer-facing surface shared by the batching engine and the
 * synchronous writer.
 */
export interface Sender {
  start(): void;
  stop(): Promise<void>;
  /** Never rejects; failures surface as responses on the channel. */
  add(event: Event): Promise<void>;
  responses(): ResponseChannel;
}

/**
 * Delivers one already-encoded batch for a single destination and maps
 * the outcome to one response per event, in order.
 *
 * Implementations resolve failures into responses rather than rejecting.
 */
export interface BatchSender {
  send(events: readonly Event[], payload: string): Promise<EventResponse[]>;
}
