import type { Event, EventData } from '../domain/index.js';
import { EventEncodeError } from '../domain/index.js';

/** One element of the batch request array. */
export interface WireEvent {
  data: EventData;
  samplerate?: number;
  time?: string;
}

/** One line of writer output. */
export interface WriterLine extends WireEvent {
  dataset?: string;
}

/**
 * Maps an event onto its wire object.
 *
 * Key order is fixed (data, samplerate, time) and the default sample
 * rate of 1 and an absent timestamp are left out entirely.
 */
export function toWireEvent(event: Event): WireEvent {
  const wire: WireEvent = { data: event.data };
  if (event.sampleRate !== 1) {
    wire.samplerate = event.sampleRate;
  }
  if (event.timestamp !== undefined) {
    wire.time = formatTime(event.timestamp);
  }
  return wire;
}

/** JSON for one element of the batch array. */
export function encodeEvent(event: Event): string {
  return stringify(() => toWireEvent(event));
}

/** JSON of the field map alone; this is what the per-event ceiling is measured on. */
export function encodeEventData(event: Event): string {
  return stringify(() => event.data);
}

/** JSON line for the writer sender, without the trailing newline. */
export function encodeWriterLine(event: Event): string {
  return stringify(() => {
    const line: WriterLine = toWireEvent(event);
    if (event.dataset !== '') {
      line.dataset = event.dataset;
    }
    return line;
  });
}

/** Joins already-encoded events into a JSON array. */
export function encodeBatch(encoded: readonly string[]): string {
  return `[${encoded.join(',')}]`;
}

/** RFC 3339 in UTC with trailing zeros of the fraction dropped (`...T12:00:01Z`, `...T12:00:01.5Z`). */
export function formatTime(date: Date): string {
  return date.toISOString().replace(/\.?0+Z$/, 'Z');
}

export function byteLength(text: string): number {
  return Buffer.byteLength(text, 'utf8');
}

/** Builds and serializes a value; an invalid timestamp or unserializable data becomes EventEncodeError. */
function stringify(build: () => unknown): string {
  let json: string | undefined;
  try {
    json = JSON.stringify(build());
  } catch (err: unknown) {
    throw new EventEncodeError(err);
  }
  if (json === undefined) {
    throw new EventEncodeError('value is not representable as JSON');
  }
  return json;
}
