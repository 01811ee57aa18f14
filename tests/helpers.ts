import { gunzipSync } from 'node:zlib';
import { vi } from 'vitest';
import type { Event } from '../src/domain/index.js';
import type { Clock } from '../src/application/clock.js';
import type { HttpReply, HttpRequest, HttpTransport } from '../src/infrastructure/http/transport.js';

let counter = 0;

/**
 * Factory for creating test events with sensible defaults.
 * Override any field via the partial parameter.
 */
export function makeEvent(overrides: Partial<Event> = {}): Event {
  counter++;
  return {
    apiHost: overrides.apiHost ?? 'http://fakeHost:8080',
    writeKey: overrides.writeKey ?? 'written',
    dataset: overrides.dataset ?? 'ds1',
    sampleRate: overrides.sampleRate ?? 1,
    timestamp: overrides.timestamp,
    metadata: 'metadata' in overrides ? overrides.metadata : `meta-${counter}`,
    data: overrides.data ?? { foo: 'bar' },
  };
}

/** Minimal fake logger. */
export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } as unknown as import('pino').Logger;
}

/** Clock that advances by `stepMs` on every reading. */
export class FakeClock implements Clock {
  private current = 0;

  constructor(private readonly stepMs = 10_000) {}

  now(): number {
    this.current += this.stepMs;
    return this.current;
  }

  since(start: number): number {
    return this.now() - start;
  }
}

/** Builds a reply whose body is the given text. */
export function reply(status: number, body: string): HttpReply {
  return {
    status,
    arrayBuffer: async () => {
      const bytes = Buffer.from(body, 'utf8');
      const out = new ArrayBuffer(bytes.length);
      new Uint8Array(out).set(bytes);
      return out;
    },
  };
}

/** Builds a reply whose body read fails with `message`. */
export function unreadableReply(status: number, message: string): HttpReply {
  return {
    status,
    arrayBuffer: () => Promise.reject(new Error(message)),
  };
}

/** Decompressed JSON text of a captured request body. */
export function requestText(request: HttpRequest): string {
  return gunzipSync(request.body).toString('utf8');
}

/**
 * In-process stand-in for the ingestion API.
 * Records every request and answers with `respond`.
 */
export function fakeTransport(
  respond: (request: HttpRequest) => HttpReply | Promise<HttpReply>,
) {
  const requests: HttpRequest[] = [];
  const transport: HttpTransport = async (request) => {
    requests.push(request);
    return respond(request);
  };
  return { transport, requests };
}

/** Fake API that accepts every event with status 202. */
export function acceptingTransport() {
  return fakeTransport((request) => {
    const sent = JSON.parse(requestText(request)) as unknown[];
    return reply(200, JSON.stringify(sent.map(() => ({ status: 202 }))));
  });
}

/** ~99 KB field value, close to but under the per-event ceiling. */
export function bigValue(length = 99_000): string {
  return 'x'.repeat(length);
}
