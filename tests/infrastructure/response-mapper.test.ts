import { describe, it, expect } from 'vitest';
import { mapBatchResponses, toTransportError } from '../../src/infrastructure/http/response-mapper.js';
import {
  ResponseBodyReadError,
  ResponseDecodeError,
  ResponseMismatchError,
  ServerEventError,
  TransportError,
} from '../../src/domain/index.js';
import { makeEvent } from '../helpers.js';

const events = [makeEvent({ metadata: 'm0' }), makeEvent({ metadata: 'm1' })];

function completed(statusCode: number, body: string) {
  return { kind: 'completed', statusCode, body: Buffer.from(body), durationMs: 7 } as const;
}

describe('mapBatchResponses', () => {
  it('gives every event the transport error', () => {
    const error = new TransportError('batch request failed: refused', undefined);
    const out = mapBatchResponses(events, { kind: 'failed', error, durationMs: 3 });

    expect(out).toEqual([
      { statusCode: 0, durationMs: 3, metadata: 'm0', error },
      { statusCode: 0, durationMs: 3, metadata: 'm1', error },
    ]);
  });

  it('uses the 2xx wording for an unreadable success body', () => {
    const out = mapBatchResponses(events, {
      kind: 'unreadable',
      statusCode: 200,
      error: new Error('truncated'),
      durationMs: 1,
    });

    expect(out[0]?.error).toBeInstanceOf(ResponseBodyReadError);
    expect(out[0]?.error?.message).toBe("couldn't read response body: truncated");
  });

  it('maps per-event statuses positionally', () => {
    const out = mapBatchResponses(events, completed(200, '[{"status":202},{"status":400,"error":"bad field"}]'));

    expect(out[0]).toEqual({ statusCode: 202, durationMs: 7, metadata: 'm0', error: undefined });
    expect(out[1]?.statusCode).toBe(400);
    expect(out[1]?.error).toBeInstanceOf(ServerEventError);
    expect(out[1]?.error?.message).toBe('bad field');
    expect(out[1]?.body).toBeUndefined();
  });

  it('describes a non-2xx entry without an error message', () => {
    const out = mapBatchResponses([events[0] ?? makeEvent()], completed(200, '[{"status":500}]'));
    expect(out[0]?.error?.message).toBe('API rejected event with status 500');
  });

  it('fails all events when the body is not JSON', () => {
    const out = mapBatchResponses(events, completed(200, 'oops'));

    expect(out).toHaveLength(2);
    expect(out[0]?.error).toBeInstanceOf(ResponseDecodeError);
    expect(out[1]?.body?.toString()).toBe('oops');
  });

  it('fails all events when the body has the wrong shape', () => {
    const out = mapBatchResponses(events, completed(200, '{"status":202}'));
    expect(out[0]?.error?.message).toBe(
      "couldn't decode API response body: expected an array of {status, error?} objects",
    );
  });

  it('fails all events when the status count differs', () => {
    const out = mapBatchResponses(events, completed(202, '[{"status":202},{"status":202},{"status":202}]'));
    expect(out[1]?.error).toBeInstanceOf(ResponseMismatchError);
    expect(out[1]?.error?.message).toBe('API returned 3 statuses for a batch of 2 events');
  });
});

describe('toTransportError', () => {
  it('names the timeout for aborted requests', () => {
    const abort = new Error('aborted');
    abort.name = 'AbortError';
    expect(toTransportError(abort, 1_500).message).toBe('request timed out after 1500ms');
  });

  it('wraps other failures with their message', () => {
    const err = toTransportError(new Error('ECONNREFUSED'), 1_500);
    expect(err.message).toBe('batch request failed: ECONNREFUSED');
    expect(err.cause).toBeInstanceOf(Error);
  });

  it('stringifies non-error rejections', () => {
    expect(toTransportError('boom', 10).message).toBe('batch request failed: boom');
  });
});
