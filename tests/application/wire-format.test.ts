import { describe, it, expect } from 'vitest';
import {
  byteLength,
  encodeBatch,
  encodeEvent,
  encodeEventData,
  encodeWriterLine,
  formatTime,
  toWireEvent,
} from '../../src/application/wire-format.js';
import { EventEncodeError } from '../../src/domain/index.js';
import { makeEvent } from '../helpers.js';

const T = new Date('2026-03-01T12:00:01Z');

describe('toWireEvent', () => {
  it('omits samplerate of 1 and an absent timestamp', () => {
    const event = makeEvent({ sampleRate: 1, data: {} });
    expect(toWireEvent(event)).toEqual({ data: {} });
  });

  it('includes samplerate and time when set', () => {
    const event = makeEvent({ sampleRate: 4, timestamp: T, data: { a: 1 } });
    expect(toWireEvent(event)).toEqual({
      data: { a: 1 },
      samplerate: 4,
      time: '2026-03-01T12:00:01Z',
    });
  });
});

describe('encodeEvent', () => {
  it('serializes fields in data, samplerate, time order', () => {
    const event = makeEvent({ sampleRate: 4, timestamp: T, data: { foo: 'bar' } });
    expect(encodeEvent(event)).toBe(
      '{"data":{"foo":"bar"},"samplerate":4,"time":"2026-03-01T12:00:01Z"}',
    );
  });

  it('drops function-valued fields like JSON does', () => {
    const event = makeEvent({ data: { a: 1, b: () => {} } });
    expect(encodeEvent(event)).toBe('{"data":{"a":1}}');
  });

  it('throws EventEncodeError for unserializable data', () => {
    const event = makeEvent({ data: { big: 10n } });
    expect(() => encodeEvent(event)).toThrow(EventEncodeError);
  });

  it('throws EventEncodeError for an invalid timestamp', () => {
    const event = makeEvent({ timestamp: new Date(Number.NaN) });
    expect(() => encodeEvent(event)).toThrow(EventEncodeError);
  });
});

describe('encodeEventData', () => {
  it('serializes only the field map', () => {
    const event = makeEvent({ sampleRate: 4, data: { reallyBigColumn: 'abc' } });
    expect(encodeEventData(event)).toBe('{"reallyBigColumn":"abc"}');
  });

  it('rejects circular data', () => {
    const data: Record<string, unknown> = {};
    data['self'] = data;
    expect(() => encodeEventData(makeEvent({ data }))).toThrow(/couldn't serialize event data/);
  });
});

describe('encodeWriterLine', () => {
  it('writes only data for a default event', () => {
    const event = makeEvent({ sampleRate: 1, dataset: '', data: {} });
    expect(encodeWriterLine(event)).toBe('{"data":{}}');
  });

  it('writes samplerate, time and dataset when not default', () => {
    const event = makeEvent({ sampleRate: 2, timestamp: T, dataset: 'dataset', data: { key: 'val' } });
    expect(encodeWriterLine(event)).toBe(
      '{"data":{"key":"val"},"samplerate":2,"time":"2026-03-01T12:00:01Z","dataset":"dataset"}',
    );
  });
});

describe('formatTime', () => {
  it('drops a zero fraction', () => {
    expect(formatTime(new Date('2026-03-01T12:00:00.000Z'))).toBe('2026-03-01T12:00:00Z');
  });

  it('trims trailing zeros from a partial fraction', () => {
    expect(formatTime(new Date('2026-03-01T12:00:10.500Z'))).toBe('2026-03-01T12:00:10.5Z');
    expect(formatTime(new Date('2026-03-01T12:00:10.120Z'))).toBe('2026-03-01T12:00:10.12Z');
  });

  it('keeps a full millisecond fraction', () => {
    expect(formatTime(new Date('2026-03-01T12:00:10.123Z'))).toBe('2026-03-01T12:00:10.123Z');
  });
});

describe('encodeBatch / byteLength', () => {
  it('joins encoded events into an array', () => {
    expect(encodeBatch(['{"data":{"a":1}}', '{"data":{"b":2}}'])).toBe(
      '[{"data":{"a":1}},{"data":{"b":2}}]',
    );
    expect(encodeBatch([])).toBe('[]');
  });

  it('counts UTF-8 bytes, not characters', () => {
    expect(byteLength('abc')).toBe(3);
    expect(byteLength('é')).toBe(2);
  });
});
