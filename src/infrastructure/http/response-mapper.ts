import { z } from 'zod';
import type { Event, EventResponse } from '../../domain/index.js';
import {
  HttpStatusError,
  ResponseBodyReadError,
  ResponseDecodeError,
  ResponseMismatchError,
  ServerEventError,
  TransportError,
  isSuccessStatus,
} from '../../domain/index.js';

/**
 * Outcome of one batch request.
 *
 * - `failed`: no HTTP response was obtained.
 * - `unreadable`: a status arrived but reading the body failed.
 * - `completed`: status and full body bytes.
 */
export type BatchExchange =
  | { readonly kind: 'failed'; readonly error: Error; readonly durationMs: number }
  | {
      readonly kind: 'unreadable';
      readonly statusCode: number;
      readonly error: unknown;
      readonly durationMs: number;
    }
  | {
      readonly kind: 'completed';
      readonly statusCode: number;
      readonly body: Buffer;
      readonly durationMs: number;
    };

/** Per-event status array returned by the batch endpoint. */
export const batchStatusSchema = z.array(
  z.object({
    status: z.number().int(),
    error: z.string().optional(),
  }),
);

export type BatchStatus = z.infer<typeof batchStatusSchema>[number];

/**
 * Produces exactly one response per sent event, in sent order.
 *
 * Batch-level failures (transport, unreadable or non-2xx body, a status
 * array that does not decode or does not line up) apply to every event.
 * Otherwise status N is matched to event N, and a rejection stays on
 * that event only.
 */
export function mapBatchResponses(
  events: readonly Event[],
  exchange: BatchExchange,
): EventResponse[] {
  const { durationMs } = exchange;

  if (exchange.kind === 'failed') {
    const { error } = exchange;
    return events.map((event) => ({
      statusCode: 0,
      durationMs,
      metadata: event.metadata,
      error,
    }));
  }

  if (exchange.kind === 'unreadable') {
    const { statusCode } = exchange;
    const error = new ResponseBodyReadError(statusCode, exchange.error);
    return events.map((event) => ({
      statusCode,
      durationMs,
      metadata: event.metadata,
      error,
    }));
  }

  const { statusCode, body } = exchange;

  if (!isSuccessStatus(statusCode)) {
    const error = new HttpStatusError(statusCode);
    return events.map((event) => ({
      statusCode,
      body,
      durationMs,
      metadata: event.metadata,
      error,
    }));
  }

  const statuses = decodeStatuses(body);
  if (statuses instanceof Error || statuses.length !== events.length) {
    const error = statuses instanceof Error
      ? statuses
      : new ResponseMismatchError(statuses.length, events.length);
    return events.map((event) => ({
      statusCode,
      body,
      durationMs,
      metadata: event.metadata,
      error,
    }));
  }

  return events.map((event, i) => {
    // Lengths were checked above
    const entry: BatchStatus = statuses[i] ?? { status: 0 };
    const rejected = entry.error !== undefined || !isSuccessStatus(entry.status);
    return {
      statusCode: entry.status,
      durationMs,
      metadata: event.metadata,
      error: rejected
        ? new ServerEventError(entry.error ?? `API rejected event with status ${entry.status}`, entry.status)
        : undefined,
    };
  });
}

/** Wraps a transport rejection; timeouts get a message naming the limit. */
export function toTransportError(err: unknown, timeoutMs: number): TransportError {
  if (err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')) {
    return new TransportError(`request timed out after ${timeoutMs}ms`, err);
  }
  const message = err instanceof Error ? err.message : String(err);
  return new TransportError(`batch request failed: ${message}`, err);
}

function decodeStatuses(body: Buffer): BatchStatus[] | ResponseDecodeError {
  let raw: unknown;
  try {
    raw = JSON.parse(body.toString('utf8'));
  } catch (err: unknown) {
    return new ResponseDecodeError(err instanceof Error ? err.message : String(err));
  }

  const parsed = batchStatusSchema.safeParse(raw);
  if (!parsed.success) {
    return new ResponseDecodeError('expected an array of {status, error?} objects');
  }
  return parsed.data;
}
