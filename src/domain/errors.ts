/**
 * Error kinds surfaced through EventResponse.error.
 *
 * None of these are thrown back to the caller of `add()`; the engine
 * resolves every failure into a response. ConfigError is the only one
 * thrown, and only from client construction.
 */

export type TransmissionErrorCode =
  | 'QUEUE_OVERFLOW'
  | 'EVENT_TOO_LARGE'
  | 'EVENT_ENCODE_FAILED'
  | 'TRANSPORT_FAILED'
  | 'RESPONSE_BODY_UNREADABLE'
  | 'RESPONSE_UNDECODABLE'
  | 'RESPONSE_MISMATCH'
  | 'SERVER_REJECTED'
  | 'HTTP_STATUS'
  | 'INVALID_CONFIG';

export class TransmissionError extends Error {
  constructor(
    message: string,
    public readonly code: TransmissionErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'TransmissionError';
  }
}

/** The pending-work queue was full and the client does not block on send. */
export class QueueOverflowError extends TransmissionError {
  constructor() {
    super('queue overflow', 'QUEUE_OVERFLOW');
    this.name = 'QueueOverflowError';
  }
}

export class EventTooLargeError extends TransmissionError {
  constructor(
    public readonly maxBytes: number,
    public readonly actualBytes: number,
  ) {
    super(
      `event exceeds max event size of ${maxBytes} bytes, API will not accept this event`,
      'EVENT_TOO_LARGE',
    );
    this.name = 'EventTooLargeError';
  }
}

/** Event data could not be serialized (BigInt values, cycles, throwing toJSON). */
export class EventEncodeError extends TransmissionError {
  constructor(cause: unknown) {
    super(`couldn't serialize event data: ${describe(cause)}`, 'EVENT_ENCODE_FAILED', { cause });
    this.name = 'EventEncodeError';
  }
}

/** No HTTP response was obtained: connection failure, DNS, timeout. */
export class TransportError extends TransmissionError {
  constructor(message: string, cause: unknown) {
    super(message, 'TRANSPORT_FAILED', { cause });
    this.name = 'TransportError';
  }
}

export class ResponseBodyReadError extends TransmissionError {
  constructor(
    public readonly statusCode: number,
    cause: unknown,
  ) {
    const prefix = isSuccessStatus(statusCode)
      ? "couldn't read response body"
      : "Got HTTP error code but couldn't read response body";
    super(`${prefix}: ${describe(cause)}`, 'RESPONSE_BODY_UNREADABLE', { cause });
    this.name = 'ResponseBodyReadError';
  }
}

/** A 2xx body that is not a per-event status array. */
export class ResponseDecodeError extends TransmissionError {
  constructor(detail: string) {
    super(`couldn't decode API response body: ${detail}`, 'RESPONSE_UNDECODABLE');
    this.name = 'ResponseDecodeError';
  }
}

export class ResponseMismatchError extends TransmissionError {
  constructor(
    public readonly received: number,
    public readonly sent: number,
  ) {
    super(
      `API returned ${received} statuses for a batch of ${sent} events`,
      'RESPONSE_MISMATCH',
    );
    this.name = 'ResponseMismatchError';
  }
}

/** Server rejected one event of an otherwise successful batch. */
export class ServerEventError extends TransmissionError {
  constructor(
    message: string,
    public readonly statusCode: number,
  ) {
    super(message, 'SERVER_REJECTED');
    this.name = 'ServerEventError';
  }
}

/** Whole batch rejected with a non-2xx status and a readable body. */
export class HttpStatusError extends TransmissionError {
  constructor(public readonly statusCode: number) {
    super(`API responded with HTTP ${statusCode}`, 'HTTP_STATUS');
    this.name = 'HttpStatusError';
  }
}

export class ConfigError extends TransmissionError {
  constructor(
    message: string,
    public readonly issues: readonly { path: readonly (string | number)[]; message: string }[],
  ) {
    super(message, 'INVALID_CONFIG');
    this.name = 'ConfigError';
  }
}

export function isSuccessStatus(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 300;
}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
