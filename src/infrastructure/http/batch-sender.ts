import { gzip } from 'node:zlib';
import { promisify } from 'node:util';
import type { Logger } from 'pino';
import type { Event, EventResponse } from '../../domain/index.js';
import type { BatchSender } from '../../application/sender.js';
import type { Clock } from '../../application/clock.js';
import { systemClock } from '../../application/clock.js';
import { noopMetrics, type TransmissionMetrics } from '../../application/metrics.js';
import { buildUserAgent } from './user-agent.js';
import { fetchTransport, type HttpReply, type HttpTransport } from './transport.js';
import { mapBatchResponses, toTransportError, type BatchExchange } from './response-mapper.js';

const gzipAsync = promisify(gzip);

export const WRITE_KEY_HEADER = 'X-Telemetry-Team';

export interface HttpBatchSenderOptions {
  log: Logger;
  transport?: HttpTransport | undefined;
  clock?: Clock | undefined;
  metrics?: TransmissionMetrics | undefined;
  userAgentAddition?: string | undefined;
  requestTimeoutMs: number;
}

/**
 * Builds `<apiHost>/1/batch/<dataset>`, keeping any path prefix already
 * present on the host URL.
 */
export function batchUrl(apiHost: string, dataset: string): string {
  const url = new URL(apiHost);
  const prefix = url.pathname.replace(/\/+$/, '');
  url.pathname = `${prefix}/1/batch/${encodeURIComponent(dataset)}`;
  return url.toString();
}

/**
 * Sends one gzip-compressed batch per call to the ingestion API and maps
 * the reply to per-event responses.
 *
 * Never rejects: an invalid host URL, a transport failure or an
 * unreadable body all come back as responses.
 */
export class HttpBatchSender implements BatchSender {
  private readonly log: Logger;
  private readonly transport: HttpTransport;
  private readonly clock: Clock;
  private readonly metrics: TransmissionMetrics;
  private readonly userAgent: string;
  private readonly requestTimeoutMs: number;

  constructor(options: HttpBatchSenderOptions) {
    this.log = options.log;
    this.transport = options.transport ?? fetchTransport;
    this.clock = options.clock ?? systemClock;
    this.metrics = options.metrics ?? noopMetrics;
    this.userAgent = buildUserAgent(options.userAgentAddition);
    this.requestTimeoutMs = options.requestTimeoutMs;
  }

  async send(events: readonly Event[], payload: string): Promise<EventResponse[]> {
    const first = events[0];
    if (first === undefined) return [];

    const exchange = await this.exchange(first, payload);
    this.record(exchange, events.length);

    this.log.debug(
      {
        dataset: first.dataset,
        count: events.length,
        kind: exchange.kind,
        durationMs: exchange.durationMs,
        ...(exchange.kind === 'failed' ? {} : { statusCode: exchange.statusCode }),
      },
      'Batch sent',
    );

    return mapBatchResponses(events, exchange);
  }

  private async exchange(route: Event, payload: string): Promise<BatchExchange> {
    let url: string;
    let body: Buffer;
    try {
      url = batchUrl(route.apiHost, route.dataset);
      body = await gzipAsync(payload);
    } catch (err: unknown) {
      return { kind: 'failed', error: toTransportError(err, this.requestTimeoutMs), durationMs: 0 };
    }

    const start = this.clock.now();

    let reply: HttpReply;
    try {
      reply = await this.transport({
        url,
        headers: {
          'Content-Type': 'application/json',
          'Content-Encoding': 'gzip',
          'User-Agent': this.userAgent,
          [WRITE_KEY_HEADER]: route.writeKey,
        },
        body,
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
    } catch (err: unknown) {
      return {
        kind: 'failed',
        error: toTransportError(err, this.requestTimeoutMs),
        durationMs: this.clock.since(start),
      };
    }

    try {
      const bytes = Buffer.from(await reply.arrayBuffer());
      return {
        kind: 'completed',
        statusCode: reply.status,
        body: bytes,
        durationMs: this.clock.since(start),
      };
    } catch (err: unknown) {
      return {
        kind: 'unreadable',
        statusCode: reply.status,
        error: err,
        durationMs: this.clock.since(start),
      };
    }
  }

  private record(exchange: BatchExchange, count: number): void {
    if (exchange.kind === 'failed') {
      this.metrics.increment('send_errors');
      return;
    }

    this.metrics.increment('batches_sent');
    this.metrics.increment('messages_sent', count);

    if (exchange.kind === 'unreadable') {
      this.metrics.increment('response_decode_errors');
    } else if (exchange.statusCode >= 200 && exchange.statusCode < 300) {
      this.metrics.increment('response_20x');
    } else {
      this.metrics.increment('response_errors');
    }
  }
}
