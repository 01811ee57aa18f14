import type { Logger } from 'pino';
import type { Event, EventResponse } from './domain/index.js';
import { QueueOverflowError } from './domain/index.js';
import { BatchAggregator } from './application/batch-aggregator.js';
import { BoundedQueue } from './application/bounded-queue.js';
import type { Clock } from './application/clock.js';
import { noopMetrics, type TransmissionMetrics } from './application/metrics.js';
import { OverflowStore } from './application/overflow-store.js';
import { ResponseChannel } from './application/response-channel.js';
import type { BatchSender, Sender } from './application/sender.js';
import {
  resolveTransmissionConfig,
  type TransmissionConfig,
  type TransmissionConfigInput,
} from './infrastructure/config.js';
import { HttpBatchSender } from './infrastructure/http/batch-sender.js';
import type { HttpTransport } from './infrastructure/http/transport.js';
import { createLogger } from './infrastructure/logger.js';

/** Configuration plus injectable collaborators. */
export type TransmissionOptions = TransmissionConfigInput & {
  logger?: Logger | undefined;
  clock?: Clock | undefined;
  metrics?: TransmissionMetrics | undefined;
  transport?: HttpTransport | undefined;
  /** Replaces the HTTP sender entirely (transport, clock and user agent are then unused). */
  sender?: BatchSender | undefined;
};

/**
 * Client front end of the batching engine.
 *
 * `add()` places events on a bounded work queue; an aggregation pass,
 * run on a `batchTimeoutMs` tick or as soon as the queue holds
 * `maxBatchSize` events, drains it, batches per destination and ships
 * the batches. Every accepted event yields exactly one response on
 * `responses()`.
 *
 * Each instance owns its queues; any number of clients can coexist.
 */
export class Transmission implements Sender {
  readonly config: TransmissionConfig;

  private readonly log: Logger;
  private readonly metrics: TransmissionMetrics;
  private readonly work: BoundedQueue<Event>;
  private readonly channel: ResponseChannel;
  private readonly overflow = new OverflowStore();
  private readonly aggregator: BatchAggregator;

  private timer: ReturnType<typeof setInterval> | null = null;
  // Tail of the pass chain; passes run strictly one after another
  private passes: Promise<void> = Promise.resolve();
  private passQueued = false;
  private stopped = false;

  constructor(options: TransmissionOptions = {}) {
    const { logger, clock, metrics, transport, sender, ...input } = options;
    this.config = resolveTransmissionConfig(input);
    this.log = logger ?? createLogger();
    this.metrics = metrics ?? noopMetrics;

    this.work = new BoundedQueue<Event>(this.config.pendingWorkCapacity);
    this.channel = new ResponseChannel({
      capacity: this.config.responseQueueSize,
      blockOnResponse: this.config.blockOnResponse,
      log: this.log,
      metrics: this.metrics,
    });

    this.aggregator = new BatchAggregator({
      sender: sender ?? new HttpBatchSender({
        log: this.log,
        transport,
        clock,
        metrics: this.metrics,
        userAgentAddition: this.config.userAgentAddition,
        requestTimeoutMs: this.config.requestTimeoutMs,
      }),
      responses: this.channel,
      overflow: this.overflow,
      limits: {
        maxEventBytes: this.config.maxEventBytes,
        maxBatchBytes: this.config.maxBatchBytes,
      },
      log: this.log,
      metrics: this.metrics,
    });
  }

  /** Starts the periodic aggregation tick. Idempotent. */
  start(): void {
    if (this.timer || this.stopped) return;

    this.timer = setInterval(() => {
      this.trigger();
    }, this.config.batchTimeoutMs);

    // Ensure timer doesn't prevent process exit
    this.timer.unref();
  }

  /**
   * Hands an event to the engine. Never rejects.
   *
   * Non-blocking (default): a full queue turns the event into a
   * "queue overflow" response instead. With `blockOnSend`, resolves
   * once the queue has accepted the event.
   */
  async add(event: Event): Promise<void> {
    if (this.stopped) {
      this.log.warn({ dataset: event.dataset }, 'Client is stopped, dropping event');
      return;
    }

    if (this.config.blockOnSend) {
      const accepted = await this.work.push(event);
      if (!accepted) {
        this.log.warn({ dataset: event.dataset }, 'Client stopped while waiting for queue space, dropping event');
        return;
      }
    } else if (!this.work.tryPush(event)) {
      this.metrics.increment('queue_overflow');
      const overflow: EventResponse = {
        statusCode: 0,
        durationMs: 0,
        metadata: event.metadata,
        error: new QueueOverflowError(),
      };
      await this.channel.deliver(overflow);
      return;
    }

    if (this.work.size >= this.config.maxBatchSize) {
      this.trigger();
    }
  }

  /** Runs an aggregation pass after any pass already in flight. */
  flush(): Promise<void> {
    this.passes = this.passes.then(() => this.runPass());
    return this.passes;
  }

  responses(): ResponseChannel {
    return this.channel;
  }

  /** Events waiting for the next pass, including deferred overflow. */
  pending(): number {
    return this.work.size + this.overflow.size;
  }

  /**
   * Stops the tick, flushes everything still queued or deferred, then
   * closes the response channel. Later `add()` calls are dropped.
   */
  async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;

    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }

    await this.flush();
    while (this.pending() > 0) {
      const before = this.pending();
      await this.flush();
      if (this.pending() >= before) {
        this.log.warn({ pending: before }, 'Stopping with undelivered events');
        break;
      }
    }

    this.work.close();
    this.channel.close();
  }

  /** Schedules one pass unless one is already waiting to run. */
  private trigger(): void {
    if (this.passQueued) return;
    this.passQueued = true;
    this.passes = this.passes.then(() => {
      this.passQueued = false;
      return this.runPass();
    });
  }

  private async runPass(): Promise<void> {
    const drained = this.work.drain();
    this.metrics.gauge('queue_length', drained.length);
    if (drained.length === 0 && this.overflow.isEmpty()) return;

    try {
      await this.aggregator.runPass(drained);
    } catch (err: unknown) {
      this.log.error({ err, count: drained.length }, 'Aggregation pass failed');
    }
  }
}
