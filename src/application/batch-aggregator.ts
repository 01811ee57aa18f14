import type { Logger } from 'pino';
import type { DestinationKey, Event, EventResponse } from '../domain/index.js';
import { destinationKey, localFailure, EventEncodeError, EventTooLargeError } from '../domain/index.js';
import type { BatchSender } from './sender.js';
import type { ResponseChannel } from './response-channel.js';
import type { OverflowStore } from './overflow-store.js';
import { noopMetrics, type TransmissionMetrics } from './metrics.js';
import { byteLength, encodeBatch, encodeEvent, encodeEventData } from './wire-format.js';

export interface BatchLimits {
  /** Ceiling for one event's serialized data. */
  maxEventBytes: number;
  /** Ceiling for the uncompressed JSON array of one request. */
  maxBatchBytes: number;
}

/** Dependencies bundled for the aggregator. */
export interface AggregatorDeps {
  sender: BatchSender;
  responses: ResponseChannel;
  overflow: OverflowStore;
  limits: BatchLimits;
  log: Logger;
  metrics?: TransmissionMetrics | undefined;
}

/**
 * Groups drained events by destination, builds size-bounded batches and
 * hands them to the sender.
 *
 * One `runPass()` fully drains its input: whatever does not fit in a
 * request is parked in the overflow store and re-fired within the same
 * pass until the store is empty, so a single trigger clears a backlog.
 */
export class BatchAggregator {
  private readonly sender: BatchSender;
  private readonly responses: ResponseChannel;
  private readonly overflow: OverflowStore;
  private readonly limits: BatchLimits;
  private readonly log: Logger;
  private readonly metrics: TransmissionMetrics;

  constructor(deps: AggregatorDeps) {
    this.sender = deps.sender;
    this.responses = deps.responses;
    this.overflow = deps.overflow;
    this.limits = deps.limits;
    this.log = deps.log;
    this.metrics = deps.metrics ?? noopMetrics;
  }

  /**
   * One aggregation pass.
   *
   * 1. Group the drained events by destination key.
   * 2. Put any overflowed events for a key ahead of its new events.
   * 3. Fire every group; groups run concurrently.
   * 4. Re-fire the overflow store until it is empty or stops shrinking.
   *
   * Never rejects: a failure in one group is reported on that group's
   * responses and does not affect the others.
   */
  async runPass(drained: readonly Event[]): Promise<void> {
    const groups = groupByDestination(drained);

    for (const key of this.overflow.keys()) {
      const deferred = this.overflow.take(key);
      groups.set(key, [...deferred, ...(groups.get(key) ?? [])]);
    }

    await this.fireGroups(groups);

    while (!this.overflow.isEmpty()) {
      const before = this.overflow.size;
      const round = new Map<DestinationKey, Event[]>();
      for (const key of this.overflow.keys()) {
        round.set(key, this.overflow.take(key));
      }

      await this.fireGroups(round);

      if (this.overflow.size >= before) {
        this.log.warn(
          { pending: this.overflow.size, keys: this.overflow.keyCount },
          'Overflow did not shrink, deferring remainder to next pass',
        );
        break;
      }
    }
  }

  /**
   * Builds and sends one batch for events sharing a destination key.
   *
   * Events that cannot be encoded, or whose data exceeds
   * `maxEventBytes`, are failed locally and never sent. The rest are
   * packed in order until the next event would push the array past
   * `maxBatchBytes`; that event and everything after it go to the
   * overflow store for this key.
   */
  async fireBatch(events: readonly Event[]): Promise<void> {
    const first = events[0];
    if (first === undefined) return;
    const key = destinationKey(first);

    const batch: Event[] = [];
    const encoded: string[] = [];
    // Opening and closing brackets
    let batchBytes = 2;

    for (let i = 0; i < events.length; i++) {
      const event = events[i];
      if (event === undefined) continue;

      let json: string;
      let dataBytes: number;
      try {
        dataBytes = byteLength(encodeEventData(event));
        json = encodeEvent(event);
      } catch (err: unknown) {
        const error = err instanceof EventEncodeError ? err : new EventEncodeError(err);
        this.metrics.increment('events_encode_failed');
        await this.responses.deliver(localFailure(event, error));
        continue;
      }

      if (dataBytes > this.limits.maxEventBytes) {
        this.metrics.increment('events_oversize');
        this.log.debug({ key, bytes: dataBytes }, 'Event exceeds max event size');
        await this.responses.deliver(
          localFailure(event, new EventTooLargeError(this.limits.maxEventBytes, dataBytes)),
        );
        continue;
      }

      const added = byteLength(json) + (encoded.length > 0 ? 1 : 0);
      if (encoded.length > 0 && batchBytes + added > this.limits.maxBatchBytes) {
        const remainder = events.slice(i);
        this.overflow.append(key, remainder);
        this.metrics.increment('overflow_deferred', remainder.length);
        this.log.debug(
          { key, sent: encoded.length, deferred: remainder.length },
          'Batch exceeds max batch size, deferring remainder',
        );
        break;
      }

      batch.push(event);
      encoded.push(json);
      batchBytes += added;
    }

    if (batch.length === 0) return;

    let responses: EventResponse[];
    try {
      responses = await this.sender.send(batch, encodeBatch(encoded));
    } catch (err: unknown) {
      this.log.error({ err, key, count: batch.length }, 'Batch sender failed unexpectedly');
      const error = err instanceof Error ? err : new Error(String(err));
      responses = batch.map((event) => localFailure(event, error));
    }

    for (const response of responses) {
      await this.responses.deliver(response);
    }
  }

  private async fireGroups(groups: ReadonlyMap<DestinationKey, Event[]>): Promise<void> {
    await Promise.all(
      [...groups.values()].map((events) => this.fireBatch(events)),
    );
  }
}

/** Groups events by destination key, keys in first-seen order, events in input order. */
export function groupByDestination(events: readonly Event[]): Map<DestinationKey, Event[]> {
  const groups = new Map<DestinationKey, Event[]>();
  for (const event of events) {
    const key = destinationKey(event);
    const group = groups.get(key);
    if (group) {
      group.push(event);
    } else {
      groups.set(key, [event]);
    }
  }
  return groups;
}
