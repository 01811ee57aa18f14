import type { Logger } from 'pino';
import type { EventResponse } from '../domain/index.js';
import { BoundedQueue } from './bounded-queue.js';
import { noopMetrics, type TransmissionMetrics } from './metrics.js';

export interface ResponseChannelOptions {
  capacity: number;
  /** Wait for room instead of dropping when the channel is full. */
  blockOnResponse: boolean;
  log: Logger;
  metrics?: TransmissionMetrics | undefined;
}

/**
 * Bounded conduit of per-event outcomes, read by the application at its
 * own pace.
 *
 * In the default non-blocking mode a full channel drops the response:
 * a consumer that does not keep up loses visibility of results, never
 * progress of the pipeline. In blocking mode the consumer's backpressure
 * propagates into whoever is delivering.
 */
export class ResponseChannel implements AsyncIterable<EventResponse> {
  private readonly queue: BoundedQueue<EventResponse>;
  private readonly blockOnResponse: boolean;
  private readonly log: Logger;
  private readonly metrics: TransmissionMetrics;

  constructor(options: ResponseChannelOptions) {
    this.queue = new BoundedQueue<EventResponse>(options.capacity);
    this.blockOnResponse = options.blockOnResponse;
    this.log = options.log;
    this.metrics = options.metrics ?? noopMetrics;
  }

  /**
   * Pushes a response using the configured policy.
   * Resolves true if the response is now on the channel.
   */
  async deliver(response: EventResponse): Promise<boolean> {
    const delivered = this.blockOnResponse
      ? await this.queue.push(response)
      : this.queue.tryPush(response);

    if (!delivered) {
      this.metrics.increment('responses_dropped');
      this.log.debug(
        { statusCode: response.statusCode, closed: this.queue.closed },
        'Response dropped',
      );
    }

    return delivered;
  }

  /** Waits for the next response; undefined once closed and drained. */
  receive(): Promise<EventResponse | undefined> {
    return this.queue.receive();
  }

  tryReceive(): EventResponse | undefined {
    return this.queue.tryReceive();
  }

  get size(): number {
    return this.queue.size;
  }

  get capacity(): number {
    return this.queue.capacity;
  }

  get closed(): boolean {
    return this.queue.closed;
  }

  close(): void {
    this.queue.close();
  }

  [Symbol.asyncIterator](): AsyncIterator<EventResponse> {
    return this.queue[Symbol.asyncIterator]();
  }
}
