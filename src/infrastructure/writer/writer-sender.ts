import type { Writable } from 'node:stream';
import type { Logger } from 'pino';
import type { Event } from '../../domain/index.js';
import { EventEncodeError, localFailure } from '../../domain/index.js';
import type { Sender } from '../../application/sender.js';
import { ResponseChannel } from '../../application/response-channel.js';
import { encodeWriterLine } from '../../application/wire-format.js';
import { createLogger } from '../logger.js';

export interface WriterSenderOptions {
  /** Destination stream; defaults to process.stdout. */
  output?: Writable | undefined;
  blockOnResponse?: boolean | undefined;
  responseQueueSize?: number | undefined;
  logger?: Logger | undefined;
}

/**
 * Synchronous alternative to the batching engine: writes each event as
 * one JSON line and reports a placeholder response through the same
 * channel contract.
 *
 * Nothing is batched or sent over the network, so the placeholder has
 * status 0, no duration and no error.
 */
export class WriterSender implements Sender {
  private readonly output: Writable;
  private readonly channel: ResponseChannel;
  private readonly log: Logger;

  constructor(options: WriterSenderOptions = {}) {
    this.output = options.output ?? process.stdout;
    this.log = options.logger ?? createLogger();
    this.channel = new ResponseChannel({
      capacity: options.responseQueueSize ?? 100,
      blockOnResponse: options.blockOnResponse ?? false,
      log: this.log,
    });

    this.output.on('error', (err: unknown) => {
      this.log.error({ err }, 'Writer output stream failed');
    });
  }

  start(): void {}

  async stop(): Promise<void> {
    this.channel.close();
  }

  async add(event: Event): Promise<void> {
    let line: string;
    try {
      line = encodeWriterLine(event);
    } catch (err: unknown) {
      const error = err instanceof EventEncodeError ? err : new EventEncodeError(err);
      this.log.warn({ err: error, dataset: event.dataset }, 'Failed to encode event for writer output');
      await this.channel.deliver(localFailure(event, error));
      return;
    }

    this.output.write(`${line}\n`);
    await this.channel.deliver({
      statusCode: 0,
      durationMs: 0,
      metadata: event.metadata,
    });
  }

  responses(): ResponseChannel {
    return this.channel;
  }
}
