import { z } from 'zod';
import { ConfigError } from '../domain/index.js';

/** Hard API limit on one event's serialized data. */
export const DEFAULT_MAX_EVENT_BYTES = 100_000;

/** Hard API limit on one uncompressed batch body. */
export const DEFAULT_MAX_BATCH_BYTES = 5_000_000;

/**
 * Zod schema for client configuration.
 *
 * Every field is optional; an empty object yields a usable client.
 * `pendingWorkCapacity` of 0 is valid and means every non-blocking
 * `add()` overflows.
 */
export const transmissionConfigSchema = z
  .object({
    pendingWorkCapacity: z.number().int().min(0).default(100),
    responseQueueSize: z.number().int().min(0).default(100),
    blockOnSend: z.boolean().default(false),
    blockOnResponse: z.boolean().default(false),
    maxEventBytes: z.number().int().positive().default(DEFAULT_MAX_EVENT_BYTES),
    maxBatchBytes: z.number().int().positive().default(DEFAULT_MAX_BATCH_BYTES),
    /** Queue length that triggers a pass without waiting for the tick. */
    maxBatchSize: z.number().int().positive().default(50),
    batchTimeoutMs: z.number().int().positive().default(100),
    requestTimeoutMs: z.number().int().positive().default(60_000),
    userAgentAddition: z.string().default(''),
  })
  .refine(
    (cfg) => cfg.maxBatchBytes >= cfg.maxEventBytes + 2,
    {
      message: 'maxBatchBytes must leave room for at least one event of maxEventBytes',
      path: ['maxBatchBytes'],
    },
  );

export type TransmissionConfigInput = z.input<typeof transmissionConfigSchema>;
export type TransmissionConfig = z.output<typeof transmissionConfigSchema>;

/**
 * Validates user-supplied options and applies defaults.
 * Throws ConfigError carrying the zod issues on invalid input.
 */
export function resolveTransmissionConfig(input: TransmissionConfigInput = {}): TransmissionConfig {
  const parsed = transmissionConfigSchema.safeParse(input);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      path: issue.path,
      message: issue.message,
    }));
    throw new ConfigError(
      `Invalid transmission config: ${issues.map((i) => `${i.path.join('.') || '(root)'} ${i.message}`).join('; ')}`,
      issues,
    );
  }

  return parsed.data;
}

const ENV_INTEGERS = {
  TRANSMISSION_PENDING_WORK_CAPACITY: 'pendingWorkCapacity',
  TRANSMISSION_RESPONSE_QUEUE_SIZE: 'responseQueueSize',
  TRANSMISSION_MAX_BATCH_SIZE: 'maxBatchSize',
  TRANSMISSION_BATCH_TIMEOUT_MS: 'batchTimeoutMs',
  TRANSMISSION_REQUEST_TIMEOUT_MS: 'requestTimeoutMs',
} as const;

const ENV_BOOLEANS = {
  TRANSMISSION_BLOCK_ON_SEND: 'blockOnSend',
  TRANSMISSION_BLOCK_ON_RESPONSE: 'blockOnResponse',
} as const;

/**
 * Reads option overrides from environment variables.
 *
 * Unset or unparseable values are skipped so that the schema defaults
 * (or explicit options merged over this result) apply instead.
 */
export function readConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): TransmissionConfigInput {
  const out: TransmissionConfigInput = {};

  for (const [name, key] of Object.entries(ENV_INTEGERS)) {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') continue;
    const value = Number(raw);
    if (Number.isInteger(value)) {
      out[key] = value;
    }
  }

  for (const [name, key] of Object.entries(ENV_BOOLEANS)) {
    const raw = env[name]?.trim().toLowerCase();
    if (raw === 'true' || raw === '1') {
      out[key] = true;
    } else if (raw === 'false' || raw === '0') {
      out[key] = false;
    }
  }

  const addition = env['TRANSMISSION_USER_AGENT_ADDITION'];
  if (addition !== undefined) {
    out.userAgentAddition = addition;
  }

  return out;
}
