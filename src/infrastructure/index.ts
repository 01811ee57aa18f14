export {
  transmissionConfigSchema,
  resolveTransmissionConfig,
  readConfigFromEnv,
  DEFAULT_MAX_EVENT_BYTES,
  DEFAULT_MAX_BATCH_BYTES,
} from './config.js';
export type { TransmissionConfig, TransmissionConfigInput } from './config.js';
export { createLogger } from './logger.js';
export { HttpBatchSender, batchUrl, WRITE_KEY_HEADER } from './http/batch-sender.js';
export type { HttpBatchSenderOptions } from './http/batch-sender.js';
export { fetchTransport } from './http/transport.js';
export type { HttpTransport, HttpRequest, HttpReply } from './http/transport.js';
export { mapBatchResponses, batchStatusSchema } from './http/response-mapper.js';
export type { BatchExchange, BatchStatus } from './http/response-mapper.js';
export { buildUserAgent } from './http/user-agent.js';
export { WriterSender } from './writer/writer-sender.js';
export type { WriterSenderOptions } from './writer/writer-sender.js';
