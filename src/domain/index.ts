export type { Event, EventData, EventResponse, DestinationKey } from './event.js';
export { destinationKey, localFailure } from './event.js';
export {
  TransmissionError,
  QueueOverflowError,
  EventTooLargeError,
  EventEncodeError,
  TransportError,
  ResponseBodyReadError,
  ResponseDecodeError,
  ResponseMismatchError,
  ServerEventError,
  HttpStatusError,
  ConfigError,
  isSuccessStatus,
} from './errors.js';
export type { TransmissionErrorCode } from './errors.js';
