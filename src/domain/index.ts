export type { Envelope, EnvelopeStream, PublishResult } from './envelope.js';
export {
  START_CATEGORY,
  START_PAYLOAD,
  START_ENVELOPE,
  PING_CATEGORY,
  KEEPALIVE_PAYLOAD,
  createEnvelope,
} from './envelope.js';
export {
  FanoutError,
  EnvelopeValidationError,
  SubscriptionLimitError,
  EngineClosedError,
  BoundaryConnectionError,
  FramingError,
} from './errors.js';
