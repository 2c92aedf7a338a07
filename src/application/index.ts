export { envelopeSchema, parseEnvelope } from './envelope-schema.js';
export type { EnvelopeInput } from './envelope-schema.js';
export { Inbox, DEFAULT_INBOX_CAPACITY } from './inbox.js';
export { Subscription } from './subscription.js';
export { SubscriptionRegistry, DEFAULT_MAX_SUBSCRIBERS } from './registry.js';
export type { RegistryOptions } from './registry.js';
export { FanoutEngine } from './fanout-engine.js';
export type { FanoutEngineOptions } from './fanout-engine.js';
export { KeepAliveDriver, DEFAULT_KEEPALIVE_INTERVAL_MS } from './keep-alive.js';
export { createLocalFanoutPort } from './fanout-port.js';
export type { FanoutPort } from './fanout-port.js';
export { nicknameSchema, likertSchema, answerSchema } from './audience-schema.js';
export type { NicknameInput, LikertInput, LikertValue, AnswerInput } from './audience-schema.js';
export { AudienceStore, likertPercentage } from './audience-store.js';
