export { formatEnvelope, parseBlock, SseDecoder } from './framing.js';
export { pipeEnvelopes, SSE_HEADERS } from './stream-response.js';
export { RemoteEnvelopeStream } from './remote-stream.js';
