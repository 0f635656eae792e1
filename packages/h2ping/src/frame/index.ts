/**
 * PING message codec
 */

export { Ping } from './ping.js';

export {
  PAYLOAD_SIZE,
  SHUTDOWN_PAYLOAD,
  USER_PAYLOADS,
  userPayload,
  payloadFromBytes,
  assertPayload,
  payloadsEqual,
  userPayloadId,
  isShutdownPayload,
  classifyPayload,
  randomPayload,
} from './payload.js';
export type { Payload, UserPayloadId, PayloadClass } from './payload.js';
