/**
 * PING payloads: the fixed 8-byte type, the reserved values and their classification.
 */

import { randomBytes } from '@noble/hashes/utils';
import { FrameErrorCode, FrameError } from '../types/errors.js';

/** PING payloads are always 8 octets */
export const PAYLOAD_SIZE = 8;

/**
 * Opaque PING payload, echoed verbatim between probe and response
 */
export type Payload = readonly [number, number, number, number, number, number, number, number];

type UserPrefix = readonly [number, number, number, number, number, number, number];

// Arbitrary fixed bytes, distinct from an all-zero keep-alive.
export const SHUTDOWN_PAYLOAD: Payload = [0x0b, 0x7b, 0xa2, 0xf0, 0x8b, 0x9b, 0xfe, 0x54];
Object.freeze(SHUTDOWN_PAYLOAD);

const USER_PREFIX: UserPrefix = [0x3b, 0x7c, 0xdb, 0x7a, 0x0b, 0x87, 0x16];

/** Tag byte carried in the last octet of a user payload */
export type UserPayloadId = 0 | 1;

function buildUserPayload(id: UserPayloadId): Payload {
  const payload: Payload = [...USER_PREFIX, id];
  Object.freeze(payload);
  return payload;
}

export const USER_PAYLOADS: readonly [Payload, Payload] = [buildUserPayload(0), buildUserPayload(1)];
Object.freeze(USER_PAYLOADS);

/**
 * Payload for the user ping with the given tag
 */
export function userPayload(id: UserPayloadId): Payload {
  return USER_PAYLOADS[id];
}

/**
 * Copy exactly 8 bytes into a payload.
 *
 * @throws FrameError with ERR_BAD_FRAME_SIZE for any other length
 */
export function payloadFromBytes(bytes: Uint8Array): Payload {
  if (bytes.length !== PAYLOAD_SIZE) {
    throw new FrameError(
      FrameErrorCode.ERR_BAD_FRAME_SIZE,
      `PING payload must be ${PAYLOAD_SIZE} bytes, got ${bytes.length}`
    );
  }

  return [bytes[0], bytes[1], bytes[2], bytes[3], bytes[4], bytes[5], bytes[6], bytes[7]];
}

/**
 * Check that every entry is a byte value (integer in 0..255).
 *
 * @throws RangeError naming the first offending index
 */
export function assertPayload(payload: Payload): void {
  payload.forEach((byte, i) => {
    if (!Number.isInteger(byte) || byte < 0 || byte > 0xff) {
      throw new RangeError(`PING payload byte ${i} is not in 0..255: ${byte}`);
    }
  });
}

export function payloadsEqual(a: Payload, b: Payload): boolean {
  return a.every((byte, i) => byte === b[i]);
}

/**
 * Tag of a user payload, or null when the first 7 bytes are not the user prefix.
 * Only the prefix is compared; the tag byte is returned as found.
 */
export function userPayloadId(payload: Payload): number | null {
  for (let i = 0; i < USER_PREFIX.length; i++) {
    if (payload[i] !== USER_PREFIX[i]) {
      return null;
    }
  }
  return payload[7];
}

export function isShutdownPayload(payload: Payload): boolean {
  return payloadsEqual(payload, SHUTDOWN_PAYLOAD);
}

export type PayloadClass =
  | { readonly kind: 'shutdown' }
  | { readonly kind: 'user'; readonly id: number }
  | { readonly kind: 'ordinary' };

/**
 * Classify a payload by the reserved values it matches
 */
export function classifyPayload(payload: Payload): PayloadClass {
  if (isShutdownPayload(payload)) {
    return { kind: 'shutdown' };
  }

  const id = userPayloadId(payload);
  if (id !== null) {
    return { kind: 'user', id };
  }

  return { kind: 'ordinary' };
}

/**
 * Random payload for an ordinary keep-alive probe.
 * Draws again on the rare hit of a reserved value.
 */
export function randomPayload(): Payload {
  for (;;) {
    const payload = payloadFromBytes(randomBytes(PAYLOAD_SIZE));
    if (classifyPayload(payload).kind === 'ordinary') {
      return payload;
    }
  }
}
