/**
 * Option parsing and output formatting shared by the commands
 */

import { InvalidArgumentError } from 'commander';
import {
  FrameError,
  FrameErrorCode,
  type Payload,
  type PayloadClass,
  Ping,
  type UserPayloadId,
  bytesToHex,
  classifyPayload,
  hexToBytes,
  isValidHex,
  payloadFromBytes,
  randomPayload,
  userPayload,
} from 'h2ping';

export interface EncodeOptions {
  ack: boolean;
  payload?: Uint8Array;
  shutdown?: boolean;
  user?: UserPayloadId;
  random?: boolean;
}

const ZERO_PAYLOAD: Payload = [0, 0, 0, 0, 0, 0, 0, 0];

/**
 * commander argument parser for `--user`
 */
export function parseUserId(value: string): UserPayloadId {
  if (value === '0') return 0;
  if (value === '1') return 1;
  throw new InvalidArgumentError(`User ping id must be 0 or 1, got "${value}"`);
}

/**
 * commander argument parser for hex input; whitespace between bytes is allowed
 */
export function parseHex(value: string): Uint8Array {
  if (!isValidHex(value)) {
    throw new InvalidArgumentError(`Not a hex byte string: "${value}"`);
  }
  return hexToBytes(value);
}

/**
 * Pick the payload selected by the encode options
 */
export function resolvePayload(options: EncodeOptions): Payload {
  const selected = [
    options.payload !== undefined,
    options.shutdown === true,
    options.user !== undefined,
    options.random === true,
  ].filter(Boolean).length;

  if (selected > 1) {
    throw new Error('Choose only one of --payload, --shutdown, --user and --random');
  }

  if (options.payload !== undefined) return payloadFromBytes(options.payload);
  if (options.shutdown) return Ping.SHUTDOWN;
  if (options.user !== undefined) return userPayload(options.user);
  if (options.random) return randomPayload();
  return ZERO_PAYLOAD;
}

export function formatClass(payloadClass: PayloadClass): string {
  switch (payloadClass.kind) {
    case 'shutdown':
      return 'shutdown';
    case 'user':
      return `user:${payloadClass.id}`;
    case 'ordinary':
      return 'ordinary';
  }
}

/**
 * Human-readable lines for a decoded PING
 */
export function describePing(ping: Ping): string[] {
  return [
    `ack: ${ping.isAck()}`,
    `payload: ${bytesToHex(ping.payload())}`,
    `class: ${formatClass(classifyPayload(ping.payload()))}`,
  ];
}

export function formatError(err: unknown): string {
  if (err instanceof FrameError) {
    return `error: ${err.message} (${FrameErrorCode[err.code]})`;
  }
  return `error: ${err instanceof Error ? err.message : String(err)}`;
}
