/**
 * Generic frame header encoding.
 *
 * | length (24) | type (8) | flags (8) | R (1) + stream id (31) |
 *
 * All fields are big-endian.
 */

import { FRAME_HEADER_SIZE, STREAM_ID_MASK, type Head } from '../types/frame.js';
import { FrameErrorCode, FrameError } from '../types/errors.js';

/** Largest length the 24-bit field can carry */
const MAX_PAYLOAD_LENGTH = 0xffffff;

/**
 * Write a frame header for a payload of `payloadLength` bytes into `dst` at `offset`
 */
export function writeHead(head: Head, payloadLength: number, dst: Uint8Array, offset: number = 0): void {
  if (!Number.isInteger(payloadLength) || payloadLength < 0 || payloadLength > MAX_PAYLOAD_LENGTH) {
    throw new RangeError(`Payload length out of range: ${payloadLength}`);
  }

  const view = new DataView(dst.buffer, dst.byteOffset + offset, FRAME_HEADER_SIZE);
  view.setUint8(0, (payloadLength >>> 16) & 0xff);
  view.setUint16(1, payloadLength & 0xffff);
  view.setUint8(3, head.kind);
  view.setUint8(4, head.flags & 0xff);
  view.setUint32(5, head.streamId & STREAM_ID_MASK);
}

/**
 * Encode a frame header into a fresh 9-byte array
 */
export function encodeHead(head: Head, payloadLength: number): Uint8Array {
  const bytes = new Uint8Array(FRAME_HEADER_SIZE);
  writeHead(head, payloadLength, bytes);
  return bytes;
}

/**
 * Result of parsing a frame header
 */
export interface ParsedHead {
  head: Head;
  /** Payload length declared by the header */
  length: number;
}

/**
 * Parse a frame header from the start of `bytes`.
 * The reserved bit in front of the stream identifier is dropped.
 */
export function parseHead(bytes: Uint8Array): ParsedHead {
  if (bytes.length < FRAME_HEADER_SIZE) {
    throw new FrameError(
      FrameErrorCode.ERR_INCOMPLETE_HEADER,
      `Frame header needs ${FRAME_HEADER_SIZE} bytes, got ${bytes.length}`
    );
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, FRAME_HEADER_SIZE);
  const length = (view.getUint8(0) << 16) | view.getUint16(1);

  return {
    head: {
      kind: view.getUint8(3),
      flags: view.getUint8(4),
      streamId: view.getUint32(5) & STREAM_ID_MASK,
    },
    length,
  };
}
