/**
 * Whole-frame helpers for PING: bytes in, message out and back.
 */

import { FRAME_HEADER_SIZE, FrameKind, isZeroStream } from '../types/frame.js';
import { FrameErrorCode, FrameError } from '../types/errors.js';
import { Ping } from '../frame/ping.js';
import { ByteBuffer } from './buffer.js';
import { parseHead } from './head.js';

/**
 * Encode a PING into a standalone 17-byte frame
 */
export function encodePing(ping: Ping): Uint8Array {
  const buffer = new ByteBuffer();
  ping.encode(buffer);
  return buffer.bytes();
}

/**
 * Decode one complete PING frame (header and payload).
 * `bytes` must hold exactly the frame the header declares.
 */
export function decodePingFrame(bytes: Uint8Array): Ping {
  const { head, length } = parseHead(bytes);

  if (head.kind !== FrameKind.PING) {
    throw new FrameError(
      FrameErrorCode.ERR_UNEXPECTED_KIND,
      `Expected PING frame (0x${FrameKind.PING.toString(16)}), got 0x${head.kind.toString(16)}`
    );
  }

  // Stream id is reported ahead of any size problem, truncated frames included.
  if (!isZeroStream(head)) {
    throw new FrameError(
      FrameErrorCode.ERR_INVALID_STREAM_ID,
      `PING frame on stream ${head.streamId}`
    );
  }

  const payload = bytes.subarray(FRAME_HEADER_SIZE);
  if (payload.length !== length) {
    throw new FrameError(
      FrameErrorCode.ERR_BAD_FRAME_SIZE,
      `Header declares ${length} payload bytes, got ${payload.length}`
    );
  }

  return Ping.load(head, payload);
}
