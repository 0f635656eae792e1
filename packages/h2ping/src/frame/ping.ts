/**
 * PING frame (RFC 9113 Section 6.7).
 * Connection-scoped liveness probe carrying 8 bytes of opaque data.
 */

import {
  ACK_FLAG,
  FRAME_HEADER_SIZE,
  FrameKind,
  type Head,
  NO_STREAM,
  createHead,
  isZeroStream,
} from '../types/frame.js';
import { FrameErrorCode, FrameError } from '../types/errors.js';
import type { ByteSink } from '../wire/buffer.js';
import { writeHead } from '../wire/head.js';
import { logger } from '../utils/logger.js';
import {
  type Payload,
  SHUTDOWN_PAYLOAD,
  USER_PAYLOADS,
  assertPayload,
  isShutdownPayload,
  payloadFromBytes,
  payloadsEqual,
  userPayloadId,
} from './payload.js';

export class Ping {
  static readonly SHUTDOWN: Payload = SHUTDOWN_PAYLOAD;
  static readonly USERS: readonly [Payload, Payload] = USER_PAYLOADS;

  private readonly ack: boolean;
  private readonly data: Payload;

  private constructor(ack: boolean, payload: Payload) {
    assertPayload(payload);
    const data: Payload = [...payload];
    Object.freeze(data);

    this.ack = ack;
    this.data = data;
  }

  /**
   * Create a probe (no ACK flag)
   *
   * @throws RangeError when an entry is not a byte value
   */
  static probe(payload: Payload): Ping {
    return new Ping(false, payload);
  }

  /**
   * Create a response to a probe, echoing its payload
   *
   * @throws RangeError when an entry is not a byte value
   */
  static pong(payload: Payload): Ping {
    return new Ping(true, payload);
  }

  isAck(): boolean {
    return this.ack;
  }

  payload(): Payload {
    return this.data;
  }

  /**
   * The payload as a fresh byte array owned by the caller
   */
  intoPayload(): Uint8Array {
    return Uint8Array.from(this.data);
  }

  /**
   * Tag byte when the payload carries the user-ping prefix
   */
  userPayloadId(): number | null {
    return userPayloadId(this.data);
  }

  isShutdown(): boolean {
    return isShutdownPayload(this.data);
  }

  equals(other: Ping): boolean {
    return this.ack === other.ack && payloadsEqual(this.data, other.data);
  }

  /**
   * Build a PING from a demultiplexed frame header and its raw payload.
   * The input buffer is copied, never retained.
   *
   * @throws FrameError ERR_INVALID_STREAM_ID when the stream id is not 0
   * @throws FrameError ERR_BAD_FRAME_SIZE when the payload is not 8 bytes
   */
  static load(head: Head, bytes: Uint8Array): Ping {
    // PING is not associated with any stream; a non-zero id is a connection
    // error of type PROTOCOL_ERROR. Checked before the size.
    if (!isZeroStream(head)) {
      throw new FrameError(
        FrameErrorCode.ERR_INVALID_STREAM_ID,
        `PING frame on stream ${head.streamId}`
      );
    }

    const payload = payloadFromBytes(bytes);

    // Only bit 0 is defined; the remaining flag bits are ignored.
    const ack = (head.flags & ACK_FLAG) !== 0;

    return new Ping(ack, payload);
  }

  /**
   * Append the complete frame (header and payload) to `dst` in one write
   */
  encode(dst: ByteSink): void {
    const size = this.data.length;
    logger.debug(`encoding PING; ack=${this.ack} len=${size}`);

    const flags = this.ack ? ACK_FLAG : 0;
    const head = createHead(FrameKind.PING, flags, NO_STREAM);

    const frame = new Uint8Array(FRAME_HEADER_SIZE + size);
    writeHead(head, size, frame);
    frame.set(this.data, FRAME_HEADER_SIZE);

    dst.put(frame);
  }
}
