/**
 * Frame-level type definitions shared by the codec and the wire helpers.
 */

/**
 * Frame type identifiers (RFC 9113 Section 6)
 */
export enum FrameKind {
  DATA = 0x0,
  HEADERS = 0x1,
  PRIORITY = 0x2,
  RST_STREAM = 0x3,
  SETTINGS = 0x4,
  PUSH_PROMISE = 0x5,
  PING = 0x6,
  GOAWAY = 0x7,
  WINDOW_UPDATE = 0x8,
  CONTINUATION = 0x9,
}

/** ACK flag, bit 0 of the flags byte on PING and SETTINGS frames */
export const ACK_FLAG = 0x1;

/** Size of the generic frame header in bytes */
export const FRAME_HEADER_SIZE = 9;

/** Stream identifier reserved for connection-scoped frames */
export const NO_STREAM = 0;

/** Stream identifiers are 31 bits; the high bit of the field is reserved */
export const STREAM_ID_MASK = 0x7fffffff;

/**
 * Parsed generic frame header
 */
export interface Head {
  readonly kind: FrameKind;
  readonly flags: number;
  readonly streamId: number;
}

/**
 * Create a frame head
 */
export function createHead(kind: FrameKind, flags: number, streamId: number = NO_STREAM): Head {
  return { kind, flags, streamId };
}

export function isZeroStream(head: Head): boolean {
  return head.streamId === NO_STREAM;
}
