/**
 * Error codes raised while decoding frames.
 * Every code describes a violation by the remote peer, never an internal fault.
 */

export enum FrameErrorCode {
  /** Connection-scoped frame received with a non-zero stream identifier */
  ERR_INVALID_STREAM_ID = 1,

  /** Payload length differs from what the frame type mandates */
  ERR_BAD_FRAME_SIZE = 2,

  /** Fewer bytes than a frame header */
  ERR_INCOMPLETE_HEADER = 3,

  /** Frame of another type handed to a PING-only decoder */
  ERR_UNEXPECTED_KIND = 4,
}

/**
 * Connection error codes sent in GOAWAY (RFC 9113 Section 7).
 * Only the codes this codec can lead to are listed.
 */
export enum Reason {
  PROTOCOL_ERROR = 0x1,
  FRAME_SIZE_ERROR = 0x6,
}

/**
 * Get human-readable description for error code
 */
export function getErrorMessage(code: FrameErrorCode): string {
  const messages: Record<FrameErrorCode, string> = {
    [FrameErrorCode.ERR_INVALID_STREAM_ID]: 'Invalid stream identifier',
    [FrameErrorCode.ERR_BAD_FRAME_SIZE]: 'Bad frame size',
    [FrameErrorCode.ERR_INCOMPLETE_HEADER]: 'Incomplete frame header',
    [FrameErrorCode.ERR_UNEXPECTED_KIND]: 'Unexpected frame type',
  };
  return messages[code] ?? 'Unknown frame error';
}

/**
 * Connection error code the owning connection should report for a decode failure
 */
export function reasonFor(code: FrameErrorCode): Reason {
  switch (code) {
    case FrameErrorCode.ERR_BAD_FRAME_SIZE:
    case FrameErrorCode.ERR_INCOMPLETE_HEADER:
      return Reason.FRAME_SIZE_ERROR;
    case FrameErrorCode.ERR_INVALID_STREAM_ID:
    case FrameErrorCode.ERR_UNEXPECTED_KIND:
      return Reason.PROTOCOL_ERROR;
  }
}

/**
 * Error thrown when a frame violates the protocol
 */
export class FrameError extends Error {
  constructor(
    public readonly code: FrameErrorCode,
    message?: string
  ) {
    super(message ?? getErrorMessage(code));
    this.name = 'FrameError';
  }

  get reason(): Reason {
    return reasonFor(this.code);
  }
}
