/**
 * Type definitions for the framing layer
 */

export {
  FrameKind,
  ACK_FLAG,
  FRAME_HEADER_SIZE,
  NO_STREAM,
  STREAM_ID_MASK,
  createHead,
  isZeroStream,
} from './frame.js';
export type { Head } from './frame.js';

export {
  FrameErrorCode,
  Reason,
  getErrorMessage,
  reasonFor,
  FrameError,
} from './errors.js';
