import { describe, it, expect, vi, afterEach } from 'vitest';
import { FrameErrorCode, FrameError, Reason, getErrorMessage, reasonFor } from '../types/errors.js';
import { Logger } from '../utils/logger.js';
import { bytesToHex, hexToBytes, isValidHex } from '../utils/hex.js';

describe('errors', () => {
  it('should map decode failures to connection error codes', () => {
    expect(reasonFor(FrameErrorCode.ERR_INVALID_STREAM_ID)).toBe(Reason.PROTOCOL_ERROR);
    expect(reasonFor(FrameErrorCode.ERR_UNEXPECTED_KIND)).toBe(Reason.PROTOCOL_ERROR);
    expect(reasonFor(FrameErrorCode.ERR_BAD_FRAME_SIZE)).toBe(Reason.FRAME_SIZE_ERROR);
    expect(reasonFor(FrameErrorCode.ERR_INCOMPLETE_HEADER)).toBe(Reason.FRAME_SIZE_ERROR);
  });

  it('should default the message from the code', () => {
    const err = new FrameError(FrameErrorCode.ERR_BAD_FRAME_SIZE);
    expect(err.message).toBe(getErrorMessage(FrameErrorCode.ERR_BAD_FRAME_SIZE));
    expect(err.message).toBe('Bad frame size');
    expect(err.name).toBe('FrameError');
    expect(err.reason).toBe(Reason.FRAME_SIZE_ERROR);
    expect(err).toBeInstanceOf(Error);
  });
});

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should drop debug output unless enabled', () => {
    const spy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const logger = new Logger(false);

    logger.debug('hidden');
    expect(spy).not.toHaveBeenCalled();

    logger.setDebug(true);
    logger.debug('shown', { ack: true });
    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy.mock.calls[0][0]).toMatch(/^\[.+\] \[DEBUG\] shown \{"ack":true\}$/);
  });
});

describe('hex', () => {
  it('should encode lowercase with zero padding', () => {
    expect(bytesToHex(new Uint8Array([0x00, 0x0f, 0xab]))).toBe('000fab');
    expect(bytesToHex([0x3b, 0x7c])).toBe('3b7c');
  });

  it('should decode with or without whitespace', () => {
    expect(hexToBytes('3b 7c\tdb\n7a')).toEqual(new Uint8Array([0x3b, 0x7c, 0xdb, 0x7a]));
    expect(hexToBytes('3B7C')).toEqual(new Uint8Array([0x3b, 0x7c]));
  });

  it('should reject malformed input', () => {
    expect(() => hexToBytes('abc')).toThrow('Invalid hex string: odd length');
    expect(() => hexToBytes('zz')).toThrow('Invalid hex character at position 0');
    expect(isValidHex('0a 0b')).toBe(true);
    expect(isValidHex('0g')).toBe(false);
  });
});
