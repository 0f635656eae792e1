import { describe, it, expect } from 'vitest';
import {
  type Payload,
  SHUTDOWN_PAYLOAD,
  USER_PAYLOADS,
  classifyPayload,
  payloadFromBytes,
  payloadsEqual,
  userPayload,
  userPayloadId,
} from '../frame/payload.js';
import { FrameErrorCode, FrameError } from '../types/errors.js';

describe('payloads', () => {
  describe('reserved values', () => {
    it('should carry the shutdown bytes', () => {
      expect(SHUTDOWN_PAYLOAD).toEqual([0x0b, 0x7b, 0xa2, 0xf0, 0x8b, 0x9b, 0xfe, 0x54]);
    });

    it('should carry the user bytes with tags 0 and 1', () => {
      expect(USER_PAYLOADS[0]).toEqual([0x3b, 0x7c, 0xdb, 0x7a, 0x0b, 0x87, 0x16, 0x00]);
      expect(USER_PAYLOADS[1]).toEqual([0x3b, 0x7c, 0xdb, 0x7a, 0x0b, 0x87, 0x16, 0x01]);
    });

    it('should be frozen', () => {
      expect(Object.isFrozen(SHUTDOWN_PAYLOAD)).toBe(true);
      expect(Object.isFrozen(USER_PAYLOADS)).toBe(true);
      expect(Object.isFrozen(USER_PAYLOADS[0])).toBe(true);
      expect(Object.isFrozen(USER_PAYLOADS[1])).toBe(true);
    });

    it('should look up user payloads by tag', () => {
      expect(userPayload(0)).toBe(USER_PAYLOADS[0]);
      expect(userPayload(1)).toBe(USER_PAYLOADS[1]);
    });
  });

  describe('payloadFromBytes', () => {
    it('should copy exactly 8 bytes', () => {
      const bytes = new Uint8Array([8, 7, 6, 5, 4, 3, 2, 1]);
      const payload = payloadFromBytes(bytes);
      bytes[0] = 0;
      expect(payload).toEqual([8, 7, 6, 5, 4, 3, 2, 1]);
    });

    it('should reject other lengths', () => {
      expect(() => payloadFromBytes(new Uint8Array(7))).toThrow(FrameError);
      expect(() => payloadFromBytes(new Uint8Array(9))).toThrow('PING payload must be 8 bytes, got 9');
    });

    it('should use the frame size error code', () => {
      try {
        payloadFromBytes(new Uint8Array(0));
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(FrameError);
        expect(err).toHaveProperty('code', FrameErrorCode.ERR_BAD_FRAME_SIZE);
      }
    });
  });

  describe('classifyPayload', () => {
    it('should classify the shutdown payload', () => {
      expect(classifyPayload(SHUTDOWN_PAYLOAD)).toEqual({ kind: 'shutdown' });
    });

    it('should classify user payloads with their tag', () => {
      expect(classifyPayload(USER_PAYLOADS[0])).toEqual({ kind: 'user', id: 0 });
      expect(classifyPayload(USER_PAYLOADS[1])).toEqual({ kind: 'user', id: 1 });
    });

    it('should classify anything else as ordinary', () => {
      expect(classifyPayload([0, 0, 0, 0, 0, 0, 0, 0])).toEqual({ kind: 'ordinary' });
      const nearShutdown: Payload = [0x0b, 0x7b, 0xa2, 0xf0, 0x8b, 0x9b, 0xfe, 0x55];
      expect(classifyPayload(nearShutdown)).toEqual({ kind: 'ordinary' });
    });
  });

  describe('helpers', () => {
    it('should compare payloads by value', () => {
      expect(payloadsEqual([...SHUTDOWN_PAYLOAD], SHUTDOWN_PAYLOAD)).toBe(true);
      expect(payloadsEqual(USER_PAYLOADS[0], USER_PAYLOADS[1])).toBe(false);
    });

    it('should read the user tag from the last byte', () => {
      expect(userPayloadId(USER_PAYLOADS[1])).toBe(1);
      expect(userPayloadId([0x3c, 0x7c, 0xdb, 0x7a, 0x0b, 0x87, 0x16, 0x01])).toBeNull();
    });
  });
});
