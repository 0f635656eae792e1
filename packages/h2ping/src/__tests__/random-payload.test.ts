import { describe, it, expect, vi, beforeEach } from 'vitest';
import { randomBytes } from '@noble/hashes/utils';
import { SHUTDOWN_PAYLOAD, USER_PAYLOADS, randomPayload } from '../frame/payload.js';

vi.mock('@noble/hashes/utils', () => ({
  randomBytes: vi.fn(),
}));

describe('randomPayload', () => {
  beforeEach(() => {
    vi.mocked(randomBytes).mockReset();
  });

  it('should use 8 random bytes', () => {
    vi.mocked(randomBytes).mockReturnValueOnce(new Uint8Array([1, 1, 2, 3, 5, 8, 13, 21]));

    expect(randomPayload()).toEqual([1, 1, 2, 3, 5, 8, 13, 21]);
    expect(randomBytes).toHaveBeenCalledWith(8);
  });

  it('should draw again when it hits a reserved payload', () => {
    vi.mocked(randomBytes)
      .mockReturnValueOnce(Uint8Array.from(SHUTDOWN_PAYLOAD))
      .mockReturnValueOnce(Uint8Array.from(USER_PAYLOADS[1]))
      .mockReturnValueOnce(new Uint8Array([0x3b, 0x7c, 0xdb, 0x7a, 0x0b, 0x87, 0x16, 0x99]))
      .mockReturnValueOnce(new Uint8Array([9, 8, 7, 6, 5, 4, 3, 2]));

    expect(randomPayload()).toEqual([9, 8, 7, 6, 5, 4, 3, 2]);
    expect(randomBytes).toHaveBeenCalledTimes(4);
  });
});
