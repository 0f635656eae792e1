/**
 * Hex encoding/decoding for frame dumps.
 */

/**
 * Convert a byte array to a lowercase hex string
 */
export function bytesToHex(bytes: ArrayLike<number>): string {
  return Array.from(bytes)
    .map(b => b.toString(16).padStart(2, '0'))
    .join('');
}

/**
 * Convert a hex string to a byte array.
 * Whitespace between digits is ignored, so `3b 7c db` and `3b7cdb` are equivalent.
 */
export function hexToBytes(hex: string): Uint8Array {
  const compact = hex.replace(/\s+/g, '');
  if (compact.length % 2 !== 0) {
    throw new Error('Invalid hex string: odd length');
  }
  const bytes = new Uint8Array(compact.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    const pair = compact.slice(i * 2, i * 2 + 2);
    if (!/^[0-9a-fA-F]{2}$/.test(pair)) {
      throw new Error(`Invalid hex character at position ${i * 2}`);
    }
    bytes[i] = parseInt(pair, 16);
  }
  return bytes;
}

/**
 * Validate that a string is valid hex
 */
export function isValidHex(hex: string): boolean {
  const compact = hex.replace(/\s+/g, '');
  return compact.length % 2 === 0 && /^[0-9a-fA-F]*$/.test(compact);
}
