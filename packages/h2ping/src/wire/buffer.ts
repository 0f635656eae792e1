/**
 * Output sinks for encoded frames.
 */

/**
 * Destination for encoded bytes. Encoders hand over each frame in one call.
 */
export interface ByteSink {
  put(bytes: Uint8Array): void;
}

/**
 * Growable in-memory sink
 */
export class ByteBuffer implements ByteSink {
  private buffer: Uint8Array = new Uint8Array(0);

  /**
   * Append data to the buffer
   */
  put(data: Uint8Array): void {
    const newBuffer = new Uint8Array(this.buffer.length + data.length);
    newBuffer.set(this.buffer, 0);
    newBuffer.set(data, this.buffer.length);
    this.buffer = newBuffer;
  }

  /**
   * Copy of everything written so far
   */
  bytes(): Uint8Array {
    return this.buffer.slice();
  }

  get size(): number {
    return this.buffer.length;
  }

  clear(): void {
    this.buffer = new Uint8Array(0);
  }
}
