const INITIAL_CAPACITY = 256;
const GROWTH_FACTOR = 2;

/**
 * Destination for encoded bytes.
 */
export interface ByteSink {
  /** Writes the whole buffer or throws. */
  writeAll(bytes: Uint8Array): void;
  /** Pushes any buffered bytes to their destination. */
  flush(): void;
}

/**
 * BytesWriter collects encoded bytes into a growable in-memory buffer.
 */
export class BytesWriter implements ByteSink {
  private buffer: Uint8Array;
  private pos: number;

  constructor(initialCapacity: number = INITIAL_CAPACITY) {
    this.buffer = new Uint8Array(Math.max(1, initialCapacity));
    this.pos = 0;
  }

  /**
   * Returns the current position in the buffer.
   */
  get position(): number {
    return this.pos;
  }

  /**
   * Returns the encoded bytes. The view is invalidated by further writes.
   */
  bytes(): Uint8Array {
    return this.buffer.subarray(0, this.pos);
  }

  /**
   * Returns a copy of the encoded bytes that the writer no longer touches.
   */
  intoBytes(): Uint8Array {
    return this.buffer.slice(0, this.pos);
  }

  /**
   * Resets the writer for reuse.
   */
  reset(): void {
    this.pos = 0;
  }

  /**
   * Ensures the buffer has at least the specified capacity.
   */
  private ensureCapacity(needed: number): void {
    const required = this.pos + needed;
    if (required <= this.buffer.length) {
      return;
    }

    let newCapacity = this.buffer.length * GROWTH_FACTOR;
    while (newCapacity < required) {
      newCapacity *= GROWTH_FACTOR;
    }

    const newBuffer = new Uint8Array(newCapacity);
    newBuffer.set(this.buffer.subarray(0, this.pos));
    this.buffer = newBuffer;
  }

  /**
   * Writes a raw byte.
   */
  writeByte(value: number): void {
    this.ensureCapacity(1);
    this.buffer[this.pos++] = value & 0xff;
  }

  writeAll(bytes: Uint8Array): void {
    this.ensureCapacity(bytes.length);
    this.buffer.set(bytes, this.pos);
    this.pos += bytes.length;
  }

  flush(): void {
    // Nothing is buffered beyond the array itself.
  }
}
