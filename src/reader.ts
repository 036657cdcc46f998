import { BufferUnderflowError, LengthLimitExceededError, Utf8Error } from "./errors";
import { DEFAULT_MAX_LENGTH, decodeLarge, decodeSmall } from "./types";
import type { Visitor } from "./traversal";

// Module-level singleton to avoid repeated instantiation.
// ignoreBOM keeps a leading U+FEFF in the decoded text.
const textDecoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/**
 * Decode UTF-8, rejecting malformed input.
 */
export function decodeUtf8(bytes: Uint8Array): string {
  try {
    return textDecoder.decode(bytes);
  } catch (e) {
    throw new Utf8Error(e);
  }
}

/**
 * Options shared by every byte source.
 */
export interface SourceOptions {
  /** Largest framed length accepted on decode. Default: 64 MB */
  maxLength?: number;
}

/**
 * Source of bytes for the decoder.
 */
export interface ByteSource {
  /** Fills `buf` completely or throws. */
  readExact(buf: Uint8Array): void;
  /** Reads framed text and hands it to the visitor, borrowed if the source can. */
  visitStr<T>(visitor: Visitor<T>): T;
  /** Reads framed bytes and hands them to the visitor, borrowed if the source can. */
  visitBytes<T>(visitor: Visitor<T>): T;
  /** Reads `n` bytes into a new array. */
  readFixed(n: number): Uint8Array;
  /** Reads `n` bytes whose count came off the wire. */
  readVec(n: number): Uint8Array;
  /** Reads bytes framed by a one-byte length. */
  readFramedSmall(): Uint8Array;
  /** Reads a two-tier length. */
  readLength(): number;
  /** Reads bytes framed by a two-tier length into a new array. */
  readFramedLarge(): Uint8Array;
}

/**
 * Framing helpers shared by the slice-backed and stream-backed sources,
 * derived from `readExact`.
 */
export abstract class BaseSource implements ByteSource {
  protected readonly maxLength: number;

  constructor(options: SourceOptions = {}) {
    this.maxLength = options.maxLength ?? DEFAULT_MAX_LENGTH;
  }

  abstract readExact(buf: Uint8Array): void;
  abstract visitStr<T>(visitor: Visitor<T>): T;
  abstract visitBytes<T>(visitor: Visitor<T>): T;

  readFixed(n: number): Uint8Array {
    const bytes = new Uint8Array(n);
    this.readExact(bytes);
    return bytes;
  }

  readVec(n: number): Uint8Array {
    return this.readFixed(n);
  }

  readFramedSmall(): Uint8Array {
    const len = decodeSmall(this.readFixed(1)[0]);
    return this.readVec(len);
  }

  readLength(): number {
    const tier1 = decodeSmall(this.readFixed(1)[0]);
    const len = decodeLarge(this.readVec(tier1));
    if (!Number.isSafeInteger(len) || len > this.maxLength) {
      throw new LengthLimitExceededError(len, this.maxLength);
    }
    return len;
  }

  readFramedLarge(): Uint8Array {
    return this.readVec(this.readLength());
  }
}

/**
 * Options for the slice-backed source.
 */
export interface BytesReaderOptions extends SourceOptions {
  /**
   * Let `readExact` succeed on a short buffer: the available bytes are copied,
   * the rest of the destination is left as it was, and a warning is logged.
   * Borrowed reads always fail on shortage. Default: false
   */
  lenientReads?: boolean;
}

/**
 * BytesReader decodes from an in-memory buffer. Text and bytes requested
 * through `visitStr`/`visitBytes` are handed out as views into that buffer.
 */
export class BytesReader extends BaseSource {
  private buffer: Uint8Array;
  private pos: number;
  private end: number;
  private lenientReads: boolean;

  constructor(data: Uint8Array, options: BytesReaderOptions = {}) {
    super(options);
    this.buffer = data;
    this.pos = 0;
    this.end = data.length;
    this.lenientReads = options.lenientReads ?? false;
  }

  /**
   * Returns the current position in the buffer.
   */
  get position(): number {
    return this.pos;
  }

  /**
   * Returns the number of bytes remaining.
   */
  get remaining(): number {
    return this.end - this.pos;
  }

  /**
   * Returns true if there is more data to read.
   */
  get hasMore(): boolean {
    return this.pos < this.end;
  }

  /**
   * Checks if there are enough bytes available.
   */
  private checkAvailable(needed: number): void {
    if (this.pos + needed > this.end) {
      throw new BufferUnderflowError(needed, this.remaining);
    }
  }

  readExact(buf: Uint8Array): void {
    if (this.lenientReads && buf.length > this.remaining) {
      const available = this.remaining;
      console.warn(
        `stillwire: short read at offset ${this.pos}, ` +
        `requested ${buf.length} bytes but only ${available} available`
      );
      buf.set(this.buffer.subarray(this.pos, this.end));
      this.pos = this.end;
      return;
    }

    this.checkAvailable(buf.length);
    buf.set(this.buffer.subarray(this.pos, this.pos + buf.length));
    this.pos += buf.length;
  }

  /**
   * Reads a view of the next `length` bytes without copying.
   */
  readBorrowed(length: number): Uint8Array {
    this.checkAvailable(length);
    const bytes = this.buffer.subarray(this.pos, this.pos + length);
    this.pos += length;
    return bytes;
  }

  visitStr<T>(visitor: Visitor<T>): T {
    const bytes = this.readBorrowed(this.readLength());
    return visitor.visitBorrowedStr(decodeUtf8(bytes), bytes);
  }

  visitBytes<T>(visitor: Visitor<T>): T {
    const bytes = this.readBorrowed(this.readLength());
    return visitor.visitBorrowedBytes(bytes);
  }
}
