/**
 * Streaming support.
 *
 * Adapts synchronous byte streams (file descriptors, or anything with the
 * same pull/push shape) to the decoder's byte source and the encoder's byte
 * sink, and iterates over values packed back to back in one buffer.
 */

import * as fs from "fs";
import { Decoder } from "./decoder";
import { EndOfStreamError, IoError } from "./errors";
import { BaseSource, BytesReader, decodeUtf8 } from "./reader";
import type { BytesReaderOptions, SourceOptions } from "./reader";
import type { Deserialize, Visitor } from "./traversal";
import type { Present } from "./types";
import type { ByteSink } from "./writer";

/**
 * Pull-based byte stream. `read` fills a prefix of `buffer` and returns how
 * many bytes it wrote; 0 means the stream has ended.
 */
export interface InputStream {
  read(buffer: Uint8Array): number;
}

/**
 * Push-based byte stream. `write` consumes a prefix of `buffer` and returns
 * how many bytes it took.
 */
export interface OutputStream {
  write(buffer: Uint8Array): number;
  flush?(): void;
}

/**
 * Reads from a file descriptor at its current position.
 */
export function fdInput(fd: number): InputStream {
  return {
    read: (buffer) => fs.readSync(fd, buffer, 0, buffer.length, null),
  };
}

/**
 * Writes to a file descriptor at its current position.
 */
export function fdOutput(fd: number): OutputStream {
  return {
    write: (buffer) => fs.writeSync(fd, buffer, 0, buffer.length),
  };
}

/**
 * StreamReader decodes from a pull-based stream. Every extraction copies, so
 * visitors that only accept borrowed text or bytes are rejected by their own
 * `visitStr` / `visitBytes`.
 *
 * The reader never reads ahead: after a value is decoded the stream is
 * positioned right behind it, ready for the next one.
 */
export class StreamReader extends BaseSource {
  private pos: number;

  constructor(
    private readonly stream: InputStream,
    options: SourceOptions = {}
  ) {
    super(options);
    this.pos = 0;
  }

  /**
   * Returns the number of bytes consumed so far.
   */
  get position(): number {
    return this.pos;
  }

  readExact(buf: Uint8Array): void {
    let filled = 0;
    while (filled < buf.length) {
      let n: number;
      try {
        n = this.stream.read(buf.subarray(filled));
      } catch (e) {
        throw new IoError(e);
      }
      if (n === 0) {
        throw new EndOfStreamError(
          `Stream ended after ${this.pos + filled} bytes, ${buf.length - filled} more needed`
        );
      }
      filled += n;
    }
    this.pos += filled;
  }

  visitStr<T>(visitor: Visitor<T>): T {
    return visitor.visitStr(decodeUtf8(this.readFramedLarge()));
  }

  visitBytes<T>(visitor: Visitor<T>): T {
    return visitor.visitBytes(this.readFramedLarge());
  }
}

/**
 * StreamWriter encodes into a push-based stream.
 */
export class StreamWriter implements ByteSink {
  private pos: number;

  constructor(private readonly stream: OutputStream) {
    this.pos = 0;
  }

  /**
   * Returns the number of bytes written so far.
   */
  get position(): number {
    return this.pos;
  }

  writeAll(bytes: Uint8Array): void {
    let written = 0;
    while (written < bytes.length) {
      let n: number;
      try {
        n = this.stream.write(bytes.subarray(written));
      } catch (e) {
        throw new IoError(e);
      }
      if (n === 0) {
        throw new IoError(new Error("failed to write whole buffer"));
      }
      written += n;
    }
    this.pos += written;
  }

  flush(): void {
    try {
      this.stream.flush?.();
    } catch (e) {
      throw new IoError(e);
    }
  }
}

/**
 * ValueIterator decodes values packed back to back in one buffer, sharing a
 * single reader between calls.
 *
 * @example
 * ```typescript
 * const points = new ValueIterator(data, shapeDeserialize(PointShape));
 *
 * for (const point of points) {
 *   console.log(point);
 * }
 *
 * // Or collect all at once
 * const all = points.toArray();
 * ```
 */
export class ValueIterator<T> implements Iterable<T> {
  private reader: BytesReader;
  private decoder: Decoder;

  constructor(
    private readonly data: Uint8Array,
    private readonly deserialize: Deserialize<T>,
    private readonly options: BytesReaderOptions = {}
  ) {
    this.reader = new BytesReader(data, options);
    this.decoder = new Decoder(this.reader);
  }

  /**
   * Returns true if there are more bytes to decode.
   */
  get hasMore(): boolean {
    return this.reader.hasMore;
  }

  /**
   * Returns the offset of the next value.
   */
  get position(): number {
    return this.reader.position;
  }

  /**
   * Decodes the next value, or returns null at the end of the buffer.
   * A value cut short by the end of the buffer throws.
   */
  next(): Present<T> | null {
    if (!this.reader.hasMore) {
      return null;
    }
    return { value: this.deserialize(this.decoder) };
  }

  *[Symbol.iterator](): IterableIterator<T> {
    for (let item = this.next(); item !== null; item = this.next()) {
      yield item.value;
    }
  }

  /**
   * Collects all remaining values into an array.
   */
  toArray(): T[] {
    return [...this];
  }

  /**
   * Rewinds to the beginning of the buffer.
   */
  reset(): void {
    this.reader = new BytesReader(this.data, this.options);
    this.decoder = new Decoder(this.reader);
  }
}
