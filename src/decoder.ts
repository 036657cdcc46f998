import { EnumDecoder, MapDecoder, SeqDecoder } from "./access";
import { InvalidBytesError, UnsupportedOperationError } from "./errors";
import { decodeUtf8 } from "./reader";
import type { ByteSource } from "./reader";
import type { Deserializer, Visitor } from "./traversal";
import { MAX_CHAR_WIDTH, ValueType, decodeSmall } from "./types";

/**
 * Decoder reads values from a byte source in the binary format.
 *
 * The decoder never discovers structure from the bytes: each call states the
 * shape it expects and the decoder reads exactly what the encoder would have
 * written for it.
 */
export class Decoder implements Deserializer {
  readonly isHumanReadable = false;

  constructor(private readonly source: ByteSource) {}

  /**
   * Returns the source this decoder reads from.
   */
  get reader(): ByteSource {
    return this.source;
  }

  /**
   * Reads one byte, such as a union tag.
   */
  readByte(): number {
    return this.source.readFixed(1)[0];
  }

  private readView(size: number): DataView {
    const bytes = this.source.readFixed(size);
    return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  deserializeAny<T>(_visitor: Visitor<T>): T {
    throw new UnsupportedOperationError("deserializeAny");
  }

  deserializeBool<T>(visitor: Visitor<T>): T {
    const bytes = this.source.readFixed(1);
    switch (bytes[0]) {
      case 0:
        return visitor.visitBool(false);
      case 1:
        return visitor.visitBool(true);
      default:
        throw new InvalidBytesError(ValueType.Bool, bytes);
    }
  }

  deserializeI8<T>(visitor: Visitor<T>): T {
    return visitor.visitI8(this.readView(1).getInt8(0));
  }

  deserializeI16<T>(visitor: Visitor<T>): T {
    return visitor.visitI16(this.readView(2).getInt16(0));
  }

  deserializeI32<T>(visitor: Visitor<T>): T {
    return visitor.visitI32(this.readView(4).getInt32(0));
  }

  deserializeI64<T>(visitor: Visitor<T>): T {
    return visitor.visitI64(this.readView(8).getBigInt64(0));
  }

  deserializeI128<T>(visitor: Visitor<T>): T {
    const view = this.readView(16);
    return visitor.visitI128((view.getBigInt64(0) << 64n) | view.getBigUint64(8));
  }

  deserializeU8<T>(visitor: Visitor<T>): T {
    return visitor.visitU8(this.readByte());
  }

  deserializeU16<T>(visitor: Visitor<T>): T {
    return visitor.visitU16(this.readView(2).getUint16(0));
  }

  deserializeU32<T>(visitor: Visitor<T>): T {
    return visitor.visitU32(this.readView(4).getUint32(0));
  }

  deserializeU64<T>(visitor: Visitor<T>): T {
    return visitor.visitU64(this.readView(8).getBigUint64(0));
  }

  deserializeU128<T>(visitor: Visitor<T>): T {
    const view = this.readView(16);
    return visitor.visitU128((view.getBigUint64(0) << 64n) | view.getBigUint64(8));
  }

  deserializeF32<T>(visitor: Visitor<T>): T {
    return visitor.visitF32(this.readView(4).getFloat32(0));
  }

  deserializeF64<T>(visitor: Visitor<T>): T {
    return visitor.visitF64(this.readView(8).getFloat64(0));
  }

  /**
   * Reads a width byte and that many UTF-8 bytes. Only the first scalar is
   * kept: any further scalars packed into the same width are dropped.
   */
  deserializeChar<T>(visitor: Visitor<T>): T {
    const width = decodeSmall(this.readByte());
    if (width < 1 || width > MAX_CHAR_WIDTH) {
      throw new InvalidBytesError(ValueType.Char, Uint8Array.of(width));
    }

    const scratch = new Uint8Array(MAX_CHAR_WIDTH);
    const encoded = scratch.subarray(MAX_CHAR_WIDTH - width);
    this.source.readExact(encoded);

    const codePoint = decodeUtf8(encoded).codePointAt(0);
    if (codePoint === undefined) {
      throw new InvalidBytesError(ValueType.Char, encoded);
    }
    return visitor.visitChar(String.fromCodePoint(codePoint));
  }

  deserializeStr<T>(visitor: Visitor<T>): T {
    return this.source.visitStr(visitor);
  }

  deserializeString<T>(visitor: Visitor<T>): T {
    return visitor.visitString(decodeUtf8(this.source.readFramedLarge()));
  }

  deserializeBytes<T>(visitor: Visitor<T>): T {
    return this.source.visitBytes(visitor);
  }

  deserializeByteBuf<T>(visitor: Visitor<T>): T {
    return visitor.visitByteBuf(this.source.readFramedLarge());
  }

  deserializeOption<T>(visitor: Visitor<T>): T {
    const discriminant = this.source.readFixed(1);
    switch (discriminant[0]) {
      case 0:
        return visitor.visitNone();
      case 1:
        return visitor.visitSome(this);
      default:
        throw new InvalidBytesError(ValueType.Option, discriminant);
    }
  }

  deserializeUnit<T>(visitor: Visitor<T>): T {
    return visitor.visitUnit();
  }

  deserializeUnitStruct<T>(_name: string, visitor: Visitor<T>): T {
    return visitor.visitUnit();
  }

  deserializeNewtypeStruct<T>(_name: string, visitor: Visitor<T>): T {
    return visitor.visitNewtypeStruct(this);
  }

  deserializeSeq<T>(visitor: Visitor<T>): T {
    return visitor.visitSeq(new SeqDecoder(this, this.source.readLength()));
  }

  deserializeTuple<T>(len: number, visitor: Visitor<T>): T {
    return visitor.visitSeq(new SeqDecoder(this, len));
  }

  deserializeTupleStruct<T>(_name: string, len: number, visitor: Visitor<T>): T {
    return visitor.visitSeq(new SeqDecoder(this, len));
  }

  deserializeMap<T>(visitor: Visitor<T>): T {
    return visitor.visitMap(new MapDecoder(this, this.source.readLength()));
  }

  /**
   * Structs are read as tuples of their fields in declaration order.
   */
  deserializeStruct<T>(_name: string, fields: readonly string[], visitor: Visitor<T>): T {
    return visitor.visitSeq(new SeqDecoder(this, fields.length));
  }

  deserializeEnum<T>(_name: string, _variants: readonly string[], visitor: Visitor<T>): T {
    return visitor.visitEnum(new EnumDecoder(this));
  }

  deserializeIdentifier<T>(_visitor: Visitor<T>): T {
    throw new UnsupportedOperationError("deserializeIdentifier");
  }

  deserializeIgnoredAny<T>(_visitor: Visitor<T>): T {
    throw new UnsupportedOperationError("deserializeIgnoredAny");
  }
}
