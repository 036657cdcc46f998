import {
  FieldSkippingNotAllowedError,
  TooManyVariantsError,
  UnknownMapLengthError,
  UnknownSeqLengthError,
} from "./errors";
import { MAX_VARIANTS, encodeLarge, encodeSmall } from "./types";
import type {
  Serialize,
  SerializeMap,
  SerializeSeq,
  SerializeStruct,
  SerializeTuple,
  Serializer,
} from "./traversal";
import type { ByteSink } from "./writer";

// Module-level singleton to avoid repeated instantiation
const textEncoder = new TextEncoder();

/**
 * Encoder writes values to a byte sink in the binary format.
 *
 * Nothing but the optional-presence byte and the union variant byte is
 * tagged: the reader must know the exact shape being decoded.
 */
export class Encoder implements Serializer {
  readonly isHumanReadable = false;

  constructor(private readonly sink: ByteSink) {}

  /**
   * Returns the sink this encoder writes to.
   */
  get writer(): ByteSink {
    return this.sink;
  }

  private writeFixed(size: number, fill: (view: DataView) => void): void {
    const bytes = new Uint8Array(size);
    fill(new DataView(bytes.buffer));
    this.sink.writeAll(bytes);
  }

  private writeFramed(payload: Uint8Array): void {
    this.sink.writeAll(encodeLarge(payload.length));
    this.sink.writeAll(payload);
  }

  private writeVariantTag(name: string, variantIndex: number): void {
    if (!Number.isInteger(variantIndex) || variantIndex < 0 || variantIndex >= MAX_VARIANTS) {
      throw new TooManyVariantsError(name, variantIndex);
    }
    this.sink.writeAll(Uint8Array.of(variantIndex));
  }

  serializeBool(v: boolean): void {
    this.sink.writeAll(Uint8Array.of(v ? 1 : 0));
  }

  serializeI8(v: number): void {
    this.writeFixed(1, (view) => view.setInt8(0, v));
  }

  serializeI16(v: number): void {
    this.writeFixed(2, (view) => view.setInt16(0, v));
  }

  serializeI32(v: number): void {
    this.writeFixed(4, (view) => view.setInt32(0, v));
  }

  serializeI64(v: bigint): void {
    this.writeFixed(8, (view) => view.setBigInt64(0, v));
  }

  serializeI128(v: bigint): void {
    this.writeFixed(16, (view) => {
      view.setBigInt64(0, BigInt.asIntN(64, v >> 64n));
      view.setBigUint64(8, BigInt.asUintN(64, v));
    });
  }

  serializeU8(v: number): void {
    this.writeFixed(1, (view) => view.setUint8(0, v));
  }

  serializeU16(v: number): void {
    this.writeFixed(2, (view) => view.setUint16(0, v));
  }

  serializeU32(v: number): void {
    this.writeFixed(4, (view) => view.setUint32(0, v));
  }

  serializeU64(v: bigint): void {
    this.writeFixed(8, (view) => view.setBigUint64(0, v));
  }

  serializeU128(v: bigint): void {
    this.writeFixed(16, (view) => {
      view.setBigUint64(0, BigInt.asUintN(64, v >> 64n));
      view.setBigUint64(8, BigInt.asUintN(64, v));
    });
  }

  serializeF32(v: number): void {
    this.writeFixed(4, (view) => view.setFloat32(0, v));
  }

  serializeF64(v: number): void {
    this.writeFixed(8, (view) => view.setFloat64(0, v));
  }

  /**
   * Writes the first scalar of `v` as a one-byte width followed by its UTF-8.
   */
  serializeChar(v: string): void {
    const codePoint = v.codePointAt(0) ?? 0;
    const utf8 = textEncoder.encode(String.fromCodePoint(codePoint));
    const bytes = new Uint8Array(utf8.length + 1);
    bytes[0] = encodeSmall(utf8.length);
    bytes.set(utf8, 1);
    this.sink.writeAll(bytes);
  }

  serializeStr(v: string): void {
    this.writeFramed(textEncoder.encode(v));
  }

  serializeBytes(v: Uint8Array): void {
    this.writeFramed(v);
  }

  serializeNone(): void {
    this.sink.writeAll(Uint8Array.of(0));
  }

  serializeSome<T>(value: T, serialize: Serialize<T>): void {
    this.sink.writeAll(Uint8Array.of(1));
    serialize(value, this);
  }

  serializeUnit(): void {}

  serializeUnitStruct(_name: string): void {}

  serializeUnitVariant(name: string, variantIndex: number, _variant: string): void {
    this.writeVariantTag(name, variantIndex);
  }

  serializeNewtypeStruct<T>(_name: string, value: T, serialize: Serialize<T>): void {
    serialize(value, this);
  }

  serializeNewtypeVariant<T>(
    name: string,
    variantIndex: number,
    _variant: string,
    value: T,
    serialize: Serialize<T>
  ): void {
    this.writeVariantTag(name, variantIndex);
    serialize(value, this);
  }

  serializeSeq(len: number | null): SerializeSeq {
    if (len === null) {
      throw new UnknownSeqLengthError();
    }
    this.sink.writeAll(encodeLarge(len));
    return new CompoundEncoder(this);
  }

  serializeTuple(_len: number): SerializeTuple {
    return new CompoundEncoder(this);
  }

  serializeTupleStruct(_name: string, _len: number): SerializeTuple {
    return new CompoundEncoder(this);
  }

  serializeTupleVariant(name: string, variantIndex: number, _variant: string, _len: number): SerializeTuple {
    this.writeVariantTag(name, variantIndex);
    return new CompoundEncoder(this);
  }

  serializeMap(len: number | null): SerializeMap {
    if (len === null) {
      throw new UnknownMapLengthError();
    }
    this.sink.writeAll(encodeLarge(len));
    return new CompoundEncoder(this);
  }

  serializeStruct(_name: string, _len: number): SerializeStruct {
    return new CompoundEncoder(this);
  }

  serializeStructVariant(name: string, variantIndex: number, _variant: string, _len: number): SerializeStruct {
    this.writeVariantTag(name, variantIndex);
    return new CompoundEncoder(this);
  }
}

/**
 * State for an open sequence, tuple, map or struct. Elements, keys, values and
 * fields are written back to back; field names never reach the wire.
 */
class CompoundEncoder implements SerializeSeq, SerializeMap, SerializeStruct {
  constructor(private readonly encoder: Encoder) {}

  serializeElement<T>(value: T, serialize: Serialize<T>): void {
    serialize(value, this.encoder);
  }

  serializeKey<K>(key: K, serialize: Serialize<K>): void {
    serialize(key, this.encoder);
  }

  serializeValue<V>(value: V, serialize: Serialize<V>): void {
    serialize(value, this.encoder);
  }

  serializeField<T>(_key: string, value: T, serialize: Serialize<T>): void {
    serialize(value, this.encoder);
  }

  skipField(key: string): void {
    throw new FieldSkippingNotAllowedError(key);
  }

  end(): void {}
}
