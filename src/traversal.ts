/**
 * Value traversal contract.
 *
 * A type makes itself encodable by providing a `Serialize<T>` function that
 * walks its value through a `Serializer`, and decodable by providing a
 * `Deserialize<T>` function that asks a `Deserializer` for the shape it
 * expects and rebuilds the value from the `Visitor` callbacks it receives.
 * The binary engine only implements the `Serializer` and `Deserializer` sides.
 */

import { CustomError } from "./errors";
import type { Present } from "./types";

// ============================================================================
// Serialization
// ============================================================================

/**
 * Walks a value of type `T` through a serializer.
 */
export type Serialize<T> = (value: T, serializer: Serializer) => void;

export interface SerializeSeq {
  serializeElement<T>(value: T, serialize: Serialize<T>): void;
  end(): void;
}

/** Tuples, tuple structs and tuple variants share one state. */
export type SerializeTuple = SerializeSeq;

export interface SerializeMap {
  serializeKey<K>(key: K, serialize: Serialize<K>): void;
  serializeValue<V>(value: V, serialize: Serialize<V>): void;
  end(): void;
}

/** Structs and struct variants share one state. */
export interface SerializeStruct {
  serializeField<T>(key: string, value: T, serialize: Serialize<T>): void;
  /** Called for a field the type chose to leave out of this value. */
  skipField(key: string): void;
  end(): void;
}

export interface Serializer {
  readonly isHumanReadable: boolean;

  serializeBool(v: boolean): void;
  serializeI8(v: number): void;
  serializeI16(v: number): void;
  serializeI32(v: number): void;
  serializeI64(v: bigint): void;
  serializeI128(v: bigint): void;
  serializeU8(v: number): void;
  serializeU16(v: number): void;
  serializeU32(v: number): void;
  serializeU64(v: bigint): void;
  serializeU128(v: bigint): void;
  serializeF32(v: number): void;
  serializeF64(v: number): void;
  /** A string holding exactly one Unicode scalar value. */
  serializeChar(v: string): void;
  serializeStr(v: string): void;
  serializeBytes(v: Uint8Array): void;

  serializeNone(): void;
  serializeSome<T>(value: T, serialize: Serialize<T>): void;
  serializeUnit(): void;
  serializeUnitStruct(name: string): void;
  serializeUnitVariant(name: string, variantIndex: number, variant: string): void;
  serializeNewtypeStruct<T>(name: string, value: T, serialize: Serialize<T>): void;
  serializeNewtypeVariant<T>(
    name: string,
    variantIndex: number,
    variant: string,
    value: T,
    serialize: Serialize<T>
  ): void;

  /** `len` is `null` when the length is not known before iteration. */
  serializeSeq(len: number | null): SerializeSeq;
  serializeTuple(len: number): SerializeTuple;
  serializeTupleStruct(name: string, len: number): SerializeTuple;
  serializeTupleVariant(name: string, variantIndex: number, variant: string, len: number): SerializeTuple;
  serializeMap(len: number | null): SerializeMap;
  serializeStruct(name: string, len: number): SerializeStruct;
  serializeStructVariant(name: string, variantIndex: number, variant: string, len: number): SerializeStruct;
}

// ============================================================================
// Deserialization
// ============================================================================

/**
 * Rebuilds a value of type `T` from a deserializer.
 */
export type Deserialize<T> = (deserializer: Deserializer) => T;

export interface Deserializer {
  readonly isHumanReadable: boolean;

  deserializeAny<T>(visitor: Visitor<T>): T;
  deserializeBool<T>(visitor: Visitor<T>): T;
  deserializeI8<T>(visitor: Visitor<T>): T;
  deserializeI16<T>(visitor: Visitor<T>): T;
  deserializeI32<T>(visitor: Visitor<T>): T;
  deserializeI64<T>(visitor: Visitor<T>): T;
  deserializeI128<T>(visitor: Visitor<T>): T;
  deserializeU8<T>(visitor: Visitor<T>): T;
  deserializeU16<T>(visitor: Visitor<T>): T;
  deserializeU32<T>(visitor: Visitor<T>): T;
  deserializeU64<T>(visitor: Visitor<T>): T;
  deserializeU128<T>(visitor: Visitor<T>): T;
  deserializeF32<T>(visitor: Visitor<T>): T;
  deserializeF64<T>(visitor: Visitor<T>): T;
  deserializeChar<T>(visitor: Visitor<T>): T;
  /** Text that may be borrowed from the input. */
  deserializeStr<T>(visitor: Visitor<T>): T;
  /** Text the visitor will own. */
  deserializeString<T>(visitor: Visitor<T>): T;
  /** Bytes that may be borrowed from the input. */
  deserializeBytes<T>(visitor: Visitor<T>): T;
  /** Bytes the visitor will own. */
  deserializeByteBuf<T>(visitor: Visitor<T>): T;
  deserializeOption<T>(visitor: Visitor<T>): T;
  deserializeUnit<T>(visitor: Visitor<T>): T;
  deserializeUnitStruct<T>(name: string, visitor: Visitor<T>): T;
  deserializeNewtypeStruct<T>(name: string, visitor: Visitor<T>): T;
  deserializeSeq<T>(visitor: Visitor<T>): T;
  deserializeTuple<T>(len: number, visitor: Visitor<T>): T;
  deserializeTupleStruct<T>(name: string, len: number, visitor: Visitor<T>): T;
  deserializeMap<T>(visitor: Visitor<T>): T;
  deserializeStruct<T>(name: string, fields: readonly string[], visitor: Visitor<T>): T;
  deserializeEnum<T>(name: string, variants: readonly string[], visitor: Visitor<T>): T;
  deserializeIdentifier<T>(visitor: Visitor<T>): T;
  deserializeIgnoredAny<T>(visitor: Visitor<T>): T;
}

export interface SeqAccess {
  /** Returns `null` once every element has been handed out. */
  nextElement<T>(deserialize: Deserialize<T>): Present<T> | null;
  sizeHint(): number | null;
}

export interface MapAccess {
  /** Returns `null` once every entry has been handed out. */
  nextKey<K>(deserialize: Deserialize<K>): Present<K> | null;
  nextValue<V>(deserialize: Deserialize<V>): V;
  sizeHint(): number | null;
}

export interface EnumAccess {
  /** Reads the variant identifier and returns the access for its payload. */
  variant<V>(deserialize: Deserialize<V>): [V, VariantAccess];
}

export interface VariantAccess {
  unitVariant(): void;
  newtypeVariant<T>(deserialize: Deserialize<T>): T;
  tupleVariant<T>(len: number, visitor: Visitor<T>): T;
  structVariant<T>(fields: readonly string[], visitor: Visitor<T>): T;
}

/**
 * A decoded string together with the UTF-8 bytes it was decoded from.
 * When produced from an in-memory buffer, `bytes` aliases that buffer.
 */
export class BorrowedStr {
  constructor(
    readonly text: string,
    readonly bytes: Uint8Array
  ) {}

  toString(): string {
    return this.text;
  }
}

// ============================================================================
// Visitor
// ============================================================================

/**
 * Description of a value a visitor did not expect, for error messages.
 */
export type Unexpected =
  | { kind: "bool"; value: boolean }
  | { kind: "signed"; value: bigint }
  | { kind: "unsigned"; value: bigint }
  | { kind: "float"; value: number }
  | { kind: "char"; value: string }
  | { kind: "str"; value: string }
  | { kind: "bytes" }
  | { kind: "unit" }
  | { kind: "option" }
  | { kind: "newtype struct" }
  | { kind: "seq" }
  | { kind: "map" }
  | { kind: "enum" };

function describeUnexpected(unexpected: Unexpected): string {
  switch (unexpected.kind) {
    case "bool":
      return `boolean \`${unexpected.value}\``;
    case "signed":
    case "unsigned":
      return `integer \`${unexpected.value}\``;
    case "float":
      return `floating point \`${unexpected.value}\``;
    case "char":
      return `character \`${unexpected.value}\``;
    case "str":
      return `string ${JSON.stringify(unexpected.value)}`;
    case "bytes":
      return "byte array";
    case "unit":
      return "unit value";
    case "option":
      return "Option value";
    case "newtype struct":
      return "newtype struct";
    case "seq":
      return "sequence";
    case "map":
      return "map";
    case "enum":
      return "enum";
  }
}

/**
 * Error for a value of the wrong type, e.g.
 * `invalid type: string "x", expected a borrowed string`.
 */
export function invalidType(unexpected: Unexpected, expecting: string): CustomError {
  return new CustomError(`invalid type: ${describeUnexpected(unexpected)}, expected ${expecting}`);
}

/**
 * Error for a value of the right type but outside the accepted range.
 */
export function invalidValue(unexpected: Unexpected, expecting: string): CustomError {
  return new CustomError(`invalid value: ${describeUnexpected(unexpected)}, expected ${expecting}`);
}

/**
 * Error for a sequence that ran out of elements at `len`.
 */
export function invalidLength(len: number, expecting: string): CustomError {
  return new CustomError(`invalid length ${len}, expected ${expecting}`);
}

/**
 * Receives the values a deserializer produces. Every callback rejects its
 * input unless overridden; subclasses override the ones their target
 * representation accepts.
 */
export abstract class Visitor<T> {
  /** Completes "expected ..." in error messages. */
  abstract readonly expecting: string;

  visitBool(v: boolean): T {
    throw invalidType({ kind: "bool", value: v }, this.expecting);
  }

  // Narrow integer callbacks widen to the 64-bit ones, then to the 128-bit ones.
  visitI8(v: number): T {
    return this.visitI64(BigInt(v));
  }

  visitI16(v: number): T {
    return this.visitI64(BigInt(v));
  }

  visitI32(v: number): T {
    return this.visitI64(BigInt(v));
  }

  visitI64(v: bigint): T {
    return this.visitI128(v);
  }

  visitI128(v: bigint): T {
    throw invalidType({ kind: "signed", value: v }, this.expecting);
  }

  visitU8(v: number): T {
    return this.visitU64(BigInt(v));
  }

  visitU16(v: number): T {
    return this.visitU64(BigInt(v));
  }

  visitU32(v: number): T {
    return this.visitU64(BigInt(v));
  }

  visitU64(v: bigint): T {
    return this.visitU128(v);
  }

  visitU128(v: bigint): T {
    throw invalidType({ kind: "unsigned", value: v }, this.expecting);
  }

  visitF32(v: number): T {
    return this.visitF64(v);
  }

  visitF64(v: number): T {
    throw invalidType({ kind: "float", value: v }, this.expecting);
  }

  visitChar(v: string): T {
    return this.visitStr(v);
  }

  /** Transient text: copy it if it must outlive the call. */
  visitStr(v: string): T {
    throw invalidType({ kind: "str", value: v }, this.expecting);
  }

  /** Text whose UTF-8 bytes alias the input buffer. */
  visitBorrowedStr(v: string, _bytes: Uint8Array): T {
    return this.visitStr(v);
  }

  /** Text produced for the visitor to keep. */
  visitString(v: string): T {
    return this.visitStr(v);
  }

  /** Transient bytes: copy them if they must outlive the call. */
  visitBytes(_v: Uint8Array): T {
    throw invalidType({ kind: "bytes" }, this.expecting);
  }

  /** Bytes aliasing the input buffer. */
  visitBorrowedBytes(v: Uint8Array): T {
    return this.visitBytes(v);
  }

  /** Bytes produced for the visitor to keep. */
  visitByteBuf(v: Uint8Array): T {
    return this.visitBytes(v);
  }

  visitNone(): T {
    throw invalidType({ kind: "option" }, this.expecting);
  }

  visitSome(_deserializer: Deserializer): T {
    throw invalidType({ kind: "option" }, this.expecting);
  }

  visitUnit(): T {
    throw invalidType({ kind: "unit" }, this.expecting);
  }

  visitNewtypeStruct(_deserializer: Deserializer): T {
    throw invalidType({ kind: "newtype struct" }, this.expecting);
  }

  visitSeq(_seq: SeqAccess): T {
    throw invalidType({ kind: "seq" }, this.expecting);
  }

  visitMap(_map: MapAccess): T {
    throw invalidType({ kind: "map" }, this.expecting);
  }

  visitEnum(_data: EnumAccess): T {
    throw invalidType({ kind: "enum" }, this.expecting);
  }
}

// ============================================================================
// Identifier resolution
// ============================================================================

/**
 * Deserializer over a single variant index. Whatever shape is requested, the
 * visitor receives the index through `visitU8`; this is how a one-byte tag
 * read off the wire is turned into the caller's variant identifier.
 */
export class IndexDeserializer implements Deserializer {
  readonly isHumanReadable = false;

  constructor(private readonly index: number) {}

  private forward<T>(visitor: Visitor<T>): T {
    return visitor.visitU8(this.index);
  }

  deserializeAny<T>(visitor: Visitor<T>): T {
    return this.forward(visitor);
  }
  deserializeBool<T>(visitor: Visitor<T>): T {
    return this.forward(visitor);
  }
  deserializeI8<T>(visitor: Visitor<T>): T {
    return this.forward(visitor);
  }
  deserializeI16<T>(visitor: Visitor<T>): T {
    return this.forward(visitor);
  }
  deserializeI32<T>(visitor: Visitor<T>): T {
    return this.forward(visitor);
  }
  deserializeI64<T>(visitor: Visitor<T>): T {
    return this.forward(visitor);
  }
  deserializeI128<T>(visitor: Visitor<T>): T {
    return this.forward(visitor);
  }
  deserializeU8<T>(visitor: Visitor<T>): T {
    return this.forward(visitor);
  }
  deserializeU16<T>(visitor: Visitor<T>): T {
    return this.forward(visitor);
  }
  deserializeU32<T>(visitor: Visitor<T>): T {
    return this.forward(visitor);
  }
  deserializeU64<T>(visitor: Visitor<T>): T {
    return this.forward(visitor);
  }
  deserializeU128<T>(visitor: Visitor<T>): T {
    return this.forward(visitor);
  }
  deserializeF32<T>(visitor: Visitor<T>): T {
    return this.forward(visitor);
  }
  deserializeF64<T>(visitor: Visitor<T>): T {
    return this.forward(visitor);
  }
  deserializeChar<T>(visitor: Visitor<T>): T {
    return this.forward(visitor);
  }
  deserializeStr<T>(visitor: Visitor<T>): T {
    return this.forward(visitor);
  }
  deserializeString<T>(visitor: Visitor<T>): T {
    return this.forward(visitor);
  }
  deserializeBytes<T>(visitor: Visitor<T>): T {
    return this.forward(visitor);
  }
  deserializeByteBuf<T>(visitor: Visitor<T>): T {
    return this.forward(visitor);
  }
  deserializeOption<T>(visitor: Visitor<T>): T {
    return this.forward(visitor);
  }
  deserializeUnit<T>(visitor: Visitor<T>): T {
    return this.forward(visitor);
  }
  deserializeUnitStruct<T>(_name: string, visitor: Visitor<T>): T {
    return this.forward(visitor);
  }
  deserializeNewtypeStruct<T>(_name: string, visitor: Visitor<T>): T {
    return this.forward(visitor);
  }
  deserializeSeq<T>(visitor: Visitor<T>): T {
    return this.forward(visitor);
  }
  deserializeTuple<T>(_len: number, visitor: Visitor<T>): T {
    return this.forward(visitor);
  }
  deserializeTupleStruct<T>(_name: string, _len: number, visitor: Visitor<T>): T {
    return this.forward(visitor);
  }
  deserializeMap<T>(visitor: Visitor<T>): T {
    return this.forward(visitor);
  }
  deserializeStruct<T>(_name: string, _fields: readonly string[], visitor: Visitor<T>): T {
    return this.forward(visitor);
  }
  deserializeEnum<T>(_name: string, _variants: readonly string[], visitor: Visitor<T>): T {
    return this.forward(visitor);
  }
  deserializeIdentifier<T>(visitor: Visitor<T>): T {
    return this.forward(visitor);
  }
  deserializeIgnoredAny<T>(visitor: Visitor<T>): T {
    return this.forward(visitor);
  }
}
