/**
 * stillwire - deterministic binary serialization for TypeScript
 *
 * Values are written in a compact, untagged binary form: the reader must
 * know the shape it is decoding. Types take part either through hand-written
 * `Serialize` / `Deserialize` functions or through runtime shapes.
 *
 * @example
 * ```typescript
 * import { encodeWithShape, decodeWithShape, Shape } from 'stillwire';
 *
 * const Point: Shape = {
 *   kind: "struct",
 *   name: "Point",
 *   fields: [
 *     { name: "x", shape: { kind: "i32" } },
 *     { name: "y", shape: { kind: "i32" } },
 *   ],
 * };
 *
 * const data = encodeWithShape({ x: 1, y: -1 }, Point);
 * const point = decodeWithShape(data, Point); // { x: 1, y: -1 }
 * ```
 */

import { Decoder } from "./decoder";
import { Encoder } from "./encoder";
import { BytesReader } from "./reader";
import type { BytesReaderOptions, SourceOptions } from "./reader";
import { defaultRegistry } from "./registry";
import type { ShapeRegistry } from "./registry";
import type { Shape } from "./shape";
import { shapeDeserialize, shapeSerialize } from "./shape_codec";
import { StreamReader } from "./stream";
import type { InputStream } from "./stream";
import type { Deserialize, Serialize } from "./traversal";
import { BytesWriter } from "./writer";
import type { ByteSink } from "./writer";

// Core types
export { ValueType, MAX_VARIANTS, MAX_CHAR_WIDTH, DEFAULT_MAX_LENGTH, encodeSmall, decodeSmall, encodeLarge, decodeLarge } from "./types";
export type { Present } from "./types";

// Errors
export {
  StillwireError,
  EncodeError,
  DecodeError,
  UnknownSeqLengthError,
  UnknownMapLengthError,
  TooManyVariantsError,
  FieldSkippingNotAllowedError,
  EndOfStreamError,
  BufferUnderflowError,
  InvalidBytesError,
  Utf8Error,
  UnsupportedOperationError,
  LengthLimitExceededError,
  IoError,
  CustomError,
  TypeNotRegisteredError,
} from "./errors";

// Traversal contract
export { BorrowedStr, Visitor, IndexDeserializer, invalidType, invalidValue, invalidLength } from "./traversal";
export type {
  Serialize,
  SerializeSeq,
  SerializeTuple,
  SerializeMap,
  SerializeStruct,
  Serializer,
  Deserialize,
  Deserializer,
  SeqAccess,
  MapAccess,
  EnumAccess,
  VariantAccess,
  Unexpected,
} from "./traversal";

// Sinks and sources
export { BytesWriter } from "./writer";
export type { ByteSink } from "./writer";
export { BaseSource, BytesReader, decodeUtf8 } from "./reader";
export type { ByteSource, BytesReaderOptions, SourceOptions } from "./reader";

// Streaming support
export { StreamReader, StreamWriter, ValueIterator, fdInput, fdOutput } from "./stream";
export type { InputStream, OutputStream } from "./stream";

// Engine
export { Encoder } from "./encoder";
export { Decoder } from "./decoder";
export { SeqDecoder, MapDecoder, EnumDecoder, VariantDecoder } from "./access";

// Shapes
export { findVariantIndex, wireFieldNames, describeShape } from "./shape";
export type {
  PrimitiveKind,
  PrimitiveShape,
  BorrowedStrShape,
  BorrowedBytesShape,
  OptionShape,
  SeqShape,
  MapShape,
  TupleShape,
  UnitStructShape,
  NewtypeShape,
  TupleStructShape,
  FieldShape,
  StructShape,
  VariantShape,
  EnumShape,
  RefShape,
  CustomShape,
  Shape,
  ResolvedShape,
  EnumValue,
} from "./shape";
export { shapeSerialize, shapeDeserialize } from "./shape_codec";
export { ShapeRegistry, defaultRegistry, register } from "./registry";

/**
 * Library version.
 */
export const VERSION = "0.3.0";

/**
 * Serialize encodes a value into a new byte array.
 */
export function serialize<T>(value: T, ser: Serialize<T>): Uint8Array {
  const writer = new BytesWriter();
  ser(value, new Encoder(writer));
  return writer.intoBytes();
}

/**
 * SerializeInto encodes a value into a caller-supplied sink.
 */
export function serializeInto<T>(value: T, ser: Serialize<T>, sink: ByteSink): void {
  ser(value, new Encoder(sink));
  sink.flush();
}

/**
 * Deserialize decodes one value from the front of a byte array. Borrowed text
 * and bytes in the result are views into `data`.
 *
 * Trailing bytes after the value are left unread.
 */
export function deserialize<T>(data: Uint8Array, de: Deserialize<T>, options?: BytesReaderOptions): T {
  return de(new Decoder(new BytesReader(data, options)));
}

/**
 * DeserializeFrom decodes one value from a stream. The stream is left
 * positioned right after the value.
 */
export function deserializeFrom<T>(stream: InputStream, de: Deserialize<T>, options?: SourceOptions): T {
  return de(new Decoder(new StreamReader(stream, options)));
}

/**
 * EncodeWithShape encodes a plain value described by a shape.
 */
export function encodeWithShape(value: unknown, shape: Shape, registry: ShapeRegistry = defaultRegistry): Uint8Array {
  return serialize(value, shapeSerialize(shape, registry));
}

/**
 * DecodeWithShape decodes a plain value described by a shape.
 */
export function decodeWithShape(
  data: Uint8Array,
  shape: Shape,
  registry: ShapeRegistry = defaultRegistry,
  options?: BytesReaderOptions
): unknown {
  return deserialize(data, shapeDeserialize(shape, registry), options);
}
