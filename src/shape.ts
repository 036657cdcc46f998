// Shape types for runtime type description.
//
// A shape describes the structure of a value so that `Serialize` and
// `Deserialize` functions can be built for it without writing them by hand.
// It supports:
// - Primitive types (bool, integers, floats, char, string, bytes, unit)
// - Borrowed text and bytes that alias the input buffer
// - Container types (option, seq, map)
// - Composite types (struct, enum, tuple and their named forms)
// - Type references (ref) for deduplication and recursive types
// - Hand-written codecs (custom)

import type { Deserialize, Serialize } from "./traversal";

// ============================================================================
// Primitive Shapes
// ============================================================================

/**
 * Primitive kinds that map directly onto one traversal call.
 *
 * Integers up to 32 bits are `number`, 64 and 128 bits are `bigint`. `char`
 * is a string holding one code point, `unit` is `null`.
 */
export type PrimitiveKind =
  | "bool"
  | "i8"
  | "i16"
  | "i32"
  | "i64"
  | "i128"
  | "u8"
  | "u16"
  | "u32"
  | "u64"
  | "u128"
  | "f32"
  | "f64"
  | "char"
  | "string"
  | "bytes"
  | "unit";

/** Owned primitive. */
export interface PrimitiveShape {
  kind: PrimitiveKind;
}

/**
 * Text that must be borrowed from the input buffer. Decodes to a
 * `BorrowedStr`; fails on sources that can only hand out copies.
 */
export interface BorrowedStrShape {
  kind: "borrowedStr";
}

/**
 * Bytes that must be borrowed from the input buffer. Decodes to a view of it.
 */
export interface BorrowedBytesShape {
  kind: "borrowedBytes";
}

// ============================================================================
// Container Shapes
// ============================================================================

/** `null` when absent. */
export interface OptionShape {
  kind: "option";
  inner: Shape;
}

/** Length-prefixed array. */
export interface SeqShape {
  kind: "seq";
  element: Shape;
}

/** Length-prefixed `Map`; entries are written in insertion order. */
export interface MapShape {
  kind: "map";
  key: Shape;
  value: Shape;
}

// ============================================================================
// Composite Shapes
// ============================================================================

/** Fixed-size array, written without a length. */
export interface TupleShape {
  kind: "tuple";
  elements: Shape[];
}

export interface UnitStructShape {
  kind: "unitStruct";
  name: string;
}

export interface NewtypeShape {
  kind: "newtype";
  name: string;
  inner: Shape;
}

export interface TupleStructShape {
  kind: "tupleStruct";
  name: string;
  elements: Shape[];
}

/**
 * A named field of a struct or struct variant.
 */
export interface FieldShape {
  name: string;
  shape: Shape;

  /** Never written or read. Decoding fills it from `default`, if given. */
  skip?: boolean;

  /** Value for a skipped field on decode. */
  default?: () => unknown;

  /**
   * Asks to leave the field out of a particular value. The binary format has
   * no field names, so encoding such a value fails.
   */
  skipIf?: (value: unknown) => boolean;
}

/**
 * Plain object with named fields, written as its non-skipped fields in
 * declaration order.
 */
export interface StructShape {
  kind: "struct";
  name: string;
  /** Fields in declaration order. Order is significant for encoding! */
  fields: FieldShape[];
}

/**
 * A variant of an enum. Its position in the variant list is the byte written
 * on the wire.
 *
 * Values are `{ tag }` for unit variants and `{ tag, value }` otherwise, where
 * `value` is the payload, the array of tuple elements, or the object of struct
 * fields.
 */
export type VariantShape =
  | { name: string; kind: "unit" }
  | { name: string; kind: "newtype"; inner: Shape }
  | { name: string; kind: "tuple"; elements: Shape[] }
  | { name: string; kind: "struct"; fields: FieldShape[] };

export interface EnumShape {
  kind: "enum";
  name: string;
  /** Variants in declaration order. At most 256 can be encoded. */
  variants: VariantShape[];
}

// ============================================================================
// Reference and Custom Shapes
// ============================================================================

/**
 * Reference to a shape registered under `name` in a `ShapeRegistry`.
 *
 * Used for recursive types and to avoid inlining the same shape many times.
 */
export interface RefShape {
  kind: "ref";
  name: string;
}

/**
 * Escape hatch for types that walk themselves through the traversal contract.
 */
export interface CustomShape {
  kind: "custom";
  name: string;
  serialize: Serialize<unknown>;
  deserialize: Deserialize<unknown>;
}

// ============================================================================
// Union Type
// ============================================================================

/** Union of all shape types. */
export type Shape =
  | PrimitiveShape
  | BorrowedStrShape
  | BorrowedBytesShape
  | OptionShape
  | SeqShape
  | MapShape
  | TupleShape
  | UnitStructShape
  | NewtypeShape
  | TupleStructShape
  | StructShape
  | EnumShape
  | RefShape
  | CustomShape;

/** A shape with every top-level reference followed. */
export type ResolvedShape = Exclude<Shape, RefShape>;

/** JavaScript form of an enum value. */
export interface EnumValue {
  tag: string;
  value?: unknown;
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Find a variant by name (for encoding).
 *
 * @returns The variant's index, or -1 if there is none by that name
 */
export function findVariantIndex(shape: EnumShape, name: string): number {
  return shape.variants.findIndex((v) => v.name === name);
}

/**
 * Names of the fields that reach the wire, in order.
 */
export function wireFieldNames(fields: readonly FieldShape[]): string[] {
  return fields.filter((f) => !f.skip).map((f) => f.name);
}

/**
 * Short description of what a shape accepts, for error messages.
 */
export function describeShape(shape: Shape): string {
  switch (shape.kind) {
    case "bool":
      return "a boolean";
    case "char":
      return "a character";
    case "string":
      return "a string";
    case "bytes":
      return "a byte array";
    case "borrowedStr":
      return "a borrowed string";
    case "borrowedBytes":
      return "a borrowed byte array";
    case "option":
      return "option";
    case "seq":
      return "a sequence";
    case "map":
      return "a map";
    case "tuple":
      return `a tuple of size ${shape.elements.length}`;
    case "unitStruct":
      return `unit struct ${shape.name}`;
    case "newtype":
      return `newtype struct ${shape.name}`;
    case "tupleStruct":
      return `tuple struct ${shape.name}`;
    case "struct":
      return `struct ${shape.name}`;
    case "enum":
      return `enum ${shape.name}`;
    case "ref":
    case "custom":
      return shape.name;
    default:
      // Remaining primitives: integers, floats and unit
      return shape.kind;
  }
}
