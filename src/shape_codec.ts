// Shape-driven serialization.
//
// Builds `Serialize` and `Deserialize` functions from runtime shapes, so plain
// JavaScript values can go through any serializer or deserializer without a
// hand-written codec.

import { CustomError } from "./errors";
import { defaultRegistry } from "./registry";
import type { ShapeRegistry } from "./registry";
import { describeShape, findVariantIndex, wireFieldNames } from "./shape";
import type { EnumShape, EnumValue, FieldShape, NewtypeShape, Shape } from "./shape";
import { BorrowedStr, Visitor, invalidLength, invalidValue } from "./traversal";
import type {
  Deserialize,
  Deserializer,
  EnumAccess,
  MapAccess,
  SeqAccess,
  Serialize,
  SerializeStruct,
  SerializeTuple,
  Serializer,
} from "./traversal";

type IntegerKind = "i8" | "i16" | "i32" | "i64" | "i128" | "u8" | "u16" | "u32" | "u64" | "u128";

const RANGES: Record<IntegerKind, readonly [bigint, bigint]> = {
  i8: [-(1n << 7n), (1n << 7n) - 1n],
  i16: [-(1n << 15n), (1n << 15n) - 1n],
  i32: [-(1n << 31n), (1n << 31n) - 1n],
  i64: [-(1n << 63n), (1n << 63n) - 1n],
  i128: [-(1n << 127n), (1n << 127n) - 1n],
  u8: [0n, (1n << 8n) - 1n],
  u16: [0n, (1n << 16n) - 1n],
  u32: [0n, (1n << 32n) - 1n],
  u64: [0n, (1n << 64n) - 1n],
  u128: [0n, (1n << 128n) - 1n],
};

// ============================================================================
// Value checks
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Map) &&
    !(value instanceof Uint8Array)
  );
}

function describeValue(value: unknown): string {
  if (value === null || value === undefined) {
    return String(value);
  }
  switch (typeof value) {
    case "boolean":
      return `boolean \`${value}\``;
    case "number":
      return Number.isInteger(value) ? `integer \`${value}\`` : `floating point \`${value}\``;
    case "bigint":
      return `integer \`${value}\``;
    case "string":
      return `string ${JSON.stringify(value)}`;
  }
  if (value instanceof Uint8Array) {
    return "byte array";
  }
  if (Array.isArray(value)) {
    return `sequence of length ${value.length}`;
  }
  if (value instanceof Map) {
    return "map";
  }
  return typeof value;
}

function mismatch(value: unknown, shape: Shape): CustomError {
  return new CustomError(`invalid value: ${describeValue(value)}, expected ${describeShape(shape)}`);
}

function expectInteger(value: unknown, kind: IntegerKind): bigint {
  let n: bigint;
  if (typeof value === "bigint") {
    n = value;
  } else if (typeof value === "number" && Number.isSafeInteger(value)) {
    n = BigInt(value);
  } else {
    throw mismatch(value, { kind });
  }
  const [min, max] = RANGES[kind];
  if (n < min || n > max) {
    throw mismatch(value, { kind });
  }
  return n;
}

function expectSmallInteger(value: unknown, kind: IntegerKind): number {
  if (typeof value !== "number") {
    throw mismatch(value, { kind });
  }
  return Number(expectInteger(value, kind));
}

function expectArray(value: unknown, shape: Shape, length?: number): unknown[] {
  if (!Array.isArray(value) || (length !== undefined && value.length !== length)) {
    throw mismatch(value, shape);
  }
  return value;
}

function isAbsent(value: unknown): boolean {
  return value === null || value === undefined;
}

// ============================================================================
// Shape-driven serialization
// ============================================================================

/**
 * Build a `Serialize` function for values of the given shape.
 *
 * @param shape - Shape describing the value
 * @param registry - Registry for resolving `ref` shapes
 */
export function shapeSerialize(shape: Shape, registry: ShapeRegistry = defaultRegistry): Serialize<unknown> {
  return (value, serializer) => serializeWithShape(value, shape, serializer, registry);
}

function serializeWithShape(
  value: unknown,
  shape: Shape,
  serializer: Serializer,
  registry: ShapeRegistry
): void {
  const resolved = registry.resolve(shape);

  switch (resolved.kind) {
    // Primitives
    case "bool":
      if (typeof value !== "boolean") {
        throw mismatch(value, resolved);
      }
      return serializer.serializeBool(value);
    case "i8":
      return serializer.serializeI8(expectSmallInteger(value, "i8"));
    case "i16":
      return serializer.serializeI16(expectSmallInteger(value, "i16"));
    case "i32":
      return serializer.serializeI32(expectSmallInteger(value, "i32"));
    case "i64":
      return serializer.serializeI64(expectInteger(value, "i64"));
    case "i128":
      return serializer.serializeI128(expectInteger(value, "i128"));
    case "u8":
      return serializer.serializeU8(expectSmallInteger(value, "u8"));
    case "u16":
      return serializer.serializeU16(expectSmallInteger(value, "u16"));
    case "u32":
      return serializer.serializeU32(expectSmallInteger(value, "u32"));
    case "u64":
      return serializer.serializeU64(expectInteger(value, "u64"));
    case "u128":
      return serializer.serializeU128(expectInteger(value, "u128"));
    case "f32":
    case "f64":
      if (typeof value !== "number") {
        throw mismatch(value, resolved);
      }
      return resolved.kind === "f32" ? serializer.serializeF32(value) : serializer.serializeF64(value);
    case "char":
      if (typeof value !== "string" || [...value].length !== 1) {
        throw mismatch(value, resolved);
      }
      return serializer.serializeChar(value);
    case "string":
      if (typeof value !== "string") {
        throw mismatch(value, resolved);
      }
      return serializer.serializeStr(value);
    case "borrowedStr":
      if (value instanceof BorrowedStr) {
        return serializer.serializeStr(value.text);
      }
      if (typeof value !== "string") {
        throw mismatch(value, resolved);
      }
      return serializer.serializeStr(value);
    case "bytes":
    case "borrowedBytes":
      if (!(value instanceof Uint8Array)) {
        throw mismatch(value, resolved);
      }
      return serializer.serializeBytes(value);
    case "unit":
      if (!isAbsent(value)) {
        throw mismatch(value, resolved);
      }
      return serializer.serializeUnit();

    // Containers
    case "option":
      if (isAbsent(value)) {
        return serializer.serializeNone();
      }
      return serializer.serializeSome(value, shapeSerialize(resolved.inner, registry));
    case "seq": {
      const values = expectArray(value, resolved);
      const state = serializer.serializeSeq(values.length);
      const element = shapeSerialize(resolved.element, registry);
      for (const item of values) {
        state.serializeElement(item, element);
      }
      return state.end();
    }
    case "map": {
      if (!(value instanceof Map)) {
        throw mismatch(value, resolved);
      }
      const state = serializer.serializeMap(value.size);
      const key = shapeSerialize(resolved.key, registry);
      const val = shapeSerialize(resolved.value, registry);
      for (const [k, v] of value) {
        state.serializeKey(k, key);
        state.serializeValue(v, val);
      }
      return state.end();
    }

    // Composites
    case "tuple": {
      const values = expectArray(value, resolved, resolved.elements.length);
      const state = serializer.serializeTuple(values.length);
      return serializeElements(state, values, resolved.elements, registry);
    }
    case "unitStruct":
      if (!isAbsent(value)) {
        throw mismatch(value, resolved);
      }
      return serializer.serializeUnitStruct(resolved.name);
    case "newtype":
      return serializer.serializeNewtypeStruct(resolved.name, value, shapeSerialize(resolved.inner, registry));
    case "tupleStruct": {
      const values = expectArray(value, resolved, resolved.elements.length);
      const state = serializer.serializeTupleStruct(resolved.name, values.length);
      return serializeElements(state, values, resolved.elements, registry);
    }
    case "struct": {
      if (!isRecord(value)) {
        throw mismatch(value, resolved);
      }
      const state = serializer.serializeStruct(resolved.name, wireFieldNames(resolved.fields).length);
      return serializeFields(state, value, resolved.fields, registry);
    }
    case "enum":
      return serializeEnum(value, resolved, serializer, registry);

    case "custom":
      return resolved.serialize(value, serializer);
  }
}

function serializeElements(
  state: SerializeTuple,
  values: readonly unknown[],
  shapes: readonly Shape[],
  registry: ShapeRegistry
): void {
  for (let i = 0; i < shapes.length; i++) {
    state.serializeElement(values[i], shapeSerialize(shapes[i], registry));
  }
  state.end();
}

function serializeFields(
  state: SerializeStruct,
  record: Record<string, unknown>,
  fields: readonly FieldShape[],
  registry: ShapeRegistry
): void {
  for (const field of fields) {
    if (field.skip) {
      continue;
    }
    const fieldValue = record[field.name];
    if (field.skipIf?.(fieldValue)) {
      state.skipField(field.name);
      continue;
    }
    state.serializeField(field.name, fieldValue, shapeSerialize(field.shape, registry));
  }
  state.end();
}

function serializeEnum(
  value: unknown,
  shape: EnumShape,
  serializer: Serializer,
  registry: ShapeRegistry
): void {
  if (!isRecord(value)) {
    throw mismatch(value, shape);
  }
  const tag = value.tag;
  if (typeof tag !== "string") {
    throw mismatch(value, shape);
  }
  const index = findVariantIndex(shape, tag);
  if (index === -1) {
    const names = shape.variants.map((v) => `\`${v.name}\``).join(", ");
    throw new CustomError(`unknown variant \`${tag}\`, expected one of ${names}`);
  }

  const variant = shape.variants[index];
  const payload = value.value;
  switch (variant.kind) {
    case "unit":
      return serializer.serializeUnitVariant(shape.name, index, variant.name);
    case "newtype":
      return serializer.serializeNewtypeVariant(
        shape.name,
        index,
        variant.name,
        payload,
        shapeSerialize(variant.inner, registry)
      );
    case "tuple": {
      const values = expectArray(payload, { kind: "tuple", elements: variant.elements }, variant.elements.length);
      const state = serializer.serializeTupleVariant(shape.name, index, variant.name, values.length);
      return serializeElements(state, values, variant.elements, registry);
    }
    case "struct": {
      if (!isRecord(payload)) {
        throw mismatch(payload, { kind: "struct", name: `${shape.name}::${variant.name}`, fields: variant.fields });
      }
      const state = serializer.serializeStructVariant(
        shape.name,
        index,
        variant.name,
        wireFieldNames(variant.fields).length
      );
      return serializeFields(state, payload, variant.fields, registry);
    }
  }
}

// ============================================================================
// Shape-driven deserialization
// ============================================================================

/**
 * Build a `Deserialize` function for values of the given shape.
 *
 * @param shape - Shape describing the expected value
 * @param registry - Registry for resolving `ref` shapes
 */
export function shapeDeserialize(shape: Shape, registry: ShapeRegistry = defaultRegistry): Deserialize<unknown> {
  return (deserializer) => deserializeWithShape(deserializer, shape, registry);
}

function deserializeWithShape(deserializer: Deserializer, shape: Shape, registry: ShapeRegistry): unknown {
  const resolved = registry.resolve(shape);

  switch (resolved.kind) {
    // Primitives
    case "bool":
      return deserializer.deserializeBool(new BoolVisitor());
    case "i8":
      return deserializer.deserializeI8(integerVisitor("i8", Number));
    case "i16":
      return deserializer.deserializeI16(integerVisitor("i16", Number));
    case "i32":
      return deserializer.deserializeI32(integerVisitor("i32", Number));
    case "i64":
      return deserializer.deserializeI64(integerVisitor("i64", BigInt));
    case "i128":
      return deserializer.deserializeI128(integerVisitor("i128", BigInt));
    case "u8":
      return deserializer.deserializeU8(integerVisitor("u8", Number));
    case "u16":
      return deserializer.deserializeU16(integerVisitor("u16", Number));
    case "u32":
      return deserializer.deserializeU32(integerVisitor("u32", Number));
    case "u64":
      return deserializer.deserializeU64(integerVisitor("u64", BigInt));
    case "u128":
      return deserializer.deserializeU128(integerVisitor("u128", BigInt));
    case "f32":
      return deserializer.deserializeF32(new FloatVisitor("f32"));
    case "f64":
      return deserializer.deserializeF64(new FloatVisitor("f64"));
    case "char":
      return deserializer.deserializeChar(new CharVisitor());
    case "string":
      return deserializer.deserializeString(new StringVisitor());
    case "borrowedStr":
      return deserializer.deserializeStr(new BorrowedStrVisitor());
    case "bytes":
      return deserializer.deserializeByteBuf(new ByteBufVisitor());
    case "borrowedBytes":
      return deserializer.deserializeBytes(new BorrowedBytesVisitor());
    case "unit":
      return deserializer.deserializeUnit(new UnitVisitor("unit"));

    // Containers
    case "option":
      return deserializer.deserializeOption(new OptionVisitor(resolved.inner, registry));
    case "seq":
      return deserializer.deserializeSeq(new SeqVisitor(resolved.element, registry));
    case "map":
      return deserializer.deserializeMap(new MapVisitor(resolved.key, resolved.value, registry));

    // Composites
    case "tuple":
      return deserializer.deserializeTuple(
        resolved.elements.length,
        new TupleVisitor(describeShape(resolved), resolved.elements, registry)
      );
    case "unitStruct":
      return deserializer.deserializeUnitStruct(resolved.name, new UnitVisitor(describeShape(resolved)));
    case "newtype":
      return deserializer.deserializeNewtypeStruct(resolved.name, new NewtypeVisitor(resolved, registry));
    case "tupleStruct":
      return deserializer.deserializeTupleStruct(
        resolved.name,
        resolved.elements.length,
        new TupleVisitor(describeShape(resolved), resolved.elements, registry)
      );
    case "struct":
      return deserializer.deserializeStruct(
        resolved.name,
        wireFieldNames(resolved.fields),
        new StructVisitor(describeShape(resolved), resolved.fields, registry)
      );
    case "enum":
      return deserializer.deserializeEnum(
        resolved.name,
        resolved.variants.map((v) => v.name),
        new EnumVisitor(resolved, registry)
      );

    case "custom":
      return resolved.deserialize(deserializer);
  }
}

// ============================================================================
// Visitors
// ============================================================================

class BoolVisitor extends Visitor<boolean> {
  readonly expecting = "a boolean";

  visitBool(v: boolean): boolean {
    return v;
  }
}

/**
 * Accepts any integer callback whose value lies in `[min, max]`.
 */
class IntegerVisitor<T> extends Visitor<T> {
  constructor(
    readonly expecting: string,
    private readonly min: bigint,
    private readonly max: bigint,
    private readonly convert: (v: bigint) => T
  ) {
    super();
  }

  visitI128(v: bigint): T {
    if (v < this.min || v > this.max) {
      throw invalidValue({ kind: "signed", value: v }, this.expecting);
    }
    return this.convert(v);
  }

  visitU128(v: bigint): T {
    if (v < this.min || v > this.max) {
      throw invalidValue({ kind: "unsigned", value: v }, this.expecting);
    }
    return this.convert(v);
  }
}

function integerVisitor<T>(kind: IntegerKind, convert: (v: bigint) => T): IntegerVisitor<T> {
  const [min, max] = RANGES[kind];
  return new IntegerVisitor(kind, min, max, convert);
}

class FloatVisitor extends Visitor<number> {
  constructor(readonly expecting: string) {
    super();
  }

  visitF64(v: number): number {
    return v;
  }
}

class CharVisitor extends Visitor<string> {
  readonly expecting = "a character";

  visitChar(v: string): string {
    return v;
  }
}

class StringVisitor extends Visitor<string> {
  readonly expecting = "a string";

  visitStr(v: string): string {
    return v;
  }
}

class BorrowedStrVisitor extends Visitor<BorrowedStr> {
  readonly expecting = "a borrowed string";

  visitBorrowedStr(v: string, bytes: Uint8Array): BorrowedStr {
    return new BorrowedStr(v, bytes);
  }
}

class ByteBufVisitor extends Visitor<Uint8Array> {
  readonly expecting = "a byte array";

  visitBytes(v: Uint8Array): Uint8Array {
    return v.slice();
  }

  visitByteBuf(v: Uint8Array): Uint8Array {
    return v;
  }
}

class BorrowedBytesVisitor extends Visitor<Uint8Array> {
  readonly expecting = "a borrowed byte array";

  visitBorrowedBytes(v: Uint8Array): Uint8Array {
    return v;
  }
}

class UnitVisitor extends Visitor<null> {
  constructor(readonly expecting: string) {
    super();
  }

  visitUnit(): null {
    return null;
  }
}

class OptionVisitor extends Visitor<unknown> {
  readonly expecting = "option";

  constructor(
    private readonly inner: Shape,
    private readonly registry: ShapeRegistry
  ) {
    super();
  }

  visitNone(): null {
    return null;
  }

  visitSome(deserializer: Deserializer): unknown {
    return deserializeWithShape(deserializer, this.inner, this.registry);
  }
}

class NewtypeVisitor extends Visitor<unknown> {
  readonly expecting: string;

  constructor(
    private readonly shape: NewtypeShape,
    private readonly registry: ShapeRegistry
  ) {
    super();
    this.expecting = describeShape(shape);
  }

  visitNewtypeStruct(deserializer: Deserializer): unknown {
    return deserializeWithShape(deserializer, this.shape.inner, this.registry);
  }
}

class SeqVisitor extends Visitor<unknown[]> {
  readonly expecting = "a sequence";

  constructor(
    private readonly element: Shape,
    private readonly registry: ShapeRegistry
  ) {
    super();
  }

  visitSeq(seq: SeqAccess): unknown[] {
    const values: unknown[] = [];
    const element = shapeDeserialize(this.element, this.registry);
    for (let item = seq.nextElement(element); item !== null; item = seq.nextElement(element)) {
      values.push(item.value);
    }
    return values;
  }
}

class MapVisitor extends Visitor<Map<unknown, unknown>> {
  readonly expecting = "a map";

  constructor(
    private readonly key: Shape,
    private readonly value: Shape,
    private readonly registry: ShapeRegistry
  ) {
    super();
  }

  visitMap(map: MapAccess): Map<unknown, unknown> {
    const entries = new Map<unknown, unknown>();
    const key = shapeDeserialize(this.key, this.registry);
    const value = shapeDeserialize(this.value, this.registry);
    for (let k = map.nextKey(key); k !== null; k = map.nextKey(key)) {
      entries.set(k.value, map.nextValue(value));
    }
    return entries;
  }
}

class TupleVisitor extends Visitor<unknown[]> {
  constructor(
    readonly expecting: string,
    private readonly elements: readonly Shape[],
    private readonly registry: ShapeRegistry
  ) {
    super();
  }

  visitSeq(seq: SeqAccess): unknown[] {
    const values: unknown[] = [];
    for (let i = 0; i < this.elements.length; i++) {
      const item = seq.nextElement(shapeDeserialize(this.elements[i], this.registry));
      if (item === null) {
        throw invalidLength(i, this.expecting);
      }
      values.push(item.value);
    }
    return values;
  }
}

class StructVisitor extends Visitor<Record<string, unknown>> {
  constructor(
    readonly expecting: string,
    private readonly fields: readonly FieldShape[],
    private readonly registry: ShapeRegistry
  ) {
    super();
  }

  visitSeq(seq: SeqAccess): Record<string, unknown> {
    const record: Record<string, unknown> = {};
    let read = 0;
    for (const field of this.fields) {
      if (field.skip) {
        if (field.default) {
          record[field.name] = field.default();
        }
        continue;
      }
      const item = seq.nextElement(shapeDeserialize(field.shape, this.registry));
      if (item === null) {
        throw invalidLength(read, `${this.expecting} with ${wireFieldNames(this.fields).length} elements`);
      }
      record[field.name] = item.value;
      read++;
    }
    return record;
  }
}

/**
 * Resolves a variant index read off the wire against the variant count.
 */
class VariantIndexVisitor extends Visitor<number> {
  readonly expecting: string;

  constructor(private readonly count: number) {
    super();
    this.expecting = `variant index 0 <= i < ${count}`;
  }

  visitU64(v: bigint): number {
    if (v >= BigInt(this.count)) {
      throw invalidValue({ kind: "unsigned", value: v }, this.expecting);
    }
    return Number(v);
  }
}

class EnumVisitor extends Visitor<EnumValue> {
  readonly expecting: string;

  constructor(
    private readonly shape: EnumShape,
    private readonly registry: ShapeRegistry
  ) {
    super();
    this.expecting = describeShape(shape);
  }

  visitEnum(data: EnumAccess): EnumValue {
    const [index, access] = data.variant((d) =>
      d.deserializeIdentifier(new VariantIndexVisitor(this.shape.variants.length))
    );
    const variant = this.shape.variants[index];
    const tag = variant.name;
    const path = `${this.shape.name}::${tag}`;

    switch (variant.kind) {
      case "unit":
        access.unitVariant();
        return { tag };
      case "newtype":
        return { tag, value: access.newtypeVariant(shapeDeserialize(variant.inner, this.registry)) };
      case "tuple":
        return {
          tag,
          value: access.tupleVariant(
            variant.elements.length,
            new TupleVisitor(`tuple variant ${path}`, variant.elements, this.registry)
          ),
        };
      case "struct":
        return {
          tag,
          value: access.structVariant(
            wireFieldNames(variant.fields),
            new StructVisitor(`struct variant ${path}`, variant.fields, this.registry)
          ),
        };
    }
  }
}
