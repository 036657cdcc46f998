/**
 * Every type the encoder and decoder know how to handle, by display name.
 * Used in diagnostics only; nothing here is written to the wire.
 */
export enum ValueType {
  Bool = "bool",
  I8 = "i8",
  I16 = "i16",
  I32 = "i32",
  I64 = "i64",
  I128 = "i128",
  U8 = "u8",
  U16 = "u16",
  U32 = "u32",
  U64 = "u64",
  U128 = "u128",
  F32 = "f32",
  F64 = "f64",
  Char = "char",
  Str = "str",
  String = "string",
  Bytes = "bytes",
  ByteBuf = "byte_buf",
  Option = "option",
  Unit = "unit",
  UnitStruct = "unit_struct",
  NewtypeStruct = "newtype_struct",
  Seq = "seq",
  Tuple = "tuple",
  TupleStruct = "tuple_struct",
  Map = "map",
  Struct = "struct",
  Enum = "enum",
}

/**
 * A present value, as opposed to `null` for "no more elements".
 * Wrapping keeps `undefined` and `null` usable as element values.
 */
export interface Present<T> {
  value: T;
}

/**
 * Number of distinct variant indices a one-byte tag can carry.
 */
export const MAX_VARIANTS = 256;

/**
 * Widest UTF-8 encoding of a single scalar value.
 */
export const MAX_CHAR_WIDTH = 4;

/**
 * Default upper bound for a framed length on decode (64 MB).
 */
export const DEFAULT_MAX_LENGTH = 64 * 1024 * 1024;

/**
 * Encode a length known to be below 256 as a single byte.
 * Larger values are truncated; callers guarantee the bound.
 */
export function encodeSmall(n: number): number {
  return n & 0xff;
}

/**
 * Decode a single-byte length.
 */
export function decodeSmall(b: number): number {
  return b;
}

/**
 * Encode a length of any size as `[k, b_{k-1}, ..., b_0]`: a count byte
 * followed by the big-endian bytes of `n` with leading zeros stripped.
 * Zero encodes as `[0]`.
 *
 * @throws RangeError if n is not a non-negative safe integer
 */
export function encodeLarge(n: number): Uint8Array {
  if (!Number.isSafeInteger(n) || n < 0) {
    throw new RangeError(`Length ${n} is not a non-negative safe integer`);
  }

  const digits: number[] = [];
  // Division rather than shifts: lengths may exceed 32 bits.
  let rest = n;
  while (rest > 0) {
    digits.push(rest % 256);
    rest = Math.floor(rest / 256);
  }

  const out = new Uint8Array(digits.length + 1);
  out[0] = encodeSmall(digits.length);
  for (let i = 0; i < digits.length; i++) {
    out[i + 1] = digits[digits.length - 1 - i];
  }
  return out;
}

/**
 * Decode the tier-2 bytes of a large length. The count byte must already
 * have been consumed.
 */
export function decodeLarge(bytes: Uint8Array): number {
  let len = 0;
  for (const b of bytes) {
    len = len * 256 + b;
  }
  return len;
}
