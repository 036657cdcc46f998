// Scoped drivers handed to visitors while a sequence, map or union is being
// decoded. Each one borrows the active decoder for the duration of that value.

import type { Decoder } from "./decoder";
import { IndexDeserializer } from "./traversal";
import type {
  Deserialize,
  EnumAccess,
  MapAccess,
  SeqAccess,
  VariantAccess,
  Visitor,
} from "./traversal";
import type { Present } from "./types";

/**
 * Hands out at most `len` elements.
 */
export class SeqDecoder implements SeqAccess {
  constructor(
    private readonly decoder: Decoder,
    private len: number
  ) {}

  nextElement<T>(deserialize: Deserialize<T>): Present<T> | null {
    if (this.len === 0) {
      return null;
    }
    this.len--;
    return { value: deserialize(this.decoder) };
  }

  sizeHint(): number {
    return this.len;
  }
}

/**
 * Hands out at most `len` key/value pairs. Only the key step counts down.
 */
export class MapDecoder implements MapAccess {
  constructor(
    private readonly decoder: Decoder,
    private len: number
  ) {}

  nextKey<K>(deserialize: Deserialize<K>): Present<K> | null {
    if (this.len === 0) {
      return null;
    }
    this.len--;
    return { value: deserialize(this.decoder) };
  }

  nextValue<V>(deserialize: Deserialize<V>): V {
    return deserialize(this.decoder);
  }

  sizeHint(): number {
    return this.len;
  }
}

/**
 * Reads the one-byte tag and resolves it through the caller's identifier
 * deserializer.
 */
export class EnumDecoder implements EnumAccess {
  constructor(private readonly decoder: Decoder) {}

  variant<V>(deserialize: Deserialize<V>): [V, VariantAccess] {
    const tag = this.decoder.readByte();
    const value = deserialize(new IndexDeserializer(tag));
    return [value, new VariantDecoder(this.decoder)];
  }
}

export class VariantDecoder implements VariantAccess {
  constructor(private readonly decoder: Decoder) {}

  unitVariant(): void {}

  newtypeVariant<T>(deserialize: Deserialize<T>): T {
    return deserialize(this.decoder);
  }

  tupleVariant<T>(len: number, visitor: Visitor<T>): T {
    return this.decoder.deserializeTuple(len, visitor);
  }

  structVariant<T>(fields: readonly string[], visitor: Visitor<T>): T {
    return this.decoder.deserializeStruct("", fields, visitor);
  }
}
