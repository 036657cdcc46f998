import { describe, it, expect, vi, afterEach } from 'vitest';
import { Decoder } from './decoder';
import { BytesReader } from './reader';
import type { BytesReaderOptions } from './reader';
import {
  BufferUnderflowError,
  EndOfStreamError,
  InvalidBytesError,
  LengthLimitExceededError,
  UnsupportedOperationError,
  Utf8Error,
} from './errors';
import { Visitor } from './traversal';
import type { EnumAccess, MapAccess, SeqAccess } from './traversal';
import { shapeDeserialize } from './shape_codec';
import type { Shape } from './shape';

function decoderFor(bytes: number[], options?: BytesReaderOptions): Decoder {
  return new Decoder(new BytesReader(new Uint8Array(bytes), options));
}

function decode(bytes: number[], shape: Shape): unknown {
  return shapeDeserialize(shape)(decoderFor(bytes));
}

/** Reports which callback received the text or bytes. */
class Recorder extends Visitor<string> {
  readonly expecting = 'text or bytes';

  visitStr(v: string) {
    return `str:${v}`;
  }

  visitBorrowedStr(v: string) {
    return `borrowedStr:${v}`;
  }

  visitString(v: string) {
    return `string:${v}`;
  }

  visitBytes(v: Uint8Array) {
    return `bytes:${v.join(',')}`;
  }

  visitBorrowedBytes(v: Uint8Array) {
    return `borrowedBytes:${v.join(',')}`;
  }

  visitByteBuf(v: Uint8Array) {
    return `byteBuf:${v.join(',')}`;
  }
}

class SeqHints extends Visitor<number[]> {
  readonly expecting = 'a sequence';

  visitSeq(seq: SeqAccess) {
    const hints: number[] = [];
    const u8 = shapeDeserialize({ kind: 'u8' });
    for (;;) {
      const hint = seq.sizeHint();
      if (hint !== null) {
        hints.push(hint);
      }
      if (seq.nextElement(u8) === null) {
        return hints;
      }
    }
  }
}

class MapHints extends Visitor<number[]> {
  readonly expecting = 'a map';

  visitMap(map: MapAccess) {
    const hints: number[] = [];
    const u8 = shapeDeserialize({ kind: 'u8' });
    const bool = shapeDeserialize({ kind: 'bool' });
    for (;;) {
      hints.push(map.sizeHint() ?? -1);
      if (map.nextKey(u8) === null) {
        return hints;
      }
      hints.push(map.sizeHint() ?? -1);
      map.nextValue(bool);
    }
  }
}

class VariantIndex extends Visitor<number> {
  readonly expecting = 'a variant index';

  visitU8(v: number) {
    return v;
  }
}

class Choice extends Visitor<string> {
  readonly expecting = 'enum Choice';

  visitEnum(data: EnumAccess) {
    const [index, variant] = data.variant((d) => d.deserializeIdentifier(new VariantIndex()));
    if (index === 0) {
      variant.unitVariant();
      return 'none';
    }
    const inner = variant.newtypeVariant(shapeDeserialize({ kind: 'u8' }));
    return `some:${String(inner)}`;
  }
}

describe('Decoder', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('bool', () => {
    it('decodes 0 and 1', () => {
      expect(decode([0], { kind: 'bool' })).toBe(false);
      expect(decode([1], { kind: 'bool' })).toBe(true);
    });

    it('rejects any other byte', () => {
      expect(() => decode([2], { kind: 'bool' })).toThrow(InvalidBytesError);
      expect(() => decode([2], { kind: 'bool' })).toThrow(
        'invalid byte sequence while decoding value of type `bool`: [2]'
      );
    });
  });

  describe('integers', () => {
    it('decodes big-endian values', () => {
      expect(decode([0xff], { kind: 'i8' })).toBe(-1);
      expect(decode([0xff, 0xfe], { kind: 'i16' })).toBe(-2);
      expect(decode([1, 2, 3, 4], { kind: 'i32' })).toBe(0x01020304);
      expect(decode([0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff], { kind: 'i64' })).toBe(-1n);
      expect(decode([200], { kind: 'u8' })).toBe(200);
      expect(decode([1, 2], { kind: 'u16' })).toBe(258);
      expect(decode([0xde, 0xad, 0xbe, 0xef], { kind: 'u32' })).toBe(0xdeadbeef);
      expect(decode([0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff], { kind: 'u64' })).toBe((1n << 64n) - 1n);
    });

    it('decodes 128-bit values', () => {
      expect(decode(new Array<number>(16).fill(0xff), { kind: 'i128' })).toBe(-1n);
      expect(decode([0, 0, 0, 0, 0, 0, 0, 1, 0, 0, 0, 0, 0, 0, 0, 2], { kind: 'u128' })).toBe((1n << 64n) + 2n);
      expect(decode([0x80, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0], { kind: 'i128' })).toBe(-(1n << 127n));
    });

    it('throws EndOfStreamError on a short buffer', () => {
      expect(() => decode([0, 0], { kind: 'i32' })).toThrow(EndOfStreamError);
      expect(() => decode([0, 0], { kind: 'i32' })).toThrow(BufferUnderflowError);
    });
  });

  describe('floats', () => {
    it('decodes IEEE 754 big-endian values', () => {
      expect(decode([0x3f, 0x80, 0, 0], { kind: 'f32' })).toBe(1);
      expect(decode([0xc0, 0x04, 0, 0, 0, 0, 0, 0], { kind: 'f64' })).toBe(-2.5);
    });
  });

  describe('char', () => {
    it('decodes one to four UTF-8 bytes', () => {
      expect(decode([1, 0x61], { kind: 'char' })).toBe('a');
      expect(decode([2, 0xc3, 0xa9], { kind: 'char' })).toBe('é');
      expect(decode([3, 0xe2, 0x82, 0xac], { kind: 'char' })).toBe('€');
      expect(decode([4, 0xf0, 0x9f, 0x98, 0x80], { kind: 'char' })).toBe('😀');
    });

    it('keeps only the first scalar', () => {
      const decoder = decoderFor([2, 0x61, 0x62, 7]);
      expect(shapeDeserialize({ kind: 'char' })(decoder)).toBe('a');
      expect(decoder.readByte()).toBe(7);
    });

    it('rejects widths outside 1..4', () => {
      expect(() => decode([0], { kind: 'char' })).toThrow(
        'invalid byte sequence while decoding value of type `char`: [0]'
      );
      expect(() => decode([5, 1, 1, 1, 1, 1], { kind: 'char' })).toThrow(
        'invalid byte sequence while decoding value of type `char`: [5]'
      );
    });

    it('rejects malformed UTF-8', () => {
      expect(() => decode([1, 0xff], { kind: 'char' })).toThrow(Utf8Error);
    });
  });

  describe('text and bytes', () => {
    it('offers str as borrowed', () => {
      expect(decoderFor([1, 2, 104, 105]).deserializeStr(new Recorder())).toBe('borrowedStr:hi');
    });

    it('offers string as owned', () => {
      expect(decoderFor([1, 2, 104, 105]).deserializeString(new Recorder())).toBe('string:hi');
    });

    it('offers bytes as borrowed', () => {
      expect(decoderFor([1, 2, 7, 8]).deserializeBytes(new Recorder())).toBe('borrowedBytes:7,8');
    });

    it('offers byte bufs as owned', () => {
      expect(decoderFor([1, 2, 7, 8]).deserializeByteBuf(new Recorder())).toBe('byteBuf:7,8');
    });

    it('rejects malformed UTF-8 in owned text', () => {
      expect(() => decoderFor([1, 2, 0xc3, 0x28]).deserializeString(new Recorder())).toThrow(Utf8Error);
    });

    it('applies the length limit', () => {
      const decoder = decoderFor([1, 3, 1, 2, 3], { maxLength: 2 });
      expect(() => decoder.deserializeByteBuf(new Recorder())).toThrow(LengthLimitExceededError);
    });
  });

  describe('option', () => {
    it('decodes none and some', () => {
      const shape: Shape = { kind: 'option', inner: { kind: 'u8' } };
      expect(decode([0], shape)).toBeNull();
      expect(decode([1, 9], shape)).toBe(9);
    });

    it('rejects any other discriminant', () => {
      expect(() => decode([5], { kind: 'option', inner: { kind: 'u8' } })).toThrow(
        'invalid byte sequence while decoding value of type `option`: [5]'
      );
    });
  });

  describe('drivers', () => {
    it('counts down sequence elements', () => {
      expect(decoderFor([1, 2, 5, 6]).deserializeSeq(new SeqHints())).toEqual([2, 1, 0]);
    });

    it('counts down map entries on the key step only', () => {
      expect(decoderFor([1, 1, 7, 1]).deserializeMap(new MapHints())).toEqual([1, 0, 0]);
    });

    it('reads tuples without a length', () => {
      const decoder = decoderFor([3, 4, 5]);
      const tuple = shapeDeserialize({ kind: 'tuple', elements: [{ kind: 'u8' }, { kind: 'u8' }] });
      expect(tuple(decoder)).toEqual([3, 4]);
      expect(decoder.readByte()).toBe(5);
    });

    it('reads one element per struct field', () => {
      const decoder = decoderFor([1, 2, 3]);
      expect(decoder.deserializeStruct('Pair', ['a', 'b'], new SeqHints())).toEqual([2, 1, 0]);
      expect(decoder.readByte()).toBe(3);
    });

    it('resolves the variant tag through the identifier visitor', () => {
      expect(decoderFor([0]).deserializeEnum('Choice', ['None', 'Some'], new Choice())).toBe('none');
      expect(decoderFor([1, 9]).deserializeEnum('Choice', ['None', 'Some'], new Choice())).toBe('some:9');
    });

    it('applies the length limit to sequences', () => {
      expect(() => decoderFor([1, 3, 0, 0, 0], { maxLength: 2 }).deserializeSeq(new SeqHints())).toThrow(
        'Length 3 exceeds maximum 2'
      );
    });
  });

  describe('unsupported requests', () => {
    it('rejects self-describing decoding', () => {
      expect(() => decoderFor([0]).deserializeAny(new Recorder())).toThrow(UnsupportedOperationError);
      expect(() => decoderFor([0]).deserializeAny(new Recorder())).toThrow('`deserializeAny` is not allowed');
    });

    it('rejects identifiers and ignored values', () => {
      expect(() => decoderFor([0]).deserializeIdentifier(new Recorder())).toThrow(
        '`deserializeIdentifier` is not allowed'
      );
      expect(() => decoderFor([0]).deserializeIgnoredAny(new Recorder())).toThrow(
        '`deserializeIgnoredAny` is not allowed'
      );
    });
  });

  describe('lenient reads', () => {
    it('decodes missing bytes as zero and warns', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const decoder = decoderFor([0, 1], { lenientReads: true });
      expect(shapeDeserialize({ kind: 'u32' })(decoder)).toBe(0x00010000);
      expect(warn).toHaveBeenCalledTimes(1);
    });
  });
});
