import { describe, it, expect } from 'vitest';
import {
  encodeSmall,
  decodeSmall,
  encodeLarge,
  decodeLarge,
} from './types';

describe('small length', () => {
  it('encodes a length as one byte', () => {
    expect(encodeSmall(0)).toBe(0);
    expect(encodeSmall(4)).toBe(4);
    expect(encodeSmall(255)).toBe(255);
  });

  it('truncates lengths of 256 and above', () => {
    expect(encodeSmall(256)).toBe(0);
    expect(encodeSmall(257)).toBe(1);
  });

  it('decodes every byte', () => {
    for (let b = 0; b < 256; b++) {
      expect(decodeSmall(b)).toBe(b);
    }
  });
});

describe('large length', () => {
  it('encodes 0 with an empty tier 2', () => {
    expect(encodeLarge(0)).toEqual(new Uint8Array([0]));
  });

  it('encodes 1', () => {
    expect(encodeLarge(1)).toEqual(new Uint8Array([1, 1]));
  });

  it('encodes 255 in one byte', () => {
    expect(encodeLarge(255)).toEqual(new Uint8Array([1, 255]));
  });

  it('encodes 256 in two bytes', () => {
    expect(encodeLarge(256)).toEqual(new Uint8Array([2, 1, 0]));
  });

  it('encodes 65535 in two bytes', () => {
    expect(encodeLarge(65535)).toEqual(new Uint8Array([2, 255, 255]));
  });

  it('encodes 2^32 - 1 in four bytes', () => {
    expect(encodeLarge(4294967295)).toEqual(new Uint8Array([4, 255, 255, 255, 255]));
  });

  it('encodes values past 32 bits', () => {
    expect(encodeLarge(2 ** 40)).toEqual(new Uint8Array([6, 1, 0, 0, 0, 0, 0]));
  });

  it('rejects negative and fractional lengths', () => {
    expect(() => encodeLarge(-1)).toThrow(RangeError);
    expect(() => encodeLarge(1.5)).toThrow(RangeError);
  });

  it('decodes a big-endian run', () => {
    expect(decodeLarge(new Uint8Array([]))).toBe(0);
    expect(decodeLarge(new Uint8Array([1, 0]))).toBe(256);
    expect(decodeLarge(new Uint8Array([0x12, 0x34, 0x56]))).toBe(0x123456);
  });

  it('roundtrips boundary lengths with a minimal, canonical prefix', () => {
    for (const n of [0, 1, 127, 255, 256, 65535, 65536, 4294967295, Number.MAX_SAFE_INTEGER]) {
      const encoded = encodeLarge(n);
      const tier2 = encoded.subarray(1);
      expect(encoded[0]).toBe(tier2.length);
      if (tier2.length > 0) {
        expect(tier2[0]).not.toBe(0);
      }
      expect(decodeLarge(tier2)).toBe(n);
    }
  });
});
