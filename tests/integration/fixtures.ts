/**
 * Shapes and values shared by the integration tests.
 *
 * `Sample` touches every kind of shape once. Each row carries the bytes its
 * field must encode to, so the full encoding is the rows' bytes in order.
 */

import type { EnumShape, FieldShape, Shape, StructShape } from '../../src';

const settingsFields: FieldShape[] = [
  { name: 'note', shape: { kind: 'unit' } },
  { name: 'on', shape: { kind: 'bool' } },
  { name: 'weight', shape: { kind: 'u8' } },
];

export const Level: EnumShape = {
  kind: 'enum',
  name: 'Level',
  variants: [
    { name: 'Off', kind: 'unit' },
    { name: 'Fixed', kind: 'newtype', inner: { kind: 'u8' } },
    { name: 'Range', kind: 'tuple', elements: [{ kind: 'unit' }, { kind: 'bool' }, { kind: 'u8' }] },
    { name: 'Custom', kind: 'struct', fields: settingsFields },
  ],
};

const Settings: StructShape = { kind: 'struct', name: 'Settings', fields: settingsFields };

interface Row {
  name: string;
  shape: Shape;
  value: unknown;
  bytes: number[];
  /** Value decoded when the field is skipped. */
  fallback?: unknown;
}

function rows(borrowed: boolean): Row[] {
  return [
    { name: 'active', shape: { kind: 'bool' }, value: true, bytes: [1] },
    { name: 'tiny', shape: { kind: 'i8' }, value: -100, bytes: [156], fallback: 0 },
    { name: 'small', shape: { kind: 'i16' }, value: -300, bytes: [254, 212] },
    { name: 'medium', shape: { kind: 'i32' }, value: -70000, bytes: [255, 254, 238, 144], fallback: 0 },
    { name: 'large', shape: { kind: 'i64' }, value: -2n, bytes: [255, 255, 255, 255, 255, 255, 255, 254] },
    {
      name: 'huge',
      shape: { kind: 'i128' },
      value: -(1n << 127n),
      bytes: [128, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0],
      fallback: 0n,
    },
    { name: 'byte', shape: { kind: 'u8' }, value: 250, bytes: [250] },
    { name: 'word', shape: { kind: 'u16' }, value: 0x1234, bytes: [0x12, 0x34], fallback: 0 },
    { name: 'dword', shape: { kind: 'u32' }, value: 0x89abcdef, bytes: [0x89, 0xab, 0xcd, 0xef] },
    { name: 'qword', shape: { kind: 'u64' }, value: 1n << 63n, bytes: [128, 0, 0, 0, 0, 0, 0, 0], fallback: 0n },
    {
      name: 'oword',
      shape: { kind: 'u128' },
      value: (1n << 128n) - 1n,
      bytes: [255, 255, 255, 255, 255, 255, 255, 255, 255, 255, 255, 255, 255, 255, 255, 255],
    },
    { name: 'ratio', shape: { kind: 'f32' }, value: 0.5, bytes: [63, 0, 0, 0], fallback: 0 },
    { name: 'precise', shape: { kind: 'f64' }, value: -0.75, bytes: [0xbf, 0xe8, 0, 0, 0, 0, 0, 0] },
    { name: 'initial', shape: { kind: 'char' }, value: 'Z', bytes: [1, 90], fallback: '\0' },
    {
      name: 'title',
      shape: borrowed ? { kind: 'borrowedStr' } : { kind: 'string' },
      value: 'draft',
      bytes: [1, 5, 100, 114, 97, 102, 116],
    },
    {
      name: 'body',
      shape: { kind: 'string' },
      value: 'plain text',
      bytes: [1, 10, 112, 108, 97, 105, 110, 32, 116, 101, 120, 116],
      fallback: '',
    },
    {
      name: 'blob',
      shape: borrowed ? { kind: 'borrowedBytes' } : { kind: 'bytes' },
      value: new Uint8Array([9, 8, 7]),
      bytes: [1, 3, 9, 8, 7],
    },
    { name: 'missing', shape: { kind: 'option', inner: { kind: 'u8' } }, value: null, bytes: [0], fallback: null },
    { name: 'present', shape: { kind: 'option', inner: { kind: 'u8' } }, value: 42, bytes: [1, 42] },
    { name: 'nothing', shape: { kind: 'unit' }, value: null, bytes: [], fallback: null },
    { name: 'marker', shape: { kind: 'unitStruct', name: 'Marker' }, value: null, bytes: [] },
    { name: 'mode', shape: Level, value: { tag: 'Off' }, bytes: [0], fallback: { tag: 'Off' } },
    { name: 'distance', shape: { kind: 'newtype', name: 'Meters', inner: { kind: 'u8' } }, value: 77, bytes: [77] },
    { name: 'level', shape: Level, value: { tag: 'Fixed', value: 3 }, bytes: [1, 3], fallback: { tag: 'Off' } },
    { name: 'samples', shape: { kind: 'seq', element: { kind: 'u8' } }, value: [1, 1, 2, 3, 5], bytes: [1, 5, 1, 1, 2, 3, 5] },
    {
      name: 'triple',
      shape: { kind: 'tuple', elements: [{ kind: 'unit' }, { kind: 'bool' }, { kind: 'u8' }] },
      value: [null, true, 8],
      bytes: [1, 8],
      fallback: [null, false, 0],
    },
    {
      name: 'named',
      shape: { kind: 'tupleStruct', name: 'Triple', elements: [{ kind: 'unit' }, { kind: 'bool' }, { kind: 'u8' }] },
      value: [null, false, 9],
      bytes: [0, 9],
    },
    {
      name: 'range',
      shape: Level,
      value: { tag: 'Range', value: [null, true, 10] },
      bytes: [2, 1, 10],
      fallback: { tag: 'Off' },
    },
    {
      name: 'table',
      shape: { kind: 'map', key: { kind: 'u8' }, value: { kind: 'u8' } },
      value: new Map([
        [1, 2],
        [3, 4],
      ]),
      bytes: [1, 2, 1, 2, 3, 4],
    },
    {
      name: 'settings',
      shape: Settings,
      value: { note: null, on: false, weight: 11 },
      bytes: [0, 11],
      fallback: { note: null, on: false, weight: 0 },
    },
    {
      name: 'custom',
      shape: Level,
      value: { tag: 'Custom', value: { note: null, on: true, weight: 12 } },
      bytes: [3, 1, 12],
    },
  ];
}

function struct(name: string, all: Row[], skipFallbacks: boolean): StructShape {
  return {
    kind: 'struct',
    name,
    fields: all.map((row): FieldShape => {
      if (skipFallbacks && 'fallback' in row) {
        const fallback = row.fallback;
        return { name: row.name, shape: row.shape, skip: true, default: () => fallback };
      }
      return { name: row.name, shape: row.shape };
    }),
  };
}

function value(all: Row[], skipFallbacks: boolean): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const row of all) {
    out[row.name] = skipFallbacks && 'fallback' in row ? row.fallback : row.value;
  }
  return out;
}

function bytes(all: Row[], skipFallbacks: boolean): Uint8Array {
  return new Uint8Array(all.filter((row) => !(skipFallbacks && 'fallback' in row)).flatMap((row) => row.bytes));
}

/** Borrows its text and bytes from the input. */
export const Sample = struct('Sample', rows(true), false);
export const SAMPLE_VALUE = value(rows(true), false);
export const SAMPLE_BYTES = bytes(rows(true), false);

/** Same layout, owning every field. */
export const SampleOwned = struct('SampleOwned', rows(false), false);
export const SAMPLE_OWNED_VALUE = value(rows(false), false);

/** Every field with a fallback is skipped and decodes to that fallback. */
export const SampleWithSkips = struct('SampleWithSkips', rows(true), true);
export const SAMPLE_WITH_SKIPS_VALUE = value(rows(true), true);
export const SAMPLE_WITH_SKIPS_BYTES = bytes(rows(true), true);
