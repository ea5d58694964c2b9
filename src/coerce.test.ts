import { describe, expect, it } from 'vitest';
import { coerce, SKIP, zeroValue } from './coerce';
import { DecoderRegistry } from './decoders';
import { CoercionError } from './errors';
import {
  array,
  boolean,
  bytes,
  custom,
  duration,
  type Field,
  float32,
  float64,
  int,
  int8,
  int16,
  int32,
  int64,
  map,
  opaque,
  pointer,
  record,
  string,
  uint,
  uint8,
  uint16,
  uint32,
  uint64,
} from './schema';

describe('coerce()', () => {
  it('returns strings unchanged', () => {
    expect(coerce(' spaced ', string().type)).toBe(' spaced ');
  });

  it('converts scalars', () => {
    expect(coerce('true', boolean().type)).toBe(true);
    expect(coerce('-12', int8().type)).toBe(-12);
    expect(coerce('0.5', float32().type)).toBe(0.5);
    expect(coerce('2m', duration().type)).toBe(120_000);
  });

  it('reads back the string form of every scalar', () => {
    const cases: Array<[Field<unknown>, unknown[]]> = [
      [string(), ['', ' spaced ', 'a,b']],
      [boolean(), [true, false]],
      [int8(), [-128, 0, 127]],
      [int16(), [-32768, 32767]],
      [int32(), [-2147483648, 2147483647]],
      [int(), [Number.MIN_SAFE_INTEGER, Number.MAX_SAFE_INTEGER]],
      [int64(), [-(2n ** 63n), 2n ** 63n - 1n]],
      [uint8(), [0, 255]],
      [uint16(), [65535]],
      [uint32(), [4294967295]],
      [uint(), [Number.MAX_SAFE_INTEGER]],
      [uint64(), [0n, 2n ** 64n - 1n]],
      [float32(), [Math.fround(0.1), -65504, Math.fround(1e-45), 3.4028234663852886e38]],
      [float64(), [0.1, -1.5e300, 5e-324, Number.MAX_VALUE]],
    ];

    for (const [field, values] of cases) {
      for (const value of values) {
        expect(coerce(String(value), field.type)).toBe(value);
      }
    }
  });

  it('produces bigint for 64-bit widths', () => {
    expect(coerce('9223372036854775807', int64().type)).toBe(9223372036854775807n);
    expect(coerce('0xFF', uint64().type)).toBe(255n);
  });

  it('splits sequences on commas', () => {
    expect(coerce('a,b,c', array(string()).type)).toEqual(['a', 'b', 'c']);
    expect(coerce('5,10,20', array(int()).type)).toEqual([5, 10, 20]);
  });

  it('yields an empty sequence for an empty string', () => {
    expect(coerce('', array(int()).type)).toEqual([]);
  });

  it('uses a custom separator', () => {
    expect(coerce('a;b', array(string(), { separator: ';' }).type)).toEqual(['a', 'b']);
  });

  it('fails when any element fails', () => {
    expect(() => coerce('1,x', array(int()).type)).toThrow('parsing "x": invalid syntax');
  });

  it('keeps bytes whole', () => {
    expect(coerce('hi,there', bytes().type)).toEqual(new TextEncoder().encode('hi,there'));
  });

  it('builds maps from key:value pairs', () => {
    expect(coerce('k1:v1,k2:v2', map(string(), string()).type)).toEqual(
      new Map([
        ['k1', 'v1'],
        ['k2', 'v2'],
      ]),
    );
    expect(coerce('red:1,green:2', map(string(), int()).type)).toEqual(
      new Map([
        ['red', 1],
        ['green', 2],
      ]),
    );
  });

  it('yields an empty map for an empty string', () => {
    expect(coerce('', map(string(), int()).type)).toEqual(new Map());
  });

  it('rejects map pairs without exactly one colon', () => {
    expect(() => coerce('a:1:2', map(string(), int()).type)).toThrow('invalid map item: "a:1:2"');
    expect(() => coerce('a', map(string(), string()).type)).toThrow(CoercionError);
  });

  it('coerces through pointers', () => {
    expect(coerce('5', pointer(int()).type)).toBe(5);
  });

  it('skips records and opaque fields', () => {
    expect(coerce('x', record({ a: string() }).type)).toBe(SKIP);
    expect(coerce('x', opaque<() => void>().type)).toBe(SKIP);
  });

  it('runs custom coercers', () => {
    expect(coerce('abc', custom(s => s.length).type)).toBe(3);
  });

  it('prefers a registered decoder over builtin rules', () => {
    const decoders = new DecoderRegistry().register('Port', s => Number(s) + 1);
    expect(coerce('80', int().named('Port').type, decoders)).toBe(81);
    expect(coerce('80', int().type, decoders)).toBe(80);
  });
});

describe('zeroValue()', () => {
  it('builds zero records', () => {
    const spec = record({
      name: string(),
      port: int(),
      big: int64(),
      enabled: boolean(),
      ptr: pointer(string()),
      list: array(string()),
      codes: map(string(), int()),
      inner: record({ value: float32() }),
    });

    expect(zeroValue(spec.type)).toEqual({
      name: '',
      port: 0,
      big: 0n,
      enabled: false,
      ptr: undefined,
      list: [],
      codes: new Map(),
      inner: { value: 0 },
    });
  });
});
