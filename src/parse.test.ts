import { describe, expect, it } from 'vitest';
import { CoercionError } from './errors';
import { parseBoolean, parseDuration, parseFloat, parseInteger, parseSafeInteger } from './parse';

describe('parseInteger()', () => {
  it('parses decimal values', () => {
    expect(parseInteger('42', true, 8)).toBe(42n);
    expect(parseInteger('-128', true, 8)).toBe(-128n);
    expect(parseInteger('1_000', true, 32)).toBe(1000n);
  });

  it('detects the base from the prefix', () => {
    expect(parseInteger('0x1F', true, 32)).toBe(31n);
    expect(parseInteger('0o17', true, 32)).toBe(15n);
    expect(parseInteger('017', true, 32)).toBe(15n);
    expect(parseInteger('0b101', false, 8)).toBe(5n);
  });

  it('accepts the full unsigned 64-bit range', () => {
    expect(parseInteger('18446744073709551615', false, 64)).toBe(2n ** 64n - 1n);
  });

  it('rejects values outside the width', () => {
    expect(() => parseInteger('128', true, 8)).toThrow('parsing "128": value out of range');
    expect(() => parseInteger('256', false, 8)).toThrow('parsing "256": value out of range');
  });

  it('rejects a sign on unsigned widths', () => {
    expect(() => parseInteger('-1', false, 32)).toThrow('parsing "-1": invalid syntax');
  });

  it('rejects malformed input', () => {
    expect(() => parseInteger('12a', true, 32)).toThrow(CoercionError);
    expect(() => parseInteger('', true, 32)).toThrow('parsing "": invalid syntax');
    expect(() => parseInteger('08', true, 32)).toThrow('parsing "08": invalid syntax');
    expect(() => parseInteger('0x', true, 32)).toThrow('parsing "0x": invalid syntax');
  });
});

describe('parseSafeInteger()', () => {
  it('returns a number', () => {
    expect(parseSafeInteger('8080', true, 64)).toBe(8080);
  });

  it('rejects values beyond the safe integer range', () => {
    expect(() => parseSafeInteger('9007199254740992', true, 64)).toThrow(
      'parsing "9007199254740992": value out of range',
    );
  });
});

describe('parseBoolean()', () => {
  it('accepts the canonical forms', () => {
    for (const raw of ['1', 't', 'T', 'TRUE', 'true', 'True']) {
      expect(parseBoolean(raw)).toBe(true);
    }
    for (const raw of ['0', 'f', 'F', 'FALSE', 'false', 'False']) {
      expect(parseBoolean(raw)).toBe(false);
    }
  });

  it('rejects anything else', () => {
    expect(() => parseBoolean('yes')).toThrow('parsing "yes": invalid syntax');
    expect(() => parseBoolean('tRUE')).toThrow(CoercionError);
  });
});

describe('parseFloat()', () => {
  it('parses decimal and exponent forms', () => {
    expect(parseFloat('0.5', 64)).toBe(0.5);
    expect(parseFloat('1e3', 64)).toBe(1000);
    expect(parseFloat('.25', 64)).toBe(0.25);
  });

  it('rounds to single precision for float32', () => {
    expect(parseFloat('0.1', 32)).toBe(Math.fround(0.1));
  });

  it('accepts values that round to the largest float32', () => {
    expect(parseFloat('3.4028235e+38', 32)).toBe(3.4028234663852886e38);
    expect(parseFloat('-3.4028235e38', 32)).toBe(-3.4028234663852886e38);
  });

  it('parses infinities and NaN', () => {
    expect(parseFloat('-Inf', 64)).toBe(Number.NEGATIVE_INFINITY);
    expect(parseFloat('infinity', 32)).toBe(Number.POSITIVE_INFINITY);
    expect(parseFloat('NaN', 64)).toBeNaN();
  });

  it('rejects out of range values', () => {
    expect(() => parseFloat('1e39', 32)).toThrow('parsing "1e39": value out of range');
    expect(() => parseFloat('1e400', 64)).toThrow('parsing "1e400": value out of range');
  });

  it('rejects malformed input', () => {
    expect(() => parseFloat('abc', 64)).toThrow('parsing "abc": invalid syntax');
    expect(() => parseFloat('', 64)).toThrow('parsing "": invalid syntax');
  });
});

describe('parseDuration()', () => {
  it('returns milliseconds', () => {
    expect(parseDuration('300ms')).toBe(300);
    expect(parseDuration('2h45m')).toBe(9_900_000);
    expect(parseDuration('1.5s')).toBe(1500);
    expect(parseDuration('1us')).toBe(0.001);
    expect(parseDuration('-1m')).toBe(-60_000);
  });

  it('accepts a bare zero', () => {
    expect(parseDuration('0')).toBe(0);
  });

  it('requires a unit', () => {
    expect(() => parseDuration('1')).toThrow('missing unit in duration "1"');
  });

  it('rejects unknown units', () => {
    expect(() => parseDuration('3x')).toThrow('unknown unit "x" in duration "3x"');
  });

  it('rejects empty and unit-only input', () => {
    expect(() => parseDuration('')).toThrow('invalid duration ""');
    expect(() => parseDuration('h')).toThrow('invalid duration "h"');
  });

  it('rejects durations beyond 64-bit nanoseconds', () => {
    expect(() => parseDuration('3000000h')).toThrow('invalid duration "3000000h"');
  });
});
