import { CoercionError } from './errors';

function syntaxError(raw: string): CoercionError {
  return new CoercionError(`parsing "${raw}": invalid syntax`);
}

function rangeError(raw: string): CoercionError {
  return new CoercionError(`parsing "${raw}": value out of range`);
}

const DIGITS = {
  2: /^_?[01](_?[01])*$/,
  8: /^_?[0-7](_?[0-7])*$/,
  10: /^[0-9](_?[0-9])*$/,
  16: /^_?[0-9a-fA-F](_?[0-9a-fA-F])*$/,
} as const;

const RADIX_PREFIX = { 2: '0b', 8: '0o', 10: '', 16: '0x' } as const;

/**
 * Parses an integer literal with base detection: `0x`, `0o` and `0b`
 * prefixes, a bare leading `0` for octal, and `_` between digits. A sign is
 * only accepted for signed widths.
 */
export function parseInteger(raw: string, signed: boolean, bits: number): bigint {
  let body = raw;
  let negative = false;
  if (body.startsWith('+') || body.startsWith('-')) {
    if (!signed) throw syntaxError(raw);
    negative = body.startsWith('-');
    body = body.slice(1);
  }

  let base: keyof typeof DIGITS = 10;
  const lower = body.toLowerCase();
  if (lower.startsWith('0x')) {
    base = 16;
    body = body.slice(2);
  } else if (lower.startsWith('0o')) {
    base = 8;
    body = body.slice(2);
  } else if (lower.startsWith('0b')) {
    base = 2;
    body = body.slice(2);
  } else if (body.length > 1 && body.startsWith('0')) {
    base = 8;
    body = body.slice(1);
  }

  if (!DIGITS[base].test(body)) throw syntaxError(raw);

  const magnitude = BigInt(RADIX_PREFIX[base] + body.replaceAll('_', ''));
  const value = negative ? -magnitude : magnitude;

  const width = BigInt(bits);
  const min = signed ? -(1n << (width - 1n)) : 0n;
  const max = signed ? (1n << (width - 1n)) - 1n : (1n << width) - 1n;
  if (value < min || value > max) throw rangeError(raw);
  return value;
}

/** Same as {@link parseInteger}, further limited to the safe integer range of `number`. */
export function parseSafeInteger(raw: string, signed: boolean, bits: number): number {
  const value = parseInteger(raw, signed, bits);
  if (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER)) {
    throw rangeError(raw);
  }
  return Number(value);
}

const TRUE_FORMS = new Set(['1', 't', 'T', 'TRUE', 'true', 'True']);
const FALSE_FORMS = new Set(['0', 'f', 'F', 'FALSE', 'false', 'False']);

export function parseBoolean(raw: string): boolean {
  if (TRUE_FORMS.has(raw)) return true;
  if (FALSE_FORMS.has(raw)) return false;
  throw syntaxError(raw);
}

const DECIMAL = /^[+-]?([0-9]+(\.[0-9]*)?|\.[0-9]+)([eE][+-]?[0-9]+)?$/;
const SPECIAL = /^([+-])?(inf|infinity|nan)$/i;

export function parseFloat(raw: string, bits: 32 | 64): number {
  const special = SPECIAL.exec(raw);
  if (special) {
    if (special[2].toLowerCase() === 'nan') return Number.NaN;
    return special[1] === '-' ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
  }
  if (!DECIMAL.test(raw)) throw syntaxError(raw);

  const value = Number(raw);
  if (!Number.isFinite(value)) throw rangeError(raw);
  if (bits === 64) return value;

  const rounded = Math.fround(value);
  if (!Number.isFinite(rounded)) throw rangeError(raw);
  return rounded;
}

const NANOSECONDS_PER_UNIT: Readonly<Record<string, bigint>> = {
  ns: 1n,
  us: 1_000n,
  'µs': 1_000n,
  'μs': 1_000n,
  ms: 1_000_000n,
  s: 1_000_000_000n,
  m: 60_000_000_000n,
  h: 3_600_000_000_000n,
};

const INT64_MAX = (1n << 63n) - 1n;
const DURATION_TERM = /^([0-9]*)(?:\.([0-9]*))?([^0-9.]*)/;

/**
 * Parses a duration literal such as `300ms`, `-1.5h` or `2h45m` and returns
 * it in milliseconds. Terms are accumulated as 64-bit nanoseconds.
 */
export function parseDuration(raw: string): number {
  const invalid = () => new CoercionError(`invalid duration "${raw}"`);

  let rest = raw;
  let negative = false;
  if (rest.startsWith('+') || rest.startsWith('-')) {
    negative = rest.startsWith('-');
    rest = rest.slice(1);
  }
  if (rest === '0') return 0;
  if (rest === '') throw invalid();

  let total = 0n;
  while (rest !== '') {
    const term = DURATION_TERM.exec(rest);
    if (!term) throw invalid();
    const [matched, whole, fraction = '', unit] = term;
    if (whole === '' && fraction === '') throw invalid();
    if (unit === '') {
      throw new CoercionError(`missing unit in duration "${raw}"`);
    }
    const scale = NANOSECONDS_PER_UNIT[unit];
    if (scale === undefined) {
      throw new CoercionError(`unknown unit "${unit}" in duration "${raw}"`);
    }

    let nanos = BigInt(whole === '' ? '0' : whole) * scale;
    if (fraction !== '') {
      nanos += (BigInt(fraction) * scale) / 10n ** BigInt(fraction.length);
    }
    total += nanos;
    if (total > INT64_MAX + (negative ? 1n : 0n)) throw invalid();
    rest = rest.slice(matched.length);
  }

  const signed = negative ? -total : total;
  return Number(signed) / 1_000_000;
}
