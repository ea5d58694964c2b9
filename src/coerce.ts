import { type DecoderRegistry, decodeInto } from './decoders';
import { CoercionError } from './errors';
import { parseBoolean, parseDuration, parseFloat, parseInteger, parseSafeInteger } from './parse';
import { type RecordType, type TypeDescriptor, typeName } from './schema';

export const SKIP = Symbol('SKIP');
export type Skip = typeof SKIP;

const encoder = new TextEncoder();

export function zeroValue(type: TypeDescriptor): unknown {
  switch (type.kind) {
    case 'string':
      return '';
    case 'boolean':
      return false;
    case 'integer':
      return type.bigint ? 0n : 0;
    case 'float':
    case 'duration':
      return 0;
    case 'bytes':
      return new Uint8Array(0);
    case 'sequence':
      return [];
    case 'map':
      return new Map();
    case 'record':
      return zeroRecord(type);
    case 'decodable':
      return type.create();
    case 'pointer':
    case 'custom':
    case 'opaque':
      return undefined;
  }
}

export function zeroRecord(type: RecordType): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [name, field] of Object.entries(type.fields)) {
    out[name] = zeroValue(field.type);
  }
  return out;
}

/**
 * Converts `raw` into a value of `type`. Returns {@link SKIP} for kinds the
 * loader does not write (records and opaque fields in value position).
 */
export function coerce(
  raw: string,
  type: TypeDescriptor,
  decoders?: DecoderRegistry,
): unknown | Skip {
  const registered = decoders?.get(typeName(type));
  if (registered) return registered(raw);

  switch (type.kind) {
    case 'decodable':
      return decodeInto(type.create(), raw);
    case 'custom':
      return type.coerce(raw);
    case 'pointer':
      return coerce(raw, type.elem, decoders);
    case 'string':
      return raw;
    case 'boolean':
      return parseBoolean(raw);
    case 'integer':
      return type.bigint
        ? parseInteger(raw, type.signed, type.bits)
        : parseSafeInteger(raw, type.signed, type.bits);
    case 'float':
      return parseFloat(raw, type.bits);
    case 'duration':
      return parseDuration(raw);
    case 'bytes':
      return encoder.encode(raw);
    case 'sequence': {
      if (raw === '') return [];
      return raw.split(type.separator).map(item => element(item, type.elem, decoders));
    }
    case 'map': {
      const out = new Map<unknown, unknown>();
      if (raw === '') return out;
      for (const pair of raw.split(type.separator)) {
        const parts = pair.split(':');
        if (parts.length !== 2) {
          throw new CoercionError(`invalid map item: "${pair}"`);
        }
        out.set(element(parts[0], type.key, decoders), element(parts[1], type.value, decoders));
      }
      return out;
    }
    case 'record':
    case 'opaque':
      return SKIP;
  }
}

function element(raw: string, type: TypeDescriptor, decoders?: DecoderRegistry): unknown {
  const value = coerce(raw, type, decoders);
  return value === SKIP ? zeroValue(type) : value;
}
