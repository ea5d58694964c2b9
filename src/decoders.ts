import { CoercionError } from './errors';

export type Coercer<T> = (raw: string) => T;

export interface Decoder {
  decode(value: string): void;
}

export interface Setter {
  set(value: string): void;
}

export interface TextUnmarshaler {
  unmarshalText(text: Uint8Array): void;
}

export interface BinaryUnmarshaler {
  unmarshalBinary(data: Uint8Array): void;
}

export type Decodable = Decoder | Setter | TextUnmarshaler | BinaryUnmarshaler;

const encoder = new TextEncoder();

function isObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null;
}

export function isDecoder(value: unknown): value is Decoder {
  return isObject(value) && 'decode' in value && typeof value.decode === 'function';
}

export function isSetter(value: unknown): value is Setter {
  return isObject(value) && 'set' in value && typeof value.set === 'function';
}

export function isTextUnmarshaler(value: unknown): value is TextUnmarshaler {
  return (
    isObject(value) && 'unmarshalText' in value && typeof value.unmarshalText === 'function'
  );
}

export function isBinaryUnmarshaler(value: unknown): value is BinaryUnmarshaler {
  return (
    isObject(value) && 'unmarshalBinary' in value && typeof value.unmarshalBinary === 'function'
  );
}

export function decodeInto<T>(target: T, raw: string): T {
  if (isDecoder(target)) {
    target.decode(raw);
  } else if (isSetter(target)) {
    target.set(raw);
  } else if (isTextUnmarshaler(target)) {
    target.unmarshalText(encoder.encode(raw));
  } else if (isBinaryUnmarshaler(target)) {
    target.unmarshalBinary(encoder.encode(raw));
  } else {
    throw new CoercionError('value has no decode capability');
  }
  return target;
}

/**
 * Ad hoc decoders keyed by type label (or builtin type name). A registry is
 * owned by the caller and handed to `load` through `options.decoders`;
 * mutating it while a load is running is not supported.
 */
export class DecoderRegistry {
  private readonly _decoders = new Map<string, Coercer<unknown>>();

  register<T>(typeName: string, coerce: Coercer<T>): this {
    this._decoders.set(typeName, coerce);
    return this;
  }

  unregister(typeName: string): boolean {
    return this._decoders.delete(typeName);
  }

  clear(): void {
    this._decoders.clear();
  }

  has(typeName: string): boolean {
    return this._decoders.has(typeName);
  }

  get(typeName: string): Coercer<unknown> | undefined {
    return this._decoders.get(typeName);
  }
}
