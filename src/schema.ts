import type { Coercer, Decodable } from './decoders';

interface BaseType {
  readonly name: string;
  readonly label?: string;
}

export interface StringType extends BaseType {
  readonly kind: 'string';
}

export interface BooleanType extends BaseType {
  readonly kind: 'boolean';
}

export type IntegerBits = 8 | 16 | 32 | 64;

export interface IntegerType extends BaseType {
  readonly kind: 'integer';
  readonly signed: boolean;
  readonly bits: IntegerBits;
  readonly bigint: boolean;
}

export interface FloatType extends BaseType {
  readonly kind: 'float';
  readonly bits: 32 | 64;
}

export interface DurationType extends BaseType {
  readonly kind: 'duration';
}

export interface BytesType extends BaseType {
  readonly kind: 'bytes';
}

export interface PointerType extends BaseType {
  readonly kind: 'pointer';
  readonly elem: TypeDescriptor;
}

export interface SequenceType extends BaseType {
  readonly kind: 'sequence';
  readonly elem: TypeDescriptor;
  readonly separator: string;
}

export interface MapType extends BaseType {
  readonly kind: 'map';
  readonly key: TypeDescriptor;
  readonly value: TypeDescriptor;
  readonly separator: string;
}

export interface RecordType extends BaseType {
  readonly kind: 'record';
  readonly fields: Readonly<Record<string, Field<unknown>>>;
}

export interface DecodableType extends BaseType {
  readonly kind: 'decodable';
  readonly create: () => Decodable;
}

export interface CustomType extends BaseType {
  readonly kind: 'custom';
  readonly coerce: Coercer<unknown>;
}

export interface OpaqueType extends BaseType {
  readonly kind: 'opaque';
}

export type TypeDescriptor =
  | StringType
  | BooleanType
  | IntegerType
  | FloatType
  | DurationType
  | BytesType
  | PointerType
  | SequenceType
  | MapType
  | RecordType
  | DecodableType
  | CustomType
  | OpaqueType;

export interface FieldMeta {
  readonly alias?: string;
  readonly defaultValue?: string;
  readonly required: boolean;
  readonly splitWords: boolean;
  readonly ignored: boolean;
  readonly embedded: boolean;
  readonly acceptSmushyName: boolean;
  readonly description?: string;
}

const EMPTY_META: FieldMeta = {
  required: false,
  splitWords: false,
  ignored: false,
  embedded: false,
  acceptSmushyName: false,
};

export class Field<T> {
  readonly _tag = 'Field';
  declare readonly _output: T;

  constructor(
    readonly type: TypeDescriptor,
    readonly meta: FieldMeta = EMPTY_META,
  ) {}

  /** Raw string used when no variable is set. It is coerced like any other value. */
  default(raw: string): Field<T> {
    return withMeta(this, { defaultValue: raw === '' ? undefined : raw });
  }

  required(): Field<T> {
    return withMeta(this, { required: true });
  }

  /** Overrides the name segment of the key; the bare name is also accepted as a fallback key. */
  fromEnv(name: string): Field<T> {
    return withMeta(this, { alias: name === '' ? undefined : name.toUpperCase() });
  }

  splitWords(): Field<T> {
    return withMeta(this, { splitWords: true });
  }

  ignored(): Field<T> {
    return withMeta(this, { ignored: true });
  }

  embedded(): Field<T> {
    return withMeta(this, { embedded: true });
  }

  acceptSmushyName(): Field<T> {
    return withMeta(this, { acceptSmushyName: true });
  }

  describe(description: string): Field<T> {
    return withMeta(this, { description });
  }

  named(label: string): Field<T> {
    return new Field<T>({ ...this.type, label }, this.meta);
  }
}

function withMeta<T>(field: Field<T>, patch: Partial<FieldMeta>): Field<T> {
  return new Field<T>(field.type, { ...field.meta, ...patch });
}

export type Schema = Record<string, Field<unknown>>;

type OutputOf<F> = F extends Field<infer T> ? T : never;
export type InferConfig<S extends Schema> = {
  [K in keyof S]: OutputOf<S[K]>;
};

export function isField(value: unknown): value is Field<unknown> {
  return value instanceof Field;
}

export function string(): Field<string> {
  return new Field({ kind: 'string', name: 'string' });
}

export function boolean(): Field<boolean> {
  return new Field({ kind: 'boolean', name: 'boolean' });
}

function integer<T>(name: string, signed: boolean, bits: IntegerBits, bigint: boolean): Field<T> {
  return new Field({ kind: 'integer', name, signed, bits, bigint });
}

/** 64-bit signed width, limited to the safe integer range of `number`. */
export function int(): Field<number> {
  return integer('int', true, 64, false);
}

export function int8(): Field<number> {
  return integer('int8', true, 8, false);
}

export function int16(): Field<number> {
  return integer('int16', true, 16, false);
}

export function int32(): Field<number> {
  return integer('int32', true, 32, false);
}

export function int64(): Field<bigint> {
  return integer('int64', true, 64, true);
}

export function uint(): Field<number> {
  return integer('uint', false, 64, false);
}

export function uint8(): Field<number> {
  return integer('uint8', false, 8, false);
}

export function uint16(): Field<number> {
  return integer('uint16', false, 16, false);
}

export function uint32(): Field<number> {
  return integer('uint32', false, 32, false);
}

export function uint64(): Field<bigint> {
  return integer('uint64', false, 64, true);
}

export function float32(): Field<number> {
  return new Field({ kind: 'float', name: 'float32', bits: 32 });
}

export function float64(): Field<number> {
  return new Field({ kind: 'float', name: 'float64', bits: 64 });
}

export function number(): Field<number> {
  return float64();
}

/** Parsed from literals such as `300ms` or `2h45m`; the value is in milliseconds. */
export function duration(): Field<number> {
  return new Field({ kind: 'duration', name: 'duration' });
}

export function bytes(): Field<Uint8Array> {
  return new Field({ kind: 'bytes', name: 'bytes' });
}

export function pointer<T>(elem: Field<T>): Field<T | undefined> {
  return new Field({ kind: 'pointer', name: `${typeName(elem.type)} | undefined`, elem: elem.type });
}

export interface SeparatorOptions {
  separator?: string;
}

export function array<T>(item: Field<T>, opts?: SeparatorOptions): Field<T[]> {
  return new Field({
    kind: 'sequence',
    name: `${typeName(item.type)}[]`,
    elem: item.type,
    separator: opts?.separator || ',',
  });
}

export function map<K, V>(
  key: Field<K>,
  value: Field<V>,
  opts?: SeparatorOptions,
): Field<Map<K, V>> {
  return new Field({
    kind: 'map',
    name: `Map<${typeName(key.type)}, ${typeName(value.type)}>`,
    key: key.type,
    value: value.type,
    separator: opts?.separator || ',',
  });
}

export function record<S extends Schema>(fields: S, label?: string): Field<InferConfig<S>> {
  return new Field({ kind: 'record', name: 'record', label, fields });
}

export function decodable<T extends Decodable>(label: string, create: () => T): Field<T> {
  return new Field({ kind: 'decodable', name: label, label, create });
}

export function custom<T>(coerce: Coercer<T>, label?: string): Field<T | undefined> {
  return new Field({ kind: 'custom', name: label ?? 'custom', label, coerce });
}

export function json<T = unknown>(): Field<T | undefined> {
  return custom((s): T => JSON.parse(s), 'JSON');
}

export function opaque<T>(): Field<T | undefined> {
  return new Field({ kind: 'opaque', name: 'opaque' });
}

export function typeName(type: TypeDescriptor): string {
  return type.label ?? type.name;
}
