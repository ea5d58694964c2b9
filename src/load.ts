import { coerce, SKIP, zeroRecord } from './coerce';
import type { DecoderRegistry } from './decoders';
import { Environment, type EnvSource } from './environment';
import { InvalidSpecificationError, MissingRequiredError, ParseError } from './errors';
import { resolveValue } from './resolve';
import {
  type Field,
  type InferConfig,
  isField,
  type RecordType,
  type Schema,
  type TypeDescriptor,
  typeName,
} from './schema';
import { gatherInfo, isRecordObject } from './walker';

export interface LoadOptions<T = unknown> {
  prefix?: string;
  env?: EnvSource;
  envFile?: string;
  encoding?: BufferEncoding;
  decoders?: DecoderRegistry;
  /** Existing record to populate in place. Fields that resolve to nothing keep their value. */
  target?: T;
}

export type Spec = Field<unknown> | Schema;
export type Infer<S> = S extends Field<infer T> ? T : S extends Schema ? InferConfig<S> : never;

function recordTypeOf(spec: unknown): RecordType {
  if (isField(spec)) {
    if (spec.type.kind === 'record') return spec.type;
    throw new InvalidSpecificationError();
  }
  if (!isRecordObject(spec)) throw new InvalidSpecificationError();

  const fields: Record<string, Field<unknown>> = {};
  for (const [name, field] of Object.entries(spec)) {
    if (!isField(field)) {
      throw new InvalidSpecificationError(`Specification entry '${name}' is not a field.`);
    }
    fields[name] = field;
  }
  return { kind: 'record', name: 'record', fields };
}

function snapshot(options: LoadOptions): Environment {
  const env = new Environment(options.env ?? process.env);
  if (!options.envFile) return env;
  return env.withFallback(Environment.fromFile(options.envFile, options.encoding));
}

function prepare(spec: unknown, options: LoadOptions) {
  const type = recordTypeOf(spec);
  const { target } = options;
  let holder: Record<string, unknown>;
  if (target === undefined) {
    holder = zeroRecord(type);
  } else if (isRecordObject(target)) {
    holder = target;
  } else {
    throw new InvalidSpecificationError('Target must be a record object.');
  }
  const env = snapshot(options);
  const infos = gatherInfo(options.prefix ?? '', type, holder, env);
  return { holder, env, infos };
}

/**
 * Populates a record from the environment. `spec` is either a `record(...)`
 * field or a plain object of fields. Throws on the first missing required
 * variable or conversion failure; fields handled before it stay populated.
 */
export function load<S extends Spec>(spec: S, options: LoadOptions<Infer<S>> = {}): Infer<S> {
  const { holder, env, infos } = prepare(spec, options);

  for (const info of infos) {
    if (info.role === 'record') continue;
    if (info.role === 'indexed') {
      if (info.field.meta.required) throw new MissingRequiredError(info.alias ?? info.key);
      continue;
    }

    const resolution = resolveValue(
      {
        key: info.key,
        alias: info.alias,
        smushyKey: info.smushyKey,
        defaultValue: info.field.meta.defaultValue,
        required: info.field.meta.required,
      },
      env,
    );
    if (resolution === undefined) continue;

    let value: unknown;
    try {
      value = coerce(resolution.value, info.field.type, options.decoders);
    } catch (e: unknown) {
      throw new ParseError(info.key, info.name, typeName(info.field.type), resolution.value, e);
    }
    if (value !== SKIP) info.holder[info.name] = value;
  }

  return holder as Infer<S>;
}

export type LoadFunc = <S extends Spec>(
  spec: S,
  options?: Omit<LoadOptions<Infer<S>>, 'env' | 'envFile'>,
) => Infer<S>;

export function newReader(text: string): LoadFunc {
  const env = Environment.fromText(text);
  return (spec, options = {}) => load(spec, { ...options, env });
}

export interface VarDescription {
  key: string;
  alias?: string;
  name: string;
  type: string;
  default?: string;
  required: boolean;
  description?: string;
}

export function describe(spec: Spec, options: Omit<LoadOptions, 'target'> = {}): VarDescription[] {
  const { infos } = prepare(spec, options);
  return infos.map(info => ({
    key: info.key,
    alias: info.alias,
    name: info.name,
    type:
      info.role === 'indexed'
        ? `Indexed list of ${info.field.type.kind === 'sequence' ? describeType(info.field.type.elem) : ''}`
        : typeDescription(info.field.type),
    default: info.field.meta.defaultValue,
    required: info.field.meta.required,
    description: info.field.meta.description,
  }));
}

function describeType(type: TypeDescriptor): string {
  return typeDescription(type) || 'Record';
}

/**
 * Returns the keys under `prefix` that are set but that no field reads. With
 * an empty prefix every key of the environment is considered.
 */
export function unused(spec: Spec, options: Omit<LoadOptions, 'target'> = {}): string[] {
  const { env, infos } = prepare(spec, options);

  const used = new Set<string>();
  for (const info of infos) {
    if (info.role !== 'value') continue;
    for (const key of [info.key, info.alias, info.smushyKey]) {
      if (key !== undefined) used.add(key);
    }
  }

  const head = options.prefix ? `${options.prefix.toUpperCase()}_` : '';
  return [...env.keys()].filter(key => key !== '' && key.startsWith(head) && !used.has(key));
}

const SEPARATOR_NAMES: Readonly<Record<string, string>> = {
  ',': 'Comma',
  ';': 'Semicolon',
  '-': 'Dash',
  '/': 'Slash',
  '\\': 'Backslash',
  '|': 'Bar',
  '~': 'Tilde',
  '&': 'Ampersand',
  '#': 'Hash',
  '@': 'At',
  '.': 'Period',
  '*': 'Asterisk',
  '+': 'Plus',
};

function separatorName(separator: string): string {
  return SEPARATOR_NAMES[separator] ?? `"${separator}"`;
}

export function typeDescription(type: TypeDescriptor): string {
  if (type.label !== undefined) return type.label;

  switch (type.kind) {
    case 'sequence':
      return `${separatorName(type.separator)}-separated list of ${typeDescription(type.elem)}`;
    case 'map':
      return `${separatorName(type.separator)}-separated list of ${typeDescription(type.key)}:${typeDescription(type.value)} pairs`;
    case 'pointer':
      return typeDescription(type.elem);
    case 'string':
      return 'String';
    case 'boolean':
      return 'True or False';
    case 'integer':
      return type.signed ? 'Integer' : 'Unsigned Integer';
    case 'float':
      return 'Float';
    case 'duration':
      return 'Duration';
    case 'bytes':
      return 'Bytes';
    case 'record':
    case 'opaque':
      return '';
    case 'decodable':
    case 'custom':
      return type.name;
  }
}
