export { coerce, SKIP, zeroValue } from './coerce';
export {
  type BinaryUnmarshaler,
  type Coercer,
  type Decodable,
  type Decoder,
  DecoderRegistry,
  type Setter,
  type TextUnmarshaler,
} from './decoders';
export { Environment, type EnvSource, type Lookup, parseEnv, readEnvFile } from './environment';
export {
  CoercionError,
  ConfigError,
  InvalidSpecificationError,
  MissingRequiredError,
  ParseError,
  SequenceIndexError,
} from './errors';
export { deriveKey, splitWords } from './keys';
export {
  describe,
  type Infer,
  type LoadFunc,
  type LoadOptions,
  load,
  newReader,
  type Spec,
  typeDescription,
  unused,
  type VarDescription,
} from './load';
export { resolveValue } from './resolve';
export {
  array,
  boolean,
  bytes,
  custom,
  decodable,
  duration,
  Field,
  float32,
  float64,
  type InferConfig,
  int,
  int8,
  int16,
  int32,
  int64,
  json,
  map,
  number,
  opaque,
  pointer,
  record,
  type Schema,
  string,
  type TypeDescriptor,
  uint,
  uint8,
  uint16,
  uint32,
  uint64,
} from './schema';
export { gatherInfo, type VarInfo, type VarRole } from './walker';
