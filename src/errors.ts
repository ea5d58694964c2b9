export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export class InvalidSpecificationError extends ConfigError {
  constructor(message = 'Specification must be a record of fields.') {
    super(message);
    this.name = 'InvalidSpecificationError';
  }
}

export class MissingRequiredError extends ConfigError {
  constructor(readonly key: string) {
    super(`Config '${key}' is required and has no value.`);
    this.name = 'MissingRequiredError';
  }
}

export class ParseError extends ConfigError {
  constructor(
    readonly keyName: string,
    readonly fieldName: string,
    readonly typeName: string,
    readonly value: string,
    cause: unknown,
  ) {
    const detail = cause instanceof Error ? ` ${cause.message}` : '';
    super(
      `Config '${keyName}' has value '${value}' which cannot be assigned to ${fieldName} (${typeName}).${detail}`,
      { cause },
    );
    this.name = 'ParseError';
  }
}

export class SequenceIndexError extends ConfigError {
  constructor(
    message: string,
    readonly prefix: string,
    readonly key?: string,
    readonly count?: number,
  ) {
    super(message);
    this.name = 'SequenceIndexError';
  }
}

export class CoercionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CoercionError';
  }
}
