import type { Lookup } from './environment';
import { MissingRequiredError } from './errors';

export interface ResolveInput {
  key: string;
  alias?: string;
  smushyKey?: string;
  defaultValue?: string;
  required: boolean;
}

export interface Resolution {
  value: string;
  supplied: boolean;
}

// A set but empty variable counts as present.
export function resolveValue(input: ResolveInput, env: Lookup): Resolution | undefined {
  for (const key of [input.key, input.alias, input.smushyKey]) {
    if (key === undefined) continue;
    const value = env.lookup(key);
    if (value !== undefined) return { value, supplied: true };
  }

  if (input.defaultValue !== undefined && input.defaultValue !== '') {
    return { value: input.defaultValue, supplied: false };
  }

  if (input.required) {
    throw new MissingRequiredError(input.alias ?? input.key);
  }
  return undefined;
}
