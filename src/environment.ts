import { existsSync, readFileSync } from 'node:fs';

export interface Lookup {
  lookup(key: string): string | undefined;
  keys(): Iterable<string>;
}

export type EnvSource = Record<string, string | undefined> | Lookup;

function isLookup(source: EnvSource): source is Lookup {
  return typeof source.lookup === 'function' && typeof source.keys === 'function';
}

export class Environment implements Lookup {
  private readonly _entries: ReadonlyMap<string, string>;

  constructor(environment: EnvSource = process.env) {
    const entries = new Map<string, string>();
    if (isLookup(environment)) {
      for (const key of environment.keys()) {
        const value = environment.lookup(key);
        if (value !== undefined) entries.set(key, value);
      }
    } else {
      for (const [key, value] of Object.entries(environment)) {
        if (value !== undefined) entries.set(key, value);
      }
    }
    this._entries = entries;
  }

  static fromText(text: string): Environment {
    return new Environment(parseEnv(text));
  }

  static fromFile(file: string, encoding: BufferEncoding = 'utf8'): Environment {
    return new Environment(readEnvFile(file, encoding));
  }

  lookup(key: string): string | undefined {
    return this._entries.get(key);
  }

  has(key: string): boolean {
    return this._entries.has(key);
  }

  keys(): IterableIterator<string> {
    return this._entries.keys();
  }

  /** Keys of this snapshot first, then keys only `fallback` has. */
  withFallback(fallback: Environment): Environment {
    const merged: Record<string, string> = {};
    for (const [key, value] of fallback._entries) merged[key] = value;
    for (const [key, value] of this._entries) merged[key] = value;
    return new Environment(merged);
  }
}

export function parseEnv(text: string): Record<string, string> {
  const values: Record<string, string> = {};

  for (const lineRaw of text.split(/\r?\n/)) {
    const line = lineRaw.trim();
    if (!line || line.startsWith('#') || !line.includes('=')) continue;

    const [k, ...rest] = line.split('=');
    let value = rest.join('=').trim();

    if (
      value.length >= 2 &&
      ((value.startsWith('"') && value.endsWith('"')) ||
        (value.startsWith("'") && value.endsWith("'")))
    ) {
      value = value.slice(1, -1);
    }

    values[k.trim()] = value;
  }

  return values;
}

export function readEnvFile(file: string, encoding: BufferEncoding = 'utf8'): Record<string, string> {
  if (!existsSync(file)) {
    console.warn(`Config file '${file}' not found.`);
    return {};
  }

  return parseEnv(readFileSync(file, { encoding }));
}
