import { zeroRecord } from './coerce';
import type { Lookup } from './environment';
import { SequenceIndexError } from './errors';
import { deriveKey, joinKey } from './keys';
import type { Field, RecordType, TypeDescriptor } from './schema';

/**
 * `record` entries name a nested record field ahead of its own fields, and
 * `indexed` entries an indexed list of records for which no index was found.
 * Neither is assigned a value.
 */
export type VarRole = 'value' | 'record' | 'indexed';

export interface VarInfo {
  readonly name: string;
  readonly key: string;
  readonly alias?: string;
  readonly smushyKey?: string;
  readonly field: Field<unknown>;
  readonly holder: Record<string, unknown>;
  readonly role: VarRole;
}

export function isRecordObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function recordOf(type: TypeDescriptor): RecordType | undefined {
  if (type.kind === 'record') return type;
  if (type.kind === 'pointer') return recordOf(type.elem);
  return undefined;
}

interface WalkState {
  readonly env: Lookup;
  readonly infos: VarInfo[];
}

export function gatherInfo(
  prefix: string,
  type: RecordType,
  holder: Record<string, unknown>,
  env: Lookup,
): VarInfo[] {
  const state: WalkState = { env, infos: [] };
  walk(state, prefix, type, holder, false);
  return state.infos;
}

function walk(
  state: WalkState,
  prefix: string,
  type: RecordType,
  holder: Record<string, unknown>,
  inSequence: boolean,
): void {
  for (const [name, field] of Object.entries(type.fields)) {
    const { meta } = field;
    if (meta.ignored) continue;

    const { key, alias } = deriveKey(prefix, name, {
      splitWords: meta.splitWords,
      alias: meta.alias,
      inSequence,
    });

    const nested = recordOf(field.type);
    if (nested) {
      const current = holder[name];
      const inner = isRecordObject(current) ? current : zeroRecord(nested);
      holder[name] = inner;
      state.infos.push({ name, key, alias, field, holder, role: 'record' });
      const innerPrefix = meta.embedded && alias === undefined ? prefix : key;
      walk(state, innerPrefix, nested, inner, inSequence);
      continue;
    }

    const elementRecord = field.type.kind === 'sequence' ? recordOf(field.type.elem) : undefined;
    if (elementRecord) {
      let base = key;
      let count = countIndices(state.env, key);
      if (count === 0 && alias !== undefined) {
        base = alias;
        count = countIndices(state.env, alias);
      }
      if (count === 0) {
        state.infos.push({ name, key, alias, field, holder, role: 'indexed' });
        continue;
      }
      const elements = Array.from({ length: count }, () => zeroRecord(elementRecord));
      holder[name] = elements;
      elements.forEach((element, i) => walk(state, `${base}_${i}`, elementRecord, element, true));
      continue;
    }

    const smushy = joinKey(prefix, name);
    const smushyKey = meta.acceptSmushyName && smushy !== key ? smushy : undefined;
    state.infos.push({ name, key, alias, smushyKey, field, holder, role: 'value' });
  }
}

const INDEX = /^(\d+)(?:_|$)/;

/**
 * Counts the elements of an indexed list stored under `base`, as in
 * `BASE_0_HOST`, `BASE_1_HOST`. Indices must run from zero without gaps.
 */
export function countIndices(env: Lookup, base: string): number {
  const head = `${base}_`;
  const indices = new Set<number>();

  for (const key of env.keys()) {
    if (!key.startsWith(head)) continue;
    const suffix = key.slice(head.length);
    if (!/^\d/.test(suffix)) continue;

    const match = INDEX.exec(suffix);
    if (!match || (match[1].length > 1 && match[1].startsWith('0'))) {
      throw new SequenceIndexError(`Config '${key}' has a malformed index under '${base}'.`, base, key);
    }
    indices.add(Number(match[1]));
  }

  const count = indices.size;
  for (let i = 0; i < count; i++) {
    if (!indices.has(i)) {
      throw new SequenceIndexError(
        `Config '${base}' has ${count} indexed entries but index ${i} is missing.`,
        base,
        undefined,
        count,
      );
    }
  }
  return count;
}
