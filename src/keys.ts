const WORDS = /([^A-Z]+|[A-Z]+[^A-Z]+|[A-Z]+)/g;
const ACRONYM = /^([A-Z]+)([A-Z][^A-Z]+)$/;

/**
 * Splits an identifier into words at case boundaries. A run of capitals
 * followed by a lowercase word gives its last capital to that word, so
 * `HTTPServer` becomes `HTTP`, `Server`.
 */
export function splitWords(name: string): string[] {
  const words: string[] = [];
  for (const [word] of name.matchAll(WORDS)) {
    const acronym = ACRONYM.exec(word);
    if (acronym) {
      words.push(acronym[1], acronym[2]);
    } else {
      words.push(word);
    }
  }
  return words;
}

export function joinKey(prefix: string, segment: string): string {
  return (prefix === '' ? segment : `${prefix}_${segment}`).toUpperCase();
}

export interface KeyOptions {
  splitWords?: boolean;
  alias?: string;
  /** Set while walking the elements of an indexed list of records. */
  inSequence?: boolean;
}

export interface DerivedKey {
  key: string;
  alias?: string;
}

export function deriveKey(prefix: string, fieldName: string, options: KeyOptions = {}): DerivedKey {
  const alias = options.inSequence ? undefined : options.alias?.toUpperCase() || undefined;

  let segment = alias ?? fieldName;
  if (options.splitWords && alias === undefined) {
    const words = splitWords(fieldName);
    if (words.length > 0) segment = words.join('_');
  }

  return { key: joinKey(prefix, segment), alias };
}
