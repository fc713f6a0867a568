import { CompareOptions, Key, Ordering, SortOptions, Token } from "./types";

const DIGIT_RUNS = /[0-9]+|[^0-9]+/g;

function compareStrings(a: string, b: string): Ordering {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Split a name into maximal runs of digits and non-digits
 */
export function extractKey(name: string): Key {
  const tokens: Token[] = [];
  for (const [text] of name.matchAll(DIGIT_RUNS)) {
    const code = text.charCodeAt(0);
    if (code >= 48 && code <= 57) {
      tokens.push({ kind: "number", text, value: BigInt(text) });
    } else {
      tokens.push({ kind: "text", text });
    }
  }
  return tokens;
}

function compareTokens(a: Token, b: Token, options: CompareOptions): Ordering {
  if (a.kind === "number" && b.kind === "number") {
    // padding is ignored: "007" and "7" are equal here
    if (a.value < b.value) return -1;
    if (a.value > b.value) return 1;
    return 0;
  }

  if (a.kind === "text" && b.kind === "text") {
    return options.ignoreCase
      ? compareStrings(a.text.toLowerCase(), b.text.toLowerCase())
      : compareStrings(a.text, b.text);
  }

  // Mixed kinds at the same position fall back to raw text
  return compareStrings(a.text, b.text);
}

export function compareKeys(a: Key, b: Key, options: CompareOptions = {}): Ordering {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const order = compareTokens(a[i], b[i], options);
    if (order !== 0) return order;
  }
  if (a.length < b.length) return -1;
  if (a.length > b.length) return 1;
  return 0;
}

/**
 * Compare two strings so that embedded numbers order by value.
 * "frame9" sorts before "frame10", and "f007" equals "f7".
 */
export function compareNaturally(a: string, b: string, options: CompareOptions = {}): Ordering {
  return compareKeys(extractKey(a), extractKey(b), options);
}

export function naturalComparator(options: CompareOptions = {}): (a: string, b: string) => Ordering {
  return (a, b) => compareNaturally(a, b, options);
}

/**
 * Return a naturally sorted copy of the items. Keys are extracted once per item.
 */
export function sortNaturally<T>(
  items: readonly T[],
  options: SortOptions<T> & { key: (item: T) => string }
): T[];
export function sortNaturally<T extends string>(items: readonly T[], options?: SortOptions<T>): T[];
export function sortNaturally<T>(items: readonly T[], options: SortOptions<T> = {}): T[] {
  const select = options.key ?? ((item: T) => String(item));
  return items
    .map(item => ({ item, key: extractKey(select(item)) }))
    .sort((a, b) => compareKeys(a.key, b.key, options))
    .map(entry => entry.item);
}
