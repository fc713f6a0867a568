export interface TextToken {
  kind: "text";
  text: string;
}

export interface NumberToken {
  kind: "number";
  text: string;
  value: bigint;
}

export type Token = TextToken | NumberToken;

/**
 * Full token decomposition of one name. Joining every token's text gives back the name.
 */
export type Key = readonly Token[];

/**
 * -1 (less), 0 (equal) or 1 (greater), as Array.prototype.sort expects
 */
export type Ordering = -1 | 0 | 1;

export interface CompareOptions {
  ignoreCase?: boolean;
}

export interface SortOptions<T> extends CompareOptions {
  key?: (item: T) => string;
}
