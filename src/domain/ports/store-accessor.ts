import type { StoreSpace } from "../constants/languages";

export type TableName =
  | "synset"
  | "lemma"
  | "index"
  | "morpho"
  | "relation"
  | "synonyms"
  | "semfield"
  | "semfield_hierarchy";

/**
 * Column predicate: an exact value, a LIKE pattern (`\` escapes `%` and `_`),
 * or membership in a list of values.
 */
export type ColumnMatch =
  | string
  | { readonly like: string }
  | { readonly in: readonly string[] };

export interface StoreQuery {
  readonly columns?: readonly string[];
  readonly where?: Readonly<Record<string, ColumnMatch>>;
}

export type StoreRow = Readonly<Record<string, unknown>>;

export interface StoreAccessor {
  /**
   * Returns the matching rows of `<space>_<table>`, or `undefined` when that
   * table does not exist for the space. Only malformed queries and engine
   * faults throw.
   */
  query(
    space: StoreSpace,
    table: TableName,
    query?: StoreQuery,
  ): StoreRow[] | undefined;
}

export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/gu, (match) => `\\${match}`);
}
