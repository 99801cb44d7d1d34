import { z } from "zod";
import type { StoreSpace } from "../constants/languages";
import { StoreError } from "../errors";
import type {
  StoreAccessor,
  StoreQuery,
  StoreRow,
  TableName,
} from "../ports/store-accessor";

// SQLite hands back integers for numeric-looking ids.
const text = z.union([z.string(), z.number()]).transform(String);
const optionalText = text.nullish().transform((value) => value ?? undefined);

export const synsetRecordSchema = z.object({
  id: text,
  word: optionalText,
  phrase: optionalText,
  gloss: optionalText,
});

export const lemmaRecordSchema = z.object({
  lemma: text,
  pos: text,
});

export const indexRecordSchema = z.object({
  lemma: text,
  id_n: optionalText,
  id_v: optionalText,
  id_a: optionalText,
  id_r: optionalText,
});

export const morphoRecordSchema = z.object({
  id: text,
  lemma: text,
  pos: text,
  principal_parts: optionalText,
  irregular_forms: optionalText,
  alternative_forms: optionalText,
  pronunciation: optionalText,
  miscellanea: optionalText,
  undotted: optionalText,
  dotted_without_dots: optionalText,
  variants: optionalText,
  translit_dotted: optionalText,
  translit_undotted: optionalText,
});

export const relationRecordSchema = z.object({
  type: text,
  id_source: text,
  id_target: text,
  w_source: optionalText,
  w_target: optionalText,
  status: optionalText,
});

export const synonymsRecordSchema = z.object({
  pos: text,
  syn: text,
  lemma: text,
});

export const semfieldRecordSchema = z.object({
  english: text,
  synset: text,
});

export const semfieldHierarchyRecordSchema = z.object({
  code: text,
  english: text,
  hypers: optionalText,
  hypons: optionalText,
  normal: optionalText,
});

export type SynsetRecord = z.infer<typeof synsetRecordSchema>;
export type LemmaRecord = z.infer<typeof lemmaRecordSchema>;
export type IndexRecord = z.infer<typeof indexRecordSchema>;
export type MorphoRecord = z.infer<typeof morphoRecordSchema>;
export type RelationRecord = z.infer<typeof relationRecordSchema>;
export type SynonymsRecord = z.infer<typeof synonymsRecordSchema>;
export type SemfieldRecord = z.infer<typeof semfieldRecordSchema>;
export type SemfieldHierarchyRecord = z.infer<
  typeof semfieldHierarchyRecordSchema
>;

export function parseRecords<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  rows: readonly StoreRow[],
  table: string,
): T[] {
  return rows.map((row, position) => {
    const parsed = schema.safeParse(row);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new StoreError(
        `malformed ${table} record at row ${position}: ${issue?.path.join(".") ?? "?"} ${issue?.message ?? ""}`.trim(),
      );
    }
    return parsed.data;
  });
}

/**
 * Queries a table and validates its rows. An absent table reads as empty.
 */
export function readRecords<T>(
  store: StoreAccessor,
  space: StoreSpace,
  table: TableName,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  query?: StoreQuery,
): T[] {
  const rows = store.query(space, table, query);
  return rows ? parseRecords(schema, rows, `${space}_${table}`) : [];
}

/** Like `readRecords`, but keeps "table absent" distinct from "no rows". */
export function readRecordsIfPresent<T>(
  store: StoreAccessor,
  space: StoreSpace,
  table: TableName,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  query?: StoreQuery,
): T[] | undefined {
  const rows = store.query(space, table, query);
  return rows ? parseRecords(schema, rows, `${space}_${table}`) : undefined;
}

/** Splits a whitespace-separated multi-valued column into its tokens. */
export function tokens(value: string | undefined): string[] {
  return value ? value.split(/\s+/u).filter(Boolean) : [];
}
