import { z } from "zod";
import relationTypesData from "../../data/relation-types.json";
import { DomainError } from "../errors";
import { PARTS_OF_SPEECH, type PartOfSpeech } from "./languages";

export const HYPERNYM = "@";
export const HYPONYM = "~";
export const ANTONYM = "!";
export const DERIVED_FROM = "\\";
export const RELATED_TO = "/";
export const COMPOSED_OF = "+c";
export const COMPOSES = "-c";
export const PART_OF = "#p";

export interface RelationType {
  readonly code: string;
  readonly name: string;
  /** Lexical relations link surface forms, not just synsets. */
  readonly lexical: boolean;
}

const relationTypeSchema = z.object({
  code: z.string().min(1),
  name: z.string().min(1),
  lexical: z.boolean(),
});

const taxonomySchema = z.object({
  n: z.array(relationTypeSchema),
  v: z.array(relationTypeSchema),
  a: z.array(relationTypeSchema),
  r: z.array(relationTypeSchema),
});

const TAXONOMY: Readonly<
  Record<PartOfSpeech, ReadonlyMap<string, RelationType>>
> = buildTaxonomy(taxonomySchema.parse(relationTypesData));

function buildTaxonomy(
  raw: z.infer<typeof taxonomySchema>,
): Record<PartOfSpeech, ReadonlyMap<string, RelationType>> {
  const byCode = (types: readonly RelationType[]) =>
    new Map<string, RelationType>(types.map((type) => [type.code, type]));
  return {
    n: byCode(raw.n),
    v: byCode(raw.v),
    a: byCode(raw.a),
    r: byCode(raw.r),
  };
}

export function relationTypesFor(
  pos: PartOfSpeech,
): ReadonlyMap<string, RelationType> {
  return TAXONOMY[pos];
}

export function isRelationTypeDefined(pos: PartOfSpeech, code: string): boolean {
  return TAXONOMY[pos].has(code);
}

/** Looks up a relation type, failing for codes the part of speech lacks. */
export function requireRelationType(
  pos: PartOfSpeech,
  code: string,
): RelationType {
  const type = TAXONOMY[pos].get(code);
  if (!type) {
    throw new DomainError(`no relation type '${code}' for '${pos}'`);
  }
  return type;
}

/** True when some part of speech defines `code` as a lexical relation. */
export function isLexicalRelationType(code: string): boolean {
  return PARTS_OF_SPEECH.some(
    (pos) => TAXONOMY[pos].get(code)?.lexical === true,
  );
}
