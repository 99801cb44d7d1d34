import { z } from "zod";
import morphoLayoutsData from "../../data/morpho-layouts.json";
import type { Language } from "../constants/languages";
import { DecodingError } from "../errors";

export const MORPHO_FEATURES = [
  "pos",
  "person",
  "degree",
  "number",
  "tense",
  "mood",
  "voice",
  "gender",
  "case",
  "group",
  "stem",
] as const;

export type MorphoFeature = (typeof MORPHO_FEATURES)[number];

export interface DecodedFeature {
  readonly code: string;
  /** Human-readable meaning; undefined for codes the layout accepts raw. */
  readonly label?: string;
}

export type MorphoFeatures = Readonly<
  Partial<Record<MorphoFeature, DecodedFeature>>
>;

// A placeholder for "not applicable" at any position.
const NOT_APPLICABLE = "-";

const codeTableSchema = z.record(z.string().length(1), z.string());

const fieldSchema = z.object({
  feature: z.enum(MORPHO_FEATURES),
  offset: z.number().int().nonnegative(),
  when: z.array(z.string().length(1)).optional(),
  codes: codeTableSchema.optional(),
  codesByPos: z.record(z.string().length(1), codeTableSchema).optional(),
  pattern: z.string().optional(),
});

const layoutSchema = z.object({
  length: z.number().int().positive(),
  fields: z.array(fieldSchema).min(1),
});

export type MorphoField = z.infer<typeof fieldSchema>;
export type MorphoLayout = z.infer<typeof layoutSchema>;

const LAYOUTS: ReadonlyMap<string, MorphoLayout> = new Map(
  Object.entries(z.record(layoutSchema).parse(morphoLayoutsData)),
);

export function morphoLayoutFor(language: Language): MorphoLayout | undefined {
  return LAYOUTS.get(language);
}

/**
 * Decodes a fixed-position tag string against a layout. The part of speech at
 * the field whose feature is `pos` selects which conditional fields apply.
 */
export function decodeTag(tag: string, layout: MorphoLayout): MorphoFeatures {
  if (tag.length !== layout.length || /\s/u.test(tag)) {
    throw new DecodingError(
      tag,
      `expected ${layout.length} non-blank characters`,
    );
  }

  const posField = layout.fields.find((field) => field.feature === "pos");
  const pos = posField ? tag.charAt(posField.offset) : "";
  if (posField && (pos === NOT_APPLICABLE || !posField.codes?.[pos])) {
    throw new DecodingError(tag, `unknown part of speech '${pos}'`);
  }

  const features: Partial<Record<MorphoFeature, DecodedFeature>> = {};
  for (const field of layout.fields) {
    if (field.when && !field.when.includes(pos)) {
      continue;
    }
    const decoded = decodeField(tag, field, pos);
    if (decoded) {
      features[field.feature] = decoded;
    }
  }
  return features;
}

function decodeField(
  tag: string,
  field: MorphoField,
  pos: string,
): DecodedFeature | undefined {
  const code = tag.charAt(field.offset);
  const table = field.codesByPos ? field.codesByPos[pos] : field.codes;

  const label = table?.[code];
  if (label !== undefined) {
    return { code, label };
  }
  if (code === NOT_APPLICABLE) {
    return undefined;
  }
  if (field.pattern && new RegExp(`^${field.pattern}$`, "u").test(code)) {
    return { code };
  }
  throw new DecodingError(
    tag,
    `unknown ${field.feature} code '${code}' at position ${field.offset}`,
  );
}

/** Decodes a tag with the layout registered for `language`. */
export function decodeMorphoTag(
  tag: string,
  language: Language,
): MorphoFeatures {
  const layout = morphoLayoutFor(language);
  if (!layout) {
    throw new DecodingError(tag, `no tag layout for ${language}`);
  }
  return decodeTag(tag, layout);
}
