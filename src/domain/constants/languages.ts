export const LANGUAGES = [
  "english",
  "italian",
  "spanish",
  "french",
  "hebrew",
  "latin",
  "portuguese",
  "romanian",
] as const;

export type Language = (typeof LANGUAGES)[number];

export const COMMON_SPACE = "common";

/** A store namespace: one language's tables, or the shared backbone. */
export type StoreSpace = Language | typeof COMMON_SPACE;

export const REFERENCE_LANGUAGE: Language = "english";

export const PARTS_OF_SPEECH = ["n", "v", "a", "r"] as const;

export type PartOfSpeech = (typeof PARTS_OF_SPEECH)[number];

export const ANY_POS = "*";

export type PosQuery = PartOfSpeech | typeof ANY_POS;

// Languages whose lemmas are keyed by the morpho table instead of the index.
const MORPHOLOGY_MODEL_LANGUAGES: ReadonlySet<Language> = new Set(["latin"]);

export function usesMorphologyModel(language: Language): boolean {
  return MORPHOLOGY_MODEL_LANGUAGES.has(language);
}

export function isLanguage(value: string): value is Language {
  return (LANGUAGES as readonly string[]).includes(value);
}

export function isPartOfSpeech(value: string): value is PartOfSpeech {
  return (PARTS_OF_SPEECH as readonly string[]).includes(value);
}

/** Index-table column holding the synset ids of a part of speech. */
export function indexColumn(pos: PartOfSpeech): `id_${PartOfSpeech}` {
  return `id_${pos}`;
}
