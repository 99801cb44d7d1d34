import { Lazy } from "../../utils/lazy";
import type { Language } from "../constants/languages";
import { tokens, type MorphoRecord } from "../records/record-schemas";
import {
  decodeMorphoTag,
  MORPHO_FEATURES,
  type MorphoFeature,
  type MorphoFeatures,
} from "../services/morphology-decoder";

export type FormPair = readonly [form: string, value: string];

const SCRIPT_FIELDS = [
  "undotted",
  "dotted_without_dots",
  "variants",
  "translit_dotted",
  "translit_undotted",
] as const;

export type ScriptField = (typeof SCRIPT_FIELDS)[number];

/** Grammatical information for one lemma of a morphologically rich language. */
export class Morpho {
  private readonly featuresCell: Lazy<MorphoFeatures>;

  constructor(
    private readonly record: MorphoRecord,
    readonly language: Language,
  ) {
    this.featuresCell = new Lazy(() =>
      this.tag ? decodeMorphoTag(this.tag, this.language) : {},
    );
  }

  get id(): string {
    return this.record.id;
  }

  get lemma(): string {
    return this.record.lemma;
  }

  get pos(): string {
    return this.record.pos || (this.feature("pos") ?? "");
  }

  /** The raw fixed-layout tag string (the `miscellanea` column). */
  get tag(): string {
    return this.record.miscellanea ?? "";
  }

  get principalParts(): string[] {
    return tokens(this.record.principal_parts);
  }

  get irregularForms(): FormPair[] {
    return pairs(this.record.irregular_forms);
  }

  get alternativeForms(): FormPair[] {
    return pairs(this.record.alternative_forms);
  }

  get pronunciation(): string {
    return this.record.pronunciation ?? "";
  }

  /** Script-specific spellings present in the record (Hebrew pointing, transliterations). */
  get scriptForms(): Partial<Record<ScriptField, string>> {
    const forms: Partial<Record<ScriptField, string>> = {};
    for (const field of SCRIPT_FIELDS) {
      const value = this.record[field];
      if (value) {
        forms[field] = value;
      }
    }
    return forms;
  }

  get features(): MorphoFeatures {
    return this.featuresCell.value;
  }

  feature(name: MorphoFeature): string | undefined {
    return this.features[name]?.code;
  }

  /** Verbose meaning of every decoded feature that has one. */
  describe(): Partial<Record<MorphoFeature, string>> {
    const described: Partial<Record<MorphoFeature, string>> = {};
    for (const name of MORPHO_FEATURES) {
      const label = this.features[name]?.label;
      if (label) {
        described[name] = label;
      }
    }
    return described;
  }

  get isIStem(): boolean {
    return this.feature("stem") === "i";
  }

  /**
   * Citation form as printed in a dictionary entry. Only Latin builds one
   * from the principal parts; other languages return the lemma alone.
   */
  dictionaryForm(): string[] {
    if (this.language !== "latin") {
      return [this.lemma];
    }
    switch (this.pos) {
      case "v":
        return this.verbCitation();
      case "n":
        return this.nounCitation();
      case "a":
        return this.adjectiveCitation();
      default:
        return [this.lemma];
    }
  }

  private verbCitation(): string[] {
    const [stem, perfect, supine] = this.principalParts;
    const group = this.feature("group");
    const withGroup = (forms: string[]) => (group ? [...forms, group] : forms);

    if (stem !== undefined && perfect !== undefined && supine !== undefined) {
      const vowel = group === "1" ? "a" : group === "2" || group === "3" ? "e" : "i";
      if (this.feature("voice") === "a") {
        return withGroup([
          this.lemma,
          `${stem}${vowel}re`,
          `${perfect}isse`,
          `${supine}um`,
        ]);
      }
      return withGroup([this.lemma, `${stem}${vowel}ri`, `${supine}us sum`]);
    }
    if (stem !== undefined && perfect !== undefined) {
      return withGroup([this.lemma, `${stem}isse`, perfect]);
    }
    return [this.lemma];
  }

  private nounCitation(): string[] {
    const [stem] = this.principalParts;
    if (stem === undefined) {
      return [this.lemma];
    }
    const singular = this.feature("number") === "s";
    const genitive = GENITIVE_ENDINGS[this.feature("group") ?? ""] ?? ["ēi", "erum"];
    const gender = this.feature("gender");
    const forms = [this.lemma, `${stem}${singular ? genitive[0] : genitive[1]}`];
    return gender ? [...forms, `${gender}.`] : forms;
  }

  private adjectiveCitation(): string[] {
    const [stem] = this.principalParts;
    if (stem === undefined) {
      return [this.lemma];
    }
    const group = this.feature("group");
    if (group === "1") {
      return [this.lemma, `${stem}a`, `${stem}um`];
    }
    if (group === "3") {
      // gender encodes the number of terminations
      switch (this.feature("gender")) {
        case "m":
          return [this.lemma, `${stem}is`, `${stem}e`, "m.f.n."];
        case "c":
          return [this.lemma, `${stem}e`, "mf.n."];
        case "a":
          return [this.lemma, "mfn."];
      }
    }
    return [this.lemma];
  }

  toString(): string {
    return this.tag;
  }
}

// [singular, plural] genitive endings per declension
const GENITIVE_ENDINGS: Readonly<Record<string, readonly [string, string]>> = {
  "1": ["ae", "arum"],
  "2": ["i", "orum"],
  "3": ["is", "um"],
  "4": ["us", "uum"],
};

function pairs(value: string | undefined): FormPair[] {
  return tokens(value).map((token) => {
    const [form = "", rest = ""] = token.split("=");
    return [form, rest] as const;
  });
}

