import { Lazy } from "../../utils/lazy";
import {
  indexColumn,
  PARTS_OF_SPEECH,
  type Language,
  type PartOfSpeech,
} from "../constants/languages";
import {
  ANTONYM,
  COMPOSED_OF,
  COMPOSES,
  DERIVED_FROM,
  RELATED_TO,
} from "../constants/relation-types";
import {
  indexRecordSchema,
  readRecords,
  readRecordsIfPresent,
  relationRecordSchema,
  synonymsRecordSchema,
  tokens,
} from "../records/record-schemas";
import { parseSynsetId } from "../services/identifier-resolver";
import type { EntityContext } from "./entity-context";
import type { Morpho } from "./morpho";
import type { Synset } from "./synset";

export interface LemmaInit {
  /** Surface form, with `_` in place of spaces. */
  readonly form: string;
  readonly pos: PartOfSpeech;
  readonly language: Language;
  readonly morphoId?: string;
  readonly tag?: string;
}

type Side = "source" | "target";

const ALL_POS = PARTS_OF_SPEECH.join("");

/**
 * A word or phrase of one language. Identity is (form, pos); the language is
 * carried for lookups only.
 */
export class Lemma {
  readonly form: string;
  readonly pos: PartOfSpeech;
  readonly language: Language;
  readonly morphoId: string | undefined;
  readonly tag: string | undefined;

  private readonly synsetsCell = new Lazy(() => this.loadSynsets());
  private readonly synonymsCell = new Lazy(() => this.loadSynonyms());
  private readonly derivatesCell = new Lazy(() => this.lexicalNeighbours(DERIVED_FROM, "target"));
  private readonly relativesCell = new Lazy(() => this.lexicalNeighbours(RELATED_TO, "source"));
  private readonly antonymsCell = new Lazy(() => this.lexicalNeighbours(ANTONYM, "source"));
  private readonly composedOfCell = new Lazy(() => this.lexicalNeighbours(COMPOSED_OF, "source"));
  private readonly composesCell = new Lazy(() => this.lexicalNeighbours(COMPOSES, "source"));
  private readonly morphoCell: Lazy<Morpho | undefined>;

  constructor(
    init: LemmaInit,
    private readonly context: EntityContext,
    morpho?: Morpho,
  ) {
    this.form = init.form;
    this.pos = init.pos;
    this.language = init.language;
    this.morphoId = init.morphoId;
    this.tag = init.tag;
    this.morphoCell = new Lazy(() => morpho ?? context.resolver.morphoFor(this));
  }

  get key(): string {
    return `${this.form}|${this.pos}`;
  }

  get synsets(): readonly Synset[] {
    return this.synsetsCell.value;
  }

  get synonyms(): readonly Lemma[] {
    return this.synonymsCell.value;
  }

  /** Lemmas derived from this one (`\` relations pointing at it). */
  get derivates(): readonly Lemma[] {
    return this.derivatesCell.value;
  }

  getDerivates(posFilter: string = ALL_POS): Lemma[] {
    return this.derivates.filter((lemma) => posFilter.includes(lemma.pos));
  }

  get relatives(): readonly Lemma[] {
    return this.relativesCell.value;
  }

  getRelatives(posFilter: string = ALL_POS): Lemma[] {
    return this.relatives.filter((lemma) => posFilter.includes(lemma.pos));
  }

  get antonyms(): readonly Lemma[] {
    return this.antonymsCell.value;
  }

  /** Parts this compound is built from. */
  get composedOf(): readonly Lemma[] {
    return this.composedOfCell.value;
  }

  /** Compounds this lemma is a part of. */
  get composes(): readonly Lemma[] {
    return this.composesCell.value;
  }

  /** Throws a DisambiguationError when several morpho rows match. */
  get morpho(): Morpho | undefined {
    return this.morphoCell.value;
  }

  equals(other: Lemma): boolean {
    return this.key === other.key;
  }

  toString(): string {
    return this.form.replace(/_/gu, " ");
  }

  private loadSynsets(): Synset[] {
    const { store, resolver } = this.context;
    const column = indexColumn(this.pos);
    const rows = readRecords(store, this.language, "index", indexRecordSchema, {
      where: { lemma: this.form },
    });
    const ids = new Set(rows.flatMap((row) => tokens(row[column])));

    const synsets: Synset[] = [];
    for (const id of ids) {
      const synset = resolver.synset(id, this.language);
      if (synset) {
        synsets.push(synset);
      }
    }
    return synsets;
  }

  private loadSynonyms(): Lemma[] {
    const offsets = this.synsets.map((synset) => synset.offset);
    const rows = offsets.length
      ? readRecordsIfPresent(
          this.context.store,
          this.language,
          "synonyms",
          synonymsRecordSchema,
          { where: { pos: this.pos, syn: { in: offsets } } },
        )
      : undefined;

    const forms = rows?.length
      ? rows.map((row) => row.lemma)
      : this.synsets.flatMap((synset) => synset.lemmas.map((lemma) => lemma.form));

    return this.distinctLemmas(
      forms
        .filter((form) => form !== this.form)
        .map((form): [string, PartOfSpeech] => [form, this.pos]),
    );
  }

  /**
   * Word-level neighbours over `type`. `side` is the end of the edge this
   * lemma sits on; the lemma at the other end is returned.
   */
  private lexicalNeighbours(type: string, side: Side): Lemma[] {
    const own = side === "source" ? "w_source" : "w_target";
    const rows = readRecords(
      this.context.store,
      this.language,
      "relation",
      relationRecordSchema,
      { where: { type, [own]: this.form } },
    );

    const found: [string, PartOfSpeech][] = [];
    for (const row of rows) {
      const [ownId, otherId, otherForm]: [string, string, string | undefined] =
        side === "source"
          ? [row.id_source, row.id_target, row.w_target]
          : [row.id_target, row.id_source, row.w_source];
      if (otherForm && parseSynsetId(ownId).pos === this.pos) {
        found.push([otherForm, parseSynsetId(otherId).pos]);
      }
    }
    return this.distinctLemmas(found);
  }

  private distinctLemmas(entries: readonly (readonly [string, PartOfSpeech])[]): Lemma[] {
    const seen = new Set<string>();
    const lemmas: Lemma[] = [];
    for (const [form, pos] of entries) {
      const lemma = this.context.resolver.memberLemma(form, pos, this.language);
      if (!seen.has(lemma.key)) {
        seen.add(lemma.key);
        lemmas.push(lemma);
      }
    }
    return lemmas;
  }
}
