import { SilentLogger, type ILogger } from "../infrastructure/logging/logger";
import { ReplayableSequence } from "../utils/lazy";
import {
  ANY_POS,
  COMMON_SPACE,
  indexColumn,
  isPartOfSpeech,
  PARTS_OF_SPEECH,
  usesMorphologyModel,
  type Language,
  type PartOfSpeech,
  type PosQuery,
  type StoreSpace,
} from "./constants/languages";
import { isLexicalRelationType } from "./constants/relation-types";
import type { Lemma } from "./entities/lemma";
import type { Relation } from "./entities/relation";
import type { Semfield } from "./entities/semfield";
import type { Synset } from "./entities/synset";
import { DomainError } from "./errors";
import { escapeLike, type ColumnMatch, type StoreAccessor } from "./ports/store-accessor";
import {
  indexRecordSchema,
  lemmaRecordSchema,
  morphoRecordSchema,
  readRecords,
  relationRecordSchema,
  semfieldHierarchyRecordSchema,
  synsetRecordSchema,
  tokens,
} from "./records/record-schemas";
import {
  EntityRegistry,
  normalizeForm,
  type LemmaFilter,
} from "./services/entity-registry";
import { resolveOriginLanguage } from "./services/identifier-resolver";

export type MatchMode = "exact" | "startswith" | "endswith" | "contains";

export interface FindOptions {
  readonly pos?: PosQuery;
  /** Morphological tag filter (morphology-model languages only). */
  readonly tag?: string;
  readonly mode?: MatchMode;
}

export interface RelationQuery {
  readonly source?: Synset;
  readonly target?: Synset;
  readonly wSource?: Lemma;
  readonly wTarget?: Lemma;
  readonly type?: string;
  readonly lexical?: boolean;
}

export type IndexEntry = readonly [form: string, pos: PartOfSpeech, tag: string];

export interface WordNetOptions {
  readonly store: StoreAccessor;
  readonly logger?: ILogger;
  readonly cacheSize?: number;
}

const ALL_POS = PARTS_OF_SPEECH.join("");

/**
 * One language's view of the shared graph: lookups by key plus iteration over
 * every lemma, synset, relation and semantic field.
 */
export class WordNet implements Iterable<Lemma> {
  private readonly registry: EntityRegistry;
  private readonly store: StoreAccessor;
  private readonly lemmaSequence = new ReplayableSequence(() => this.loadLemmas());
  private readonly synsetSequence = new ReplayableSequence(() => this.loadSynsets());
  private readonly relationSequence = new ReplayableSequence(() => this.loadRelations());
  private readonly semfieldSequence = new ReplayableSequence(() => this.loadSemfields());
  private readonly depthByPos = new Map<string, number>();

  constructor(
    readonly language: Language,
    { store, logger = new SilentLogger(), cacheSize }: WordNetOptions,
  ) {
    this.store = store;
    this.registry = new EntityRegistry({ store, logger, cacheSize });
  }

  synset(id: string): Synset | undefined {
    return this.registry.synset(id, this.language);
  }

  /**
   * The lemma with `form`. A wildcard `pos` must match a single part of
   * speech, and a morphology-model lookup a single morpho row; otherwise a
   * DisambiguationError lists the candidates.
   */
  lemma(form: string, pos: PosQuery = ANY_POS, filter: LemmaFilter = {}): Lemma | undefined {
    return this.registry.lemma(form, pos, this.language, filter);
  }

  semfield(english: string, code?: string): Semfield | undefined {
    return this.registry.semfield(english, code, this.language);
  }

  semfieldsByCode(code: string): Semfield[] {
    return this.registry.semfieldsByCode(code, this.language);
  }

  semfieldsByName(english: string): Semfield[] {
    return this.registry.semfieldsByName(english, this.language);
  }

  /** Lemmas whose form matches `form` under `mode`; every lemma when omitted. */
  find(form?: string, { pos = ANY_POS, tag, mode = "exact" }: FindOptions = {}): Lemma[] {
    const where: Record<string, ColumnMatch> = {};
    if (form !== undefined) {
      where.lemma = formMatch(normalizeForm(form), mode);
    }
    if (pos !== ANY_POS) {
      where.pos = pos;
    }

    if (usesMorphologyModel(this.language)) {
      if (tag !== undefined) {
        where.miscellanea = tag;
      }
      return readRecords(this.store, this.language, "morpho", morphoRecordSchema, { where })
        .map((record) => this.registry.lemmaFromMorpho(record, this.language))
        .filter((lemma): lemma is Lemma => lemma !== undefined);
    }

    const seen = new Set<string>();
    const lemmas: Lemma[] = [];
    for (const record of readRecords(this.store, this.language, "lemma", lemmaRecordSchema, {
      where,
    })) {
      if (!isPartOfSpeech(record.pos)) {
        continue;
      }
      const lemma = this.registry.memberLemma(record.lemma, record.pos, this.language);
      if (!seen.has(lemma.key)) {
        seen.add(lemma.key);
        lemmas.push(lemma);
      }
    }
    return lemmas;
  }

  *index(): Generator<IndexEntry, void, undefined> {
    for (const lemma of this.lemmas()) {
      yield [lemma.form, lemma.pos, lemma.tag ?? ""];
    }
  }

  *lemmas(): Generator<Lemma, void, undefined> {
    yield* this.lemmaSequence;
  }

  /** Synsets of this language, restricted to the parts of speech in `pos`. */
  *synsets(pos: string | readonly PartOfSpeech[] = ALL_POS): Generator<Synset, void, undefined> {
    const wanted = new Set<string>(pos);
    for (const synset of this.synsetSequence) {
      if (wanted.has(synset.pos)) {
        yield synset;
      }
    }
  }

  /** Relations shared by every language followed by this language's own. */
  *relations(): Generator<Relation, void, undefined> {
    yield* this.relationSequence;
  }

  *semfields(): Generator<Semfield, void, undefined> {
    yield* this.semfieldSequence;
  }

  /**
   * Relations matching the query. Lexical queries (flagged, or by a lexical
   * type) need both lemmas and read only this language's table.
   */
  findRelations(query: RelationQuery = {}): Relation[] {
    const { source, target, wSource, wTarget, type } = query;
    const lexical = query.lexical === true || (type !== undefined && isLexicalRelationType(type));
    const where: Record<string, ColumnMatch> = {};

    if (lexical) {
      if (!wSource || !wTarget) {
        throw new DomainError("a source and target lemma must be specified for lexical relations");
      }
      where.w_source = wSource.form;
      where.w_target = wTarget.form;
    } else {
      if (source) {
        where.id_source = source.id;
      } else if (wSource) {
        where.id_source = { in: wSource.synsets.map((synset) => synset.id) };
      }
      if (target) {
        where.id_target = target.id;
      } else if (wTarget) {
        where.id_target = { in: wTarget.synsets.map((synset) => synset.id) };
      }
    }
    if (type !== undefined) {
      where.type = type;
    }

    const spaces: StoreSpace[] = lexical ? [this.language] : [COMMON_SPACE, this.language];
    return spaces.flatMap((space) => this.readRelations(space, where));
  }

  /** Deepest hypernym chain among this language's synsets of `pos`. */
  maxDepthFor(pos: PartOfSpeech): number {
    const cached = this.depthByPos.get(pos);
    if (cached !== undefined) {
      return cached;
    }
    let depth = 0;
    for (const synset of this.synsets(pos)) {
      depth = Math.max(depth, synset.maxDepth());
    }
    this.depthByPos.set(pos, depth);
    return depth;
  }

  [Symbol.iterator](): Iterator<Lemma> {
    return this.lemmas();
  }

  toString(): string {
    return `WordNet(${this.language})`;
  }

  private *loadLemmas(): Generator<Lemma, void, undefined> {
    if (usesMorphologyModel(this.language)) {
      for (const record of readRecords(this.store, this.language, "morpho", morphoRecordSchema)) {
        const lemma = this.registry.lemmaFromMorpho(record, this.language);
        if (lemma) {
          yield lemma;
        }
      }
      return;
    }

    for (const record of readRecords(this.store, this.language, "index", indexRecordSchema)) {
      for (const pos of PARTS_OF_SPEECH) {
        if (tokens(record[indexColumn(pos)]).length > 0) {
          yield this.registry.memberLemma(record.lemma, pos, this.language);
        }
      }
    }
  }

  private *loadSynsets(): Generator<Synset, void, undefined> {
    for (const record of readRecords(this.store, this.language, "synset", synsetRecordSchema)) {
      // Rows for borrowed ids only lexicalise them; the concept itself is
      // read from its origin store.
      const synset =
        resolveOriginLanguage(record.id) === this.language
          ? this.registry.adoptSynset(record, this.language)
          : this.registry.synset(record.id, this.language);
      if (synset) {
        yield synset;
      }
    }
  }

  private *loadRelations(): Generator<Relation, void, undefined> {
    yield* this.readRelations(COMMON_SPACE, {});
    yield* this.readRelations(this.language, {});
  }

  private *loadSemfields(): Generator<Semfield, void, undefined> {
    for (const record of readRecords(
      this.store,
      COMMON_SPACE,
      "semfield_hierarchy",
      semfieldHierarchyRecordSchema,
    )) {
      yield this.registry.semfieldNode(record, this.language);
    }
  }

  private readRelations(space: StoreSpace, where: Record<string, ColumnMatch>): Relation[] {
    return readRecords(this.store, space, "relation", relationRecordSchema, { where }).map(
      (record) => this.registry.relation(record, space, this.language),
    );
  }
}

function formMatch(form: string, mode: MatchMode): ColumnMatch {
  const escaped = escapeLike(form);
  switch (mode) {
    case "exact":
      return form;
    case "startswith":
      return { like: `${escaped}%` };
    case "endswith":
      return { like: `%${escaped}` };
    case "contains":
      return { like: `%${escaped}%` };
  }
}
