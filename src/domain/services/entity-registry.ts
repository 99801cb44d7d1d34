import { QueryCache } from "../../infrastructure/cache/query-cache";
import type { ILogger } from "../../infrastructure/logging/logger";
import {
  ANY_POS,
  COMMON_SPACE,
  indexColumn,
  isPartOfSpeech,
  PARTS_OF_SPEECH,
  REFERENCE_LANGUAGE,
  usesMorphologyModel,
  type Language,
  type PartOfSpeech,
  type PosQuery,
  type StoreSpace,
} from "../constants/languages";
import type { EntityContext, EntityResolver } from "../entities/entity-context";
import { Lemma } from "../entities/lemma";
import { Morpho } from "../entities/morpho";
import { Relation } from "../entities/relation";
import { Semfield } from "../entities/semfield";
import { Synset } from "../entities/synset";
import { DisambiguationError } from "../errors";
import type { ColumnMatch, StoreAccessor } from "../ports/store-accessor";
import {
  indexRecordSchema,
  morphoRecordSchema,
  readRecords,
  semfieldHierarchyRecordSchema,
  synsetRecordSchema,
  tokens,
  type MorphoRecord,
  type RelationRecord,
  type SemfieldHierarchyRecord,
  type SynsetRecord,
} from "../records/record-schemas";
import { resolveOriginLanguage } from "./identifier-resolver";

export const DEFAULT_CACHE_SIZE = 2048;

export interface EntityRegistryOptions {
  readonly store: StoreAccessor;
  readonly logger: ILogger;
  readonly cacheSize?: number;
}

export interface LemmaFilter {
  /** Morpho row id (morphology-model languages). */
  readonly id?: string;
  /** Morphological tag the row must carry (morphology-model languages). */
  readonly tag?: string;
}

/** Surface forms are stored with `_` in place of spaces. */
export function normalizeForm(form: string): string {
  return form.trim().replace(/\s+/gu, "_");
}

/**
 * Builds entities from store rows, enforcing "unique or fail" lookups, and
 * memoises every lookup so repeated requests share one instance.
 */
export class EntityRegistry implements EntityResolver {
  private readonly context: EntityContext;
  private readonly synsets: QueryCache<Synset | undefined>;
  private readonly lemmas: QueryCache<Lemma | undefined>;
  private readonly members: QueryCache<Lemma>;
  private readonly morphos: QueryCache<Morpho | undefined>;
  private readonly semfieldLookups: QueryCache<Semfield | undefined>;
  private readonly semfieldNodes: QueryCache<Semfield>;

  constructor({ store, logger, cacheSize = DEFAULT_CACHE_SIZE }: EntityRegistryOptions) {
    this.context = { store, logger, resolver: this };
    this.synsets = new QueryCache(cacheSize, logger);
    this.lemmas = new QueryCache(cacheSize, logger);
    this.members = new QueryCache(cacheSize, logger);
    this.morphos = new QueryCache(cacheSize, logger);
    this.semfieldLookups = new QueryCache(cacheSize, logger);
    this.semfieldNodes = new QueryCache(cacheSize, logger);
  }

  get store(): StoreAccessor {
    return this.context.store;
  }

  /**
   * The synset with `id`, read from its origin language first, then the
   * requested language, then the reference language.
   */
  synset(id: string, language: Language): Synset | undefined {
    return this.synsets.memoize(`${language}:${id}`, () => {
      const spaces = new Set<Language>([
        resolveOriginLanguage(id),
        language,
        REFERENCE_LANGUAGE,
      ]);
      for (const space of spaces) {
        const [record] = readRecords(this.store, space, "synset", synsetRecordSchema, {
          where: { id },
        });
        if (record) {
          return new Synset(record, language, this.context);
        }
      }
      return undefined;
    });
  }

  /** Wraps a row already read from the store, sharing the memoised instance. */
  adoptSynset(record: SynsetRecord, language: Language): Synset {
    const synset = this.synsets.memoize(
      `${language}:${record.id}`,
      () => new Synset(record, language, this.context),
    );
    return synset ?? new Synset(record, language, this.context);
  }

  relation(record: RelationRecord, space: StoreSpace, language: Language): Relation {
    return new Relation(record, space, language, this.context);
  }

  lemma(
    form: string,
    pos: PosQuery,
    language: Language,
    filter: LemmaFilter = {},
  ): Lemma | undefined {
    const normalized = normalizeForm(form);
    const key = `${language}:${normalized}|${pos}|${filter.id ?? ""}|${filter.tag ?? ""}`;
    return this.lemmas.memoize(key, () =>
      usesMorphologyModel(language)
        ? this.lemmaFromMorphoTable(normalized, pos, language, filter)
        : this.lemmaFromIndex(normalized, pos, language),
    );
  }

  memberLemma(form: string, pos: PartOfSpeech, language: Language): Lemma {
    return this.members.memoize(
      `${language}:${form}|${pos}`,
      () => new Lemma({ form, pos, language }, this.context),
    );
  }

  /** A lemma backed by its morpho row; `undefined` for closed-class rows. */
  lemmaFromMorpho(record: MorphoRecord, language: Language): Lemma | undefined {
    const { pos } = record;
    if (!isPartOfSpeech(pos)) {
      return undefined;
    }
    return this.members.memoize(`${language}:morpho:${record.id}`, () => {
      const morpho = new Morpho(record, language);
      return new Lemma(
        { form: record.lemma, pos, language, morphoId: record.id, tag: record.miscellanea },
        this.context,
        morpho,
      );
    });
  }

  morphoFor(lemma: Lemma): Morpho | undefined {
    const key = `${lemma.language}:${lemma.key}|${lemma.morphoId ?? ""}`;
    return this.morphos.memoize(key, () => {
      const where: Record<string, ColumnMatch> = lemma.morphoId
        ? { id: lemma.morphoId }
        : { lemma: lemma.form, pos: lemma.pos };
      const rows = readRecords(this.store, lemma.language, "morpho", morphoRecordSchema, {
        where,
      });
      if (rows.length > 1) {
        throw new DisambiguationError(
          lemma.form,
          rows.map((row) => row.id),
        );
      }
      const [record] = rows;
      return record ? new Morpho(record, lemma.language) : undefined;
    });
  }

  semfield(english: string, code: string | undefined, language: Language): Semfield | undefined {
    const name = normalizeForm(english);
    return this.semfieldLookups.memoize(`${language}:${name}|${code ?? ""}`, () => {
      const rows = this.hierarchyRows(code === undefined ? { english: name } : { english: name, code });
      if (rows.length > 1) {
        throw new DisambiguationError(
          name,
          rows.map((row) => row.code),
        );
      }
      const [record] = rows;
      return record ? this.semfieldNode(record, language) : undefined;
    });
  }

  /**
   * A neighbour named in a hierarchy column. Names shared by several fields
   * are narrowed to the branch whose code starts like `anchorCode`.
   */
  relatedSemfield(english: string, anchorCode: string, language: Language): Semfield | undefined {
    return this.semfieldLookups.memoize(`${language}:${english}~${anchorCode}`, () => {
      const rows = this.hierarchyRows({ english });
      const branch = anchorCode.slice(0, 2);
      const candidates =
        rows.length > 1 ? rows.filter((row) => row.code.startsWith(branch)) : rows;
      if (candidates.length > 1 || (rows.length > 1 && candidates.length === 0)) {
        const listed = candidates.length > 0 ? candidates : rows;
        throw new DisambiguationError(
          english,
          listed.map((row) => row.code),
        );
      }
      const [record] = candidates;
      return record ? this.semfieldNode(record, language) : undefined;
    });
  }

  semfieldsByCode(code: string, language: Language): Semfield[] {
    return this.hierarchyRows({ code }).map((record) => this.semfieldNode(record, language));
  }

  semfieldsByName(english: string, language: Language): Semfield[] {
    return this.hierarchyRows({ english: normalizeForm(english) }).map((record) =>
      this.semfieldNode(record, language),
    );
  }

  semfieldNode(record: SemfieldHierarchyRecord, language: Language): Semfield {
    return this.semfieldNodes.memoize(
      `${language}:${record.english}|${record.code}`,
      () => new Semfield(record, language, this.context),
    );
  }

  private hierarchyRows(where: Record<string, ColumnMatch>): SemfieldHierarchyRecord[] {
    return readRecords(
      this.store,
      COMMON_SPACE,
      "semfield_hierarchy",
      semfieldHierarchyRecordSchema,
      { where },
    );
  }

  private lemmaFromIndex(form: string, pos: PosQuery, language: Language): Lemma | undefined {
    const rows = readRecords(this.store, language, "index", indexRecordSchema, {
      where: { lemma: form },
    });
    const present = PARTS_OF_SPEECH.filter((candidate) =>
      rows.some((row) => tokens(row[indexColumn(candidate)]).length > 0),
    );

    if (pos !== ANY_POS) {
      return present.includes(pos) ? this.memberLemma(form, pos, language) : undefined;
    }
    if (present.length > 1) {
      throw new DisambiguationError(form, present);
    }
    const [only] = present;
    return only ? this.memberLemma(form, only, language) : undefined;
  }

  private lemmaFromMorphoTable(
    form: string,
    pos: PosQuery,
    language: Language,
    filter: LemmaFilter,
  ): Lemma | undefined {
    const where: Record<string, ColumnMatch> = { lemma: form };
    if (filter.id !== undefined) {
      where.id = filter.id;
    }
    if (pos !== ANY_POS) {
      where.pos = pos;
    }
    if (filter.tag !== undefined) {
      where.miscellanea = filter.tag;
    }

    // Closed-class rows count towards ambiguity; a unique one yields no lemma.
    const rows = readRecords(this.store, language, "morpho", morphoRecordSchema, { where });
    if (rows.length > 1) {
      throw new DisambiguationError(
        form,
        rows.map((row) => row.id),
      );
    }
    const [record] = rows;
    return record ? this.lemmaFromMorpho(record, language) : undefined;
  }
}
