import { Lazy } from "../../utils/lazy";
import {
  COMMON_SPACE,
  indexColumn,
  type Language,
  type PartOfSpeech,
  type StoreSpace,
} from "../constants/languages";
import { HYPERNYM, HYPONYM, requireRelationType } from "../constants/relation-types";
import { escapeLike } from "../ports/store-accessor";
import {
  indexRecordSchema,
  readRecords,
  relationRecordSchema,
  semfieldRecordSchema,
  synsetRecordSchema,
  tokens,
  type SynsetRecord,
} from "../records/record-schemas";
import {
  breadthFirstClosure,
  findRoots,
  maxDepth,
  minDepth,
  pathsToRoots,
  type CycleListener,
  type GraphNode,
} from "../services/graph-traversal";
import { parseSynsetId, type SynsetIdentifier } from "../services/identifier-resolver";
import type { EntityContext } from "./entity-context";
import type { Lemma } from "./lemma";
import { Relation } from "./relation";
import type { Semfield } from "./semfield";

// Placeholder word for a concept the language does not lexicalise.
const GAP = "gap!";

/**
 * A concept node, viewed through one language. The id is authoritative in its
 * origin language; lemmas come from the view language.
 */
export class Synset implements GraphNode<Synset> {
  private readonly identifier: SynsetIdentifier;
  private readonly lemmasCell = new Lazy(() => this.loadLemmas());
  private readonly relationsCell = new Lazy(() => this.loadRelations());
  private readonly semfieldsCell = new Lazy(() => this.loadSemfields());
  private readonly maxDepthCell = new Lazy(() => maxDepth<Synset>(this, HYPERNYM, this.onCycle));
  private readonly minDepthCell = new Lazy(() => minDepth<Synset>(this, HYPERNYM, this.onCycle));

  constructor(
    private readonly record: SynsetRecord,
    readonly language: Language,
    private readonly context: EntityContext,
  ) {
    this.identifier = parseSynsetId(record.id);
  }

  get id(): string {
    return this.identifier.id;
  }

  get pos(): PartOfSpeech {
    return this.identifier.pos;
  }

  get offset(): string {
    return this.identifier.offset;
  }

  get origin(): Language {
    return this.identifier.origin;
  }

  get gloss(): string {
    return this.record.gloss ?? "";
  }

  get lemmas(): readonly Lemma[] {
    return this.lemmasCell.value;
  }

  get relations(): readonly Relation[] {
    return this.relationsCell.value;
  }

  /** Semantic fields tagging this synset. Throws when a tag name is ambiguous. */
  get semfields(): readonly Semfield[] {
    return this.semfieldsCell.value;
  }

  get hypernyms(): readonly Synset[] {
    return this.neighbours(HYPERNYM);
  }

  get hyponyms(): readonly Synset[] {
    return this.neighbours(HYPONYM);
  }

  getRelations(type: string): Relation[] {
    requireRelationType(this.pos, type);
    return this.relations.filter((relation) => relation.type === type);
  }

  /** Relations from this synset to `target`, of any type. */
  relationTo(target: Synset | string): Relation[] {
    const targetId = typeof target === "string" ? target : target.id;
    return this.relations.filter((relation) => relation.idTarget === targetId);
  }

  neighbours(type: string): readonly Synset[] {
    const seen = new Set<string>();
    const targets: Synset[] = [];
    for (const relation of this.getRelations(type)) {
      if (seen.has(relation.idTarget)) {
        continue;
      }
      seen.add(relation.idTarget);
      const target = relation.target;
      if (target) {
        targets.push(target);
      }
    }
    return targets;
  }

  /**
   * Synsets reachable over `type` edges, breadth first. The type is checked
   * before the sequence is returned.
   */
  closure(type: string, depthLimit?: number): Generator<Synset, void, undefined> {
    requireRelationType(this.pos, type);
    return breadthFirstClosure<Synset>(this, type, depthLimit);
  }

  maxDepth(): number {
    return this.maxDepthCell.value;
  }

  minDepth(): number {
    return this.minDepthCell.value;
  }

  roots(): Synset[] {
    return findRoots<Synset>(this, HYPERNYM);
  }

  pathsToRoot(): Synset[][] {
    return pathsToRoots<Synset>(this, HYPERNYM);
  }

  equals(other: Synset): boolean {
    return this.id === other.id;
  }

  toString(): string {
    return this.gloss;
  }

  private readonly onCycle: CycleListener = (nodeId, path) => {
    this.context.logger.debug("Hypernym walk revisited a synset", {
      synset: this.id,
      revisited: nodeId,
      path,
    });
  };

  private loadLemmas(): Lemma[] {
    const { store, resolver } = this.context;
    const [row] = readRecords(store, this.language, "synset", synsetRecordSchema, {
      where: { id: this.id },
    });

    const words = tokens(row?.word)
      .map((word) => word.toLowerCase())
      .filter((word) => word !== GAP);
    const phrases = tokens(row?.phrase).map((phrase) => phrase.toLowerCase());
    const forms = words.length + phrases.length > 0 ? [...words, ...phrases] : this.indexedForms();

    return [...new Set(forms)].map((form) =>
      resolver.memberLemma(form, this.pos, this.language),
    );
  }

  // Forms whose index row lists this synset, for synsets with no own words.
  private indexedForms(): string[] {
    const column = indexColumn(this.pos);
    const rows = readRecords(
      this.context.store,
      this.language,
      "index",
      indexRecordSchema,
      { where: { [column]: { like: `%${escapeLike(this.id)}%` } } },
    );
    return rows
      .filter((row) => tokens(row[column]).includes(this.id))
      .map((row) => row.lemma.toLowerCase())
      .filter((form) => form !== GAP);
  }

  private loadRelations(): Relation[] {
    const spaces: StoreSpace[] = [COMMON_SPACE, this.language];
    return spaces.flatMap((space) =>
      readRecords(this.context.store, space, "relation", relationRecordSchema, {
        where: { id_source: this.id },
      }).map((record) => new Relation(record, space, this.language, this.context)),
    );
  }

  private loadSemfields(): Semfield[] {
    const { store, resolver } = this.context;
    const query = { where: { synset: this.id } };
    let rows = readRecords(store, COMMON_SPACE, "semfield", semfieldRecordSchema, query);
    if (rows.length === 0) {
      rows = readRecords(store, this.language, "semfield", semfieldRecordSchema, query);
    }

    const fields: Semfield[] = [];
    for (const name of new Set(rows.flatMap((row) => tokens(row.english)))) {
      const field = resolver.semfield(name, undefined, this.language);
      if (field) {
        fields.push(field);
      }
    }
    return fields;
  }
}
