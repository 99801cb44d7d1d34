import type { Language, PartOfSpeech, StoreSpace } from "../constants/languages";
import { requireRelationType, type RelationType } from "../constants/relation-types";
import type { RelationRecord } from "../records/record-schemas";
import { parseSynsetId } from "../services/identifier-resolver";
import type { EntityContext } from "./entity-context";
import type { Lemma } from "./lemma";
import type { Synset } from "./synset";

export type RelationStatus = "new" | "";

/**
 * A typed edge between two synsets, optionally pinned to the surface forms
 * it links. Construction fails with a DomainError when the source synset's
 * part of speech does not define the type.
 */
export class Relation {
  readonly relationType: RelationType;
  private readonly sourcePos: PartOfSpeech;
  private readonly targetPos: PartOfSpeech;

  constructor(
    private readonly record: RelationRecord,
    readonly space: StoreSpace,
    readonly language: Language,
    private readonly context: EntityContext,
  ) {
    this.sourcePos = parseSynsetId(record.id_source).pos;
    this.targetPos = parseSynsetId(record.id_target).pos;
    this.relationType = requireRelationType(this.sourcePos, record.type);
  }

  get type(): string {
    return this.record.type;
  }

  get typeName(): string {
    return this.relationType.name;
  }

  get idSource(): string {
    return this.record.id_source;
  }

  get idTarget(): string {
    return this.record.id_target;
  }

  get wSource(): string {
    return this.record.w_source ?? "";
  }

  get wTarget(): string {
    return this.record.w_target ?? "";
  }

  get isLexical(): boolean {
    return this.wSource !== "" && this.wTarget !== "";
  }

  get status(): RelationStatus {
    return this.record.status === "new" ? "new" : "";
  }

  get source(): Synset | undefined {
    return this.context.resolver.synset(this.idSource, this.language);
  }

  get target(): Synset | undefined {
    return this.context.resolver.synset(this.idTarget, this.language);
  }

  get sourceLemma(): Lemma | undefined {
    return this.wSource
      ? this.context.resolver.memberLemma(this.wSource, this.sourcePos, this.language)
      : undefined;
  }

  get targetLemma(): Lemma | undefined {
    return this.wTarget
      ? this.context.resolver.memberLemma(this.wTarget, this.targetPos, this.language)
      : undefined;
  }

  toString(): string {
    const source = this.wSource ? `${this.idSource}(${this.wSource})` : this.idSource;
    const target = this.wTarget ? `${this.idTarget}(${this.wTarget})` : this.idTarget;
    return `${source} -${this.type}-> ${target}`;
  }
}
