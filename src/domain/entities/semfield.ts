import { Lazy } from "../../utils/lazy";
import { COMMON_SPACE, type Language, type StoreSpace } from "../constants/languages";
import { escapeLike } from "../ports/store-accessor";
import {
  readRecords,
  semfieldRecordSchema,
  tokens,
  type SemfieldHierarchyRecord,
} from "../records/record-schemas";
import type { EntityContext } from "./entity-context";
import type { Synset } from "./synset";

/** A node of the semantic-field hierarchy, identified by (english, code). */
export class Semfield {
  private readonly synsetsCell = new Lazy(() => this.loadSynsets());
  private readonly hypersCell = new Lazy(() => this.related(this.record.hypers));
  private readonly hyponsCell = new Lazy(() => this.related(this.record.hypons));
  private readonly normalCell = new Lazy(() => this.related(this.record.normal)[0]);

  constructor(
    private readonly record: SemfieldHierarchyRecord,
    readonly language: Language,
    private readonly context: EntityContext,
  ) {}

  get english(): string {
    return this.record.english;
  }

  get code(): string {
    return this.record.code;
  }

  get synsets(): readonly Synset[] {
    return this.synsetsCell.value;
  }

  /** Immediately broader fields. */
  get hypers(): readonly Semfield[] {
    return this.hypersCell.value;
  }

  /** Immediately narrower fields. */
  get hypons(): readonly Semfield[] {
    return this.hyponsCell.value;
  }

  /** The basic-level category of this field, if recorded. */
  get normal(): Semfield | undefined {
    return this.normalCell.value;
  }

  equals(other: Semfield): boolean {
    return this.english === other.english && this.code === other.code;
  }

  toString(): string {
    return this.english
      .split("_")
      .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
      .join(" ");
  }

  private loadSynsets(): Synset[] {
    const { store, resolver } = this.context;
    const spaces: StoreSpace[] = [COMMON_SPACE, this.language];
    const ids = new Set<string>();
    for (const space of spaces) {
      const rows = readRecords(store, space, "semfield", semfieldRecordSchema, {
        where: { english: { like: `%${escapeLike(this.english)}%` } },
      });
      for (const row of rows) {
        if (tokens(row.english).includes(this.english)) {
          ids.add(row.synset);
        }
      }
    }

    const synsets: Synset[] = [];
    for (const id of ids) {
      const synset = resolver.synset(id, this.language);
      if (synset) {
        synsets.push(synset);
      }
    }
    return synsets;
  }

  private related(names: string | undefined): Semfield[] {
    const fields: Semfield[] = [];
    for (const name of tokens(names)) {
      const field = this.context.resolver.relatedSemfield(name, this.code, this.language);
      if (field) {
        fields.push(field);
      }
    }
    return fields;
  }
}
