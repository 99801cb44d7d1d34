import type { ILogger } from "../../infrastructure/logging/logger";
import type { Language, PartOfSpeech } from "../constants/languages";
import type { StoreAccessor } from "../ports/store-accessor";
import type { Lemma } from "./lemma";
import type { Morpho } from "./morpho";
import type { Semfield } from "./semfield";
import type { Synset } from "./synset";

/** Memoised construction of neighbouring entities. */
export interface EntityResolver {
  synset(id: string, language: Language): Synset | undefined;
  /** A lemma known to exist from the record that names it; not re-validated. */
  memberLemma(form: string, pos: PartOfSpeech, language: Language): Lemma;
  semfield(
    english: string,
    code: string | undefined,
    language: Language,
  ): Semfield | undefined;
  /** A hierarchy neighbour by name, narrowed by the anchor field's code. */
  relatedSemfield(
    english: string,
    anchorCode: string,
    language: Language,
  ): Semfield | undefined;
  morphoFor(lemma: Lemma): Morpho | undefined;
}

export interface EntityContext {
  readonly store: StoreAccessor;
  readonly logger: ILogger;
  readonly resolver: EntityResolver;
}
