import type { Language } from "../../domain/constants/languages";
import type { WordNet } from "../../domain/wordnet";
import type { LemmaSearchRepository } from "./lemma-search-repository";

/** Per-language aggregates and search indexes, built once and shared. */
export interface WordNetProvider {
  wordnet(language: Language): WordNet;
  lemmaSearch(language: Language): Promise<LemmaSearchRepository>;
}
