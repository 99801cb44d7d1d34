import type { PartOfSpeech } from "../../domain/constants/languages";

export interface LemmaMatch {
  readonly form: string;
  readonly pos: PartOfSpeech;
  readonly score: number;
  readonly matchedTokens: string[];
}

export interface LemmaSearchRepository {
  search(terms: string[], limit: number): Promise<LemmaMatch[]>;
}
