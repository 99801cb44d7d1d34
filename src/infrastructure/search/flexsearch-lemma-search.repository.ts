import FlexSearch, { type Document } from "flexsearch";
import type {
  LemmaMatch,
  LemmaSearchRepository,
} from "../../application/ports/lemma-search-repository";
import type { PartOfSpeech } from "../../domain/constants/languages";
import { tokenize } from "../../domain/services/search-term-parser";
import type { IndexEntry } from "../../domain/wordnet";

const FIELD_WEIGHTS: Record<string, number> = {
  form: 3,
};

// Token scoring constants
const EXACT_TOKEN_MATCH_BONUS = 5;
const PREFIX_TOKEN_MATCH_BONUS = 2;

// Candidates fetched per term, relative to the requested limit
const CANDIDATE_FACTOR = 4;

interface FlexSearchLemmaSearchRepositoryOptions {
  readonly entries: Iterable<IndexEntry>;
}

interface IndexDocument {
  id: string;
  form: string;
  [key: string]: string;
}

interface IndexedLemma {
  readonly form: string;
  readonly pos: PartOfSpeech;
  readonly tokens: ReadonlySet<string>;
}

interface ScoreData {
  score: number;
  matched: Set<string>;
}

type DocumentIndex = Document<IndexDocument, false>;

/** Prefix search over the surface forms of one language's lemmas. */
export class FlexSearchLemmaSearchRepository implements LemmaSearchRepository {
  private readonly entries: Iterable<IndexEntry>;
  private readonly lemmaMap = new Map<string, IndexedLemma>();
  private document?: DocumentIndex;

  constructor({ entries }: FlexSearchLemmaSearchRepositoryOptions) {
    this.entries = entries;
  }

  get size(): number {
    return this.lemmaMap.size;
  }

  async initialise(): Promise<void> {
    if (this.document) {
      return;
    }

    const document = new FlexSearch.Document<IndexDocument, false>({
      tokenize: "forward",
      cache: true,
      document: {
        id: "id",
        index: ["form"],
      },
    });

    for (const [form, pos] of this.entries) {
      const id = `${form}|${pos}`;
      if (this.lemmaMap.has(id)) {
        continue;
      }
      const display = form.replace(/_/gu, " ");
      document.add({ id, form: display });
      this.lemmaMap.set(id, { form, pos, tokens: new Set(tokenize(display)) });
    }

    this.document = document;
  }

  async search(terms: string[], limit: number): Promise<LemmaMatch[]> {
    const document = this.document;
    if (!document) {
      throw new Error(
        "FlexSearchLemmaSearchRepository must be initialised before searching.",
      );
    }

    const scores = this.calculateScores(document, terms, limit * CANDIDATE_FACTOR);
    return this.rankResults(scores).slice(0, limit);
  }

  private calculateScores(
    document: DocumentIndex,
    terms: string[],
    candidates: number,
  ): Map<string, ScoreData> {
    const scores = new Map<string, ScoreData>();

    for (const term of terms) {
      const results = document.search(term, {
        enrich: true,
        limit: candidates,
        suggest: true,
      });

      for (const fieldResult of results) {
        for (const entry of fieldResult.result) {
          const id = resolveDocumentId(entry);
          if (!id || !this.lemmaMap.has(id)) {
            continue;
          }
          this.updateScore(scores, id, fieldResult.field, term);
        }
      }
    }

    return scores;
  }

  private updateScore(
    scores: Map<string, ScoreData>,
    id: string,
    field: string,
    term: string,
  ): void {
    const current = scores.get(id) ?? { score: 0, matched: new Set<string>() };
    current.score += FIELD_WEIGHTS[field] ?? 1;

    for (const token of this.lemmaMap.get(id)?.tokens ?? []) {
      if (token === term) {
        current.score += EXACT_TOKEN_MATCH_BONUS;
        current.matched.add(token);
      } else if (token.startsWith(term)) {
        current.score += PREFIX_TOKEN_MATCH_BONUS;
        current.matched.add(token);
      }
    }

    scores.set(id, current);
  }

  private rankResults(scores: Map<string, ScoreData>): LemmaMatch[] {
    const matches: LemmaMatch[] = [];
    for (const [id, value] of scores) {
      const lemma = this.lemmaMap.get(id);
      if (!lemma) {
        throw new Error(`Lemma missing for id ${id}`);
      }
      matches.push({
        form: lemma.form,
        pos: lemma.pos,
        score: Number.parseFloat(value.score.toFixed(2)),
        matchedTokens: Array.from(value.matched).sort((a, b) => a.localeCompare(b)),
      });
    }

    return matches.sort((a, b) => {
      if (b.score !== a.score) {
        return b.score - a.score;
      }
      return a.form.localeCompare(b.form) || a.pos.localeCompare(b.pos);
    });
  }
}

// Result entries are plain ids, or `{ id, doc }` objects when enriched.
function resolveDocumentId(entry: unknown): string | undefined {
  if (typeof entry === "string") {
    return entry;
  }
  if (!entry || typeof entry !== "object") {
    return undefined;
  }
  if ("id" in entry && typeof entry.id === "string") {
    return entry.id;
  }
  const doc: unknown = "doc" in entry ? entry.doc : undefined;
  if (doc && typeof doc === "object" && "id" in doc && typeof doc.id === "string") {
    return doc.id;
  }
  return undefined;
}
