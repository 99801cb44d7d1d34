import {
  ANY_POS,
  type Language,
  type PartOfSpeech,
  type PosQuery,
} from "../../domain/constants/languages";
import type { Lemma } from "../../domain/entities/lemma";
import type { Morpho } from "../../domain/entities/morpho";
import type { Relation } from "../../domain/entities/relation";
import type { Semfield } from "../../domain/entities/semfield";
import type { Synset } from "../../domain/entities/synset";
import type { MorphoFeature } from "../../domain/services/morphology-decoder";
import type { SearchTermParser } from "../../domain/services/search-term-parser";
import type { ErrorHandler } from "../../infrastructure/error/error-handler";
import { Result } from "../../infrastructure/result/result";
import type { LemmaMatch } from "../ports/lemma-search-repository";
import type { WordNetProvider } from "../ports/wordnet-provider";

interface ExploreWordNetUseCaseDependencies {
  readonly provider: WordNetProvider;
  readonly parser: SearchTermParser;
  readonly errorHandler: ErrorHandler;
  readonly defaultLanguage: Language;
  readonly resultLimit: number;
}

interface LanguageRequest {
  readonly language?: Language;
}

export interface LookupLemmaRequest extends LanguageRequest {
  readonly form: string;
  readonly pos?: PosQuery;
  readonly id?: string;
  readonly tag?: string;
}

export interface SynsetRequest extends LanguageRequest {
  readonly id: string;
}

export interface ClosureRequest extends SynsetRequest {
  readonly type: string;
  readonly depth?: number;
  readonly limit?: number;
}

export interface SemfieldRequest extends LanguageRequest {
  readonly english: string;
  readonly code?: string;
}

export interface SearchLemmasRequest extends LanguageRequest {
  readonly input: string;
  readonly limit?: number;
}

export interface SynsetSummary {
  readonly id: string;
  readonly pos: PartOfSpeech;
  readonly origin: Language;
  readonly lemmas: string[];
  readonly gloss: string;
}

export interface RelationView {
  readonly type: string;
  readonly name: string;
  readonly target: string;
  readonly sourceLemma?: string;
  readonly targetLemma?: string;
  readonly status: string;
}

export interface SynsetView extends SynsetSummary {
  readonly language: Language;
  readonly semfields: string[];
  readonly relations: RelationView[];
}

export interface MorphoView {
  readonly id: string;
  readonly tag: string;
  readonly features: Partial<Record<MorphoFeature, string>>;
  readonly dictionaryForm: string[];
}

export interface LemmaView {
  readonly form: string;
  readonly pos: PartOfSpeech;
  readonly language: Language;
  readonly synsets: SynsetSummary[];
  readonly synonyms: string[];
  readonly antonyms: string[];
  readonly derivates: string[];
  readonly relatives: string[];
  readonly morpho?: MorphoView;
}

export interface ClosureView {
  readonly origin: SynsetSummary;
  readonly type: string;
  readonly synsets: SynsetSummary[];
  /** True when more synsets were reachable than returned. */
  readonly truncated: boolean;
}

export interface HierarchyView {
  readonly synset: SynsetSummary;
  readonly maxDepth: number;
  readonly minDepth: number;
  readonly roots: SynsetSummary[];
  readonly paths: string[][];
}

export interface SemfieldView {
  readonly english: string;
  readonly code: string;
  readonly label: string;
  readonly hypers: string[];
  readonly hypons: string[];
  readonly normal?: string;
  readonly synsets: SynsetSummary[];
}

export interface SearchLemmasView {
  readonly terms: string[];
  readonly matches: LemmaMatch[];
  readonly guidance: string;
}

/**
 * Read-only exploration of the graph, shaped into plain views. Every call
 * reports failure through its Result instead of throwing; absence is a
 * successful `undefined`.
 */
export class ExploreWordNetUseCase {
  private readonly provider: WordNetProvider;
  private readonly parser: SearchTermParser;
  private readonly errorHandler: ErrorHandler;
  private readonly defaultLanguage: Language;
  private readonly resultLimit: number;

  constructor({
    provider,
    parser,
    errorHandler,
    defaultLanguage,
    resultLimit,
  }: ExploreWordNetUseCaseDependencies) {
    this.provider = provider;
    this.parser = parser;
    this.errorHandler = errorHandler;
    this.defaultLanguage = defaultLanguage;
    this.resultLimit = resultLimit;
  }

  lookupLemma(request: LookupLemmaRequest): Result<LemmaView | undefined> {
    const language = this.languageOf(request);
    return this.errorHandler.execute(
      () => {
        const lemma = this.provider
          .wordnet(language)
          .lemma(request.form, request.pos ?? ANY_POS, { id: request.id, tag: request.tag });
        return lemma ? this.lemmaView(lemma) : undefined;
      },
      "lookup lemma",
      { language, form: request.form, pos: request.pos },
    );
  }

  getSynset(request: SynsetRequest): Result<SynsetView | undefined> {
    const language = this.languageOf(request);
    return this.errorHandler.execute(
      () => {
        const synset = this.provider.wordnet(language).synset(request.id);
        return synset ? this.synsetView(synset) : undefined;
      },
      "get synset",
      { language, id: request.id },
    );
  }

  closure(request: ClosureRequest): Result<ClosureView | undefined> {
    const language = this.languageOf(request);
    const limit = request.limit ?? this.resultLimit;
    return this.errorHandler.execute(
      () => {
        const synset = this.provider.wordnet(language).synset(request.id);
        if (!synset) {
          return undefined;
        }

        const reached: SynsetSummary[] = [];
        let truncated = false;
        for (const next of synset.closure(request.type, request.depth)) {
          if (reached.length === limit) {
            truncated = true;
            break;
          }
          reached.push(summarize(next));
        }
        return { origin: summarize(synset), type: request.type, synsets: reached, truncated };
      },
      "compute closure",
      { language, id: request.id, type: request.type },
    );
  }

  hierarchy(request: SynsetRequest): Result<HierarchyView | undefined> {
    const language = this.languageOf(request);
    return this.errorHandler.execute(
      () => {
        const synset = this.provider.wordnet(language).synset(request.id);
        if (!synset) {
          return undefined;
        }
        return {
          synset: summarize(synset),
          maxDepth: synset.maxDepth(),
          minDepth: synset.minDepth(),
          roots: synset.roots().map(summarize),
          paths: synset.pathsToRoot().map((path) => path.map((node) => node.id)),
        };
      },
      "compute hierarchy",
      { language, id: request.id },
    );
  }

  getSemfield(request: SemfieldRequest): Result<SemfieldView | undefined> {
    const language = this.languageOf(request);
    return this.errorHandler.execute(
      () => {
        const field = this.provider.wordnet(language).semfield(request.english, request.code);
        return field ? this.semfieldView(field) : undefined;
      },
      "get semfield",
      { language, english: request.english, code: request.code },
    );
  }

  async searchLemmas(request: SearchLemmasRequest): Promise<Result<SearchLemmasView>> {
    const language = this.languageOf(request);
    try {
      const terms = this.parser.parse(request.input);
      const repository = await this.provider.lemmaSearch(language);
      const matches = await repository.search(terms, request.limit ?? this.resultLimit);
      return Result.success({ terms, matches, guidance: buildGuidance(matches, terms) });
    } catch (error) {
      return this.errorHandler.handleError(error, "search lemmas", {
        language,
        input: request.input,
      });
    }
  }

  private languageOf(request: LanguageRequest): Language {
    return request.language ?? this.defaultLanguage;
  }

  private lemmaView(lemma: Lemma): LemmaView {
    const forms = (lemmas: readonly Lemma[]) => lemmas.map((entry) => entry.toString());
    const morpho = lemma.morpho;
    return {
      form: lemma.toString(),
      pos: lemma.pos,
      language: lemma.language,
      synsets: lemma.synsets.map(summarize),
      synonyms: forms(lemma.synonyms),
      antonyms: forms(lemma.antonyms),
      derivates: forms(lemma.derivates),
      relatives: forms(lemma.relatives),
      ...(morpho ? { morpho: morphoView(morpho) } : {}),
    };
  }

  private synsetView(synset: Synset): SynsetView {
    return {
      ...summarize(synset),
      language: synset.language,
      semfields: synset.semfields.map((field) => field.toString()),
      relations: synset.relations.map(relationView),
    };
  }

  private semfieldView(field: Semfield): SemfieldView {
    const names = (fields: readonly Semfield[]) => fields.map((entry) => entry.toString());
    const normal = field.normal;
    return {
      english: field.english,
      code: field.code,
      label: field.toString(),
      hypers: names(field.hypers),
      hypons: names(field.hypons),
      ...(normal ? { normal: normal.toString() } : {}),
      synsets: field.synsets.slice(0, this.resultLimit).map(summarize),
    };
  }
}

function summarize(synset: Synset): SynsetSummary {
  return {
    id: synset.id,
    pos: synset.pos,
    origin: synset.origin,
    lemmas: synset.lemmas.map((lemma) => lemma.toString()),
    gloss: synset.gloss,
  };
}

function relationView(relation: Relation): RelationView {
  return {
    type: relation.type,
    name: relation.typeName,
    target: relation.idTarget,
    ...(relation.wSource ? { sourceLemma: relation.wSource } : {}),
    ...(relation.wTarget ? { targetLemma: relation.wTarget } : {}),
    status: relation.status,
  };
}

function morphoView(morpho: Morpho): MorphoView {
  return {
    id: morpho.id,
    tag: morpho.tag,
    features: morpho.describe(),
    dictionaryForm: morpho.dictionaryForm(),
  };
}

function buildGuidance(matches: LemmaMatch[], terms: string[]): string {
  if (matches.length === 0) {
    return `No lemmas matched: ${terms.join(", ")}. Try a shorter prefix or another language.`;
  }
  if (matches.length === 1) {
    const [match] = matches;
    return match ? `Single lemma found: ${match.form} (${match.pos}).` : "";
  }
  return "";
}
