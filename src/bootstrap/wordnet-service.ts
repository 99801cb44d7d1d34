import Database from "better-sqlite3";
import type { LemmaSearchRepository } from "../application/ports/lemma-search-repository";
import type { WordNetProvider } from "../application/ports/wordnet-provider";
import { ExploreWordNetUseCase } from "../application/use-cases/explore-wordnet.usecase";
import type { Language } from "../domain/constants/languages";
import type { StoreAccessor } from "../domain/ports/store-accessor";
import { SearchTermParser } from "../domain/services/search-term-parser";
import { WordNet } from "../domain/wordnet";
import { ConfigManager, type StoreConfig } from "../infrastructure/config/config-manager";
import { ErrorHandler } from "../infrastructure/error/error-handler";
import { ConsoleLogger, logLevelFrom, type ILogger } from "../infrastructure/logging/logger";
import { FlexSearchLemmaSearchRepository } from "../infrastructure/search/flexsearch-lemma-search.repository";
import { SqliteStoreAccessor } from "../infrastructure/store/sqlite-store.accessor";

interface WordNetServiceOptions {
  readonly store: StoreAccessor;
  readonly logger: ILogger;
  readonly cacheSize?: number;
}

/** One WordNet and one lemma index per language, created on first request. */
export class WordNetService implements WordNetProvider {
  private readonly store: StoreAccessor;
  private readonly logger: ILogger;
  private readonly cacheSize: number | undefined;
  private readonly wordnets = new Map<Language, WordNet>();
  private readonly searches = new Map<Language, Promise<LemmaSearchRepository>>();

  constructor({ store, logger, cacheSize }: WordNetServiceOptions) {
    this.store = store;
    this.logger = logger;
    this.cacheSize = cacheSize;
  }

  wordnet(language: Language): WordNet {
    let wordnet = this.wordnets.get(language);
    if (!wordnet) {
      wordnet = new WordNet(language, {
        store: this.store,
        logger: this.logger,
        cacheSize: this.cacheSize,
      });
      this.wordnets.set(language, wordnet);
    }
    return wordnet;
  }

  lemmaSearch(language: Language): Promise<LemmaSearchRepository> {
    let search = this.searches.get(language);
    if (!search) {
      search = this.buildLemmaSearch(language);
      this.searches.set(language, search);
      // a failed build is retried on the next request
      void search.catch(() => this.searches.delete(language));
    }
    return search;
  }

  private async buildLemmaSearch(language: Language): Promise<LemmaSearchRepository> {
    const repository = new FlexSearchLemmaSearchRepository({
      entries: this.wordnet(language).index(),
    });
    await repository.initialise();
    this.logger.debug("Lemma search index built", { language, lemmas: repository.size });
    return repository;
  }
}

export function createStore(config: StoreConfig, logger: ILogger): SqliteStoreAccessor {
  if (config.database) {
    const db = new Database(config.database, { readonly: true, fileMustExist: true });
    return SqliteStoreAccessor.fromDatabase(db, logger);
  }
  return SqliteStoreAccessor.fromDirectory(config.dataDir, logger);
}

export function buildExploreWordNetUseCase(
  config: ConfigManager,
  logger: ILogger,
  store: StoreAccessor = createStore(config.getStoreConfig(), logger),
): ExploreWordNetUseCase {
  const service = new WordNetService({
    store,
    logger,
    cacheSize: config.getCacheConfig().maxEntries,
  });
  return new ExploreWordNetUseCase({
    provider: service,
    parser: new SearchTermParser(),
    errorHandler: new ErrorHandler(logger),
    defaultLanguage: config.getDefaultsConfig().language,
    resultLimit: config.getServerConfig().resultLimit,
  });
}

export function createLogger(config: ConfigManager): ConsoleLogger {
  return new ConsoleLogger(logLevelFrom(config.getLoggingConfig().level));
}
