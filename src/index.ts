export {
  ANY_POS,
  COMMON_SPACE,
  LANGUAGES,
  PARTS_OF_SPEECH,
  REFERENCE_LANGUAGE,
  isLanguage,
  isPartOfSpeech,
  usesMorphologyModel,
  type Language,
  type PartOfSpeech,
  type PosQuery,
  type StoreSpace,
} from "./domain/constants/languages";
export {
  relationTypesFor,
  requireRelationType,
  type RelationType,
} from "./domain/constants/relation-types";
export { Lemma } from "./domain/entities/lemma";
export { Morpho, type FormPair } from "./domain/entities/morpho";
export { Relation, type RelationStatus } from "./domain/entities/relation";
export { Semfield } from "./domain/entities/semfield";
export { Synset } from "./domain/entities/synset";
export {
  DecodingError,
  DisambiguationError,
  DomainError,
  StoreError,
  WordNetError,
  type WordNetErrorKind,
} from "./domain/errors";
export type {
  ColumnMatch,
  StoreAccessor,
  StoreQuery,
  StoreRow,
  TableName,
} from "./domain/ports/store-accessor";
export {
  parseSynsetId,
  resolveOriginLanguage,
  type SynsetIdentifier,
} from "./domain/services/identifier-resolver";
export {
  decodeMorphoTag,
  type DecodedFeature,
  type MorphoFeature,
  type MorphoFeatures,
} from "./domain/services/morphology-decoder";
export { type LemmaFilter } from "./domain/services/entity-registry";
export {
  WordNet,
  type FindOptions,
  type IndexEntry,
  type MatchMode,
  type RelationQuery,
  type WordNetOptions,
} from "./domain/wordnet";
export { ConsoleLogger, LogLevel, SilentLogger, type ILogger } from "./infrastructure/logging/logger";
export { SqliteStoreAccessor } from "./infrastructure/store/sqlite-store.accessor";
