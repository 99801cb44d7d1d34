import {
  isPartOfSpeech,
  REFERENCE_LANGUAGE,
  type Language,
  type PartOfSpeech,
} from "../constants/languages";
import { DecodingError } from "../errors";

const SEPARATOR = "#";

// Synsets minted outside the reference WordNet replace the first offset digit
// with one of these markers.
const ORIGIN_MARKERS: Readonly<Record<string, Language>> = {
  N: "italian",
  W: "italian",
  Y: "italian",
  S: "spanish",
  H: "hebrew",
  L: "latin",
  R: "romanian",
  // P-marked synsets are stored in the reference language tables.
  P: REFERENCE_LANGUAGE,
};

export interface SynsetIdentifier {
  readonly id: string;
  readonly pos: PartOfSpeech;
  readonly offset: string;
  /** Undefined for reference-language ids, whose offset starts with a digit. */
  readonly marker?: string;
  readonly origin: Language;
}

export function parseSynsetId(id: string): SynsetIdentifier {
  if (id.length < 3) {
    throw new DecodingError(id, "synset id is too short");
  }

  const pos = id.charAt(0);
  if (!isPartOfSpeech(pos)) {
    throw new DecodingError(id, `unknown part of speech '${pos}'`);
  }

  if (id.charAt(1) !== SEPARATOR) {
    throw new DecodingError(id, `expected '${SEPARATOR}' after the part of speech`);
  }

  const offset = id.slice(2);
  const lead = offset.charAt(0);
  if (/\d/u.test(lead)) {
    return { id, pos, offset, origin: REFERENCE_LANGUAGE };
  }

  const origin = ORIGIN_MARKERS[lead];
  if (!origin) {
    throw new DecodingError(id, `unknown language marker '${lead}'`);
  }
  return { id, pos, offset, marker: lead, origin };
}

/** The language whose store holds the authoritative record of a synset. */
export function resolveOriginLanguage(id: string): Language {
  return parseSynsetId(id).origin;
}
