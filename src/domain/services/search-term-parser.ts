import { DomainError } from "../errors";

/** Punctuation, symbols and whitespace, including the `_` used inside forms. */
export const WORD_BOUNDARY = /[\p{P}\p{S}\s]+/u;

const MAX_TERMS = 8;

export class SearchTermParser {
  parse(raw: string): string[] {
    if (!raw || raw.trim().length === 0) {
      throw new DomainError("Search input must not be empty.");
    }

    const terms = raw.split(/[\n,;]/u).flatMap((segment) => tokenize(segment));

    if (terms.length === 0) {
      throw new DomainError("Search input must contain at least one word.");
    }

    const unique = Array.from(new Set(terms));
    if (unique.length > MAX_TERMS) {
      throw new DomainError(`Search input must have at most ${MAX_TERMS} distinct words.`);
    }

    return unique;
  }
}

export function tokenize(value: string): string[] {
  return value
    .split(WORD_BOUNDARY)
    .map((token) => token.trim().toLowerCase())
    .filter(Boolean);
}
