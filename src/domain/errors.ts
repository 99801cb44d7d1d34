export type WordNetErrorKind =
  | "disambiguation"
  | "decoding"
  | "domain"
  | "store";

export abstract class WordNetError extends Error {
  abstract readonly kind: WordNetErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A lookup that must be unique matched several records. `candidates` holds the
 * keys a caller can use to re-query (parts of speech, morpho ids or codes).
 */
export class DisambiguationError extends WordNetError {
  readonly kind = "disambiguation";

  constructor(
    readonly subject: string,
    readonly candidates: readonly string[],
  ) {
    super(
      `cannot disambiguate "${subject}" between "${candidates.join(", ")}"`,
    );
  }
}

/** An identifier or tag string that does not fit its fixed layout. */
export class DecodingError extends WordNetError {
  readonly kind = "decoding";

  constructor(
    readonly input: string,
    reason: string,
  ) {
    super(`cannot decode "${input}": ${reason}`);
  }
}

/** Caller misuse, such as a relation type the part of speech does not define. */
export class DomainError extends WordNetError {
  readonly kind = "domain";
}

/** Malformed query or storage-engine fault, surfaced unchanged. */
export class StoreError extends WordNetError {
  readonly kind = "store";
}
