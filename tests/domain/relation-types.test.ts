import { describe, expect, it } from "vitest";
import {
  COMPOSED_OF,
  DERIVED_FROM,
  HYPERNYM,
  isLexicalRelationType,
  isRelationTypeDefined,
  PART_OF,
  relationTypesFor,
  requireRelationType,
} from "../../src/domain/constants/relation-types";
import { DomainError } from "../../src/domain/errors";

describe("relation types", () => {
  it("defines the hypernym relation for every part of speech", () => {
    for (const pos of ["n", "v", "a", "r"] as const) {
      expect(isRelationTypeDefined(pos, HYPERNYM)).toBe(true);
    }
  });

  it("keeps meronymy to nouns", () => {
    expect(requireRelationType("n", PART_OF).name).toBe("part-of");
    expect(isRelationTypeDefined("v", PART_OF)).toBe(false);
  });

  it("names the backslash relation by part of speech", () => {
    expect(relationTypesFor("n").get(DERIVED_FROM)?.name).toBe("derived-from");
    expect(relationTypesFor("a").get(DERIVED_FROM)?.name).toBe("pertains-to");
  });

  it("throws a DomainError for an undefined code", () => {
    expect(() => requireRelationType("v", PART_OF)).toThrowError(DomainError);
    expect(() => requireRelationType("v", PART_OF)).toThrowError(
      "no relation type '#p' for 'v'",
    );
  });

  it("flags lexical relation types", () => {
    expect(isLexicalRelationType("!")).toBe(true);
    expect(isLexicalRelationType(COMPOSED_OF)).toBe(true);
    expect(isLexicalRelationType(HYPERNYM)).toBe(false);
    expect(isLexicalRelationType("?")).toBe(false);
  });
});
