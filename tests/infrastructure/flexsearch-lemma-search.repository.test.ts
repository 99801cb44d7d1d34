import { beforeEach, describe, expect, it } from "vitest";
import type { IndexEntry } from "../../src/domain/wordnet";
import { FlexSearchLemmaSearchRepository } from "../../src/infrastructure/search/flexsearch-lemma-search.repository";

const ENTRIES: IndexEntry[] = [
  ["dog", "n", ""],
  ["doghouse", "n", ""],
  ["domestic_dog", "n", ""],
  ["hot", "a", ""],
  ["dog", "n", ""],
];

describe("FlexSearchLemmaSearchRepository", () => {
  let repository: FlexSearchLemmaSearchRepository;

  beforeEach(async () => {
    repository = new FlexSearchLemmaSearchRepository({ entries: ENTRIES });
    await repository.initialise();
  });

  it("indexes each (form, pos) once", () => {
    expect(repository.size).toBe(4);
  });

  it("ranks exact word matches above prefix matches", async () => {
    const matches = await repository.search(["dog"], 10);
    expect(matches.map((match) => match.form)).toEqual(["dog", "domestic_dog", "doghouse"]);
    expect(matches[0]).toEqual({ form: "dog", pos: "n", score: 8, matchedTokens: ["dog"] });
    expect(matches[2]?.score).toBe(5);
  });

  it("matches words inside multiword forms", async () => {
    const matches = await repository.search(["domestic"], 10);
    expect(matches).toEqual([
      { form: "domestic_dog", pos: "n", score: 8, matchedTokens: ["domestic"] },
    ]);
  });

  it("honours the limit", async () => {
    const matches = await repository.search(["dog"], 1);
    expect(matches.map((match) => match.form)).toEqual(["dog"]);
  });

  it("returns nothing for unknown terms", async () => {
    expect(await repository.search(["zebra"], 10)).toEqual([]);
  });

  it("refuses to search before initialisation", async () => {
    const fresh = new FlexSearchLemmaSearchRepository({ entries: ENTRIES });
    await expect(fresh.search(["dog"], 5)).rejects.toThrowError(
      "FlexSearchLemmaSearchRepository must be initialised before searching.",
    );
  });
});
