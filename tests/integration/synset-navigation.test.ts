import { beforeEach, describe, expect, it } from "vitest";
import { DecodingError, DomainError } from "../../src/domain/errors";
import type { Synset } from "../../src/domain/entities/synset";
import type { WordNet } from "../../src/domain/wordnet";
import { createFixtureWordNet, RecordingLogger } from "../helpers/fixture-store";

const DOG = "n#02084071";
const ENTITY = "n#00001740";
const LOOP_A = "n#09000001";

const ids = (synsets: Iterable<Synset>) => Array.from(synsets, (synset) => synset.id);

function requireSynset(wordnet: WordNet, id: string): Synset {
  const synset = wordnet.synset(id);
  if (!synset) {
    throw new Error(`fixture synset ${id} missing`);
  }
  return synset;
}

describe("Synset navigation", () => {
  let english: WordNet;

  beforeEach(() => {
    english = createFixtureWordNet("english");
  });

  it("reads the synset record and its lemmas", () => {
    const dog = requireSynset(english, DOG);
    expect(dog.pos).toBe("n");
    expect(dog.offset).toBe("02084071");
    expect(dog.origin).toBe("english");
    expect(dog.gloss).toBe("a member of the genus Canis");
    expect(dog.toString()).toBe("a member of the genus Canis");
    expect(dog.lemmas.map((lemma) => lemma.form)).toEqual([
      "dog",
      "domestic_dog",
      "canis_familiaris",
    ]);
  });

  it("returns undefined for an unknown id and fails on a malformed one", () => {
    expect(english.synset("n#99999999")).toBeUndefined();
    expect(() => english.synset("q#1")).toThrowError(DecodingError);
  });

  it("shares one instance per id", () => {
    expect(english.synset(DOG)).toBe(english.synset(DOG));
  });

  it("collects relations from the shared and language tables", () => {
    const dog = requireSynset(english, DOG);
    expect(dog.relations.map((relation) => relation.toString())).toEqual([
      "n#02084071 -@-> n#02083346",
      "n#02084071 -@-> n#01317541",
      "n#02084071 -#m-> n#07999999",
      "n#02084071(dog) -/-> n#03204955(doghouse)",
      "n#02084071(dog) --c-> n#03204955(doghouse)",
      "n#02084071 -@-> n#02083346",
    ]);
    expect(dog.getRelations("@")).toHaveLength(3);
  });

  it("deduplicates neighbours and skips dangling targets", () => {
    const dog = requireSynset(english, DOG);
    expect(ids(dog.hypernyms)).toEqual(["n#02083346", "n#01317541"]);
    expect(dog.getRelations("#m")).toHaveLength(1);
    expect(dog.neighbours("#m")).toEqual([]);
  });

  it("finds relations towards a given synset", () => {
    const dog = requireSynset(english, DOG);
    expect(dog.relationTo("n#03204955").map((relation) => relation.type)).toEqual(["/", "-c"]);
  });

  it("exposes relation metadata", () => {
    const domestic = requireSynset(english, "n#01317541");
    const [relation] = domestic.getRelations("@");
    expect(relation?.typeName).toBe("hypernym");
    expect(relation?.status).toBe("new");
    expect(relation?.isLexical).toBe(false);
    expect(relation?.source?.id).toBe("n#01317541");
    expect(relation?.target?.id).toBe("n#00004475");
  });

  it("rejects relation types the part of speech does not define", () => {
    const run = requireSynset(english, "v#01926311");
    expect(() => run.getRelations("#p")).toThrowError(DomainError);
    expect(() => run.closure("#p")).toThrowError("no relation type '#p' for 'v'");
  });

  describe("closure", () => {
    it("walks hypernyms breadth first", () => {
      const dog = requireSynset(english, DOG);
      expect(ids(dog.closure("@"))).toEqual([
        "n#02083346",
        "n#01317541",
        "n#00015388",
        "n#00004475",
        "n#00004258",
        "n#00019128",
        "n#00001740",
      ]);
    });

    it("walks hyponyms breadth first", () => {
      const entity = requireSynset(english, ENTITY);
      expect(ids(entity.closure("~"))).toEqual([
        "n#00019128",
        "n#00004258",
        "n#00004475",
        "n#00015388",
        "n#01317541",
        "n#02083346",
        "n#02084071",
      ]);
    });

    it("respects a depth limit", () => {
      const dog = requireSynset(english, DOG);
      expect(ids(dog.closure("@", 2))).toEqual([
        "n#02083346",
        "n#01317541",
        "n#00015388",
        "n#00004475",
      ]);
    });

    it("terminates on cycles", () => {
      const loop = requireSynset(english, LOOP_A);
      expect(ids(loop.closure("@"))).toEqual(["n#09000002"]);
    });
  });

  describe("hierarchy", () => {
    it("computes maximum and minimum depth", () => {
      const dog = requireSynset(english, DOG);
      expect(dog.maxDepth()).toBe(6);
      expect(dog.minDepth()).toBe(2);
      expect(requireSynset(english, ENTITY).maxDepth()).toBe(0);
    });

    it("scores an ancestor reached a second time as 0", () => {
      // dog reaches organism through canine first, so the domestic_animal
      // branch stops there; on its own domestic_animal is four levels deep.
      const logger = new RecordingLogger();
      const wordnet = createFixtureWordNet("english", logger);
      expect(requireSynset(wordnet, "n#01317541").minDepth()).toBe(4);
      expect(requireSynset(wordnet, DOG).minDepth()).toBe(2);
      const revisit = logger.entries.find((entry) => entry.context?.synset === DOG);
      expect(revisit?.context).toEqual({
        synset: DOG,
        revisited: "n#00004475",
        path: [DOG, "n#02083346", "n#00015388", "n#00004475", "n#00004258", "n#00019128", ENTITY, "n#01317541"],
      });
    });

    it("finds the roots and every path to them", () => {
      const dog = requireSynset(english, DOG);
      expect(ids(dog.roots())).toEqual([ENTITY]);
      expect(dog.pathsToRoot().map(ids)).toEqual([
        [ENTITY, "n#00019128", "n#00004258", "n#00004475", "n#00015388", "n#02083346", DOG],
        [ENTITY, "n#00019128", "n#00004258", "n#00004475", "n#01317541", DOG],
      ]);
    });

    it("treats a synset without hypernyms as its own root", () => {
      const abstraction = requireSynset(english, "n#00002137");
      expect(abstraction.maxDepth()).toBe(0);
      expect(abstraction.minDepth()).toBe(0);
      expect(ids(abstraction.roots())).toEqual(["n#00002137"]);
      expect(abstraction.pathsToRoot().map(ids)).toEqual([["n#00002137"]]);
    });

    it("handles hypernym cycles without failing", () => {
      const logger = new RecordingLogger();
      const wordnet = createFixtureWordNet("english", logger);
      const loop = requireSynset(wordnet, LOOP_A);

      expect(loop.maxDepth()).toBe(3);
      expect(loop.roots()).toEqual([]);
      expect(loop.pathsToRoot()).toEqual([]);
      expect(logger.messages("debug")).toContain("Hypernym walk revisited a synset");
    });
  });
});

describe("Synsets across languages", () => {
  it("reads lemmas from the view language", () => {
    const italian = createFixtureWordNet("italian");
    const dog = requireSynset(italian, DOG);
    expect(dog.origin).toBe("english");
    expect(dog.gloss).toBe("a member of the genus Canis");
    expect(dog.lemmas.map((lemma) => lemma.form)).toEqual(["cane"]);
  });

  it("falls back to the index when the language has a lexical gap", () => {
    const italian = createFixtureWordNet("italian");
    const canine = requireSynset(italian, "n#02083346");
    expect(canine.lemmas.map((lemma) => lemma.form)).toEqual(["canide"]);
  });

  it("resolves synsets minted by another language from their origin store", () => {
    const italian = createFixtureWordNet("italian");
    const puppy = requireSynset(italian, "n#N1000001");
    expect(puppy.origin).toBe("italian");
    expect(puppy.gloss).toBe("cane di piccola taglia");
    expect(ids(puppy.hypernyms)).toEqual([DOG]);
    expect(puppy.maxDepth()).toBe(7);

    const english = createFixtureWordNet("english");
    const viewed = requireSynset(english, "n#N1000001");
    expect(viewed.gloss).toBe("cane di piccola taglia");
    expect(viewed.lemmas).toEqual([]);
    expect(viewed.equals(puppy)).toBe(true);
    expect(viewed.origin).toBe(puppy.origin);
  });
});
