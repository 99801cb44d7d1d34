import { describe, expect, it } from "vitest";
import { DecodingError } from "../../src/domain/errors";
import {
  decodeMorphoTag,
  decodeTag,
  morphoLayoutFor,
  type MorphoLayout,
} from "../../src/domain/services/morphology-decoder";

describe("decodeMorphoTag", () => {
  it("decodes a Latin noun tag, skipping not-applicable positions", () => {
    expect(decodeMorphoTag("n-s---cn3-", "latin")).toEqual({
      pos: { code: "n", label: "noun" },
      number: { code: "s", label: "singular" },
      gender: { code: "c", label: "masculine or feminine" },
      case: { code: "n", label: "nominative" },
      group: { code: "3", label: "3rd declension" },
    });
  });

  it("reads position 1 as person for verbs", () => {
    const features = decodeMorphoTag("v1spia--1-", "latin");
    expect(features.person).toEqual({ code: "1", label: "1st person" });
    expect(features.degree).toBeUndefined();
    expect(features.voice).toEqual({ code: "a", label: "active" });
    expect(features.group).toEqual({ code: "1", label: "1st conjugation" });
  });

  it("reads position 1 as degree for adjectives", () => {
    const features = decodeMorphoTag("aps---mn1-", "latin");
    expect(features.degree).toEqual({ code: "p", label: "positive" });
    expect(features.person).toBeUndefined();
    expect(features.group).toEqual({ code: "1", label: "1st/2nd declension" });
  });

  it("keeps pattern-valid codes without a label", () => {
    expect(decodeMorphoTag("v1spia--5x", "latin")).toMatchObject({
      group: { code: "5" },
      stem: { code: "x" },
    });
    expect(decodeMorphoTag("n-s---fn3i", "latin").stem).toEqual({
      code: "i",
      label: "i-stem",
    });
  });

  it("decodes Hebrew tags with its own number values", () => {
    expect(decodeMorphoTag("n-d---f---", "hebrew")).toEqual({
      pos: { code: "n", label: "noun" },
      number: { code: "d", label: "dual" },
      gender: { code: "f", label: "feminine" },
    });
  });

  it("rejects a tag of the wrong length", () => {
    expect(() => decodeMorphoTag("n-s", "latin")).toThrowError(
      `cannot decode "n-s": expected 10 non-blank characters`,
    );
  });

  it("rejects blanks inside the tag", () => {
    expect(() => decodeMorphoTag("n s---cn3-", "latin")).toThrowError(DecodingError);
  });

  it("rejects an unknown part of speech", () => {
    expect(() => decodeMorphoTag("x-s---cn3-", "latin")).toThrowError(
      "unknown part of speech 'x'",
    );
  });

  it("rejects an unknown code at a fixed position", () => {
    expect(() => decodeMorphoTag("n-z---cn3-", "latin")).toThrowError(
      "unknown number code 'z' at position 2",
    );
  });

  it("fails for languages without a layout", () => {
    expect(morphoLayoutFor("english")).toBeUndefined();
    expect(() => decodeMorphoTag("n-s---cn3-", "english")).toThrowError(
      "no tag layout for english",
    );
  });
});

describe("decodeTag", () => {
  it("works with any layout", () => {
    const layout: MorphoLayout = {
      length: 2,
      fields: [
        { feature: "pos", offset: 0, codes: { n: "noun" } },
        { feature: "number", offset: 1, codes: { s: "singular", p: "plural" } },
      ],
    };
    expect(decodeTag("np", layout)).toEqual({
      pos: { code: "n", label: "noun" },
      number: { code: "p", label: "plural" },
    });
  });
});
