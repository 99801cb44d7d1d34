import { describe, expect, it } from "vitest";
import { DecodingError } from "../../src/domain/errors";
import {
  parseSynsetId,
  resolveOriginLanguage,
} from "../../src/domain/services/identifier-resolver";

describe("parseSynsetId", () => {
  it("reads reference-language ids with a numeric offset", () => {
    expect(parseSynsetId("n#02084071")).toEqual({
      id: "n#02084071",
      pos: "n",
      offset: "02084071",
      origin: "english",
    });
  });

  it("maps the leading marker of minted offsets to the origin language", () => {
    const parsed = parseSynsetId("v#N1000001");
    expect(parsed.pos).toBe("v");
    expect(parsed.marker).toBe("N");
    expect(parsed.origin).toBe("italian");
  });

  it.each([
    ["n#W0000001", "italian"],
    ["n#Y0000001", "italian"],
    ["a#S0000001", "spanish"],
    ["r#H0000001", "hebrew"],
    ["n#L0000001", "latin"],
    ["n#R0000001", "romanian"],
    ["n#P0000001", "english"],
  ])("resolves %s to %s", (id, language) => {
    expect(resolveOriginLanguage(id)).toBe(language);
  });

  it("gives the same answer on repeated calls", () => {
    expect(resolveOriginLanguage("n#S0000042")).toBe(resolveOriginLanguage("n#S0000042"));
  });

  it("rejects an unknown part of speech", () => {
    expect(() => parseSynsetId("x#02084071")).toThrowError(
      `cannot decode "x#02084071": unknown part of speech 'x'`,
    );
  });

  it("rejects a missing separator", () => {
    expect(() => parseSynsetId("n02084071")).toThrowError(DecodingError);
  });

  it("rejects an unknown language marker", () => {
    expect(() => parseSynsetId("n#Q0000001")).toThrowError(
      `cannot decode "n#Q0000001": unknown language marker 'Q'`,
    );
  });

  it("rejects ids too short to carry an offset", () => {
    expect(() => parseSynsetId("n#")).toThrowError("synset id is too short");
  });
});
