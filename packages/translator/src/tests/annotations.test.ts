import { describe, expect, it } from "vitest";
import {
  applyAnnotations,
  checkGermanGovernance,
  checkGermanNoun,
  normalizeGermanCase,
  selectPastForms,
} from "../annotations.js";
import { EMPTY_ANNOTATIONS } from "../types.js";

describe("German noun", () => {
  it("normalizes article, gender and lemma", () => {
    expect(checkGermanNoun({ article: "Das", gender: "n", lemma: " Haus " })).toEqual({
      article: "das",
      gender: "n",
      lemma: "Haus",
    });
  });

  it("drops an article that disagrees with the gender", () => {
    expect(checkGermanNoun({ article: "der", gender: "f", lemma: "Pappe" })).toBeNull();
  });

  it("drops an unknown article", () => {
    expect(checkGermanNoun({ article: "dem", gender: "m", lemma: "Vater" })).toBeNull();
  });
});

describe("German governance", () => {
  it.each([
    ["Dativ", "Dat"],
    ["akk.", "Akk"],
    ["Genitive", "Gen"],
    ["D", "Dat"],
  ] as const)("reads %s as %s", (raw, expected) => {
    expect(normalizeGermanCase(raw)).toBe(expected);
  });

  it("rejects a case that does not take a preposition here", () => {
    expect(normalizeGermanCase("Nominativ")).toBeNull();
    expect(checkGermanGovernance({ verb: "warten", preposition: "auf", case: "Nominativ" })).toBeNull();
  });

  it("keeps a well-formed entry", () => {
    expect(checkGermanGovernance({ verb: "teilnehmen", preposition: "an", case: "Dativ" })).toEqual({
      verb: "teilnehmen",
      preposition: "an",
      case: "Dat",
    });
  });
});

describe("selectPastForms", () => {
  it("keeps only the involved languages", () => {
    const raw = { ruPast: "шёл", enPastSimple: "went", enPastParticiple: "gone", hyPast: "գնաց" };
    expect(selectPastForms(raw, ["ru", "hy"])).toEqual({ ru: { past: "шёл" }, hy: { past: "գնաց" } });
  });

  it("orders languages for display whatever the source", () => {
    const raw = { ruPast: "шёл", enPastSimple: "went", enPastParticiple: "gone", dePerfekt: "ist gegangen", dePraeteritum: "ging", hyPast: "գնաց" };
    expect(Object.keys(selectPastForms(raw, ["de", "ru", "en", "hy"]))).toEqual(["ru", "en", "de", "hy"]);
  });

  it("skips a language with an incomplete set", () => {
    expect(selectPastForms({ dePerfekt: "ist gegangen" }, ["de"])).toEqual({});
  });
});

describe("applyAnnotations", () => {
  it("replaces verb translations with infinitives", () => {
    const out = applyAnnotations(
      { ...EMPTY_ANNOTATIONS, isVerb: true, infinitives: { en: "to go", ru: "идти" } },
      "de",
      ["en"],
      { en: "went" }
    );
    expect(out.translations).toEqual({ en: "to go" });
    expect(out.annotations).toEqual({ isVerb: true });
  });

  it("ignores German noun data when German is not involved", () => {
    const out = applyAnnotations(
      { ...EMPTY_ANNOTATIONS, germanNoun: { article: "das", gender: "n", lemma: "Haus" } },
      "ru",
      ["en"],
      { en: "house" }
    );
    expect(out.annotations).toEqual({ isVerb: false });
  });

  it("ignores governance for a noun", () => {
    const out = applyAnnotations(
      { ...EMPTY_ANNOTATIONS, germanGovernance: { verb: "warten", preposition: "auf", case: "Akk" } },
      "de",
      ["en"],
      { en: "waiting" }
    );
    expect(out.annotations.germanGovernance).toBeUndefined();
  });
});
