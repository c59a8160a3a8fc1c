import { describe, expect, it } from "vitest";
import type { TranslationResult } from "@tetraglot/shared-types";
import {
  INVALID_PAIR_MESSAGE,
  TOO_LONG_MESSAGE,
  formatHistory,
  formatPastForms,
  formatTranslationReply,
  pairSavedMessage,
  rejectionMessage,
} from "../messages.js";

describe("rejectionMessage", () => {
  it("stays silent on empty input", () => {
    expect(rejectionMessage("empty")).toBeNull();
  });

  it("explains the other rejections in four languages", () => {
    expect(rejectionMessage("too_long")).toBe(TOO_LONG_MESSAGE);
    expect(rejectionMessage("invalid_pair_format")).toBe(INVALID_PAIR_MESSAGE);
    expect(TOO_LONG_MESSAGE.split("\n")).toHaveLength(4);
    expect(TOO_LONG_MESSAGE.split("\n")[1]).toBe("English: Text is too long. Please send up to 500 characters.");
  });
});

describe("formatTranslationReply", () => {
  const result: TranslationResult = {
    mode: "auto_all",
    source: "de",
    targets: ["ru", "en", "hy"],
    translations: { hy: "ստվարաթուղթ", ru: "картон", en: "cardboard" },
    annotations: { isVerb: false, germanNoun: { article: "die", gender: "f", lemma: "Pappe" } },
  };

  it("lists translations in display order after the source line", () => {
    expect(formatTranslationReply(result, { showSource: true })).toBe(
      [
        "Исходный язык: Deutsch",
        "- Русский: картон",
        "- English: cardboard",
        "- Հայերեն: ստվարաթուղթ",
        "Артикль/род (de): die Pappe (f.)",
      ].join("\n")
    );
  });

  it("omits the source line when asked", () => {
    const reply = formatTranslationReply({ ...result, annotations: { isVerb: false } }, { showSource: false });
    expect(reply).toBe("- Русский: картон\n- English: cardboard\n- Հայերեն: ստվարաթուղթ");
  });

  it("adds past forms and governance for verbs", () => {
    const verb: TranslationResult = {
      mode: "explicit_pair",
      source: "ru",
      targets: ["de"],
      translations: { de: "teilnehmen" },
      annotations: {
        isVerb: true,
        pastForms: { de: { perfekt: "hat teilgenommen", praeteritum: "nahm teil" }, ru: { past: "участвовал" } },
        germanGovernance: { verb: "teilnehmen", preposition: "an", case: "Dat" },
      },
    };
    expect(formatTranslationReply(verb, { showSource: false })).toBe(
      [
        "- Deutsch: teilnehmen",
        "Прошедшие формы: DE: Perfekt: hat teilgenommen; Prateritum: nahm teil | RU: участвовал",
        "Управление (de): teilnehmen an + D",
      ].join("\n")
    );
  });
});

describe("formatPastForms", () => {
  it("returns null when there is nothing to show", () => {
    expect(formatPastForms({})).toBeNull();
  });

  it("formats English forms", () => {
    expect(formatPastForms({ en: { pastSimple: "went", pastParticiple: "gone" } })).toBe(
      "EN: Past Simple: went; Past Participle: gone"
    );
  });
});

describe("formatHistory", () => {
  it("numbers entries with a UTC stamp", () => {
    expect(
      formatHistory([
        { timestamp: "2026-03-04T05:06:07.000Z", inputSnippet: "Haus", source: "de", targets: ["ru", "en", "hy"] },
        { timestamp: "2026-03-03T23:59:00.000Z", inputSnippet: "home", source: "en", targets: ["de"] },
      ])
    ).toBe("1. 2026-03-04 05:06 UTC | de -> ru, en, hy | Haus\n2. 2026-03-03 23:59 UTC | en -> de | home");
  });
});

describe("pairSavedMessage", () => {
  it("names both languages", () => {
    expect(pairSavedMessage(["de", "en"]).split("\n")[1]).toBe("English: Default pair saved (bidirectional): Deutsch <-> English");
  });
});
