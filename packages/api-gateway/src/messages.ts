/**
 * User-facing texts and reply formatting.
 *
 * Every fixed message is shown in all four languages, one per line, so a
 * user never needs to pick a UI language first.
 */

import type { BidirectionalPair, HistoryEntry, RejectionReason, TranslationResult, VerbPastForms } from "@tetraglot/shared-types";
import { SUPPORTED_LANGUAGES, languageLabel } from "@tetraglot/languages";

function ui4(ru: string, en: string, de: string, hy: string): string {
  return `Русский: ${ru}\nEnglish: ${en}\nDeutsch: ${de}\nՀայերեն: ${hy}`;
}

export const TOO_LONG_MESSAGE = ui4(
  "Текст слишком длинный. Отправьте до 500 символов.",
  "Text is too long. Please send up to 500 characters.",
  "Der Text ist zu lang. Bitte sende bis zu 500 Zeichen.",
  "Տեքստը չափազանց երկար է։ Ուղարկեք մինչև 500 նիշ։"
);

export const INVALID_PAIR_MESSAGE = ui4(
  "Не распознал пару языков. Формат: ru-en, de-hy и т.д.",
  "Language pair was not recognized. Format: ru-en, de-hy, etc.",
  "Das Sprachpaar wurde nicht erkannt. Format: ru-en, de-hy usw.",
  "Լեզվական զույգը չհաջողվեց ճանաչել։ Ձևաչափը՝ ru-en, de-hy և այլն։"
);

export const UNKNOWN_LANGUAGE_MESSAGE = ui4(
  "Не удалось определить язык. Пожалуйста, уточните язык.",
  "Could not detect the language. Please tell me which language it is.",
  "Die Sprache konnte nicht erkannt werden. Bitte gib die Sprache an.",
  "Չհաջողվեց որոշել լեզուն։ Խնդրում ենք նշել լեզուն։"
);

export const TRANSLATION_ERROR_MESSAGE = ui4(
  "Не удалось выполнить перевод. Попробуйте позже.",
  "Could not complete translation. Please try again later.",
  "Die Übersetzung konnte nicht ausgeführt werden. Bitte später erneut versuchen.",
  "Չհաջողվեց կատարել թարգմանությունը։ Խնդրում ենք փորձել ավելի ուշ։"
);

export const HISTORY_DISABLED_MESSAGE = ui4(
  "История переводов отключена.",
  "Translation history is disabled.",
  "Der Übersetzungsverlauf ist deaktiviert.",
  "Թարգմանությունների պատմությունը անջատված է։"
);

export const HISTORY_EMPTY_MESSAGE = ui4(
  "История пока пуста.",
  "History is empty.",
  "Der Verlauf ist leer.",
  "Պատմությունը դեռ դատարկ է։"
);

export const AUTO_MODE_MESSAGE = ui4(
  "Режим по умолчанию переключен на Auto.",
  "Default mode switched to Auto.",
  "Standardmodus auf Auto umgestellt.",
  "Լռելյայն ռեժիմը փոխվեց Auto-ի։"
);

export const NOTHING_TO_CLARIFY_MESSAGE = ui4(
  "Нет текста для уточнения. Отправьте сообщение заново.",
  "No text found for clarification. Please send the message again.",
  "Kein Text zur Klärung gefunden. Bitte sende die Nachricht erneut.",
  "Պարզաբանման համար տեքստ չի գտնվել։ Խնդրում ենք նորից ուղարկել հաղորդագրությունը։"
);

export const HELP_MESSAGE = ui4(
  "Форматы ввода: 1) авто-режим: Freundschaft; 2) явная пара: de-ru: Hallo, en-hy: Hello; " +
    "3) только исходный язык (перевод на остальные 3): de: Hallo или de Hallo; " +
    "4) активная пара задается через PUT /v1/users/:userId/pair (например en-de). " +
    "Разделители пары: '-', '_', '→', пробел перед ':'.",
  "Input formats: 1) auto mode: Freundschaft; 2) explicit pair: de-ru: Hallo, en-hy: Hello; " +
    "3) source-only mode (translate to other 3): de: Hallo or de Hallo; " +
    "4) an active bidirectional pair is set with PUT /v1/users/:userId/pair (for example en-de). " +
    "Pair delimiters: '-', '_', '→', or space before ':'.",
  "Eingabeformate: 1) Auto-Modus: Freundschaft; 2) explizites Paar: de-ru: Hallo, en-hy: Hello; " +
    "3) nur Ausgangssprache (Übersetzung in die anderen 3): de: Hallo oder de Hallo; " +
    "4) ein aktives bidirektionales Paar setzt PUT /v1/users/:userId/pair (z. B. en-de). " +
    "Trennzeichen: '-', '_', '→' oder Leerzeichen vor ':'.",
  "Մուտքի ձևաչափեր՝ 1) ավտո ռեժիմ՝ Freundschaft; 2) հստակ զույգ՝ de-ru: Hallo, en-hy: Hello; " +
    "3) միայն ելքային լեզու (թարգմանություն մնացած 3 լեզուներով)՝ de: Hallo կամ de Hallo; " +
    "4) ակտիվ երկկողմ զույգը սահմանվում է PUT /v1/users/:userId/pair հարցմամբ (օրինակ՝ en-de)։ " +
    "Զույգի բաժանարարներ՝ '-', '_', '→' կամ բացատ ':'-ից առաջ։"
);

export function pairSavedMessage(pair: BidirectionalPair): string {
  const shown = `${languageLabel(pair[0])} <-> ${languageLabel(pair[1])}`;
  return ui4(
    `Пара по умолчанию сохранена (двунаправленно): ${shown}`,
    `Default pair saved (bidirectional): ${shown}`,
    `Standardpaar gespeichert (bidirektional): ${shown}`,
    `Լռելյայն զույգը պահպանված է (երկկողմ): ${shown}`
  );
}

/** Null for empty input: it gets no reply at all */
export function rejectionMessage(reason: RejectionReason): string | null {
  switch (reason) {
    case "empty":
      return null;
    case "too_long":
      return TOO_LONG_MESSAGE;
    case "invalid_pair_format":
      return INVALID_PAIR_MESSAGE;
  }
}

// ─── Translation reply ────────────────────────────────────────────────────────

const GOVERNANCE_CASE_MARK = { Akk: "A", Dat: "D", Gen: "G" } as const;

export function formatPastForms(forms: VerbPastForms): string | null {
  const parts: string[] = [];
  if (forms.de) parts.push(`DE: Perfekt: ${forms.de.perfekt}; Prateritum: ${forms.de.praeteritum}`);
  if (forms.en) parts.push(`EN: Past Simple: ${forms.en.pastSimple}; Past Participle: ${forms.en.pastParticiple}`);
  if (forms.ru) parts.push(`RU: ${forms.ru.past}`);
  if (forms.hy) parts.push(`HY: ${forms.hy.past}`);
  return parts.length > 0 ? parts.join(" | ") : null;
}

export interface ReplyOptions {
  /** Lead with the detected source language */
  showSource: boolean;
}

export function formatTranslationReply(result: TranslationResult, options: ReplyOptions): string {
  const lines: string[] = [];
  if (options.showSource) lines.push(`Исходный язык: ${languageLabel(result.source)}`);

  for (const lang of SUPPORTED_LANGUAGES) {
    const text = result.translations[lang];
    if (text) lines.push(`- ${languageLabel(lang)}: ${text}`);
  }

  const { pastForms, germanNoun, germanGovernance } = result.annotations;
  const past = pastForms ? formatPastForms(pastForms) : null;
  if (past) lines.push(`Прошедшие формы: ${past}`);
  if (germanNoun) lines.push(`Артикль/род (de): ${germanNoun.article} ${germanNoun.lemma} (${germanNoun.gender}.)`);
  if (germanGovernance) {
    lines.push(
      `Управление (de): ${germanGovernance.verb} ${germanGovernance.preposition} + ${GOVERNANCE_CASE_MARK[germanGovernance.case]}`
    );
  }

  return lines.join("\n");
}

export function formatHistory(entries: readonly HistoryEntry[]): string {
  return entries
    .map((entry, index) => {
      const stamp = `${entry.timestamp.slice(0, 10)} ${entry.timestamp.slice(11, 16)} UTC`;
      return `${index + 1}. ${stamp} | ${entry.source} -> ${entry.targets.join(", ")} | ${entry.inputSnippet}`;
    })
    .join("\n");
}
