/**
 * @tetraglot/input-parser — message → translation intent
 *
 * Decides which of the translation modes a chat message asks for:
 *   de-en: Hallo / de → en Hallo / de en Hallo → explicit_pair
 *   de: Hallo / de Hallo                        → forced_source
 *   Hallo (with an active pair)                 → default_pair
 *   Hallo                                       → auto_all
 *
 * Pure and total: every input yields an intent or a rejection reason.
 */
import type { BidirectionalPair, LanguageCode, ParseResult, RejectionReason } from "@tetraglot/shared-types";
import { normalizeLanguage, normalizePair } from "@tetraglot/languages";

export const MAX_INPUT_LENGTH = 500;

/** Longest token the attempted-prefix heuristic still treats as a language name */
const MAX_PREFIX_TOKEN_LENGTH = 16;

type PrefixMatch =
  | { kind: "explicit"; source: LanguageCode; target: LanguageCode; payload: string }
  | { kind: "forced"; source: LanguageCode; payload: string }
  | { kind: "invalid" }
  | { kind: "none" };

const NO_PREFIX: PrefixMatch = { kind: "none" };

// ─── Public API ──────────────────────────────────────────────────────────────

export function parse(
  rawText: string | null | undefined,
  activePair: BidirectionalPair | null = null
): ParseResult {
  const text = (rawText ?? "").trim();
  if (!text) return reject("empty");
  if (characterCount(text) > MAX_INPUT_LENGTH) return reject("too_long");

  const prefix = matchPrefix(text);

  switch (prefix.kind) {
    case "invalid":
      return reject("invalid_pair_format");
    case "explicit":
      if (!prefix.payload) return reject("empty");
      return {
        ok: true,
        intent: { mode: "explicit_pair", source: prefix.source, target: prefix.target, text: prefix.payload },
      };
    case "forced":
      if (!prefix.payload) return reject("empty");
      return { ok: true, intent: { mode: "forced_source", source: prefix.source, text: prefix.payload } };
    case "none":
      if (activePair) return { ok: true, intent: { mode: "default_pair", pair: activePair, text } };
      return { ok: true, intent: { mode: "auto_all", text } };
  }
}

/**
 * Whether `prefix` reads as someone trying to write a language pair.
 *
 * Before a colon: any pair delimiter, or exactly two whitespace-separated
 * words ("xx yy: text"). A bare first word is held to a stricter shape: two
 * short letter-only tokens joined by a delimiter, where an arrow always
 * counts and a hyphen or underscore ("e-mail me") counts only when a side
 * resolves.
 */
export function looksLikePairPrefix(prefix: string, followedByColon: boolean): boolean {
  const compact = prefix.trim();
  if (!compact) return false;
  if (followedByColon) {
    return PAIR_DELIMITER.test(compact) || compact.split(/\s+/u).length === 2;
  }

  const match = PREFIX_SHAPE.exec(compact);
  if (!match) return false;

  const [, left, delimiter, right] = match;
  if (delimiter === "→") return true;
  return normalizeLanguage(left) !== null || normalizeLanguage(right) !== null;
}

// ─── Prefix recognition ──────────────────────────────────────────────────────

const PREFIX_SHAPE = new RegExp(
  `^(\\p{L}{1,${MAX_PREFIX_TOKEN_LENGTH}})(?:\\s*([-_→])\\s*|\\s+)(\\p{L}{1,${MAX_PREFIX_TOKEN_LENGTH}})$`,
  "u"
);
const SINGLE_TOKEN = /^[^\s\-_→]+$/u;
const PAIR_DELIMITER = /[-_→]/u;
const FIRST_WORD = /^(\S+)\s+([\s\S]+)$/u;
const LEADING_WORD = /^(\S+)(?:\s+([\s\S]*))?$/u;
const LONE_DELIMITER = /^[-_→]$/u;

function matchPrefix(text: string): PrefixMatch {
  const colonMatch = matchColonPrefix(text);
  if (colonMatch.kind !== "none") return colonMatch;
  return matchBarePrefix(text);
}

/** `de-en: Hallo`, `de: Hallo` */
function matchColonPrefix(text: string): PrefixMatch {
  const colonAt = text.indexOf(":");
  if (colonAt < 0) return NO_PREFIX;

  const prefix = text.slice(0, colonAt).trim();
  const payload = text.slice(colonAt + 1).trim();

  const pair = normalizePair(prefix);
  if (pair) return { kind: "explicit", source: pair[0], target: pair[1], payload };

  const source = resolveSingleToken(prefix);
  if (source) return { kind: "forced", source, payload };

  if (looksLikePairPrefix(prefix, true)) return { kind: "invalid" };
  return NO_PREFIX;
}

/** `de-en Hallo`, `de→en Hallo`, `de → en Hallo`, `de en Hallo`, `de Hallo` */
function matchBarePrefix(text: string): PrefixMatch {
  const words = FIRST_WORD.exec(text);
  if (!words) return NO_PREFIX;
  const [, first = "", rest = ""] = words;

  if (PAIR_DELIMITER.test(first)) {
    const pair = normalizePair(first);
    if (pair) return { kind: "explicit", source: pair[0], target: pair[1], payload: rest.trim() };
  }

  const source = resolveSingleToken(first);
  if (source) {
    const next = LEADING_WORD.exec(rest.trim());
    const nextWord = next?.[1] ?? "";

    if (LONE_DELIMITER.test(nextWord)) {
      const after = LEADING_WORD.exec((next?.[2] ?? "").trim());
      const target = after ? resolveSingleToken(after[1] ?? "") : null;
      if (!after || !target || target === source) return { kind: "invalid" };
      return { kind: "explicit", source, target, payload: (after[2] ?? "").trim() };
    }

    const target = resolveSingleToken(nextWord);
    if (next?.[2] && target && target !== source) {
      return { kind: "explicit", source, target, payload: next[2].trim() };
    }
    return { kind: "forced", source, payload: rest.trim() };
  }

  if (looksLikePairPrefix(first, false)) return { kind: "invalid" };
  return NO_PREFIX;
}

function resolveSingleToken(token: string): LanguageCode | null {
  if (!SINGLE_TOKEN.test(token)) return null;
  return normalizeLanguage(token);
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function reject(reason: RejectionReason): ParseResult {
  return { ok: false, reason };
}

/** Counts code points, so one Armenian or Cyrillic letter is one character */
function characterCount(text: string): number {
  return Array.from(text).length;
}
