export type ScoreResult =
  | { found: true; score: number }
  | { found: false; reason: "no-number" | "ambiguous" | "malformed" };

// "LB", "public LB", "score", "public score", "leaderboard" as whole words,
// followed by an optional ":" or "=" separator.
const MARKER_REGEX =
  /(?<![A-Za-z0-9_])(?:public\s+)?(?:lb|score|leaderboard)(?![A-Za-z_])\s*[:=]?\s*/gi;

// Greedy over digits and dots so that "0.8.1" is read as one malformed token
// instead of two valid ones.
const NUMBER_AT = /[+-]?(?:\d[\d.]*|\.\d[\d.]*)(?:[eE][+-]?\d+)?/y;
const NUMBER_TOKEN =
  /(?<![A-Za-z0-9_.])(?:\d[\d.]*|\.\d[\d.]*)(?:[eE][+-]?\d+)?(?![A-Za-z0-9_.])/g;
const STRICT_NUMBER = /^[+-]?(?:\d+(?:\.\d+)?|\.\d+)(?:[eE][+-]?\d+)?$/;
const SIGN_PRECEDERS = /[\s(\[:=]/;

interface NumberToken {
  text: string;
  value: number | undefined;
  isDecimal: boolean;
}

function readToken(raw: string): NumberToken {
  // Trailing periods are sentence punctuation ("LB 0.85...").
  const text = raw.replace(/\.+$/, "");
  if (!STRICT_NUMBER.test(text)) {
    return { text, value: undefined, isDecimal: false };
  }
  const value = Number(text);
  return {
    text,
    value: Number.isFinite(value) ? value : undefined,
    isDecimal: /[.eE]/.test(text),
  };
}

function signBefore(title: string, index: number): string {
  const sign = title[index - 1];
  if (sign !== "-" && sign !== "+") return "";
  if (index - 1 === 0 || SIGN_PRECEDERS.test(title[index - 2])) return sign;
  return "";
}

function markerScore(title: string): ScoreResult | undefined {
  for (const marker of title.matchAll(MARKER_REGEX)) {
    const start = (marker.index ?? 0) + marker[0].length;
    NUMBER_AT.lastIndex = start;
    const match = NUMBER_AT.exec(title);
    if (!match) continue;

    // "LB-0.81": a dash glued to the marker is a separator, not a sign.
    const raw =
      /^[+-]/.test(match[0]) && !SIGN_PRECEDERS.test(title[start - 1])
        ? match[0].slice(1)
        : match[0];
    const next = title[start + match[0].length];
    const token = readToken(raw);
    if (token.value === undefined || (next && /\w/.test(next))) {
      return { found: false, reason: "malformed" };
    }
    return { found: true, score: token.value };
  }
  return undefined;
}

function standaloneTokens(title: string): NumberToken[] {
  const tokens: NumberToken[] = [];
  for (const match of title.matchAll(NUMBER_TOKEN)) {
    const index = match.index ?? 0;
    tokens.push(readToken(signBefore(title, index) + match[0]));
  }
  return tokens;
}

/**
 * Extracts a leaderboard score from a free-text kernel title.
 *
 * A number right after a marker ("LB", "score", "leaderboard") wins; the first
 * marker followed by a number decides. Without a marker, the title must hold
 * exactly one standalone decimal; integers are ignored since they are usually
 * versions, folds or years. Titles with several candidate decimals are
 * reported as ambiguous rather than guessed.
 */
export function parseScore(title: string): ScoreResult {
  const anchored = markerScore(title);
  if (anchored) return anchored;

  const tokens = standaloneTokens(title);
  if (tokens.length === 0) return { found: false, reason: "no-number" };
  if (tokens.some((t) => t.value === undefined)) {
    return { found: false, reason: "malformed" };
  }

  const decimals = tokens.filter((t) => t.isDecimal);
  const score = decimals.length === 1 ? decimals[0].value : undefined;
  if (score === undefined) return { found: false, reason: "ambiguous" };
  return { found: true, score };
}

export { readToken };
