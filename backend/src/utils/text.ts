// backend/src/utils/text.ts

const FULL_WIDTH_ASCII = /[！-～]/g;
const IDEOGRAPHIC_SPACE = /　/g;
const ANSWER_LIST_DELIMITERS = /[，,、;；\s]+/;
const LETTER_ANSWER_DELIMITERS = /[，,、;；\s]/g;

/**
 * Trim, collapse whitespace and fold full-width punctuation onto ASCII so
 * "（A）" and "(A)" compare equal. Case is preserved.
 */
export function normalizeText(value: unknown): string {
  if (value === null || value === undefined) return "";
  const raw = typeof value === "string" ? value : String(value);
  return raw
    .replace(FULL_WIDTH_ASCII, (ch) => String.fromCharCode(ch.charCodeAt(0) - 0xfee0))
    .replace(IDEOGRAPHIC_SPACE, " ")
    .replace(/。/g, ".")
    .replace(/、/g, ",")
    .replace(/\s+/g, " ")
    .trim();
}

export function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

/**
 * Split a delimited answer ("A,B", "A；C", "ABD") into its parts.
 * Short letter-only strings are read as one option letter per character.
 */
export function splitAnswerList(value: string): string[] {
  const s = (value || "").trim();
  if (!s) return [];

  const compact = s.replace(LETTER_ANSWER_DELIMITERS, "").toUpperCase();
  if (compact && s.length <= 10 && /^[A-H]+$/.test(compact)) {
    return compact.split("");
  }

  return s
    .split(ANSWER_LIST_DELIMITERS)
    .map((p) => p.trim())
    .filter(Boolean);
}

export function levenshtein(a: string, b: string): number {
  const m = a.length;
  const n = b.length;

  const dp: number[][] = Array.from({ length: m + 1 }, () => new Array<number>(n + 1).fill(0));

  for (let i = 0; i <= m; i++) dp[i][0] = i;
  for (let j = 0; j <= n; j++) dp[0][j] = j;

  for (let i = 1; i <= m; i++) {
    for (let j = 1; j <= n; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      dp[i][j] = Math.min(dp[i - 1][j] + 1, dp[i][j - 1] + 1, dp[i - 1][j - 1] + cost);
    }
  }

  return dp[m][n];
}

// 1 for identical strings, 0 for nothing in common.
export function similarityRatio(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 1;
  return 1 - levenshtein(a, b) / longest;
}
