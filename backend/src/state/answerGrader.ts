// backend/src/state/answerGrader.ts

import type { GradeOutcome, QuestionType, StoredAnswer, UserAnswer } from "../types/quiz";
import { normalizeText, similarityRatio, splitAnswerList } from "../utils/text";

export type GradeReasonCode =
  | "NO_STORED_ANSWER"
  | "EXACT_MATCH"
  | "SET_MATCH"
  | "KEYWORD_COVERAGE"
  | "SIMILARITY"
  | "EMPTY_ANSWER"
  | "MISMATCH";

export type GradeResult = {
  result: GradeOutcome;
  reasonCode: GradeReasonCode;
  matched?: number;
  total?: number;
};

export type GradeOptions = {
  keywordThreshold?: number;
  similarityThreshold?: number;
};

export type SubmissionRejection = {
  code: "NO_SELECTION" | "NO_SELECTIONS";
  warning: string;
};

export const DEFAULT_KEYWORD_THRESHOLD = 0.8;
export const DEFAULT_SIMILARITY_THRESHOLD = 0.65;

const NO_ANSWER_MARKERS = new Set([
  "无",
  "暂无",
  "暂无答案",
  "(暂无答案)",
  "略",
  "答案略",
  "no answer",
  "n/a",
]);

const MARKER_EDGES = /^[\s.,;:!?()[\]【】]+|[\s.,;:!?()[\]【】]+$/g;
const ANSWER_PREFIX = /^答案\s*:\s*/;

function isNoAnswerMarker(standard: string): boolean {
  const bare = standard.replace(MARKER_EDGES, "");
  const withoutPrefix = bare.replace(ANSWER_PREFIX, "").replace(MARKER_EDGES, "");
  return NO_ANSWER_MARKERS.has(bare) || NO_ANSWER_MARKERS.has(withoutPrefix);
}

const PLACEHOLDER_FRAGMENTS = new Set(["暂无", "暂无答案", "答案略", "见解析", "见教材", "参考答案", "n/a"]);

const KEYWORD_DELIMITERS = /[\s,.;:!?()[\]{}"'“”‘’《》【】/\\|]+/;

function storedValues(stored: StoredAnswer): string[] {
  if (stored.kind === "single") return [stored.value];
  if (stored.kind === "multiple") return stored.values;
  return [];
}

function toSingleSelection(userAnswer: UserAnswer): string {
  if (!Array.isArray(userAnswer)) return normalizeText(userAnswer);
  const picked = userAnswer.map(normalizeText).filter(Boolean);
  return picked.length === 1 ? picked[0] : picked.join(",");
}

function toSelectionSet(userAnswer: UserAnswer): Set<string> {
  const parts = Array.isArray(userAnswer) ? userAnswer : splitAnswerList(userAnswer);
  return new Set(parts.map(normalizeText).filter(Boolean));
}

function sameSet(a: Set<string>, b: Set<string>): boolean {
  if (a.size !== b.size) return false;
  for (const v of a) {
    if (!b.has(v)) return false;
  }
  return true;
}

function normalizeFreeText(value: string): string {
  return normalizeText(value).toLowerCase();
}

export function extractKeywordFragments(standard: string): string[] {
  return normalizeFreeText(standard)
    .split(KEYWORD_DELIMITERS)
    .map((f) => f.trim())
    .filter((f) => f.length >= 2 && !PLACEHOLDER_FRAGMENTS.has(f));
}

function gradeChoice(type: "single" | "multiple", userAnswer: UserAnswer, stored: StoredAnswer): GradeResult {
  const expected = new Set(storedValues(stored).map(normalizeText).filter(Boolean));
  if (expected.size === 0) return { result: "ungraded", reasonCode: "NO_STORED_ANSWER" };

  if (type === "single") {
    const picked = toSingleSelection(userAnswer);
    return expected.size === 1 && expected.has(picked)
      ? { result: "correct", reasonCode: "EXACT_MATCH" }
      : { result: "incorrect", reasonCode: "MISMATCH" };
  }

  return sameSet(toSelectionSet(userAnswer), expected)
    ? { result: "correct", reasonCode: "SET_MATCH" }
    : { result: "incorrect", reasonCode: "MISMATCH" };
}

function gradeShortAnswer(userAnswer: UserAnswer, stored: StoredAnswer, options: GradeOptions): GradeResult {
  const standard = normalizeFreeText(storedValues(stored).join(";"));
  if (!standard || isNoAnswerMarker(standard)) {
    return { result: "ungraded", reasonCode: "NO_STORED_ANSWER" };
  }

  const user = normalizeFreeText(Array.isArray(userAnswer) ? userAnswer.join(" ") : userAnswer);
  if (!user) return { result: "incorrect", reasonCode: "EMPTY_ANSWER" };
  if (user === standard) return { result: "correct", reasonCode: "EXACT_MATCH" };

  const fragments = extractKeywordFragments(standard);
  if (fragments.length > 0) {
    const threshold = options.keywordThreshold ?? DEFAULT_KEYWORD_THRESHOLD;
    const matched = fragments.filter((f) => user.includes(f)).length;
    const total = fragments.length;
    return matched / total >= threshold
      ? { result: "correct", reasonCode: "KEYWORD_COVERAGE", matched, total }
      : { result: "incorrect", reasonCode: "MISMATCH", matched, total };
  }

  // Nothing long enough to match on; compare the whole text instead.
  const threshold = options.similarityThreshold ?? DEFAULT_SIMILARITY_THRESHOLD;
  return similarityRatio(user, standard) >= threshold
    ? { result: "correct", reasonCode: "SIMILARITY" }
    : { result: "incorrect", reasonCode: "MISMATCH" };
}

export function gradeAnswer(
  type: QuestionType,
  userAnswer: UserAnswer,
  stored: StoredAnswer,
  options: GradeOptions = {}
): GradeResult {
  if (type === "short") return gradeShortAnswer(userAnswer, stored, options);
  return gradeChoice(type, userAnswer, stored);
}

/**
 * A multiple-choice pick sent as one string that names an option is one
 * selection, not a delimited list.
 */
export function toChoiceSelection(
  type: QuestionType,
  userAnswer: UserAnswer,
  options: readonly string[]
): UserAnswer {
  if (type !== "multiple" || Array.isArray(userAnswer)) return userAnswer;
  const picked = normalizeText(userAnswer);
  return options.some((opt) => normalizeText(opt) === picked) ? [userAnswer] : userAnswer;
}

/**
 * Choice questions need a selection before they can be graded.
 * Short answers are always accepted, an empty one is graded as incorrect.
 */
export function validateSubmission(type: QuestionType, userAnswer: UserAnswer): SubmissionRejection | null {
  if (type === "single" && !toSingleSelection(userAnswer)) {
    return { code: "NO_SELECTION", warning: "Choose an option before submitting." };
  }
  if (type === "multiple" && toSelectionSet(userAnswer).size === 0) {
    return { code: "NO_SELECTIONS", warning: "Select at least one option before submitting." };
  }
  return null;
}
