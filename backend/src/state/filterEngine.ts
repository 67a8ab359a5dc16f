// backend/src/state/filterEngine.ts

import { ALL } from "../types/quiz";
import type { FilterSignature, QuestionBank, QuestionRecord, QuestionType } from "../types/quiz";

export const TYPE_ORDER: readonly QuestionType[] = ["single", "multiple", "short"];

export type FilterSelectionResult =
  | { ok: true; signature: FilterSignature }
  | { ok: false; error: string };

function isQuestionType(v: unknown): v is QuestionType {
  return v === "single" || v === "multiple" || v === "short";
}

function matchesCourse(q: QuestionRecord, course: string): boolean {
  return course === ALL || q.course === course;
}

function matchesChapter(q: QuestionRecord, chapter: string): boolean {
  return chapter === ALL || q.chapter === chapter;
}

function sortedDistinct(values: Iterable<string>): string[] {
  return [...new Set(values)].sort();
}

export function listCourses(bank: QuestionBank): string[] {
  return sortedDistinct(bank.questions.map((q) => q.course));
}

export function listChapters(bank: QuestionBank, course: string): string[] {
  return sortedDistinct(bank.questions.filter((q) => matchesCourse(q, course)).map((q) => q.chapter));
}

export function listTypes(bank: QuestionBank, course: string, chapter: string): QuestionType[] {
  const present = new Set(
    bank.questions.filter((q) => matchesCourse(q, course) && matchesChapter(q, chapter)).map((q) => q.type)
  );
  return TYPE_ORDER.filter((t) => present.has(t));
}

// Keeps bank order so positions stay stable for a signature.
export function filterQuestions(bank: QuestionBank, signature: FilterSignature): QuestionRecord[] {
  return bank.questions.filter(
    (q) =>
      matchesCourse(q, signature.course) &&
      matchesChapter(q, signature.chapter) &&
      (signature.type === ALL || q.type === signature.type)
  );
}

export function signatureKey(signature: FilterSignature): string {
  return `${signature.course}::${signature.chapter}::${signature.type}`;
}

// Diagnostic records only open by default when nothing else loaded.
export function defaultSignature(bank: QuestionBank): FilterSignature {
  const [firstReal] = sortedDistinct(bank.questions.filter((q) => !q.diagnostic).map((q) => q.course));
  const first = firstReal ?? listCourses(bank)[0];
  return { course: first ?? ALL, chapter: ALL, type: ALL };
}

/**
 * Validate a requested filter. Unknown chapters are allowed and simply
 * produce an empty question list.
 */
export function parseFilterSelection(input: Record<string, unknown>, bank: QuestionBank): FilterSelectionResult {
  const course = typeof input.course === "string" ? input.course.trim() : "";
  const chapterRaw = typeof input.chapter === "string" ? input.chapter.trim() : "";
  const typeRaw = typeof input.type === "string" ? input.type.trim() : "";

  if (!course) return { ok: false, error: "course is required" };
  if (course !== ALL && !listCourses(bank).includes(course)) {
    return { ok: false, error: `Unknown course: ${course}` };
  }

  const chapter = chapterRaw || ALL;
  let type: FilterSignature["type"];
  if (!typeRaw || typeRaw === ALL) type = ALL;
  else if (isQuestionType(typeRaw)) type = typeRaw;
  else return { ok: false, error: "type must be one of: all, single, multiple, short" };

  return { ok: true, signature: { course, chapter, type } };
}
