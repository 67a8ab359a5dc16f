// backend/src/state/bankLoader.ts

import fs from "fs";
import path from "path";
import type {
  BankLoadIssue,
  QuestionBank,
  QuestionRecord,
  QuestionType,
  StoredAnswer,
} from "../types/quiz";
import { isNonEmptyString, normalizeText, splitAnswerList } from "../utils/text";
import { logInfo, logWarn } from "../utils/logger";

export const UNNAMED_COURSE = "Untitled course";
export const UNCATEGORIZED_CHAPTER = "Uncategorized";
export const DIAGNOSTIC_COURSE = "(bank errors)";

export type FileErrorMode = "skip" | "placeholder";

export type BankLoadOptions = {
  onFileError?: FileErrorMode;
};

export type LoadFailureCode = "BANK_DIR_MISSING" | "BANK_EMPTY";

export class LoadFailure extends Error {
  readonly code: LoadFailureCode;
  readonly remediation: string;

  constructor(code: LoadFailureCode, reason: string, remediation: string) {
    super(reason);
    this.name = "LoadFailure";
    this.code = code;
    this.remediation = remediation;
  }
}

const SINGLE_LABELS = new Set(["单选题", "单选", "single", "single-choice"]);
const MULTIPLE_LABELS = new Set(["多选题", "多选", "不定项选择题", "multiple", "multiple-choice"]);

const DEFAULT_LABELS: Record<QuestionType, string> = {
  single: "单选题",
  multiple: "多选题",
  short: "简答题",
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toTrimmedString(value: unknown): string {
  if (typeof value === "string") return value.trim();
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return "";
}

function toStringList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.map(toTrimmedString).filter(Boolean);
}

export function resolveQuestionType(
  qtype: unknown,
  options: string[],
  answerRaw: unknown
): { type: QuestionType; label: string } {
  const label = toTrimmedString(qtype);
  if (label) {
    const key = label.toLowerCase();
    if (SINGLE_LABELS.has(key)) return { type: "single", label };
    if (MULTIPLE_LABELS.has(key)) return { type: "multiple", label };
    // every other labelled type (简答题, 名词解释, 论述题 …) is answered in free text
    return { type: "short", label };
  }

  let type: QuestionType = "short";
  if (options.length > 0) type = Array.isArray(answerRaw) ? "multiple" : "single";
  return { type, label: DEFAULT_LABELS[type] };
}

export function parseStoredAnswer(type: QuestionType, raw: unknown): StoredAnswer {
  let values: string[];
  if (Array.isArray(raw)) {
    values = toStringList(raw);
  } else {
    const text = toTrimmedString(raw);
    values = type === "multiple" ? splitAnswerList(text) : text ? [text] : [];
  }

  if (values.length === 0) return { kind: "none" };
  if (type === "multiple" || values.length > 1) return { kind: "multiple", values };
  return { kind: "single", value: values[0] };
}

function resolveLetter(letter: string, options: string[]): string | null {
  const labelled = options.find((opt) => new RegExp(`^${letter}\\s*[.,:)]`).test(normalizeText(opt)));
  if (labelled) return labelled;
  const idx = letter.charCodeAt(0) - "A".charCodeAt(0);
  return idx >= 0 && idx < options.length ? options[idx] : null;
}

/**
 * Banks often store choice answers as option letters ("B", "ACD") while the
 * learner picks option text. Map the letters onto the options they name.
 */
export function resolveOptionLetters(answer: StoredAnswer, options: string[]): StoredAnswer {
  if (answer.kind === "none" || options.length === 0) return answer;

  const values = answer.kind === "single" ? [answer.value] : answer.values;
  if (!values.every((v) => /^[A-Ha-h]$/.test(v))) return answer;

  const optionSet = new Set(options.map(normalizeText));
  if (values.some((v) => optionSet.has(v))) return answer;

  const resolved: string[] = [];
  for (const v of values) {
    const opt = resolveLetter(v.toUpperCase(), options);
    if (!opt) return answer;
    resolved.push(opt);
  }

  return answer.kind === "single"
    ? { kind: "single", value: resolved[0] }
    : { kind: "multiple", values: resolved };
}

export function toQuestionRecord(raw: Record<string, unknown>, id: number, sourceFile: string): QuestionRecord {
  const rawOptions = toStringList(raw.options);
  const { type, label } = resolveQuestionType(raw.qtype, rawOptions, raw.answer);
  const options = type === "short" ? [] : rawOptions;
  const answer = resolveOptionLetters(parseStoredAnswer(type, raw.answer), options);

  return Object.freeze({
    id,
    course: toTrimmedString(raw.course) || UNNAMED_COURSE,
    chapter: toTrimmedString(raw.chapter) || UNCATEGORIZED_CHAPTER,
    type,
    typeLabel: label,
    prompt: toTrimmedString(raw.question) || toTrimmedString(raw.prompt),
    options: Object.freeze(options),
    answer: Object.freeze(answer),
    explanation: toTrimmedString(raw.explanation),
    sourceFile,
  });
}

function diagnosticRecord(issue: BankLoadIssue, id: number): QuestionRecord {
  return Object.freeze({
    id,
    course: DIAGNOSTIC_COURSE,
    chapter: issue.file,
    type: "short" as const,
    typeLabel: DEFAULT_LABELS.short,
    prompt: `Question bank file "${issue.file}" could not be loaded: ${issue.reason}`,
    options: [],
    answer: { kind: "none" as const },
    explanation: "Fix or remove the file and restart the service.",
    sourceFile: issue.file,
    diagnostic: true,
  });
}

type DocumentRead = { ok: true; items: unknown[] } | { ok: false; reason: string };

export function readBankDocument(filePath: string): DocumentRead {
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    return { ok: false, reason: `failed to read file (${err instanceof Error ? err.message : String(err)})` };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    return { ok: false, reason: `invalid JSON (${err instanceof Error ? err.message : String(err)})` };
  }

  // some exports wrap the list as {"data": [...]}
  if (isRecord(parsed)) {
    if (Array.isArray(parsed.data)) return { ok: true, items: parsed.data };
    return { ok: false, reason: 'object document has no "data" list' };
  }
  if (Array.isArray(parsed)) return { ok: true, items: parsed };
  return { ok: false, reason: "document must be a list of questions" };
}

export function listBankFiles(dir: string): string[] {
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith(".json"))
    .map((entry) => entry.name)
    .sort();
}

/**
 * Load every *.json bank file in `dir`. Broken files are reported in
 * `issues` and never stop the rest from loading.
 */
export function loadQuestionBank(dir: string, options: BankLoadOptions = {}): QuestionBank {
  const onFileError = options.onFileError ?? "skip";

  if (!isNonEmptyString(dir) || !fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
    throw new LoadFailure(
      "BANK_DIR_MISSING",
      `Question bank directory not found: ${dir}`,
      "Create the directory and put the *.json question bank files in it, or point QUIZ_BANK_DIR at the directory that holds them."
    );
  }

  const questions: QuestionRecord[] = [];
  const issues: BankLoadIssue[] = [];
  let usable = 0;

  for (const file of listBankFiles(dir)) {
    const doc = readBankDocument(path.join(dir, file));
    if (!doc.ok) {
      const issue = { file, reason: doc.reason };
      issues.push(issue);
      logWarn("bank_file_skipped", { file, reason: doc.reason });
      if (onFileError === "placeholder") questions.push(diagnosticRecord(issue, questions.length));
      continue;
    }

    for (const item of doc.items) {
      if (!isRecord(item)) continue;
      questions.push(toQuestionRecord(item, questions.length, file));
      usable += 1;
    }
  }

  if (usable === 0) {
    const skipped = issues.length > 0 ? ` (${issues.length} file(s) could not be loaded)` : "";
    throw new LoadFailure(
      "BANK_EMPTY",
      `No usable question records found in ${dir}${skipped}`,
      'Add at least one *.json file holding a list of question objects, or an object with a "data" list, and commit it with the service.'
    );
  }

  logInfo("bank_loaded", { dir, questions: usable, issues: issues.length });

  return { dir, questions: Object.freeze(questions), issues };
}
