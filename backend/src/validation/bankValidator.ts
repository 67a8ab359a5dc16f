// backend/src/validation/bankValidator.ts

import fs from "fs/promises";
import path from "path";
import { parseStoredAnswer, resolveOptionLetters, resolveQuestionType } from "../state/bankLoader";
import { isNonEmptyString, normalizeText } from "../utils/text";

export type BankDirArgs = {
  dir: string;
  file?: string;
};

type ValidationResult = { ok: boolean; errors: string[]; questionCount: number };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isAnswerShape(value: unknown): boolean {
  if (value === undefined || value === null) return true;
  if (typeof value === "string" || typeof value === "number") return true;
  return Array.isArray(value) && value.every((x) => typeof x === "string" || typeof x === "number");
}

function unwrapDocument(input: unknown): unknown[] | null {
  if (Array.isArray(input)) return input;
  if (isRecord(input) && Array.isArray(input.data)) return input.data;
  return null;
}

/**
 * Checks a parsed bank document question by question. Missing answers are
 * not errors (those questions are simply ungraded).
 */
export function validateBankDocument(input: unknown, sourcePath: string): ValidationResult {
  const errors: string[] = [];

  const pushError = (path: string, message: string) => {
    errors.push(`${sourcePath}: ${path} ${message}`);
  };

  const items = unwrapDocument(input);
  if (!items) {
    return {
      ok: false,
      errors: [`${sourcePath}: document must be a list of questions or an object with a "data" list`],
      questionCount: 0,
    };
  }

  if (items.length === 0) {
    pushError("document", "contains no questions");
  }

  items.forEach((q, i) => {
    const qPath = `[${i}]`;

    if (!isRecord(q)) {
      pushError(qPath, "must be an object");
      return;
    }

    if (!isNonEmptyString(q.question)) {
      pushError(`${qPath}.question`, "is required");
    }

    if (q.options !== undefined && !Array.isArray(q.options)) {
      pushError(`${qPath}.options`, "must be a list of strings");
      return;
    }

    if (!isAnswerShape(q.answer)) {
      pushError(`${qPath}.answer`, "must be a string or a list of strings");
      return;
    }

    const options = Array.isArray(q.options)
      ? q.options.filter(isNonEmptyString).map((o) => o.trim())
      : [];
    const { type } = resolveQuestionType(q.qtype, options, q.answer);

    if (type === "short") return;

    if (options.length < 2) {
      pushError(`${qPath}.options`, "choice questions need at least two options");
      return;
    }

    const answer = resolveOptionLetters(parseStoredAnswer(type, q.answer), options);
    const expected = answer.kind === "single" ? [answer.value] : answer.kind === "multiple" ? answer.values : [];
    const optionSet = new Set(options.map(normalizeText));

    for (const value of expected) {
      if (!optionSet.has(normalizeText(value))) {
        pushError(`${qPath}.answer`, `"${value}" is not one of the options`);
      }
    }

    if (type === "single" && expected.length > 1) {
      pushError(`${qPath}.answer`, "single-choice question has more than one answer");
    }
  });

  return { ok: errors.length === 0, errors, questionCount: items.length };
}

async function listBankFiles(args: BankDirArgs): Promise<string[]> {
  if (args.file) return [args.file];
  const entries = await fs.readdir(args.dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith(".json"))
    .map((entry) => entry.name)
    .sort();
}

/**
 * Validate every bank file in a directory (or one file in it). Returns the
 * problems keyed by file name; files without problems are left out.
 */
export async function validateBankDir(args: BankDirArgs): Promise<Record<string, string[]>> {
  const errorsByFile: Record<string, string[]> = {};

  for (const file of await listBankFiles(args)) {
    let raw = "";
    try {
      raw = await fs.readFile(path.join(args.dir, file), "utf8");
    } catch {
      errorsByFile[file] = ["failed to read file"];
      continue;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      errorsByFile[file] = ["invalid JSON"];
      continue;
    }

    const result = validateBankDocument(json, file);
    if (!result.ok) {
      const prefix = `${file}: `;
      errorsByFile[file] = result.errors.map((e) => (e.startsWith(prefix) ? e.slice(prefix.length) : e));
    }
  }

  return errorsByFile;
}
