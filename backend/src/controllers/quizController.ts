// backend/src/controllers/quizController.ts

import type { Request, Response } from "express";
import type { QuestionBank, UserAnswer } from "../types/quiz";
import type { GradeOptions } from "../state/answerGrader";
import { parseFilterSelection } from "../state/filterEngine";
import { onAdvance, onReset, onSelectFilter, onSubmit } from "../state/quizActions";
import type { ActionOutcome, ActionRejectionCode } from "../state/quizActions";
import { buildQuizView } from "../state/quizView";
import { deleteSession, getOrCreateSession } from "../storage/sessionStore";
import { sendError } from "../http/sendError";

export type QuizControllerDeps = {
  bank: QuestionBank;
  gradeOptions: GradeOptions;
};

const REJECTION_STATUS: Record<ActionRejectionCode, number> = {
  NO_SELECTION: 422,
  NO_SELECTIONS: 422,
  NO_QUESTIONS: 409,
  QUIZ_COMPLETE: 409,
  ALREADY_SUBMITTED: 409,
  NOT_SUBMITTED: 409,
};

function readUserId(v: unknown): string | null {
  if (typeof v !== "string") return null;
  const t = v.trim();
  if (!t || t.length > 80) return null;
  return t;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readBody(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  return isRecord(body) ? body : {};
}

// A missing answer counts as "nothing selected" so the learner gets the selection warning.
function readAnswer(v: unknown): UserAnswer | null {
  if (v === undefined || v === null) return "";
  if (typeof v === "string") return v;
  if (Array.isArray(v) && v.every((x): x is string => typeof x === "string")) return v;
  return null;
}

function sendOutcome(res: Response, outcome: ActionOutcome) {
  if (outcome.ok) {
    return res.status(200).json({ view: outcome.view, ...(outcome.grade ? { grade: outcome.grade } : {}) });
  }
  return sendError(res, REJECTION_STATUS[outcome.code], outcome.warning, outcome.code, { view: outcome.view });
}

export function makeQuizController({ bank, gradeOptions }: QuizControllerDeps) {
  // GET /quiz/:userId
  const getQuiz = (req: Request, res: Response) => {
    const userId = readUserId(req.params.userId);
    if (!userId) return sendError(res, 400, "userId is required", "INVALID_REQUEST");

    const session = getOrCreateSession(userId, bank);
    return res.status(200).json({ view: buildQuizView(session, bank) });
  };

  // POST /quiz/filter
  const selectFilter = (req: Request, res: Response) => {
    const body = readBody(req);
    const userId = readUserId(body.userId);
    if (!userId) return sendError(res, 400, "userId is required", "INVALID_REQUEST");

    const selection = parseFilterSelection(body, bank);
    if (!selection.ok) return sendError(res, 400, selection.error, "INVALID_FILTER");

    const session = getOrCreateSession(userId, bank);
    return sendOutcome(res, onSelectFilter(session, bank, selection.signature));
  };

  // POST /quiz/submit
  const submit = (req: Request, res: Response) => {
    const body = readBody(req);
    const userId = readUserId(body.userId);
    if (!userId) return sendError(res, 400, "userId is required", "INVALID_REQUEST");

    const answer = readAnswer(body.answer);
    if (answer === null) {
      return sendError(res, 400, "answer must be a string or a list of strings", "INVALID_REQUEST");
    }

    const session = getOrCreateSession(userId, bank);
    return sendOutcome(res, onSubmit(session, bank, answer, gradeOptions));
  };

  // POST /quiz/next
  const next = (req: Request, res: Response) => {
    const userId = readUserId(readBody(req).userId);
    if (!userId) return sendError(res, 400, "userId is required", "INVALID_REQUEST");

    const session = getOrCreateSession(userId, bank);
    return sendOutcome(res, onAdvance(session, bank));
  };

  // POST /quiz/reset
  const reset = (req: Request, res: Response) => {
    const userId = readUserId(readBody(req).userId);
    if (!userId) return sendError(res, 400, "userId is required", "INVALID_REQUEST");

    const session = getOrCreateSession(userId, bank);
    return sendOutcome(res, onReset(session, bank));
  };

  // DELETE /quiz/:userId
  const endSession = (req: Request, res: Response) => {
    const userId = readUserId(req.params.userId);
    if (!userId) return sendError(res, 400, "userId is required", "INVALID_REQUEST");

    deleteSession(userId);
    return res.status(204).end();
  };

  return { getQuiz, selectFilter, submit, next, reset, endSession };
}
