// backend/src/state/quizActions.ts

import type { FilterSignature, QuestionBank, UserAnswer } from "../types/quiz";
import { gradeAnswer, toChoiceSelection, validateSubmission } from "./answerGrader";
import type { GradeOptions, GradeResult } from "./answerGrader";
import { filterQuestions } from "./filterEngine";
import { applyAdvance, applySubmission, phaseOf } from "./progressState";
import { resetActiveProgress, setActiveProgress, switchSignature } from "./quizSession";
import type { QuizSession } from "./quizSession";
import { buildQuizView, EMPTY_FILTER_NOTICE } from "./quizView";
import type { QuizView } from "./quizView";

export type ActionRejectionCode =
  | "NO_QUESTIONS"
  | "QUIZ_COMPLETE"
  | "ALREADY_SUBMITTED"
  | "NOT_SUBMITTED"
  | "NO_SELECTION"
  | "NO_SELECTIONS";

export type ActionOutcome =
  | { ok: true; view: QuizView; grade?: GradeResult }
  | { ok: false; code: ActionRejectionCode; warning: string; view: QuizView };

function rejected(
  session: QuizSession,
  bank: QuestionBank,
  code: ActionRejectionCode,
  warning: string
): ActionOutcome {
  return { ok: false, code, warning, view: buildQuizView(session, bank) };
}

function currentPhase(session: QuizSession, bank: QuestionBank) {
  const questions = filterQuestions(bank, session.activeSignature);
  const total = questions.length;
  return { questions, total, phase: phaseOf(session.active, total) };
}

export function onSelectFilter(session: QuizSession, bank: QuestionBank, signature: FilterSignature): ActionOutcome {
  switchSignature(session, signature);
  return { ok: true, view: buildQuizView(session, bank) };
}

export function onSubmit(
  session: QuizSession,
  bank: QuestionBank,
  answer: UserAnswer,
  gradeOptions: GradeOptions = {}
): ActionOutcome {
  const { questions, total, phase } = currentPhase(session, bank);

  if (total === 0) return rejected(session, bank, "NO_QUESTIONS", EMPTY_FILTER_NOTICE);
  if (phase === "complete") {
    return rejected(session, bank, "QUIZ_COMPLETE", "This filter is finished. Reset it to start again.");
  }
  if (phase === "submitted") {
    return rejected(session, bank, "ALREADY_SUBMITTED", "This question was already submitted. Move on to the next one.");
  }

  const question = questions[session.active.position];
  const selection = toChoiceSelection(question.type, answer, question.options);
  const rejection = validateSubmission(question.type, selection);
  if (rejection) return rejected(session, bank, rejection.code, rejection.warning);

  const grade = gradeAnswer(question.type, selection, question.answer, gradeOptions);
  setActiveProgress(session, applySubmission(session.active, grade.result));

  return { ok: true, view: buildQuizView(session, bank), grade };
}

export function onAdvance(session: QuizSession, bank: QuestionBank): ActionOutcome {
  const { total, phase } = currentPhase(session, bank);

  if (total === 0) return rejected(session, bank, "NO_QUESTIONS", EMPTY_FILTER_NOTICE);
  if (phase === "complete") {
    return rejected(session, bank, "QUIZ_COMPLETE", "This filter is finished. Reset it to start again.");
  }
  if (phase !== "submitted") {
    return rejected(session, bank, "NOT_SUBMITTED", "Submit an answer before moving to the next question.");
  }

  setActiveProgress(session, applyAdvance(session.active));
  return { ok: true, view: buildQuizView(session, bank) };
}

export function onReset(session: QuizSession, bank: QuestionBank): ActionOutcome {
  resetActiveProgress(session);
  return { ok: true, view: buildQuizView(session, bank) };
}
