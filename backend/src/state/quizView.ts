// backend/src/state/quizView.ts

import type {
  FilterSignature,
  GradeOutcome,
  QuestionBank,
  QuestionRecord,
  QuestionType,
  QuizPhase,
  StoredAnswer,
} from "../types/quiz";
import { filterQuestions, listChapters, listCourses, listTypes } from "./filterEngine";
import { phaseOf } from "./progressState";
import type { QuizSession } from "./quizSession";

export type InputWidget = "radio" | "checkbox" | "text";

export type QuestionView = {
  number: number;
  id: number;
  prompt: string;
  course: string;
  chapter: string;
  type: QuestionType;
  typeLabel: string;
  options: string[];
  input: InputWidget;
  disabled: boolean;
};

export type FeedbackView = {
  result: GradeOutcome;
  message: string;
  correctAnswer: string[];
  explanation: string;
};

export type QuizView = {
  signature: FilterSignature;
  facets: { courses: string[]; chapters: string[]; types: QuestionType[] };
  total: number;
  position: number;
  score: number;
  phase: QuizPhase | "empty";
  progress: number;
  notice?: string;
  summary?: string;
  question?: QuestionView;
  feedback?: FeedbackView;
};

export const EMPTY_FILTER_NOTICE = "No questions match this filter. Change the course, chapter or type.";
export const NO_EXPLANATION = "(no explanation)";

const INPUT_BY_TYPE: Record<QuestionType, InputWidget> = {
  single: "radio",
  multiple: "checkbox",
  short: "text",
};

function answerValues(answer: StoredAnswer): string[] {
  if (answer.kind === "single") return [answer.value];
  if (answer.kind === "multiple") return [...answer.values];
  return [];
}

export function feedbackMessage(result: GradeOutcome, question: QuestionRecord): string {
  if (result === "correct") return "Correct.";
  if (result === "ungraded") {
    return "This question has no reference answer, so it was not graded automatically and the score is unchanged.";
  }

  const expected = answerValues(question.answer);
  if (question.type === "short") {
    return "Your answer did not match the reference answer. Free-text grading is approximate, use it for self-checking.";
  }
  if (expected.length === 0) return "Incorrect.";
  if (question.type === "multiple") return `Incorrect. The correct answers are: ${expected.join("; ")}`;
  return `Incorrect. The correct answer is: ${expected[0]}`;
}

function toQuestionView(question: QuestionRecord, position: number, submitted: boolean): QuestionView {
  return {
    number: position + 1,
    id: question.id,
    prompt: question.prompt,
    course: question.course,
    chapter: question.chapter,
    type: question.type,
    typeLabel: question.typeLabel,
    options: [...question.options],
    input: INPUT_BY_TYPE[question.type],
    disabled: submitted,
  };
}

export function buildQuizView(session: QuizSession, bank: QuestionBank): QuizView {
  const signature = { ...session.activeSignature };
  const questions = filterQuestions(bank, signature);
  const total = questions.length;
  const state = session.active;
  const position = Math.min(state.position, total);

  const view: QuizView = {
    signature,
    facets: {
      courses: listCourses(bank),
      chapters: listChapters(bank, signature.course),
      types: listTypes(bank, signature.course, signature.chapter),
    },
    total,
    position,
    score: state.score,
    phase: total === 0 ? "empty" : phaseOf(state, total),
    progress: total === 0 ? 0 : position / total,
  };

  if (view.phase === "empty") {
    view.notice = EMPTY_FILTER_NOTICE;
    return view;
  }

  if (view.phase === "complete") {
    view.summary = `Finished this filter. Score: ${state.score} / ${total}`;
    return view;
  }

  const question = questions[position];
  view.question = toQuestionView(question, position, state.submitted);

  if (state.submitted) {
    view.feedback = {
      result: state.lastResult,
      message: feedbackMessage(state.lastResult, question),
      correctAnswer: answerValues(question.answer),
      explanation: question.explanation || NO_EXPLANATION,
    };
  }

  return view;
}
