// backend/src/state/progressState.ts

import type { GradeOutcome, ProgressState, QuizPhase } from "../types/quiz";

export function freshProgress(): ProgressState {
  return { position: 0, score: 0, submitted: false, lastResult: "ungraded" };
}

export function phaseOf(state: ProgressState, total: number): QuizPhase {
  if (total > 0 && state.position >= total) return "complete";
  if (state.submitted) return "submitted";
  return "answering";
}

// answering -> submitted. Only a correct answer moves the score.
export function applySubmission(state: ProgressState, result: GradeOutcome): ProgressState {
  return {
    position: state.position,
    score: result === "correct" ? state.score + 1 : state.score,
    submitted: true,
    lastResult: result,
  };
}

// submitted -> answering (next question) or complete once position reaches total.
export function applyAdvance(state: ProgressState): ProgressState {
  return {
    position: state.position + 1,
    score: state.score,
    submitted: false,
    lastResult: "ungraded",
  };
}

export function cloneProgress(state: ProgressState): ProgressState {
  return { ...state };
}
