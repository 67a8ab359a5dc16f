// backend/src/state/quizSession.ts

import type { FilterSignature, ProgressState } from "../types/quiz";
import { signatureKey } from "./filterEngine";
import { cloneProgress, freshProgress } from "./progressState";

// One per user. Every filter signature owns an independent progress slot.
export type QuizSession = {
  userId: string;
  activeSignature: FilterSignature;
  active: ProgressState;
  progressBySignature: Map<string, ProgressState>;
};

export function createQuizSession(userId: string, signature: FilterSignature): QuizSession {
  const active = freshProgress();
  const progressBySignature = new Map<string, ProgressState>();
  progressBySignature.set(signatureKey(signature), cloneProgress(active));
  return { userId, activeSignature: { ...signature }, active, progressBySignature };
}

export function saveActiveProgress(session: QuizSession): void {
  session.progressBySignature.set(signatureKey(session.activeSignature), cloneProgress(session.active));
}

export function setActiveProgress(session: QuizSession, next: ProgressState): void {
  session.active = cloneProgress(next);
  saveActiveProgress(session);
}

/**
 * Park the active progress under the current signature, then resume the
 * stored progress for `next` (or start it fresh).
 */
export function switchSignature(session: QuizSession, next: FilterSignature): void {
  saveActiveProgress(session);

  const stored = session.progressBySignature.get(signatureKey(next));
  session.activeSignature = { ...next };
  session.active = stored ? cloneProgress(stored) : freshProgress();
  saveActiveProgress(session);
}

export function resetActiveProgress(session: QuizSession): void {
  setActiveProgress(session, freshProgress());
}

export function getStoredProgress(session: QuizSession, signature: FilterSignature): ProgressState | undefined {
  const stored = session.progressBySignature.get(signatureKey(signature));
  return stored ? cloneProgress(stored) : undefined;
}
