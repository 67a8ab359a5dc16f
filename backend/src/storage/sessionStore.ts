// backend/src/storage/sessionStore.ts

import type { QuestionBank } from "../types/quiz";
import { defaultSignature } from "../state/filterEngine";
import { createQuizSession } from "../state/quizSession";
import type { QuizSession } from "../state/quizSession";

// Process-lifetime only. Each user id gets its own isolated session.
const sessions = new Map<string, QuizSession>();

export function getSession(userId: string): QuizSession | null {
    return sessions.get(userId) ?? null;
}

export function getOrCreateSession(userId: string, bank: QuestionBank): QuizSession {
    const existing = sessions.get(userId);
    if (existing) return existing;

    const session = createQuizSession(userId, defaultSignature(bank));
    sessions.set(userId, session);
    return session;
}

export function deleteSession(userId: string): void {
    sessions.delete(userId);
}

export function clearSessions(): void {
    sessions.clear();
}
