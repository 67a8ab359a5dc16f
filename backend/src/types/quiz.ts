//backend/src/types/quiz.ts

export type QuestionType = "single" | "multiple" | "short";

export const ALL = "all";

// Normalized at ingestion so the grader never sees a raw string-or-list answer.
export type StoredAnswer =
    | { kind: "none" }
    | { kind: "single"; value: string }
    | { kind: "multiple"; values: string[] };

export type QuestionRecord = {
    id: number;
    course: string;
    chapter: string;
    type: QuestionType;
    typeLabel: string;   //raw qtype from the bank file, shown to the learner
    prompt: string;
    options: readonly string[];
    answer: StoredAnswer;
    explanation: string;
    sourceFile: string;
    diagnostic?: boolean;
};

export type BankLoadIssue = {
    file: string;
    reason: string;
};

export type QuestionBank = {
    dir: string;
    questions: readonly QuestionRecord[];
    issues: BankLoadIssue[];
};

export type FilterSignature = {
    course: string;
    chapter: string;
    type: QuestionType | typeof ALL;
};

export type GradeOutcome = "correct" | "incorrect" | "ungraded";

export type ProgressState = {
    position: number;
    score: number;
    submitted: boolean;
    lastResult: GradeOutcome;
};

export type QuizPhase = "answering" | "submitted" | "complete";

export type UserAnswer = string | string[];
