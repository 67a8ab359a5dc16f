// backend/src/controllers/__tests__/quizController.test.ts

import { describe, it, expect, vi, beforeEach } from "vitest";
import type { Request, Response } from "express";
import { makeQuizController } from "../quizController";
import { toQuestionRecord } from "../../state/bankLoader";
import { clearSessions, getSession } from "../../storage/sessionStore";
import type { QuestionBank } from "../../types/quiz";

const bank: QuestionBank = {
  dir: "/bank",
  issues: [],
  questions: [
    { course: "Anatomy", chapter: "Bones", qtype: "单选题", question: "Longest bone?", options: ["Femur", "Tibia"], answer: "A" },
    { course: "Anatomy", chapter: "Bones", qtype: "多选题", question: "Leg bones?", options: ["Femur", "Tibia", "Ulna"], answer: "AB" },
    { course: "Physiology", chapter: "Blood", qtype: "简答题", question: "Clotting?", answer: "platelets; fibrin" },
  ].map((raw, i) => toQuestionRecord(raw, i, "bank.json")),
};

function makeRes() {
  const res = {
    locals: {},
    status: vi.fn(),
    json: vi.fn(),
    end: vi.fn(),
  };
  res.status.mockReturnValue(res);
  res.json.mockReturnValue(res);
  res.end.mockReturnValue(res);
  return res;
}

function makeReq(parts: { body?: unknown; params?: Record<string, string> }) {
  return { body: parts.body ?? {}, params: parts.params ?? {} } as unknown as Request;
}

function payloadOf(res: ReturnType<typeof makeRes>) {
  return res.json.mock.calls[0][0];
}

const quiz = makeQuizController({ bank, gradeOptions: { keywordThreshold: 0.8 } });

describe("quizController", () => {
  beforeEach(() => {
    clearSessions();
  });

  it("creates a session on first read with the first course selected", () => {
    const res = makeRes();

    quiz.getQuiz(makeReq({ params: { userId: "u1" } }), res as unknown as Response);

    expect(res.status).toHaveBeenCalledWith(200);
    const { view } = payloadOf(res);
    expect(view.signature).toEqual({ course: "Anatomy", chapter: "all", type: "all" });
    expect(view.total).toBe(2);
    expect(view.question).toMatchObject({ number: 1, prompt: "Longest bone?", input: "radio", disabled: false });
    expect(getSession("u1")).not.toBeNull();
  });

  it("400 when userId is missing", () => {
    const res = makeRes();

    quiz.submit(makeReq({ body: { answer: "Femur" } }), res as unknown as Response);

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json).toHaveBeenCalledWith({ error: "userId is required", code: "INVALID_REQUEST" });
  });

  it("400 for an answer that is neither text nor a list of text", () => {
    const res = makeRes();

    quiz.submit(makeReq({ body: { userId: "u1", answer: { pick: 1 } } }), res as unknown as Response);

    expect(res.status).toHaveBeenCalledWith(400);
    expect(payloadOf(res).code).toBe("INVALID_REQUEST");
  });

  it("grades a submission against a letter answer resolved to option text", () => {
    const res = makeRes();

    quiz.submit(makeReq({ body: { userId: "u1", answer: "Femur" } }), res as unknown as Response);

    expect(res.status).toHaveBeenCalledWith(200);
    const payload = payloadOf(res);
    expect(payload.grade).toEqual({ result: "correct", reasonCode: "EXACT_MATCH" });
    expect(payload.view.score).toBe(1);
    expect(payload.view.phase).toBe("submitted");
  });

  it("422 with a warning when nothing is selected", () => {
    const res = makeRes();

    quiz.submit(makeReq({ body: { userId: "u1" } }), res as unknown as Response);

    expect(res.status).toHaveBeenCalledWith(422);
    const payload = payloadOf(res);
    expect(payload.error).toBe("Choose an option before submitting.");
    expect(payload.code).toBe("NO_SELECTION");
    expect(payload.view.phase).toBe("answering");
  });

  it("409 when moving on before submitting", () => {
    const res = makeRes();

    quiz.next(makeReq({ body: { userId: "u1" } }), res as unknown as Response);

    expect(res.status).toHaveBeenCalledWith(409);
    expect(payloadOf(res).code).toBe("NOT_SUBMITTED");
  });

  it("walks submit, next and reset for one user", () => {
    const userId = "u2";
    quiz.submit(makeReq({ body: { userId, answer: "Tibia" } }), makeRes() as unknown as Response);

    const nextRes = makeRes();
    quiz.next(makeReq({ body: { userId } }), nextRes as unknown as Response);
    expect(payloadOf(nextRes).view.question.prompt).toBe("Leg bones?");

    const multiRes = makeRes();
    quiz.submit(makeReq({ body: { userId, answer: ["Tibia", "Femur"] } }), multiRes as unknown as Response);
    expect(payloadOf(multiRes).grade.result).toBe("correct");
    expect(payloadOf(multiRes).view.score).toBe(1);

    const resetRes = makeRes();
    quiz.reset(makeReq({ body: { userId } }), resetRes as unknown as Response);
    expect(payloadOf(resetRes).view).toMatchObject({ position: 0, score: 0, phase: "answering" });
  });

  it("keeps users isolated", () => {
    quiz.submit(makeReq({ body: { userId: "alice", answer: "Femur" } }), makeRes() as unknown as Response);

    const res = makeRes();
    quiz.getQuiz(makeReq({ params: { userId: "bob" } }), res as unknown as Response);

    expect(payloadOf(res).view).toMatchObject({ score: 0, phase: "answering" });
    expect(getSession("alice")?.active.score).toBe(1);
  });

  it("switches filters and rejects unknown courses", () => {
    const ok = makeRes();
    quiz.selectFilter(
      makeReq({ body: { userId: "u3", course: "Physiology", chapter: "all", type: "short" } }),
      ok as unknown as Response
    );
    expect(ok.status).toHaveBeenCalledWith(200);
    expect(payloadOf(ok).view.question).toMatchObject({ prompt: "Clotting?", input: "text", options: [] });

    const bad = makeRes();
    quiz.selectFilter(makeReq({ body: { userId: "u3", course: "Chemistry" } }), bad as unknown as Response);
    expect(bad.status).toHaveBeenCalledWith(400);
    expect(bad.json).toHaveBeenCalledWith({ error: "Unknown course: Chemistry", code: "INVALID_FILTER" });
  });

  it("DELETE drops the user's progress", () => {
    quiz.submit(makeReq({ body: { userId: "u4", answer: "Femur" } }), makeRes() as unknown as Response);

    const res = makeRes();
    quiz.endSession(makeReq({ params: { userId: "u4" } }), res as unknown as Response);

    expect(res.status).toHaveBeenCalledWith(204);
    expect(res.end).toHaveBeenCalled();
    expect(getSession("u4")).toBeNull();
  });
});
