//backend/src/middleware/__tests__/errorEnvelope.test.ts

import { describe, it, expect, vi } from "vitest";
import type { Request, Response } from "express";
import { errorEnvelopeMiddleware } from "../errorEnvelope";

function makeRes(locals: Record<string, unknown>) {
  const res = { locals, json: vi.fn() };
  res.json.mockReturnValue(res);
  return res;
}

describe("errorEnvelopeMiddleware", () => {
  it("adds requestId to error payloads", () => {
    const res = makeRes({ requestId: "rid-test" });
    const originalJson = res.json;
    const next = vi.fn();

    errorEnvelopeMiddleware({} as Request, res as unknown as Response, next);
    res.json({ error: "No questions match this filter.", code: "NO_QUESTIONS" });

    expect(originalJson).toHaveBeenCalledWith({
      error: "No questions match this filter.",
      code: "NO_QUESTIONS",
      requestId: "rid-test",
    });
    expect(next).toHaveBeenCalled();
  });

  it("does not touch non-error payloads", () => {
    const res = makeRes({ requestId: "rid-test" });
    const originalJson = res.json;

    errorEnvelopeMiddleware({} as Request, res as unknown as Response, () => {});
    res.json({ view: { total: 3 } });

    expect(originalJson).toHaveBeenCalledWith({ view: { total: 3 } });
  });

  it("leaves error payloads alone when there is no request id", () => {
    const res = makeRes({});
    const originalJson = res.json;

    errorEnvelopeMiddleware({} as Request, res as unknown as Response, () => {});
    res.json({ error: "Not Found" });

    expect(originalJson).toHaveBeenCalledWith({ error: "Not Found" });
  });
});
