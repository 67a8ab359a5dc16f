// backend/src/middleware/errorEnvelope.ts

import type { Request, Response, NextFunction } from "express";
import { getRequestId } from "../http/sendError";

function isErrorPayload(body: unknown): body is { error: unknown } {
  return typeof body === "object" && body !== null && !Array.isArray(body) && "error" in body;
}

// Stamps the request id onto every error body, including ones built without sendError.
export function errorEnvelopeMiddleware(_req: Request, res: Response, next: NextFunction) {
  const originalJson = res.json.bind(res);

  res.json = (body?: unknown) => {
    const requestId = getRequestId(res);
    if (isErrorPayload(body) && requestId) {
      return originalJson({ ...body, requestId });
    }
    return originalJson(body);
  };

  next();
}

export default errorEnvelopeMiddleware;
