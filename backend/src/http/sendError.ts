// backend/src/http/sendError.ts

import type { Response } from "express";

export function getRequestId(res: Response): string | undefined {
  const requestId: unknown = res.locals?.requestId;
  return typeof requestId === "string" && requestId.trim() ? requestId : undefined;
}

export function sendError(
  res: Response,
  status: number,
  message: string,
  code?: string,
  extra?: Record<string, unknown>
): Response {
  const requestId = getRequestId(res);

  return res.status(status).json({
    error: message,
    ...(code ? { code } : {}),
    ...(extra ?? {}),
    ...(requestId ? { requestId } : {}),
  });
}
