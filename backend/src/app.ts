// backend/src/app.ts

import express from "express";
import type { NextFunction, Request, Response } from "express";
import cors from "cors";
import type { QuestionBank } from "./types/quiz";
import type { AppConfig } from "./config/appConfig";
import { createQuizRouter } from "./routes/quiz";
import { createBankRouter } from "./routes/bank";
import { requestContextMiddleware } from "./middleware/requestContext";
import { errorEnvelopeMiddleware } from "./middleware/errorEnvelope";
import { sendError, getRequestId } from "./http/sendError";
import { logServerError } from "./utils/logger";

export type AppDeps = {
  bank: QuestionBank;
  config: Pick<AppConfig, "corsOrigin" | "keywordThreshold" | "similarityThreshold">;
};

export function createApp({ bank, config }: AppDeps) {
  const app = express();

  app.use(requestContextMiddleware);
  app.use(errorEnvelopeMiddleware);

  app.use(
    cors({
      origin: config.corsOrigin,
      methods: ["GET", "POST", "DELETE"],
    })
  );

  //body size limit
  app.use(express.json({ limit: "1mb" }));

  app.get("/health", (_req, res) => res.status(200).json({ status: "ok" }));

  app.use("/bank", createBankRouter(bank));
  app.use(
    "/quiz",
    createQuizRouter({
      bank,
      gradeOptions: {
        keywordThreshold: config.keywordThreshold,
        similarityThreshold: config.similarityThreshold,
      },
    })
  );

  //404
  app.use((_req: Request, res: Response) => sendError(res, 404, "Not Found", "NOT_FOUND"));

  //error handler
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    logServerError("unhandled_error", err, getRequestId(res));
    if (res.headersSent) return next(err);
    return sendError(res, 500, "Server error", "SERVER_ERROR");
  });

  return app;
}
