// backend/src/routes/bank.ts

import { Router } from "express";
import type { QuestionBank } from "../types/quiz";
import { makeBankController } from "../controllers/bankController";

export function createBankRouter(bank: QuestionBank): Router {
  const router = Router();
  const { getCatalog } = makeBankController(bank);

  router.get("/catalog", getCatalog);

  return router;
}
