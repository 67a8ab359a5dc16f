//  backend/src/routes/quiz.ts

import { Router } from "express";
import { makeQuizController } from "../controllers/quizController";
import type { QuizControllerDeps } from "../controllers/quizController";

export function createQuizRouter(deps: QuizControllerDeps): Router {
    const router = Router();
    const quiz = makeQuizController(deps);

    router.post("/filter", quiz.selectFilter);
    router.post("/submit", quiz.submit);
    router.post("/next", quiz.next);
    router.post("/reset", quiz.reset);

    // after the POST routes so "/filter" etc. are never read as a user id
    router.get("/:userId", quiz.getQuiz);
    router.delete("/:userId", quiz.endSession);

    return router;
}
