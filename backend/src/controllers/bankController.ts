// backend/src/controllers/bankController.ts

import type { Request, Response } from "express";
import { ALL } from "../types/quiz";
import type { QuestionBank, QuestionType } from "../types/quiz";
import { filterQuestions, listChapters, listCourses } from "../state/filterEngine";

type TypeCounts = Record<QuestionType, number>;

type CatalogChapter = {
  chapter: string;
  total: number;
  types: TypeCounts;
};

type CatalogCourse = {
  course: string;
  total: number;
  chapters: CatalogChapter[];
};

function countTypes(bank: QuestionBank, course: string, chapter: string): TypeCounts {
  const counts: TypeCounts = { single: 0, multiple: 0, short: 0 };
  for (const q of filterQuestions(bank, { course, chapter, type: ALL })) counts[q.type] += 1;
  return counts;
}

// Diagnostic records are left out; load problems are reported under `issues`.
export function buildCatalog(loaded: QuestionBank): CatalogCourse[] {
  const bank: QuestionBank = { ...loaded, questions: loaded.questions.filter((q) => !q.diagnostic) };
  return listCourses(bank).map((course) => {
    const chapters = listChapters(bank, course).map((chapter) => {
      const types = countTypes(bank, course, chapter);
      return { chapter, total: types.single + types.multiple + types.short, types };
    });
    return {
      course,
      total: chapters.reduce((sum, c) => sum + c.total, 0),
      chapters,
    };
  });
}

// GET /bank/catalog
export function makeBankController(bank: QuestionBank) {
  const getCatalog = (_req: Request, res: Response) => {
    return res.status(200).json({
      courses: buildCatalog(bank),
      totalQuestions: bank.questions.filter((q) => !q.diagnostic).length,
      issues: bank.issues,
    });
  };

  return { getCatalog };
}
