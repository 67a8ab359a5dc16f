// backend/src/state/__tests__/answerGrader.test.ts

import { describe, it, expect } from "vitest";
import { extractKeywordFragments, gradeAnswer, toChoiceSelection, validateSubmission } from "../answerGrader";
import { parseStoredAnswer } from "../bankLoader";
import type { StoredAnswer } from "../../types/quiz";

const none: StoredAnswer = { kind: "none" };

describe("gradeAnswer - single choice", () => {
  it("marks a different option as incorrect", () => {
    const r = gradeAnswer("single", "B", parseStoredAnswer("single", "A"));
    expect(r.result).toBe("incorrect");
    expect(r.reasonCode).toBe("MISMATCH");
  });

  it("marks the stored option as correct", () => {
    expect(gradeAnswer("single", "A", parseStoredAnswer("single", "A")).result).toBe("correct");
  });

  it("ignores surrounding whitespace and full-width punctuation", () => {
    const stored = parseStoredAnswer("single", "C．细胞膜（外层）");
    expect(gradeAnswer("single", "  C.细胞膜(外层) ", stored).result).toBe("correct");
  });

  it("is ungraded without a stored answer", () => {
    expect(gradeAnswer("single", "A", none)).toEqual({ result: "ungraded", reasonCode: "NO_STORED_ANSWER" });
  });
});

describe("gradeAnswer - multiple choice", () => {
  it("compares selections as a set", () => {
    const r = gradeAnswer("multiple", ["A", "B"], parseStoredAnswer("multiple", ["B", "A"]));
    expect(r).toEqual({ result: "correct", reasonCode: "SET_MATCH" });
  });

  it("splits a delimited stored answer", () => {
    const stored = parseStoredAnswer("multiple", "血液凝固，分娩；排尿反射");
    expect(gradeAnswer("multiple", ["排尿反射", "分娩", "血液凝固"], stored).result).toBe("correct");
  });

  it("rejects a subset of the correct options", () => {
    const stored = parseStoredAnswer("multiple", "ACD");
    expect(gradeAnswer("multiple", ["A", "C"], stored).result).toBe("incorrect");
  });

  it("rejects an extra option", () => {
    const stored = parseStoredAnswer("multiple", ["A", "C"]);
    expect(gradeAnswer("multiple", ["A", "B", "C"], stored).result).toBe("incorrect");
  });

  it("is ungraded for an empty stored answer", () => {
    const stored = parseStoredAnswer("multiple", []);
    expect(gradeAnswer("multiple", ["A"], stored).result).toBe("ungraded");
  });
});

describe("gradeAnswer - short answer", () => {
  const stored = parseStoredAnswer("short", "肝脏;合成蛋白质;分泌胆汁");

  it("is incorrect when only two of three keywords are covered", () => {
    const r = gradeAnswer("short", "肝脏合成蛋白质", stored);
    expect(r).toEqual({ result: "incorrect", reasonCode: "MISMATCH", matched: 2, total: 3 });
  });

  it("is correct when every keyword is covered", () => {
    const r = gradeAnswer("short", "肝脏能合成蛋白质，还能分泌胆汁", stored);
    expect(r).toEqual({ result: "correct", reasonCode: "KEYWORD_COVERAGE", matched: 3, total: 3 });
  });

  it("honours a configured keyword threshold", () => {
    const r = gradeAnswer("short", "肝脏合成蛋白质", stored, { keywordThreshold: 0.6 });
    expect(r.result).toBe("correct");
  });

  it("accepts an exact match after normalization", () => {
    const r = gradeAnswer("short", "  Negative   Feedback ", parseStoredAnswer("short", "negative feedback"));
    expect(r).toEqual({ result: "correct", reasonCode: "EXACT_MATCH" });
  });

  it("treats an empty submission as incorrect once an answer exists", () => {
    expect(gradeAnswer("short", "   ", stored)).toEqual({ result: "incorrect", reasonCode: "EMPTY_ANSWER" });
  });

  it("is ungraded when the stored answer is marked as missing", () => {
    expect(gradeAnswer("short", "随便写点", parseStoredAnswer("short", "（暂无答案）")).result).toBe("ungraded");
    expect(gradeAnswer("short", "", parseStoredAnswer("short", "")).result).toBe("ungraded");
  });

  it("reads punctuated and prefixed no-answer markers as missing", () => {
    for (const marker of ["暂无答案。", "略。", "无。", "(暂无)", "【暂无】", "答案：略"]) {
      expect(gradeAnswer("short", "随便写点", parseStoredAnswer("short", marker))).toEqual({
        result: "ungraded",
        reasonCode: "NO_STORED_ANSWER",
      });
    }
  });

  it("still grades answers that merely contain a marker word", () => {
    expect(gradeAnswer("short", "随便写点", parseStoredAnswer("short", "无氧呼吸")).result).toBe("incorrect");
  });

  it("falls back to similarity when the answer has no usable keywords", () => {
    const single = parseStoredAnswer("short", "是");
    expect(gradeAnswer("short", "否", single)).toEqual({ result: "incorrect", reasonCode: "MISMATCH" });
  });

  it("returns the same result on repeated calls", () => {
    const first = gradeAnswer("short", "肝脏合成蛋白质", stored);
    const second = gradeAnswer("short", "肝脏合成蛋白质", stored);
    expect(second).toEqual(first);
  });
});

describe("toChoiceSelection", () => {
  const options = ["A. 排尿反射", "B. 排便反射", "C. 膝跳反射"];

  it("wraps a multiple-choice string that names one option", () => {
    const picked = toChoiceSelection("multiple", "A. 排尿反射", options);
    expect(picked).toEqual(["A. 排尿反射"]);
    expect(gradeAnswer("multiple", picked, parseStoredAnswer("multiple", ["A. 排尿反射"]))).toEqual({
      result: "correct",
      reasonCode: "SET_MATCH",
    });
  });

  it("leaves delimited lists and other question types alone", () => {
    expect(toChoiceSelection("multiple", "A. 排尿反射, B. 排便反射", options)).toBe("A. 排尿反射, B. 排便反射");
    expect(toChoiceSelection("single", "A. 排尿反射", options)).toBe("A. 排尿反射");
    expect(toChoiceSelection("multiple", ["C. 膝跳反射"], options)).toEqual(["C. 膝跳反射"]);
  });
});

describe("extractKeywordFragments", () => {
  it("drops one-character and placeholder fragments", () => {
    expect(extractKeywordFragments("钾离子外流，A；见解析；钠钾泵")).toEqual(["钾离子外流", "钠钾泵"]);
  });
});

describe("validateSubmission", () => {
  it("blocks single choice without a selection", () => {
    expect(validateSubmission("single", "")?.code).toBe("NO_SELECTION");
    expect(validateSubmission("single", "A")).toBeNull();
  });

  it("blocks multiple choice with zero selections", () => {
    expect(validateSubmission("multiple", [])?.code).toBe("NO_SELECTIONS");
    expect(validateSubmission("multiple", ["  "])?.code).toBe("NO_SELECTIONS");
    expect(validateSubmission("multiple", ["A"])).toBeNull();
  });

  it("always accepts short answers", () => {
    expect(validateSubmission("short", "")).toBeNull();
  });
});
