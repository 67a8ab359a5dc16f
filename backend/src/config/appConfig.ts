//backend/src/config/appConfig.ts

import fs from "fs";
import path from "path";
import type { FileErrorMode } from "../state/bankLoader";
import { DEFAULT_KEYWORD_THRESHOLD, DEFAULT_SIMILARITY_THRESHOLD } from "../state/answerGrader";

export type AppConfig = {
  port: number;
  bankDir: string;
  onFileError: FileErrorMode;
  keywordThreshold: number;
  similarityThreshold: number;
  corsOrigin: string;
};

type Env = Record<string, string | undefined>;

function readRatio(raw: string | undefined, fallback: number): number {
  const n = Number(String(raw ?? "").trim());
  if (!raw || !Number.isFinite(n) || n <= 0 || n > 1) return fallback;
  return n;
}

function readPort(raw: string | undefined): number {
  const n = Number(String(raw ?? "").trim());
  return raw && Number.isInteger(n) && n > 0 && n < 65536 ? n : 3000;
}

export function resolveBankDir(env: Env, cwd: string = process.cwd()): string {
  const explicit = String(env.QUIZ_BANK_DIR || "").trim();
  if (explicit) return path.resolve(cwd, explicit);

  const candidates = [path.join(cwd, "data"), path.join(cwd, "backend", "data")];
  return candidates.find((dir) => fs.existsSync(dir)) ?? candidates[0];
}

export function loadAppConfig(env: Env = process.env, cwd: string = process.cwd()): AppConfig {
  const onFileError = String(env.QUIZ_BANK_ON_ERROR || "").trim().toLowerCase();

  return {
    port: readPort(env.PORT),
    bankDir: resolveBankDir(env, cwd),
    onFileError: onFileError === "placeholder" ? "placeholder" : "skip",
    keywordThreshold: readRatio(env.QUIZ_KEYWORD_THRESHOLD, DEFAULT_KEYWORD_THRESHOLD),
    similarityThreshold: readRatio(env.QUIZ_SIMILARITY_THRESHOLD, DEFAULT_SIMILARITY_THRESHOLD),
    corsOrigin: String(env.CORS_ORIGIN || "").trim() || "*",
  };
}
