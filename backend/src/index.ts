// backend/src/index.ts
// backend entry file: load the bank once, then serve quiz sessions

import "dotenv/config";
import { loadAppConfig } from "./config/appConfig";
import { loadQuestionBank, LoadFailure } from "./state/bankLoader";
import type { QuestionBank } from "./types/quiz";
import { createApp } from "./app";
import { logInfo, logServerError } from "./utils/logger";

const config = loadAppConfig();

let bank: QuestionBank;
try {
  bank = loadQuestionBank(config.bankDir, { onFileError: config.onFileError });
} catch (err) {
  logServerError("bank_load_failed", err);
  if (err instanceof LoadFailure) {
    console.error(`Question bank could not be loaded: ${err.message}`);
    console.error(err.remediation);
  }
  process.exit(1);
}

const app = createApp({ bank, config });

app.listen(config.port, () => {
  logInfo("server_started", { port: config.port, bankDir: config.bankDir, questions: bank.questions.length });
});
