// backend/src/scripts/validateBank.ts

import path from "path";
import { validateBankDir } from "../validation/bankValidator";
import { resolveBankDir } from "../config/appConfig";

type Args = {
  dir: string;
  file?: string;
};

function parseArgs(argv: string[], env: Record<string, string | undefined> = process.env): Args {
  const args: Args = {
    dir: resolveBankDir(env),
  };

  for (let i = 0; i < argv.length; i += 1) {
    const key = argv[i];
    const value = argv[i + 1];
    if (key === "--dir" && value) {
      args.dir = path.resolve(process.cwd(), value);
      i += 1;
      continue;
    }
    if (key === "--file" && value) {
      args.file = value.trim();
      i += 1;
      continue;
    }
  }

  return args;
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const errorsByFile = await validateBankDir(args);

  const filesWithErrors = Object.keys(errorsByFile).sort();
  if (filesWithErrors.length === 0) {
    console.log("OK");
    return;
  }

  for (const file of filesWithErrors) {
    console.log(file);
    for (const err of errorsByFile[file]) {
      console.log(`  - ${err}`);
    }
    console.log("");
  }

  process.exitCode = 1;
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
