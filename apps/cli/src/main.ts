#!/usr/bin/env -S npx tsx
import { EXIT_CODE_ERROR, runCli } from "./index";

runCli(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    const details = error instanceof Error ? error.stack ?? error.message : String(error);
    console.error(`[cli] unexpected failure: ${details}`);
    process.exitCode = EXIT_CODE_ERROR;
  });
