#!/usr/bin/env node

import { interruptedError } from "../../sdk/typescript/src/errors.js";
import { runEnrich } from "./lib/run.js";

process.once("SIGINT", () => {
  const err = interruptedError();
  console.error(`\n\n${err.message}`);
  process.exit(err.exitCode);
});

process.exitCode = await runEnrich(process.argv.slice(2));
