#!/usr/bin/env node
import { createContext } from "./context.js";
import { FuxiError, errorMessage } from "./errors.js";
import { createProgram } from "./program.js";
import { error, sanitizeUrls } from "./ui.js";

async function main(): Promise<void> {
  await createProgram(createContext()).parseAsync();
}

main().catch((e: unknown) => {
  error(sanitizeUrls(errorMessage(e)));
  process.exitCode = e instanceof FuxiError ? e.exitCode : 1;
});
