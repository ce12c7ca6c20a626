#!/usr/bin/env node
// src/index.ts
import { errMessage } from "./domain/errors";
import { validateEnvironment } from "./env";

async function start(): Promise<number> {
  try {
    validateEnvironment();
  } catch (err) {
    process.stderr.write(`${errMessage(err)}\n`);
    return 1;
  }

  // loaded after validation: the logger reads the environment on import
  const { main } = await import("./cli/main");
  return main();
}

start().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    process.stderr.write(`Fatal: ${errMessage(err)}\n`);
    process.exitCode = 1;
  }
);
