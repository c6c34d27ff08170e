#!/usr/bin/env node
/**
 * Trivia quiz CLI
 *
 * Usage:
 *   npm start                    # every question in the catalog
 *   npm start -- 5               # five random questions
 *   npm start -- --seed demo     # replayable order
 *   npm start -- --questions ./my-catalog.json
 */

import { buildProgram } from "./quizCli";

buildProgram()
  .parseAsync(process.argv)
  .catch((e: unknown) => {
    console.error(e instanceof Error ? e.message : String(e));
    process.exitCode = 1;
  });
