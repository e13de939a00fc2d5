#!/usr/bin/env node
import { createProgram } from "./program.js";
import { ExitCodes } from "./errors.js";
import { error } from "./ui.js";

createProgram()
  .parseAsync()
  .catch((e: unknown) => {
    error(e instanceof Error ? e.message : "Unexpected error");
    process.exit(ExitCodes.Failure);
  });
