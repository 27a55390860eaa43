#!/usr/bin/env node
import { buildProgram } from "./cli/program.js";
import { formatErrorMessage } from "./infra/errors.js";
import { defaultRuntime } from "./runtime.js";

void buildProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    defaultRuntime.error(formatErrorMessage(err));
    defaultRuntime.exit(1);
  });
