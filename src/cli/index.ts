#!/usr/bin/env node

import { createProgram } from "./program.js";
import { logger } from "../utils/logger.js";

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.error("Unexpected error", {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exitCode = 1;
  });
