/**
 * schemawright CLI - OpenAPI schemas to C# declarations
 */

import { Command, InvalidArgumentError } from "commander";
import { createGenerateCommand } from "./commands/generate.js";
import { createNamesCommand } from "./commands/names.js";
import { isLogLevel, logger, type LogLevel } from "../utils/logger.js";
import { VERSION } from "../version.js";

const pkg = {
  name: "schemawright",
  description: "Resolve OpenAPI schema graphs into conflict-free C# declarations",
};

function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new InvalidArgumentError("Expected one of: error, warn, info, debug.");
  }
  return value;
}

/**
 * Main CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name(pkg.name)
    .description(pkg.description)
    .version(VERSION)
    .option("--log-level <level>", "Logging verbosity: error, warn, info, debug", parseLogLevel, "info")
    .hook("preAction", (thisCommand) => {
      logger.setLevel(thisCommand.opts<{ logLevel: LogLevel }>().logLevel);
    });

  program.addCommand(createGenerateCommand());
  program.addCommand(createNamesCommand());

  return program;
}
