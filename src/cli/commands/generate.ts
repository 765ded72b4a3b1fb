import { Command, InvalidArgumentError } from "commander";
import { loadSchemaDocument } from "../../lib/loader/index.js";
import { GenerationReporter } from "../../lib/reporter/index.js";
import { synthesize } from "../../lib/synthesizer/index.js";
import type { GeneratorOptions, NamingStyle } from "../../types/config.js";
import { loadGeneratorOptions } from "../../utils/config-loader.js";
import { logger } from "../../utils/logger.js";
import { VERSION } from "../../version.js";
import { parseConfigFile } from "../config/parser.js";
import type { GenerateCommandOptions, GenerateConfig } from "../config/types.js";
import { handleCommandError, printResult } from "../output.js";

export function parseNamingStyle(value: string): NamingStyle {
  if (value === "pascal" || value === "camel") {
    return value;
  }
  throw new InvalidArgumentError('Expected "pascal" or "camel".');
}

function parsePositiveInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

/**
 * Options the user actually passed, as generator overrides. Negated flags
 * (`--no-default-values`) only count when given, so a config file can still
 * set them.
 */
export function toGeneratorOverrides(
  opts: GenerateCommandOptions,
  command: Command,
): Partial<GeneratorOptions> {
  const given = (key: string): boolean =>
    command.getOptionValueSource(key) === "cli";

  const overrides: Partial<GeneratorOptions> = {};
  if (opts.namespace !== undefined) {
    overrides.namespace = opts.namespace;
  }
  if (opts.namingStyle !== undefined) {
    overrides.namingStyle = opts.namingStyle;
  }
  if (opts.mutableArrays) {
    overrides.immutableArrays = false;
  }
  if (opts.mutableMaps) {
    overrides.immutableMaps = false;
  }
  if (given("defaultNonNullable")) {
    overrides.defaultNonNullable = opts.defaultNonNullable;
  }
  if (given("defaultValues")) {
    overrides.propagateDefaults = opts.defaultValues;
  }
  if (opts.maxDepth !== undefined) {
    overrides.maxCompositionDepth = opts.maxDepth;
  }
  return overrides;
}

/**
 * Create generate command
 * @returns Commander Command
 */
export function createGenerateCommand(): Command {
  return new Command("generate")
    .description("Synthesize declarations for the schemas of an OpenAPI document")
    .argument("<input>", "OpenAPI document (JSON or YAML)")
    .option("-o, --output <path>", "Write the report to a file instead of stdout")
    .option("--config <path>", "Path to configuration file (JSON/YAML)")
    .option("--namespace <namespace>", "Namespace qualifying enum member defaults")
    .option("--naming-style <style>", "Identifier casing: pascal or camel", parseNamingStyle)
    .option("--mutable-arrays", "Use List<T> instead of IReadOnlyList<T>")
    .option("--mutable-maps", "Use Dictionary<string, T> instead of IReadOnlyDictionary<string, T>")
    .option("--no-default-non-nullable", "Keep optional members nullable even when they have a default")
    .option("--no-default-values", "Emit placeholders instead of schema defaults")
    .option("--max-depth <number>", "Deepest composition chain to follow", parsePositiveInteger)
    .action(async (input: string, opts: GenerateCommandOptions, command: Command) => {
      try {
        let fileConfig: GenerateConfig = {};
        if (opts.config !== undefined) {
          fileConfig = parseConfigFile(opts.config).generate ?? {};
        }

        const options = loadGeneratorOptions(toGeneratorOverrides(opts, command), fileConfig);
        const document = await loadSchemaDocument(input);
        const result = synthesize(document.schemas, options);

        const reporter = new GenerationReporter(VERSION);
        const report = reporter.build(result, document, options);

        const output = opts.output ?? fileConfig.output;
        if (output === undefined) {
          printResult(report);
          return;
        }

        await reporter.save(report, output);
        logger.info("Generation complete", { output, declarations: report.summary.declarations });
        printResult({
          status: "success",
          phase: "generation",
          output: { path: output },
          summary: report.summary,
        });
      } catch (error) {
        handleCommandError(error, "generation");
      }
    });
}
