/**
 * Configuration loader for generator options
 */

import AjvModule, { type ErrorObject } from "ajv";
import {
  createDefaultOptions,
  type GeneratorOptions,
} from "../types/config.js";
import type { GenerateConfig, SchemawrightConfig } from "../cli/config/types.js";
import { CONFIG_FILE_SCHEMA, GENERATOR_OPTIONS_SCHEMA } from "./config-schema.js";
import { ConfigError } from "./errors.js";
import { logger } from "./logger.js";

// ajv is CommonJS; the class is its `default` export
const Ajv = AjvModule.default;

const ajv = new Ajv({ allErrors: true });
const checkOptions = ajv.compile<GeneratorOptions>(GENERATOR_OPTIONS_SCHEMA);
const checkConfigFile = ajv.compile<SchemawrightConfig>(CONFIG_FILE_SCHEMA);

function describeErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map(
    (error) => `${error.instancePath || "/"} ${error.message ?? "is invalid"}`,
  );
}

/**
 * Check a parsed configuration file against its schema
 *
 * @throws ConfigError listing every violation
 */
export function validateConfigFile(
  config: unknown,
  source: string,
): SchemawrightConfig {
  if (config === null || config === undefined) {
    return {};
  }
  if (!checkConfigFile(config)) {
    const problems = describeErrors(checkConfigFile.errors);
    throw new ConfigError(`Invalid configuration in ${source}`, { problems });
  }
  return config;
}

/**
 * Merge generator options with precedence: CLI > config file > defaults,
 * then validate the result.
 *
 * @example
 * const options = loadGeneratorOptions({ namespace: "Api" }, { namespace: "Models", namingStyle: "camel" });
 * // namespace "Api" (CLI wins), namingStyle "camel" (from the file)
 */
export function loadGeneratorOptions(
  cliOptions: Partial<GeneratorOptions> = {},
  configFile: GenerateConfig = {},
): GeneratorOptions {
  const defaults = createDefaultOptions();

  const options: GeneratorOptions = {
    namingStyle:
      cliOptions.namingStyle ?? configFile.namingStyle ?? defaults.namingStyle,
    immutableArrays:
      cliOptions.immutableArrays ??
      configFile.immutableArrays ??
      defaults.immutableArrays,
    immutableMaps:
      cliOptions.immutableMaps ??
      configFile.immutableMaps ??
      defaults.immutableMaps,
    defaultNonNullable:
      cliOptions.defaultNonNullable ??
      configFile.defaultNonNullable ??
      defaults.defaultNonNullable,
    propagateDefaults:
      cliOptions.propagateDefaults ??
      configFile.propagateDefaults ??
      defaults.propagateDefaults,
    reservedWords:
      cliOptions.reservedWords ??
      configFile.reservedWords ??
      defaults.reservedWords,
    maxCompositionDepth:
      cliOptions.maxCompositionDepth ??
      configFile.maxCompositionDepth ??
      defaults.maxCompositionDepth,
    namespace: cliOptions.namespace ?? configFile.namespace ?? defaults.namespace,
  };

  if (!checkOptions(options)) {
    const problems = describeErrors(checkOptions.errors);
    throw new ConfigError(`Invalid generator options: ${problems.join("; ")}`, {
      problems,
    });
  }

  logger.debug("Generator options loaded", {
    namingStyle: options.namingStyle,
    namespace: options.namespace,
    maxCompositionDepth: options.maxCompositionDepth,
  });

  return options;
}
