/**
 * CLI configuration types
 */

import type { NamingStyle } from '../../types/config.js';

/**
 * `generate` section of a configuration file
 */
export interface GenerateConfig {
  namespace?: string;
  namingStyle?: NamingStyle;
  immutableArrays?: boolean;
  immutableMaps?: boolean;
  defaultNonNullable?: boolean;
  propagateDefaults?: boolean;
  maxCompositionDepth?: number;
  reservedWords?: string[];
  /** Report path; stdout when absent */
  output?: string;
}

/**
 * Complete configuration file structure
 */
export interface SchemawrightConfig {
  generate?: GenerateConfig;
}

/**
 * CLI command options (from commander)
 */
export interface GenerateCommandOptions {
  output?: string;
  config?: string;
  namespace?: string;
  namingStyle?: NamingStyle;
  mutableArrays?: boolean;
  mutableMaps?: boolean;
  defaultNonNullable?: boolean;
  defaultValues?: boolean;
  maxDepth?: number;
}

export interface NamesCommandOptions {
  namingStyle?: NamingStyle;
}
