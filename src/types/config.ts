/**
 * Generator configuration, constant for one run
 */

import { loadCSharpKeywords } from '../lib/naming/reserved-words.js';

export type NamingStyle = 'pascal' | 'camel';

export interface GeneratorOptions {
  /** Casing applied to every canonical identifier */
  namingStyle: NamingStyle;
  /** `IReadOnlyList<T>` instead of `List<T>` for arrays */
  immutableArrays: boolean;
  /** `IReadOnlyDictionary<string, T>` instead of `Dictionary<string, T>` for maps */
  immutableMaps: boolean;
  /** An optional member with a non-null default is treated as non-nullable */
  defaultNonNullable: boolean;
  /** Render schema defaults into member initializers; when off, a placeholder is used */
  propagateDefaults: boolean;
  reservedWords: readonly string[];
  /** Deepest reference expansion / composition chain followed before giving up */
  maxCompositionDepth: number;
  /** Namespace used to qualify enumeration members in default expressions */
  namespace: string;
}

export function createDefaultOptions(): GeneratorOptions {
  return {
    namingStyle: 'pascal',
    immutableArrays: true,
    immutableMaps: true,
    defaultNonNullable: true,
    propagateDefaults: true,
    reservedWords: loadCSharpKeywords(),
    maxCompositionDepth: 32,
    namespace: 'GeneratedModels',
  };
}

export function resolveOptions(overrides: Partial<GeneratorOptions> = {}): GeneratorOptions {
  const defaults = createDefaultOptions();
  return {
    namingStyle: overrides.namingStyle ?? defaults.namingStyle,
    immutableArrays: overrides.immutableArrays ?? defaults.immutableArrays,
    immutableMaps: overrides.immutableMaps ?? defaults.immutableMaps,
    defaultNonNullable: overrides.defaultNonNullable ?? defaults.defaultNonNullable,
    propagateDefaults: overrides.propagateDefaults ?? defaults.propagateDefaults,
    reservedWords: overrides.reservedWords ?? defaults.reservedWords,
    maxCompositionDepth: overrides.maxCompositionDepth ?? defaults.maxCompositionDepth,
    namespace: overrides.namespace ?? defaults.namespace,
  };
}
