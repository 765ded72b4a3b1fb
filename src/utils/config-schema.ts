/**
 * JSON Schemas for generator options and configuration files
 */

import type { SchemaObject } from 'ajv';

const generatorOptionProperties = {
  namespace: { type: 'string', pattern: '^$|^[A-Za-z_][A-Za-z0-9_]*(\\.[A-Za-z_][A-Za-z0-9_]*)*$' },
  namingStyle: { type: 'string', enum: ['pascal', 'camel'] },
  immutableArrays: { type: 'boolean' },
  immutableMaps: { type: 'boolean' },
  defaultNonNullable: { type: 'boolean' },
  propagateDefaults: { type: 'boolean' },
  maxCompositionDepth: { type: 'integer', minimum: 1, maximum: 1024 },
  reservedWords: { type: 'array', items: { type: 'string', minLength: 1 } },
};

export const GENERATOR_OPTIONS_SCHEMA: SchemaObject = {
  type: 'object',
  properties: generatorOptionProperties,
  required: Object.keys(generatorOptionProperties),
  additionalProperties: false,
};

export const CONFIG_FILE_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    generate: {
      type: 'object',
      properties: {
        ...generatorOptionProperties,
        output: { type: 'string', minLength: 1 },
      },
      additionalProperties: false,
    },
  },
  additionalProperties: false,
};
