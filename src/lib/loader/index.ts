/**
 * Document loader - reads an OpenAPI document (JSON or YAML) into a SchemaMap
 */

import fs from 'fs/promises';
import { parse } from 'yaml';
import type { SchemaMap, SchemaOrRef } from '../../types/schema.js';
import { DocumentError, FileIOError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { convertSchema, isMap } from './convert.js';

export { convertSchema, referenceName, toJsonValue } from './convert.js';

export interface LoadedDocument {
  path: string;
  /** Raw document text, kept for the report checksum */
  source: string;
  schemas: SchemaMap;
}

/**
 * Parse document text and convert `components.schemas`.
 *
 * Maps are kept as `Map`s while parsing so keys such as `"200"` stay in
 * document order.
 */
export function parseSchemaDocument(source: string, origin = '<input>'): SchemaMap {
  let document: unknown;
  try {
    document = parse(source, { mapAsMap: true });
  } catch (error) {
    throw new DocumentError(`Failed to parse ${origin}`, { origin }, { cause: error });
  }

  if (!isMap(document)) {
    throw new DocumentError(`${origin} is not an OpenAPI document`, { origin });
  }

  const components = document.get('components');
  const rawSchemas = isMap(components) ? components.get('schemas') : undefined;
  const schemas = new Map<string, SchemaOrRef>();

  if (rawSchemas === undefined) {
    logger.warn('Document declares no components.schemas', { origin });
    return schemas;
  }
  if (!isMap(rawSchemas)) {
    throw new DocumentError(`components.schemas in ${origin} is not an object`, { origin });
  }

  for (const [key, value] of rawSchemas) {
    const name = String(key);
    schemas.set(name, convertSchema(value, `#/components/schemas/${name}`));
  }

  logger.debug('Parsed schema document', { origin, schemas: schemas.size });
  return schemas;
}

export async function loadSchemaDocument(path: string): Promise<LoadedDocument> {
  let source: string;
  try {
    source = await fs.readFile(path, 'utf-8');
  } catch (error) {
    throw new FileIOError(`Failed to read ${path}`, { path }, { cause: error });
  }

  const schemas = parseSchemaDocument(source, path);
  logger.info('Loaded schema document', { path, schemas: schemas.size });
  return { path, source, schemas };
}
