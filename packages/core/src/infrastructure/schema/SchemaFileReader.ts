import { readFile } from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';
import type { Schema } from '../../domain/model/Schema.js';
import { SchemaDefinitionError, SchemaReadError } from '../../domain/errors/SchemaDefinitionError.js';
import { SchemaValidator } from '../../domain/services/SchemaValidator.js';

/**
 * Read a schema document from disk. YAML and JSON are both accepted, JSON
 * being a subset of YAML. Documents are read as YAML 1.1, so `yes` and `no`
 * are booleans.
 *
 * @returns The document as a nested mapping, not yet validated.
 * @throws SchemaReadError when the file cannot be read or parsed.
 */
export async function readSchemaFile(path: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new SchemaReadError(path, error instanceof Error ? error.message : String(error), { cause: error });
  }

  try {
    return parseYaml(text, { version: '1.1' });
  } catch (error) {
    throw new SchemaReadError(path, error instanceof Error ? error.message : String(error), { cause: error });
  }
}

/**
 * Read and validate a schema document.
 *
 * @throws SchemaReadError when the file cannot be read or parsed.
 * @throws SchemaDefinitionError when the document is empty or malformed.
 */
export async function loadSchemaFile(path: string): Promise<Schema> {
  const definition = await readSchemaFile(path);
  const schema = new SchemaValidator().validate(definition);

  if (schema === undefined) {
    throw new SchemaDefinitionError('STRUCTURE', `Schema document '${path}' is empty`);
  }
  return schema;
}
