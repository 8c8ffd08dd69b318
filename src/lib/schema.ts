/**
 * JSON Schema validation using Ajv.
 *
 * Schemas live in the bundled asset dir and are compiled once per process.
 */

import AjvDefault from 'ajv';
import type { ValidateFunction } from 'ajv';
import { readFile } from 'node:fs/promises';

/**
 * Result of schema validation.
 */
export interface ValidationResult<T> {
  valid: boolean;
  /** Typed data if valid, null otherwise */
  data: T | null;
  /** `path: message` lines if invalid */
  errors: string[];
}

const schemaCache = new Map<string, ValidateFunction>();
const fileCache = new Map<string, object>();

function isObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Loads and parses a JSON schema file (cached by path).
 *
 * @throws Error if the schema file cannot be read or parsed
 */
export async function loadSchema(schemaPath: string): Promise<object> {
  const cached = fileCache.get(schemaPath);
  if (cached) return cached;
  try {
    const parsed: unknown = JSON.parse(await readFile(schemaPath, 'utf-8'));
    if (!isObject(parsed)) {
      throw new Error('schema is not a JSON object');
    }
    fileCache.set(schemaPath, parsed);
    return parsed;
  } catch (error) {
    throw new Error(
      `Failed to load schema from ${schemaPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

function compile(schema: object): ValidateFunction {
  const schemaId = '$id' in schema && typeof schema.$id === 'string' ? schema.$id : JSON.stringify(schema);
  const cached = schemaCache.get(schemaId);
  if (cached) return cached;

  // Type assertion needed due to NodeNext module resolution
  const Ajv = AjvDefault as unknown as new (options?: { strict?: boolean; allErrors?: boolean }) => {
    compile: (schema: object) => ValidateFunction;
  };
  const validate = new Ajv({ strict: true, allErrors: true }).compile(schema);
  schemaCache.set(schemaId, validate);
  return validate;
}

/**
 * Validates data against a JSON schema.
 */
export function validateWithSchema<T>(data: unknown, schema: object): ValidationResult<T> {
  const validate = compile(schema);
  if (validate(data)) {
    return { valid: true, data: data as T, errors: [] };
  }

  const errors = (validate.errors ?? []).map((error) => {
    const path = error.instancePath || error.schemaPath || '';
    return `${path ? `${path}: ` : ''}${error.message ?? 'Validation error'}`;
  });
  return { valid: false, data: null, errors };
}
