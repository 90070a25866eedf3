/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for Judge responses and persisted validation runs.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import type { SchemaObject, ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { logger } from './logger';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false, // Allow additional keywords from JSON Schema draft
  allErrors: true,
  verbose: true,
});
addFormats(ajv);

export const SCHEMA_FILES = {
  judgeVerdict: 'judge_verdict.schema.json',
  validationRun: 'validation_run.schema.json',
} as const;

const loaded = new Map<string, SchemaObject>();

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function loadSchema(schemaName: string): SchemaObject {
  // Try multiple paths for schema resolution
  const possiblePaths = [
    // Relative to shared package in development
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // Relative to shared package dist
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    // Relative to project root (for Docker containers)
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  for (const schemaPath of possiblePaths) {
    if (fs.existsSync(schemaPath)) {
      const content = fs.readFileSync(schemaPath, 'utf-8');
      const parsed: unknown = JSON.parse(content);
      if (!isSchemaObject(parsed)) {
        throw new Error(`Schema file is not a JSON object: ${schemaPath}`);
      }
      return parsed;
    }
  }

  throw new Error(`Schema file not found: ${schemaName} (searched ${possiblePaths.join(', ')})`);
}

/**
 * Compile (once) the validator for a contract schema
 */
export function getValidator<T>(schemaName: string): ValidateFunction<T> {
  let schema = loaded.get(schemaName);
  if (!schema) {
    schema = loadSchema(schemaName);
    loaded.set(schemaName, schema);
  }
  // Ajv caches the compiled function per schema object
  return ajv.compile<T>(schema);
}

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

export function formatSchemaErrors(validate: ValidateFunction<unknown>): string[] {
  return (validate.errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message}`);
}

/**
 * Validate a persisted validation run against validation_run.schema.json
 */
export function validateValidationRun(data: unknown): ValidationResult {
  const validate = getValidator(SCHEMA_FILES.validationRun);
  const valid = validate(data);

  if (!valid) {
    const errors = formatSchemaErrors(validate);
    logger.warn('ValidationRun validation failed', { errors });
    return { valid: false, errors };
  }

  return { valid: true };
}
