/**
 * Form Field Extractor
 *
 * Pattern-based scraping of the configured field schema from raw document
 * text. First match wins within a field; fields are independent of each other.
 */

import type { FieldName, FieldSet } from '../types';
import { FIELD_PATTERNS } from './field-patterns';

export class FieldExtractor {
  constructor(private readonly schema: readonly FieldName[]) {}

  extractFields(rawText: string): FieldSet {
    const fields: Partial<Record<FieldName, string | null>> = {};

    for (const name of this.schema) {
      fields[name] = extractField(rawText, name);
    }

    return fields;
  }
}

/**
 * Extract a single field value, or null when the label is absent or the
 * captured value is blank.
 */
export function extractField(rawText: string, name: FieldName): string | null {
  const match = FIELD_PATTERNS[name].exec(rawText);
  const value = match?.[1]?.trim();
  return value ? value : null;
}

/**
 * Share of schema fields holding a non-blank value
 */
export function fieldCompleteness(fields: FieldSet, schema: readonly FieldName[]): number {
  if (schema.length === 0) return 0;
  const filled = schema.filter((name) => isFilled(fields[name])).length;
  return filled / schema.length;
}

export function isFilled(value: string | null | undefined): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}
