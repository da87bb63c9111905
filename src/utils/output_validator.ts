/**
 * @fileoverview Output Validation Utilities
 *
 * Validates structured model replies (entity lists, relevance scores) against
 * zod schemas.
 *
 * @packageDocumentation
 */

import type { ZodType, ZodTypeDef } from 'zod';

// ============================================================================
// TYPES
// ============================================================================

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: string; details: string[] };

// ============================================================================
// ERRORS
// ============================================================================

export class OutputValidationError extends Error {
  constructor(
    message: string,
    public readonly details: string[] = [],
    public readonly rawOutput?: string,
  ) {
    super(message);
    this.name = 'OutputValidationError';
  }
}

// ============================================================================
// VALIDATORS
// ============================================================================

/**
 * Validate JSON against a Zod schema
 */
export function validateJSON<T>(
  json: unknown,
  schema: ZodType<T, ZodTypeDef, unknown>,
): ValidationResult<T> {
  const parsed = schema.safeParse(json);
  if (parsed.success) {
    return { success: true, data: parsed.data };
  }
  return {
    success: false,
    error: 'Schema validation failed',
    details: parsed.error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`),
  };
}

/**
 * Validate string is valid JSON and matches schema
 */
export function validateJSONString<T>(
  text: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
): ValidationResult<T> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return {
      success: false,
      error: 'Invalid JSON',
      details: ['Could not parse as JSON'],
    };
  }
  return validateJSON(parsed, schema);
}

/**
 * Extract JSON from a model reply (handles markdown code blocks)
 */
export function extractJSON(text: string): string {
  const jsonBlockMatch = text.match(/```(?:json)?\s*\n?([\s\S]*?)\n?```/);
  if (jsonBlockMatch) {
    return jsonBlockMatch[1].trim();
  }

  const objectMatch = text.match(/\{[\s\S]*\}/);
  const arrayMatch = text.match(/\[[\s\S]*\]/);
  // Whichever structure opens first is the outermost one.
  if (objectMatch && arrayMatch) {
    return (objectMatch.index ?? 0) <= (arrayMatch.index ?? 0) ? objectMatch[0] : arrayMatch[0];
  }
  if (objectMatch) return objectMatch[0];
  if (arrayMatch) return arrayMatch[0];

  return text.trim();
}

/**
 * Validate a model reply and extract typed data
 *
 * @throws OutputValidationError when no schema-conforming JSON is found
 */
export function validateLLMOutput<T>(
  output: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
): T {
  const extracted = extractJSON(output);
  const result = validateJSONString(extracted, schema);

  if (!result.success) {
    throw new OutputValidationError(result.error, result.details, output);
  }

  return result.data;
}
