/**
 * Schema validation helpers and the error types raised by the I/O layer.
 */

import { z } from 'zod';

export class ValidationError extends Error {
  constructor(message: string, public issues: z.ZodIssue[]) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class StorageError extends Error {
  constructor(message: string, public readonly key: string) {
    super(message);
    this.name = 'StorageError';
  }
}

export class JudgeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'JudgeError';
  }
}

/**
 * Validate data against a schema
 */
export function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ValidationError(
      `Validation failed: ${result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join(', ')}`,
      result.error.issues
    );
  }
  return result.data;
}

/**
 * Parse JSON with validation
 */
export function parseJSON<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, jsonString: string): T {
  let data: unknown;
  try {
    data = JSON.parse(jsonString);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ValidationError(`Invalid JSON: ${error.message}`, []);
    }
    throw error;
  }
  return validate(schema, data);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
