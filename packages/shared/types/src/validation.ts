/**
 * Schema Validation Helpers
 *
 * Runtime shape checks with TypeBox schemas. Used at the boundary where
 * decoded configuration enters typed code.
 */

import { TypeCompiler, type TypeCheck } from '@sinclair/typebox/compiler';
import type { ValueError } from '@sinclair/typebox/value';
import type { TSchema, Static } from '@sinclair/typebox';

// ============================================================================
// Validation Error Types
// ============================================================================

/**
 * Validation error with detailed information
 */
export interface ValidationError {
  /** Field path that failed validation */
  path: string;
  /** Expected type or value */
  expected: string;
  /** Actual value received */
  received: unknown;
  /** Human-readable error message */
  message: string;
}

/**
 * Result of a validation operation
 */
export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; errors: ValidationError[] };

// ============================================================================
// Compiled Validators
// ============================================================================

/**
 * Compiled checkers are expensive to create, so they are cached per schema
 */
const compilerCache = new Map<TSchema, TypeCheck<TSchema>>();

function getCompiler<T extends TSchema>(schema: T): TypeCheck<T> {
  const cached = compilerCache.get(schema);
  if (cached) {
    return cached as TypeCheck<T>;
  }
  const compiler = TypeCompiler.Compile(schema);
  compilerCache.set(schema, compiler);
  return compiler;
}

// ============================================================================
// Core Validation Functions
// ============================================================================

function getSchemaTypeName(schema: TSchema): string {
  if (schema.$id) return String(schema.$id);
  if (schema.type) return String(schema.type);
  if (schema.anyOf) return 'union';
  if (schema.const !== undefined) return `literal(${JSON.stringify(schema.const)})`;
  return 'unknown';
}

function convertError(error: ValueError): ValidationError {
  return {
    path: error.path,
    expected: getSchemaTypeName(error.schema),
    received: error.value,
    message: error.message,
  };
}

/**
 * Validate data against a TypeBox schema
 *
 * @returns Validation result with typed data or errors
 */
export function validate<T extends TSchema>(schema: T, data: unknown): ValidationResult<Static<T>> {
  const compiler = getCompiler(schema);

  if (compiler.Check(data)) {
    return { success: true, data };
  }

  return {
    success: false,
    errors: [...compiler.Errors(data)].map(convertError),
  };
}

/**
 * Format validation errors as a single line, e.g. `/Global/Log_Level: Expected string`
 */
export function formatValidationErrors(errors: ValidationError[]): string {
  return errors.map((e) => `${e.path || '/'}: ${e.message}`).join('; ');
}
