/**
 * Runtime validation of inbound payloads using TypeBox schemas.
 */

import { TypeCompiler, type TypeCheck } from '@sinclair/typebox/compiler';
import type { ValueError } from '@sinclair/typebox/value';
import type { TSchema, Static } from '@sinclair/typebox';
import { InvalidMessageError } from './errors.js';

// ============================================================================
// Validation Error Types
// ============================================================================

/**
 * Validation error with detailed information
 */
export interface ValidationIssue {
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
  | { success: false; errors: ValidationIssue[] };

// ============================================================================
// Compiled Validators
// ============================================================================

/**
 * TypeBox compilers are expensive to create, so they are cached per schema
 */
const compilerCache = new WeakMap<TSchema, TypeCheck<TSchema>>();

function getCompiler<T extends TSchema>(schema: T): TypeCheck<T> {
  const cached = compilerCache.get(schema);
  if (cached) {
    return cached as TypeCheck<T>;
  }
  const compiler = TypeCompiler.Compile(schema);
  compilerCache.set(schema, compiler);
  return compiler;
}

function getSchemaTypeName(schema: TSchema): string {
  if (schema.$id) return String(schema.$id);
  if (typeof schema.type === 'string') return schema.type;
  if (schema.anyOf) return 'union';
  if (schema.const !== undefined) return `literal(${JSON.stringify(schema.const)})`;
  return 'unknown';
}

function convertError(error: ValueError): ValidationIssue {
  return {
    path: error.path,
    expected: getSchemaTypeName(error.schema),
    received: error.value,
    message: error.message,
  };
}

// ============================================================================
// Core Validation Functions
// ============================================================================

/**
 * Validate data against a TypeBox schema
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
 * Validate data and throw an InvalidMessageError if invalid
 */
export function validateOrThrow<T extends TSchema>(
  schema: T,
  data: unknown,
  what = 'message'
): Static<T> {
  const result = validate(schema, data);

  if (!result.success) {
    const summary = result.errors.map((e) => `${e.path || '/'}: ${e.message}`).join('; ');
    throw new InvalidMessageError(`Invalid ${what}: ${summary}`, {
      details: { errors: result.errors },
    });
  }

  return result.data;
}

/**
 * Boolean check only
 */
export function isValid<T extends TSchema>(schema: T, data: unknown): data is Static<T> {
  return getCompiler(schema).Check(data);
}
