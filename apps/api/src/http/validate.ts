import type { FastifyRequest } from 'fastify';
import type { ZodError, ZodType, ZodTypeDef } from 'zod';
import type { FieldErrors } from '@smart-recipe/shared';
import { ApiError } from './errors';

export const NON_FIELD_ERRORS = 'nonFieldErrors';

// Issues keyed by their top-level field; object-level refinements land under nonFieldErrors
export function toFieldErrors(error: ZodError): FieldErrors {
  const errors: FieldErrors = {};
  for (const issue of error.issues) {
    const key = issue.path.length > 0 ? String(issue.path[0]) : NON_FIELD_ERRORS;
    (errors[key] ??= []).push(issue.message);
  }
  return errors;
}

export function parseInput<Output, Input>(
  schema: ZodType<Output, ZodTypeDef, Input>,
  value: unknown,
  message = 'Validation failed'
): Output {
  const result = schema.safeParse(value ?? {});
  if (!result.success) {
    throw new ApiError({ code: 'BAD_REQUEST', message, data: toFieldErrors(result.error) });
  }
  return result.data;
}

// Reads a single query-string value (repeated keys keep the first)
export function queryParam(query: unknown, key: string): string | undefined {
  if (typeof query !== 'object' || query === null) return undefined;
  const value: unknown = Reflect.get(query, key);
  if (Array.isArray(value)) {
    const first: unknown = value[0];
    return typeof first === 'string' ? first : undefined;
  }
  return typeof value === 'string' ? value : undefined;
}

export function pathParam(request: FastifyRequest, key: string): string {
  const value = queryParam(request.params, key);
  if (value === undefined) {
    throw new ApiError({ code: 'NOT_FOUND', message: 'Not found' });
  }
  return value;
}
