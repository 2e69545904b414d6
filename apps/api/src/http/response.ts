import type { ApiEnvelope } from '@smart-recipe/shared';

export function ok<T>(data: T, message = 'Success'): ApiEnvelope<T> {
  return { code: 200, message, data };
}

export function envelope<T>(code: number, message: string, data: T): ApiEnvelope<T> {
  return { code, message, data };
}
