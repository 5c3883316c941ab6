import { BadRequestException } from '@nestjs/common';
import type { ZodError, ZodTypeAny, output } from 'zod';

export type FieldError = {
  path: string;
  message: string;
};

/**
 * Field errors ordered by path, then message, so responses are stable.
 * Issues without a path (e.g. a non-object body) are keyed by their code.
 */
export function fieldErrors(error: ZodError): FieldError[] {
  return error.issues
    .map((issue) => ({
      path: issue.path.length > 0 ? issue.path.join('.') : issue.code,
      message: issue.message,
    }))
    .sort((a, b) => a.path.localeCompare(b.path) || a.message.localeCompare(b.message));
}

export function parseOrThrow<S extends ZodTypeAny>(
  schema: S,
  input: unknown,
  message = 'Invalid request',
): output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new BadRequestException({ message, errors: fieldErrors(result.error) });
  }
  return result.data;
}
