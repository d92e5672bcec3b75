import { z, ZodError, ZodTypeAny } from 'zod';
import { FieldError, RequestLocation, ValidationError } from '../utils/errors';

function toFieldErrors(error: ZodError, location: RequestLocation): FieldError[] {
  return error.issues.map((issue) => ({
    location,
    field: issue.path.join('.'),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Parses one part of the request against a schema, throwing a
 * ValidationError (422) that lists every failing field.
 */
export function parseRequest<S extends ZodTypeAny>(
  schema: S,
  input: unknown,
  location: RequestLocation
): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(toFieldErrors(result.error, location));
  }
  return result.data;
}
