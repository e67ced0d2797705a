import { z, ZodTypeAny } from 'zod';
import { InvalidArgumentError } from '@/lib/errors';

/**
 * Parses untrusted input against a zod schema. The first issue becomes an InvalidArgumentError
 * naming the offending field.
 */
export const parseInput = <S extends ZodTypeAny>(schema: S, input: unknown): z.infer<S> => {
  const result = schema.safeParse(input);
  if (result.success) {
    return result.data;
  }
  const [issue] = result.error.issues;
  const field = issue.path.join('.');
  throw new InvalidArgumentError(field ? `${field}: ${issue.message}` : issue.message);
};
