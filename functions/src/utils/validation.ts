import { z } from 'zod';
import { InvalidFeatureError } from './errors';

// Multipart form fields arrive as strings; blanks count as missing.
export const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const fromFormField = (value: unknown) => {
  const present = blankToUndefined(value);
  return typeof present === 'string' ? Number(present) : present;
};

export function numeric(schema: z.ZodNumber = z.number()) {
  return z.preprocess(fromFormField, schema.finite());
}

export function optionalNumeric(schema: z.ZodNumber = z.number()) {
  return z.preprocess(fromFormField, schema.finite().optional());
}

export function numericWithDefault(schema: z.ZodNumber, fallback: number) {
  return z.preprocess(fromFormField, schema.finite().default(fallback));
}

export function optionalText() {
  return z.preprocess(blankToUndefined, z.string().trim().min(1).optional());
}

export function parseWith<T extends z.ZodTypeAny>(schema: T, value: unknown, context: string): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) throw InvalidFeatureError.fromIssues(context, result.error.issues);
  return result.data;
}
