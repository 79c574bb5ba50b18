import { z } from 'zod';

export function requiredText(max: number) {
  return z.string().trim().min(1, 'is required').max(max);
}

// null and blank both clear the field
export function optionalText(max: number) {
  return z
    .string()
    .trim()
    .max(max)
    .nullish()
    .transform(value => (value ? value : undefined));
}

export function optionalDate() {
  return z
    .string()
    .date('must be a YYYY-MM-DD date')
    .nullish()
    .transform(value => value ?? undefined);
}

export function identifier() {
  return z.string().trim().min(1, 'is required').max(64);
}
