import { z } from 'zod';
import { LogPayload } from './types';

export const NOT_AN_OBJECT = 'JSON body must be an object';
export const NOT_NUMBERS = 'Latitude and longitude must be numbers';

const coordinate = (label: string, min: number, max: number) => {
  const outOfRange = `${label} must be between ${min} and ${max}`;
  return z
    .number({ invalid_type_error: NOT_NUMBERS })
    .gte(min, { message: outOfRange })
    .lte(max, { message: outOfRange })
    .nullable();
};

export const logPayloadSchema = z
  .object({
    latitude: coordinate('Latitude', -90, 90),
    longitude: coordinate('Longitude', -180, 180),
  })
  .strict()
  .refine(p => (p.latitude === null) === (p.longitude === null), { message: NOT_NUMBERS });

export type ParsedLogPayload =
  | { ok: true; payload: LogPayload }
  | { ok: false; error: string };

const describeIssues = (issues: z.ZodIssue[]): string => {
  const missing = issues
    .filter(i => i.code === z.ZodIssueCode.invalid_type && i.received === z.ZodParsedType.undefined)
    .map(i => String(i.path[0]))
    .sort();
  if (missing.length > 0) {
    return `Missing fields: ${missing.join(', ')}`;
  }

  const extra = issues
    .flatMap(i => (i.code === z.ZodIssueCode.unrecognized_keys ? i.keys : []))
    .sort();
  if (extra.length > 0) {
    return `Unexpected fields: ${extra.join(', ')}`;
  }

  if (issues.some(i => i.code === z.ZodIssueCode.invalid_type || i.code === z.ZodIssueCode.custom)) {
    return NOT_NUMBERS;
  }

  const range = issues.find(i => i.code === z.ZodIssueCode.too_small || i.code === z.ZodIssueCode.too_big);
  return range ? range.message : NOT_NUMBERS;
};

/**
 * Checks a raw request body against the log payload contract. Both coordinates
 * must be present; they are either both numbers within range or both null.
 */
export function parseLogPayload(body: unknown): ParsedLogPayload {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    return { ok: false, error: NOT_AN_OBJECT };
  }

  const result = logPayloadSchema.safeParse(body);
  if (!result.success) {
    return { ok: false, error: describeIssues(result.error.issues) };
  }
  return { ok: true, payload: result.data };
}
