import { z } from 'zod';

const TRUE_VALUES = new Set(['true', '1', 'yes', 'on']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'off']);

/** Query-string boolean: `z.coerce.boolean()` would read "false" as true. */
export const QueryBooleanSchema = z
  .union([z.boolean(), z.string()])
  .transform((value, ctx) => {
    if (typeof value === 'boolean') return value;
    const normalized = value.trim().toLowerCase();
    if (TRUE_VALUES.has(normalized)) return true;
    if (FALSE_VALUES.has(normalized)) return false;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected a boolean' });
    return z.NEVER;
  });

/**
 * Object keys are slash-separated paths inside a bucket. Absolute paths, empty
 * segments and parent references are rejected.
 */
export const ObjectKeySchema = z
  .string()
  .min(1)
  .max(1024)
  .refine((key) => !key.startsWith('/'), { message: 'Key must not start with "/"' })
  .refine((key) => !/[\u0000-\u001f\\]/.test(key), { message: 'Key contains invalid characters' })
  .refine((key) => key.split('/').every((segment) => segment !== '' && segment !== '.' && segment !== '..'), {
    message: 'Key contains an empty or relative segment',
  });

/** Accepts "jpg", ".JPG" or "Jpeg" and yields a lower-cased, dot-prefixed extension. */
export const ExtensionFilterSchema = z
  .string()
  .trim()
  .min(1)
  .max(10)
  .regex(/^\.?[a-zA-Z0-9]+$/, 'Invalid file extension')
  .transform((value) => `.${value.toLowerCase().replace(/^\./, '')}`);
