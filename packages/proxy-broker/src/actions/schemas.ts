import { z } from 'zod';

const booleanFromCliSchema = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true');

function optionalText(message: string) {
  return z
    .preprocess((value) => {
      if (typeof value === 'string') {
        const trimmed = value.trim();
        return trimmed.length ? trimmed : undefined;
      }

      return value;
    }, z.string().min(1, message))
    .optional();
}

function positiveInteger(name: string, fallback: number) {
  return z
    .preprocess(
      (value) => {
        if (value === undefined) {
          return fallback;
        }

        if (typeof value === 'string') {
          const parsedValue = Number(value);
          return Number.isFinite(parsedValue) ? parsedValue : value;
        }

        return value;
      },
      z
        .number({ invalid_type_error: `Invalid --${name}. Provide a positive integer.` })
        .int(`Invalid --${name}. Provide a positive integer.`)
        .min(1, `Invalid --${name}. Provide a positive integer.`),
    )
    .default(fallback);
}

export { booleanFromCliSchema, optionalText, positiveInteger };
